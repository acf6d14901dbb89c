import type { FastifyInstance } from "fastify";

export async function registerHealthRoute(
  app: FastifyInstance,
  info: { environment: string; region: string },
): Promise<void> {
  app.get("/healthz", async () => {
    return {
      ok: true,
      timestamp: new Date().toISOString(),
      environment: info.environment,
      region: info.region,
    };
  });
}
