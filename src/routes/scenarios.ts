import type { FastifyInstance } from "fastify";

import type { Scenario } from "../types/config.js";

export async function registerScenariosRoute(
  app: FastifyInstance,
  scenarios: Scenario[],
): Promise<void> {
  app.get("/api/scenarios", async () => {
    return { scenarios };
  });
}
