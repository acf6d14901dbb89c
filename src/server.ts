import Fastify, { type FastifyInstance } from "fastify";

import { loadAppConfig } from "./config/env.js";
import { loadScenarios } from "./config/scenarios.js";
import { createAgentClient } from "./lib/agent.js";
import { createBedrockTransport, type AgentTransport } from "./lib/bedrock.js";
import { createConversationRegistry } from "./lib/conversations.js";
import { createLogger, type Logger } from "./lib/logger.js";
import { registerHealthRoute } from "./routes/health.js";
import { registerIncidentStreamRoute } from "./routes/incident-stream.js";
import { registerScenariosRoute } from "./routes/scenarios.js";
import type { AppConfig, Scenario } from "./types/config.js";

export async function buildServer(options?: {
  config?: AppConfig;
  logger?: Logger;
  transport?: AgentTransport;
  scenarios?: Scenario[];
}): Promise<FastifyInstance> {
  const config = options?.config ?? loadAppConfig();
  const logger = options?.logger ?? createLogger(config.debug, "server");
  const transport =
    options?.transport ??
    createBedrockTransport({
      region: config.agent.region,
      readTimeoutMs: config.agent.readTimeoutMs,
      maxAttempts: config.agent.maxAttempts,
      logger,
    });
  const scenarios =
    options?.scenarios ?? loadScenarios({ path: config.scenariosPath, logger });

  const createClient = () =>
    createAgentClient({
      environmentName: config.environmentName,
      agentId: config.agent.agentId,
      agentAliasId: config.agent.agentAliasId,
      region: config.agent.region,
      transport,
      logger,
    });

  // Fail at startup rather than on the first request.
  createClient();

  const conversations = createConversationRegistry({
    createClient,
    maxConversations: config.maxConversations,
    logger,
  });

  const app = Fastify({
    logger: false,
  });

  await registerHealthRoute(app, {
    environment: config.environmentName,
    region: config.agent.region,
  });
  await registerScenariosRoute(app, scenarios);
  await registerIncidentStreamRoute({
    app,
    conversations,
    logger,
  });

  app.addHook("onClose", async () => {
    transport.close();
  });

  return app;
}

async function start(): Promise<void> {
  const config = loadAppConfig();
  const logger = createLogger(config.debug, "server");
  const app = await buildServer({ config, logger });

  try {
    await app.listen({
      host: "0.0.0.0",
      port: config.port,
    });
    logger.info("Server started", {
      port: config.port,
      environment: config.environmentName,
      region: config.agent.region,
      agentId: config.agent.agentId,
      agentAliasId: config.agent.agentAliasId,
    });
  } catch (error) {
    logger.error("Failed to start server", {
      error,
    });
    process.exitCode = 1;
  }
}

if (import.meta.url === `file://${process.argv[1]}`) {
  start().catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  });
}
