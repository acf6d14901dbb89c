import { resolve } from "node:path";

import dotenv from "dotenv";
import { z } from "zod";

import { DEFAULT_REGION } from "../lib/bedrock.js";
import { ConfigurationError } from "../lib/errors.js";
import type { AppConfig } from "../types/config.js";

dotenv.config();

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) {
    return fallback;
  }

  const normalized = value.trim().toLowerCase();
  return normalized === "1" || normalized === "true" || normalized === "yes";
}

const envSchema = z.object({
  BEDROCK_AGENT_ID: z.string().optional(),
  BEDROCK_AGENT_ALIAS_ID: z.string().optional(),
  AWS_REGION: z.string().optional(),
  ENVIRONMENT_NAME: z.string().optional(),
  DEBUG: z.string().optional(),
  PORT: z.coerce.number().int().positive().optional(),
  SCENARIOS_PATH: z.string().optional(),
  BEDROCK_READ_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  BEDROCK_MAX_ATTEMPTS: z.coerce.number().int().positive().optional(),
  MAX_CONVERSATIONS: z.coerce.number().int().positive().optional(),
});

export function loadAppConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join(".")).join(", ");
    throw new ConfigurationError(`Invalid environment configuration: ${fields}`);
  }

  const env = parsed.data;
  const projectRoot = process.cwd();

  return {
    debug: parseBoolean(env.DEBUG, false),
    port: env.PORT ?? 3000,
    projectRoot,
    environmentName: env.ENVIRONMENT_NAME?.trim() || "development",
    agent: {
      agentId: env.BEDROCK_AGENT_ID?.trim() ?? "",
      agentAliasId: env.BEDROCK_AGENT_ALIAS_ID?.trim() ?? "",
      region: env.AWS_REGION?.trim() || DEFAULT_REGION,
      readTimeoutMs: env.BEDROCK_READ_TIMEOUT_MS ?? 600_000,
      maxAttempts: env.BEDROCK_MAX_ATTEMPTS ?? 3,
    },
    scenariosPath: resolve(projectRoot, env.SCENARIOS_PATH ?? "./scenarios.yaml"),
    maxConversations: env.MAX_CONVERSATIONS ?? 100,
  };
}
