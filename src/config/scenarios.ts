import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";

import YAML from "yaml";
import { z } from "zod";

import { ConfigurationError } from "../lib/errors.js";
import type { Logger } from "../lib/logger.js";
import type { Scenario } from "../types/config.js";

const scenarioSchema = z.object({
  id: z.string().min(1),
  title: z.string().min(1),
  severity: z.enum(["critical", "high", "medium", "low"]),
  description: z.string().min(1),
});

const scenarioFileSchema = z.object({
  scenarios: z.array(scenarioSchema).optional().default([]),
});

function parseScenarioFile(path: string): z.infer<typeof scenarioFileSchema> {
  const raw = readFileSync(path, "utf8");
  const parsed = YAML.parse(raw) as unknown;
  const result = scenarioFileSchema.safeParse(parsed ?? {});
  if (!result.success) {
    const fields = result.error.issues.map((issue) => issue.path.join(".")).join(", ");
    throw new ConfigurationError(`Invalid scenario file ${path}: ${fields}`);
  }

  return result.data;
}

export function loadScenarios(options: { path: string; logger: Logger }): Scenario[] {
  const sourcePath = resolve(options.path);

  if (!existsSync(sourcePath)) {
    options.logger.warn("Scenario file does not exist, no demo scenarios loaded", {
      sourcePath,
    });
    return [];
  }

  const file = parseScenarioFile(sourcePath);
  const seen = new Set<string>();

  for (const scenario of file.scenarios) {
    if (seen.has(scenario.id)) {
      throw new ConfigurationError(`Duplicate scenario id: ${scenario.id}`);
    }
    seen.add(scenario.id);
  }

  options.logger.debug("Loaded scenarios", {
    sourcePath,
    scenarios: [...seen],
  });

  return file.scenarios.map((scenario) => ({
    ...scenario,
    description: scenario.description.trim(),
  }));
}

export function findScenario(scenarios: Scenario[], key: string): Scenario | undefined {
  const index = Number.parseInt(key, 10);
  if (String(index) === key.trim() && index >= 1) {
    return scenarios[index - 1];
  }

  return scenarios.find((scenario) => scenario.id === key.trim());
}
