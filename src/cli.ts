#!/usr/bin/env node
import { realpathSync } from "node:fs";
import { createInterface } from "node:readline/promises";
import { stdin as input } from "node:process";
import { pathToFileURL } from "node:url";

import { loadAppConfig } from "./config/env.js";
import { findScenario, loadScenarios } from "./config/scenarios.js";
import { createAgentClient, type AgentClient } from "./lib/agent.js";
import { createBedrockTransport } from "./lib/bedrock.js";
import { ConfigurationError, describeError } from "./lib/errors.js";
import { createLogger } from "./lib/logger.js";
import { createCallbackSink, nullSink } from "./lib/trace-sink.js";
import type { Scenario } from "./types/config.js";

const EXIT_INVALID_CONFIG = 2;
const EXIT_AGENT_FAILURE = 4;

export interface CliArgs {
  interactive: boolean;
  trace: boolean;
  environment?: string;
  prompt: string;
}

export function parseCliArgs(args: string[]): CliArgs {
  let interactive = false;
  let trace = false;
  let environment: string | undefined;
  const promptParts: string[] = [];

  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i] ?? "";

    if (arg === "--interactive" || arg === "-i") {
      interactive = true;
      continue;
    }

    if (arg === "--trace" || arg === "-t") {
      trace = true;
      continue;
    }

    if (arg === "--environment" || arg === "-e") {
      environment = args[i + 1];
      i += 1;
      continue;
    }

    if (arg.startsWith("--environment=")) {
      environment = arg.slice("--environment=".length);
      continue;
    }

    promptParts.push(arg);
  }

  return {
    interactive,
    trace,
    prompt: promptParts.join(" ").trim(),
    ...(environment ? { environment } : {}),
  };
}

async function readStdin(): Promise<string> {
  if (input.isTTY) {
    return "";
  }

  let content = "";
  for await (const chunk of input) {
    content += chunk.toString();
  }

  return content.trim();
}

function incidentTimestamp(): string {
  return new Date().toISOString().replace("T", " ").slice(0, 19) + " UTC";
}

async function analyzeIncident(options: {
  client: AgentClient;
  prompt: string;
  showTrace: boolean;
}): Promise<boolean> {
  process.stderr.write(`INCIDENT REPORTED: ${incidentTimestamp()}\n`);

  const sink = options.showTrace
    ? createCallbackSink((fragment) => {
        process.stderr.write(`${fragment}\n\n`);
      })
    : nullSink;

  const outcome = await options.client.invoke(options.prompt, sink);
  if (!outcome.ok) {
    process.stderr.write(`[ERROR] ${outcome.error.message}\n`);
    return false;
  }

  process.stdout.write(`${outcome.value.finalText}\n`);
  return true;
}

function describeScenarios(scenarios: Scenario[]): string {
  if (scenarios.length === 0) {
    return "No scenarios configured.";
  }

  return scenarios
    .map((scenario, index) => `${index + 1}. [${scenario.severity}] ${scenario.title} (${scenario.id})`)
    .join("\n");
}

async function runInteractive(options: {
  client: AgentClient;
  scenarios: Scenario[];
  showTrace: boolean;
}): Promise<void> {
  const rl = createInterface({
    input: process.stdin,
    output: process.stdout,
    terminal: true,
  });

  process.stderr.write(
    [
      `REPL started. environment=${options.client.environmentName} sessionId=${options.client.currentSessionId()}`,
      "Commands: /exit, /quit, /reset, /session, /scenarios, /scenario <n|id>",
    ].join("\n") + "\n",
  );

  try {
    while (true) {
      const line = (await rl.question("incident> ")).trim();
      if (!line) {
        continue;
      }

      if (line === "/exit" || line === "/quit") {
        break;
      }

      if (line === "/session") {
        process.stderr.write(`${options.client.currentSessionId()}\n`);
        continue;
      }

      if (line === "/reset") {
        process.stderr.write(`sessionId reset: ${options.client.newSession()}\n`);
        continue;
      }

      if (line === "/scenarios") {
        process.stderr.write(`${describeScenarios(options.scenarios)}\n`);
        continue;
      }

      if (line.startsWith("/scenario ")) {
        const scenario = findScenario(options.scenarios, line.slice("/scenario ".length));
        if (!scenario) {
          process.stderr.write("Unknown scenario. Use /scenarios to list them.\n");
          continue;
        }

        process.stderr.write(`${scenario.title}: ${scenario.description}\n`);
        await analyzeIncident({
          client: options.client,
          prompt: scenario.description,
          showTrace: options.showTrace,
        });
        continue;
      }

      await analyzeIncident({
        client: options.client,
        prompt: line,
        showTrace: options.showTrace,
      });
    }
  } finally {
    rl.close();
  }
}

async function run(): Promise<void> {
  const args = parseCliArgs(process.argv.slice(2));
  const config = loadAppConfig();
  const logger = createLogger(config.debug, "cli");
  const showTrace = args.trace || config.debug;

  const transport = createBedrockTransport({
    region: config.agent.region,
    readTimeoutMs: config.agent.readTimeoutMs,
    maxAttempts: config.agent.maxAttempts,
    logger,
  });

  try {
    const client = createAgentClient({
      environmentName: args.environment ?? config.environmentName,
      agentId: config.agent.agentId,
      agentAliasId: config.agent.agentAliasId,
      region: config.agent.region,
      transport,
      logger,
    });

    if (args.interactive) {
      await runInteractive({
        client,
        scenarios: loadScenarios({ path: config.scenariosPath, logger }),
        showTrace,
      });
      return;
    }

    const stdinInput = await readStdin();
    const prompt = args.prompt || stdinInput;

    if (!prompt) {
      console.error('Usage: incident-agent [--trace] [--environment <name>] "incident description"');
      console.error("       incident-agent --interactive");
      process.exitCode = 1;
      return;
    }

    const succeeded = await analyzeIncident({ client, prompt, showTrace });
    if (!succeeded) {
      process.exitCode = EXIT_AGENT_FAILURE;
    }
  } finally {
    transport.close();
  }
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (!entry) {
    return false;
  }

  try {
    return import.meta.url === pathToFileURL(realpathSync(entry)).href;
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  run().catch((error: unknown) => {
    console.error(`[ERROR] ${describeError(error)}`);
    process.exitCode = error instanceof ConfigurationError ? EXIT_INVALID_CONFIG : 1;
  });
}
