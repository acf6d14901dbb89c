import { createTraceFormatter, toInvocationEvent } from "../streams/trace-formatter.js";
import type { AgentIdentity, InvocationResult } from "../types/agent.js";
import { DEFAULT_REGION, type AgentTransport } from "./bedrock.js";
import {
  AgentInvocationError,
  ConfigurationError,
  describeError,
  err,
  ok,
  type Result,
} from "./errors.js";
import type { Logger } from "./logger.js";
import { createSessionHolder, type SessionHolder } from "./session.js";
import type { TraceSink } from "./trace-sink.js";

export interface AgentClientOptions {
  environmentName?: string;
  agentId: string;
  agentAliasId: string;
  region?: string;
  transport: AgentTransport;
  session?: SessionHolder;
  logger: Logger;
}

export type InvocationOutcome = Result<InvocationResult, AgentInvocationError>;

export interface AgentClient {
  readonly identity: AgentIdentity;
  readonly environmentName: string;
  currentSessionId(): string;
  newSession(): string;
  isBusy(): boolean;
  invoke(inputText: string, sink: TraceSink): Promise<InvocationOutcome>;
}

/**
 * Builds a client bound to one agent alias. Nothing is sent to the remote
 * service here; an unknown agent only surfaces on the first `invoke`.
 */
export function createAgentClient(options: AgentClientOptions): AgentClient {
  const agentId = options.agentId.trim();
  const agentAliasId = options.agentAliasId.trim();

  const missing = [
    ...(agentId ? [] : ["agent id"]),
    ...(agentAliasId ? [] : ["agent alias id"]),
  ];
  if (missing.length > 0) {
    throw new ConfigurationError(`Missing ${missing.join(" and ")}`);
  }

  const identity: AgentIdentity = Object.freeze({
    agentId,
    agentAliasId,
    region: options.region?.trim() || DEFAULT_REGION,
  });
  const environmentName = options.environmentName?.trim() || "default";
  const session = options.session ?? createSessionHolder();
  const logger = options.logger.child("agent");
  let inFlight = false;

  logger.info("Agent client configured", { environment: environmentName, ...identity });

  async function run(inputText: string, sink: TraceSink): Promise<InvocationOutcome> {
    const formatter = createTraceFormatter({ sink, logger });
    const sessionId = session.currentSessionId();

    try {
      logger.debug("Invoking agent", { sessionId, agentId, agentAliasId });
      const stream = await options.transport.invoke({
        agentId,
        agentAliasId,
        sessionId,
        inputText,
        enableTrace: true,
      });

      for await (const raw of stream) {
        const event = toInvocationEvent(raw);
        if (!event) {
          logger.debug("Ignoring unrecognized stream event");
          continue;
        }

        formatter.consume(event);
      }
    } catch (error) {
      logger.error("Agent invocation failed", { sessionId, error });
      formatter.fail(error);
      return err(
        new AgentInvocationError({
          code: "INVOCATION_FAILED",
          message: `Agent invocation failed: ${describeError(error)}`,
          traceText: formatter.traceText,
          cause: error,
        }),
      );
    }

    logger.debug("Agent invocation completed", {
      sessionId,
      steps: formatter.stepCount,
      fragments: formatter.fragments.length,
    });

    return ok(
      Object.freeze({
        finalText: formatter.finalText,
        traceText: formatter.traceText,
      }),
    );
  }

  return {
    identity,
    environmentName,
    currentSessionId() {
      return session.currentSessionId();
    },
    newSession() {
      const sessionId = session.reset();
      logger.info("New session started", { sessionId });
      return sessionId;
    },
    isBusy() {
      return inFlight;
    },
    async invoke(inputText, sink) {
      if (!inputText.trim()) {
        return err(
          new AgentInvocationError({
            code: "INVALID_INPUT",
            message: "Input text must not be empty",
          }),
        );
      }

      if (inFlight) {
        return err(
          new AgentInvocationError({
            code: "INVOCATION_IN_PROGRESS",
            message: "An invocation is already running for this client",
          }),
        );
      }

      inFlight = true;
      try {
        return await run(inputText, sink);
      } finally {
        inFlight = false;
      }
    },
  };
}
