import {
  BedrockAgentRuntimeClient,
  InvokeAgentCommand,
} from "@aws-sdk/client-bedrock-agent-runtime";

import type { AgentInvocationRequest } from "../types/agent.js";
import type { Logger } from "./logger.js";

export interface AgentTransport {
  invoke(request: AgentInvocationRequest): Promise<AsyncIterable<unknown>>;
  close(): void;
}

export const DEFAULT_REGION = "us-east-1";

export function createBedrockTransport(options: {
  region: string;
  readTimeoutMs: number;
  maxAttempts: number;
  logger: Logger;
}): AgentTransport {
  // Credentials come from the SDK default provider chain.
  const client = new BedrockAgentRuntimeClient({
    region: options.region,
    maxAttempts: options.maxAttempts,
    requestHandler: {
      requestTimeout: options.readTimeoutMs,
    },
  });

  options.logger.debug("Bedrock agent runtime client created", {
    region: options.region,
    readTimeoutMs: options.readTimeoutMs,
    maxAttempts: options.maxAttempts,
  });

  return {
    async invoke(request) {
      const response = await client.send(
        new InvokeAgentCommand({
          agentId: request.agentId,
          agentAliasId: request.agentAliasId,
          sessionId: request.sessionId,
          inputText: request.inputText,
          enableTrace: request.enableTrace,
        }),
      );

      if (!response.completion) {
        throw new Error("InvokeAgent response did not include a completion stream");
      }

      return response.completion;
    },
    close() {
      client.destroy();
    },
  };
}
