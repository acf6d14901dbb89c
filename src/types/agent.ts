export interface AgentIdentity {
  readonly agentId: string;
  readonly agentAliasId: string;
  readonly region: string;
}

export interface AgentInvocationRequest {
  agentId: string;
  agentAliasId: string;
  sessionId: string;
  inputText: string;
  enableTrace: true;
}

export type InvocationEvent =
  | {
      type: "chunk";
      bytes: Uint8Array;
    }
  | {
      type: "orchestration";
      rationaleText?: string;
      hasModelInput: boolean;
      payload: Record<string, unknown>;
    }
  | {
      type: "failure";
      payload: Record<string, unknown>;
    }
  | {
      type: "post_processing";
      parsedResponse: unknown;
    }
  | {
      type: "remote_error";
      name: string;
      message: string;
    };

export interface InvocationResult {
  readonly finalText: string;
  readonly traceText: string;
}
