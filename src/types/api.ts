export interface IncidentStreamRequest {
  input: string;
  conversationId?: string;
}

export type IncidentStreamEvent =
  | {
      type: "session";
      conversationId: string;
      sessionId: string;
    }
  | {
      type: "trace";
      fragment: string;
    }
  | {
      type: "answer";
      text: string;
      trace: string;
    }
  | {
      type: "error";
      message: string;
      code?: string;
      trace?: string;
    }
  | {
      type: "done";
      finishReason: "stop" | "error";
    };
