export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }

  return String(error);
}

/** Missing or invalid agent settings. Raised at load or construction time, never during a call. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export type AgentInvocationErrorCode =
  | "INVALID_INPUT"
  | "INVOCATION_IN_PROGRESS"
  | "INVOCATION_FAILED";

/**
 * A failed call to the remote agent. `traceText` holds whatever trace was
 * rendered before the failure, including the error fragment itself.
 */
export class AgentInvocationError extends Error {
  readonly code: AgentInvocationErrorCode;
  readonly traceText: string;

  constructor(options: {
    code: AgentInvocationErrorCode;
    message: string;
    traceText?: string;
    cause?: unknown;
  }) {
    super(
      options.message,
      options.cause === undefined ? undefined : { cause: options.cause },
    );
    this.name = "AgentInvocationError";
    this.code = options.code;
    this.traceText = options.traceText ?? "";
  }
}
