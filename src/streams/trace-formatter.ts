import { describeError } from "../lib/errors.js";
import type { Logger } from "../lib/logger.js";
import { pushSafely, type TraceSink } from "../lib/trace-sink.js";
import type { InvocationEvent } from "../types/agent.js";

const REMOTE_EXCEPTION_MEMBERS = [
  "accessDeniedException",
  "badGatewayException",
  "conflictException",
  "dependencyFailedException",
  "internalServerException",
  "modelNotReadyException",
  "resourceNotFoundException",
  "serviceQuotaExceededException",
  "throttlingException",
  "validationException",
] as const;

const TROUBLESHOOTING: Array<{ marker: string; fragment: string }> = [
  {
    marker: "ResourceNotFoundException",
    fragment: [
      "Troubleshooting ResourceNotFoundException:",
      "1. Verify the agent id",
      "2. Verify the agent alias id",
      "3. Check that the agent lives in the configured region",
      "4. Check that the agent status is PREPARED",
      "5. Check IAM permissions for bedrock:InvokeAgent",
    ].join("\n"),
  },
  {
    marker: "AccessDeniedException",
    fragment: "Access denied: check IAM permissions for bedrock:InvokeAgent",
  },
];

/** The remote service ended the stream with one of its exception members. */
export class RemoteStreamError extends Error {
  constructor(name: string, message: string) {
    super(message);
    this.name = name;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function hasToISOString(value: unknown): value is { toISOString(): string } {
  return (
    typeof value === "object" &&
    value !== null &&
    "toISOString" in value &&
    typeof value.toISOString === "function"
  );
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

/** Replaces timestamps with ISO-8601 strings; key order and every other value are kept. */
export function serializeTraceData(value: unknown): unknown {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? "Invalid Date" : value.toISOString();
  }

  if (hasToISOString(value)) {
    return String(value.toISOString());
  }

  if (typeof value === "bigint") {
    return value.toString();
  }

  if (ArrayBuffer.isView(value)) {
    return `[${value.byteLength} bytes]`;
  }

  if (Array.isArray(value)) {
    return value.map((item) => serializeTraceData(item));
  }

  if (isRecord(value)) {
    return Object.fromEntries(
      Object.entries(value).map(([key, item]) => [key, serializeTraceData(item)]),
    );
  }

  return value;
}

export function formatStructured(value: unknown): string {
  return JSON.stringify(serializeTraceData(value), null, 2) ?? "null";
}

export function formatStep(step: number, body: string): string {
  return `Step ${step}: ${body}`;
}

/**
 * Maps one raw event of the remote completion stream onto an
 * {@link InvocationEvent}. Shapes it does not know return `undefined`.
 */
export function toInvocationEvent(raw: unknown): InvocationEvent | undefined {
  if (!isRecord(raw)) {
    return undefined;
  }

  const chunk = raw.chunk;
  if (isRecord(chunk)) {
    return chunk.bytes instanceof Uint8Array ? { type: "chunk", bytes: chunk.bytes } : undefined;
  }

  const tracePart = raw.trace;
  if (isRecord(tracePart)) {
    const trace = tracePart.trace;
    if (!isRecord(trace)) {
      return undefined;
    }

    const orchestration = trace.orchestrationTrace;
    if (isRecord(orchestration)) {
      if ("rationale" in orchestration) {
        const rationale = orchestration.rationale;
        const text = isRecord(rationale) ? rationale.text : rationale;
        return {
          type: "orchestration",
          rationaleText: typeof text === "string" ? text : "",
          hasModelInput: "modelInvocationInput" in orchestration,
          payload: orchestration,
        };
      }

      return {
        type: "orchestration",
        hasModelInput: "modelInvocationInput" in orchestration,
        payload: orchestration,
      };
    }

    const failure = trace.failureTrace;
    if (isRecord(failure)) {
      return { type: "failure", payload: failure };
    }

    const postProcessing = trace.postProcessingTrace;
    if (isRecord(postProcessing)) {
      const output = postProcessing.modelInvocationOutput;
      const parsed = isRecord(output) ? output.parsedResponse : undefined;
      return isRecord(parsed) && "text" in parsed
        ? { type: "post_processing", parsedResponse: parsed.text }
        : undefined;
    }

    return undefined;
  }

  for (const member of REMOTE_EXCEPTION_MEMBERS) {
    const exception = raw[member];
    if (isRecord(exception)) {
      const message = typeof exception.message === "string" ? exception.message : member;
      return { type: "remote_error", name: capitalize(member), message };
    }
  }

  return undefined;
}

export interface TraceFormatter {
  consume(event: InvocationEvent): void;
  fail(error: unknown): void;
  readonly finalText: string;
  readonly traceText: string;
  readonly fragments: readonly string[];
  readonly stepCount: number;
}

/** Single-invocation reducer: build a fresh one for every call. */
export function createTraceFormatter(options: { sink: TraceSink; logger: Logger }): TraceFormatter {
  const decoder = new TextDecoder("utf-8");
  const fragments: string[] = [];
  let finalText = "";
  let step = 0;

  const append = (fragment: string): void => {
    fragments.push(fragment);
    pushSafely(options.sink, fragment, options.logger);
  };

  return {
    consume(event) {
      switch (event.type) {
        case "chunk":
          // Last chunk wins; chunks are not concatenated.
          finalText = decoder.decode(event.bytes);
          return;
        case "orchestration":
          if (event.rationaleText !== undefined) {
            step += 1;
            append(formatStep(step, event.rationaleText));
          } else if (!event.hasModelInput) {
            append(formatStructured(event.payload));
          }
          return;
        case "failure":
          append(formatStructured(event.payload));
          return;
        case "post_processing": {
          step += 1;
          const body =
            typeof event.parsedResponse === "string"
              ? event.parsedResponse
              : formatStructured(event.parsedResponse);
          append(formatStep(step, body));
          return;
        }
        case "remote_error":
          throw new RemoteStreamError(event.name, event.message);
      }
    },
    fail(error) {
      const message = describeError(error);
      append(`Error: ${message}`);

      const name = error instanceof Error ? error.name : "";
      const hint = TROUBLESHOOTING.find(
        (entry) => name === entry.marker || message.includes(entry.marker),
      );
      if (hint) {
        append(hint.fragment);
      }
    },
    get finalText() {
      return finalText;
    },
    get traceText() {
      return fragments.join("\n\n");
    },
    get fragments() {
      return fragments;
    },
    get stepCount() {
      return step;
    },
  };
}
