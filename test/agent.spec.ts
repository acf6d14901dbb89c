import { describe, expect, it } from "vitest";

import { createAgentClient, type AgentClient } from "../src/lib/agent.js";
import type { AgentTransport } from "../src/lib/bedrock.js";
import { AgentInvocationError, ConfigurationError } from "../src/lib/errors.js";
import { createLogger } from "../src/lib/logger.js";
import { createBufferSink, type TraceSink } from "../src/lib/trace-sink.js";
import type { AgentInvocationRequest } from "../src/types/agent.js";

const encoder = new TextEncoder();

const chunk = (text: string) => ({ chunk: { bytes: encoder.encode(text) } });
const rationale = (text: string) => ({
  trace: { trace: { orchestrationTrace: { rationale: { traceId: "t-1", text } } } },
});
const modelInput = () => ({
  trace: {
    trace: { orchestrationTrace: { modelInvocationInput: { traceId: "t-1", text: "raw prompt" } } },
  },
});
const postProcessing = (text: string) => ({
  trace: {
    trace: { postProcessingTrace: { modelInvocationOutput: { parsedResponse: { text } } } },
  },
});

class FakeTransport implements AgentTransport {
  readonly requests: AgentInvocationRequest[] = [];
  closed = false;

  constructor(
    private readonly events: unknown[],
    private readonly failure?: { afterEvents: number; error: Error },
  ) {}

  async invoke(request: AgentInvocationRequest): Promise<AsyncIterable<unknown>> {
    this.requests.push(request);
    if (this.failure && this.failure.afterEvents < 0) {
      throw this.failure.error;
    }

    const { events, failure } = this;
    return (async function* () {
      for (const [index, event] of events.entries()) {
        if (failure && failure.afterEvents === index) {
          throw failure.error;
        }
        yield event;
      }
    })();
  }

  close(): void {
    this.closed = true;
  }
}

class GatedTransport implements AgentTransport {
  private release: () => void = () => undefined;
  private readonly gate = new Promise<void>((resolve) => {
    this.release = resolve;
  });

  async invoke(): Promise<AsyncIterable<unknown>> {
    const gate = this.gate;
    return (async function* () {
      await gate;
      yield chunk("late answer");
    })();
  }

  open(): void {
    this.release();
  }

  close(): void {
    return;
  }
}

function buildClient(transport: AgentTransport): AgentClient {
  return createAgentClient({
    environmentName: "test",
    agentId: "AGENT1",
    agentAliasId: "ALIAS1",
    transport,
    logger: createLogger(false),
  });
}

describe("createAgentClient", () => {
  it("starts with a session and a default region", () => {
    const client = buildClient(new FakeTransport([]));

    expect(client.currentSessionId()).toMatch(/^[0-9a-f-]{36}$/);
    expect(client.identity).toEqual({ agentId: "AGENT1", agentAliasId: "ALIAS1", region: "us-east-1" });
    expect(client.environmentName).toBe("test");
  });

  it("rejects empty agent identifiers", () => {
    const base = { transport: new FakeTransport([]), logger: createLogger(false) };

    expect(() => createAgentClient({ ...base, agentId: "", agentAliasId: "ALIAS1" })).toThrow(
      ConfigurationError,
    );
    expect(() => createAgentClient({ ...base, agentId: "AGENT1", agentAliasId: "  " })).toThrow(
      "Missing agent alias id",
    );
  });

  it("issues a new session id on every reset", () => {
    const client = buildClient(new FakeTransport([]));
    const first = client.currentSessionId();
    const second = client.newSession();
    const third = client.newSession();

    expect(second).not.toBe(first);
    expect(third).not.toBe(second);
    expect(client.currentSessionId()).toBe(third);
  });
});

describe("AgentClient.invoke", () => {
  it("sends one traced request for the current session", async () => {
    const transport = new FakeTransport([chunk("ok")]);
    const client = buildClient(transport);

    await client.invoke("DB down", createBufferSink());

    expect(transport.requests).toEqual([
      {
        agentId: "AGENT1",
        agentAliasId: "ALIAS1",
        sessionId: client.currentSessionId(),
        inputText: "DB down",
        enableTrace: true,
      },
    ]);
  });

  it("keeps the session across calls until reset", async () => {
    const transport = new FakeTransport([chunk("ok")]);
    const client = buildClient(transport);

    await client.invoke("first", createBufferSink());
    await client.invoke("second", createBufferSink());
    const reset = client.newSession();
    await client.invoke("third", createBufferSink());

    const sessions = transport.requests.map((request) => request.sessionId);
    expect(sessions[0]).toBe(sessions[1]);
    expect(sessions[2]).toBe(reset);
    expect(sessions[2]).not.toBe(sessions[1]);
  });

  it("returns the last content chunk", async () => {
    const client = buildClient(new FakeTransport([chunk("A"), chunk("B")]));

    const outcome = await client.invoke("two answers", createBufferSink());

    expect(outcome.ok).toBe(true);
    expect(outcome.ok && outcome.value.finalText).toBe("B");
  });

  it("orders rationale steps", async () => {
    const client = buildClient(new FakeTransport([rationale("r1"), rationale("r2")]));

    const outcome = await client.invoke("think twice", createBufferSink());
    if (!outcome.ok) {
      throw outcome.error;
    }

    const trace = outcome.value.traceText;
    expect(trace.indexOf("Step 1")).toBeLessThan(trace.indexOf("Step 2"));
    expect(trace.indexOf("r1")).toBeLessThan(trace.indexOf("r2"));
  });

  it("adds nothing for bare model input events", async () => {
    const sink = createBufferSink();
    const client = buildClient(new FakeTransport([modelInput()]));

    const outcome = await client.invoke("noise", sink);

    expect(sink.fragments).toEqual([]);
    expect(outcome).toEqual({ ok: true, value: { finalText: "", traceText: "" } });
  });

  it("renders failure traces and skips unknown events", async () => {
    const client = buildClient(
      new FakeTransport([
        { trace: { trace: { failureTrace: { failureReason: "tool timeout" } } } },
        { returnControl: { invocationId: "i-1" } },
        chunk("answer anyway"),
      ]),
    );

    const outcome = await client.invoke("partial failure", createBufferSink());

    expect(outcome).toEqual({
      ok: true,
      value: {
        finalText: "answer anyway",
        traceText: '{\n  "failureReason": "tool timeout"\n}',
      },
    });
  });

  it("fails with the error in the trace when the transport fails up front", async () => {
    const cause = new Error("connection reset");
    const sink = createBufferSink();
    const client = buildClient(new FakeTransport([], { afterEvents: -1, error: cause }));

    const outcome = await client.invoke("DB down", sink);

    expect(outcome.ok).toBe(false);
    if (outcome.ok) {
      return;
    }
    expect(outcome.error).toBeInstanceOf(AgentInvocationError);
    expect(outcome.error.code).toBe("INVOCATION_FAILED");
    expect(outcome.error.message).toBe("Agent invocation failed: connection reset");
    expect(outcome.error.cause).toBe(cause);
    expect(sink.fragments).toEqual(["Error: connection reset"]);
    expect(outcome.error.traceText).toBe("Error: connection reset");
  });

  it("keeps the partial trace when the stream breaks", async () => {
    const client = buildClient(
      new FakeTransport([rationale("checking metrics"), chunk("never seen")], {
        afterEvents: 1,
        error: new Error("stream interrupted"),
      }),
    );

    const outcome = await client.invoke("DB down", createBufferSink());

    expect(outcome.ok).toBe(false);
    expect(!outcome.ok && outcome.error.traceText).toBe(
      "Step 1: checking metrics\n\nError: stream interrupted",
    );
  });

  it("fails on exceptions reported inside the stream", async () => {
    const sink = createBufferSink();
    const client = buildClient(
      new FakeTransport([{ throttlingException: { message: "Too many requests" } }, chunk("unused")]),
    );

    const outcome = await client.invoke("DB down", sink);

    expect(!outcome.ok && outcome.error.code).toBe("INVOCATION_FAILED");
    expect(sink.fragments).toEqual(["Error: Too many requests"]);
  });

  it("adds the access hint when the agent call is denied", async () => {
    const sink = createBufferSink();
    const error = new Error("User is not authorized to perform bedrock:InvokeAgent");
    error.name = "AccessDeniedException";
    const client = buildClient(new FakeTransport([], { afterEvents: -1, error }));

    await client.invoke("DB down", sink);

    expect(sink.fragments).toEqual([
      "Error: User is not authorized to perform bedrock:InvokeAgent",
      "Access denied: check IAM permissions for bedrock:InvokeAgent",
    ]);
  });

  it("matches troubleshooting hints by message text", async () => {
    const sink = createBufferSink();
    const error = new Error("An error occurred (ResourceNotFoundException) when calling InvokeAgent");
    const client = buildClient(new FakeTransport([], { afterEvents: -1, error }));

    await client.invoke("DB down", sink);

    expect(sink.fragments).toHaveLength(2);
    expect(sink.fragments[0]).toBe(
      "Error: An error occurred (ResourceNotFoundException) when calling InvokeAgent",
    );
    expect(sink.fragments[1]).toMatch(/^Troubleshooting ResourceNotFoundException:/);
  });

  it("adds the missing-agent hint for an in-stream not-found exception", async () => {
    const sink = createBufferSink();
    const client = buildClient(
      new FakeTransport([{ resourceNotFoundException: { message: "Agent alias not found" } }]),
    );

    const outcome = await client.invoke("DB down", sink);

    expect(!outcome.ok && outcome.error.code).toBe("INVOCATION_FAILED");
    expect(sink.fragments).toHaveLength(2);
    expect(sink.fragments[0]).toBe("Error: Agent alias not found");
    expect(sink.fragments[1]).toMatch(/^Troubleshooting ResourceNotFoundException:/);
  });

  it("rejects empty input without calling the agent", async () => {
    const transport = new FakeTransport([chunk("unused")]);
    const client = buildClient(transport);

    const outcome = await client.invoke("   ", createBufferSink());

    expect(!outcome.ok && outcome.error.code).toBe("INVALID_INPUT");
    expect(transport.requests).toHaveLength(0);
  });

  it("rejects an overlapping invocation", async () => {
    const transport = new GatedTransport();
    const client = buildClient(transport);

    const first = client.invoke("first", createBufferSink());
    expect(client.isBusy()).toBe(true);

    const second = await client.invoke("second", createBufferSink());
    expect(!second.ok && second.error.code).toBe("INVOCATION_IN_PROGRESS");

    transport.open();
    const outcome = await first;
    expect(outcome.ok && outcome.value.finalText).toBe("late answer");
    expect(client.isBusy()).toBe(false);
  });

  it("survives a sink that throws", async () => {
    const sink: TraceSink = {
      push() {
        throw new Error("display gone");
      },
    };
    const client = buildClient(new FakeTransport([rationale("r1"), chunk("done")]));

    const outcome = await client.invoke("broken display", sink);

    expect(outcome).toEqual({ ok: true, value: { finalText: "done", traceText: "Step 1: r1" } });
  });

  it("runs the incident scenario end to end", async () => {
    const sink = createBufferSink();
    const client = buildClient(
      new FakeTransport([
        rationale("checking metrics"),
        chunk("Root cause: connection pool exhaustion"),
        postProcessing("recommend scaling pool"),
      ]),
    );

    const outcome = await client.invoke("DB down", sink);

    expect(outcome).toEqual({
      ok: true,
      value: {
        finalText: "Root cause: connection pool exhaustion",
        traceText: "Step 1: checking metrics\n\nStep 2: recommend scaling pool",
      },
    });
    expect(sink.fragments).toEqual(["Step 1: checking metrics", "Step 2: recommend scaling pool"]);
  });
});
