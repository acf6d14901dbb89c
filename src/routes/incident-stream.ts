import type { FastifyInstance } from "fastify";
import { z } from "zod";

import type { ConversationRegistry } from "../lib/conversations.js";
import type { Logger } from "../lib/logger.js";
import { createCallbackSink } from "../lib/trace-sink.js";
import { toSseFrame } from "../streams/sse.js";
import type { IncidentStreamEvent } from "../types/api.js";

const requestSchema = z.object({
  input: z.string().trim().min(1),
  conversationId: z.string().trim().min(1).optional(),
});

const HEARTBEAT_INTERVAL_MS = 15_000;

export async function registerIncidentStreamRoute(options: {
  app: FastifyInstance;
  conversations: ConversationRegistry;
  logger: Logger;
}): Promise<void> {
  const { app, conversations, logger } = options;

  app.post("/api/incidents/stream", async (request, reply) => {
    const bodyResult = requestSchema.safeParse(request.body);
    if (!bodyResult.success) {
      return reply.code(400).send({
        error: "Invalid request body",
        issues: bodyResult.error.issues,
      });
    }

    const body = bodyResult.data;
    const { conversationId, client } = conversations.open(body.conversationId);

    if (client.isBusy()) {
      return reply.code(409).send({
        error: "An incident analysis is already running for this conversation",
        conversationId,
      });
    }

    reply.hijack();
    reply.raw.setHeader("X-Conversation-Id", conversationId);
    reply.raw.writeHead(200, {
      "Content-Type": "text/event-stream; charset=utf-8",
      "Cache-Control": "no-cache, no-transform",
      Connection: "keep-alive",
      "X-Accel-Buffering": "no",
    });

    const send = (event: IncidentStreamEvent): void => {
      if (!reply.raw.destroyed) {
        reply.raw.write(toSseFrame(event));
      }
    };

    const heartbeat = setInterval(() => {
      if (!reply.raw.destroyed) {
        reply.raw.write(": ping\n\n");
      }
    }, HEARTBEAT_INTERVAL_MS);

    try {
      send({
        type: "session",
        conversationId,
        sessionId: client.currentSessionId(),
      });

      conversations.record(conversationId, { role: "user", text: body.input });
      const outcome = await client.invoke(
        body.input,
        createCallbackSink((fragment) => send({ type: "trace", fragment })),
      );

      if (outcome.ok) {
        conversations.record(conversationId, {
          role: "assistant",
          text: outcome.value.finalText,
          trace: outcome.value.traceText,
        });
        send({
          type: "answer",
          text: outcome.value.finalText,
          trace: outcome.value.traceText,
        });
        send({ type: "done", finishReason: "stop" });
        return;
      }

      conversations.record(conversationId, {
        role: "error",
        text: outcome.error.message,
        trace: outcome.error.traceText,
      });
      send({
        type: "error",
        message: outcome.error.message,
        code: outcome.error.code,
        trace: outcome.error.traceText,
      });
      send({ type: "done", finishReason: "error" });
    } catch (error) {
      logger.error("SSE request failed", { conversationId, error });
      send({
        type: "error",
        message: error instanceof Error ? error.message : String(error),
        code: "SSE_ROUTE_FAILED",
      });
      send({ type: "done", finishReason: "error" });
    } finally {
      clearInterval(heartbeat);
      if (!reply.raw.destroyed) {
        reply.raw.end();
      }
    }
  });

  app.get<{ Params: { conversationId: string } }>(
    "/api/conversations/:conversationId",
    async (request, reply) => {
      const { conversationId } = request.params;
      const client = conversations.get(conversationId);
      const turns = conversations.turns(conversationId);
      if (!client || !turns) {
        return reply.code(404).send({ error: "Unknown conversation", conversationId });
      }

      return {
        conversationId,
        sessionId: client.currentSessionId(),
        busy: client.isBusy(),
        turns,
      };
    },
  );

  app.post<{ Params: { conversationId: string } }>(
    "/api/conversations/:conversationId/session",
    async (request, reply) => {
      const { conversationId } = request.params;
      const client = conversations.get(conversationId);
      if (!client) {
        return reply.code(404).send({ error: "Unknown conversation", conversationId });
      }

      if (client.isBusy()) {
        return reply.code(409).send({
          error: "Cannot reset a session while an analysis is running",
          conversationId,
        });
      }

      return { conversationId, sessionId: conversations.reset(conversationId) };
    },
  );
}
