import { randomUUID } from "node:crypto";

import type { AgentClient } from "./agent.js";
import type { Logger } from "./logger.js";

export interface Conversation {
  conversationId: string;
  client: AgentClient;
}

export type ConversationTurn =
  | { role: "user"; text: string; at: string }
  | { role: "assistant"; text: string; trace: string; at: string }
  | { role: "error"; text: string; trace: string; at: string };

export type NewTurn =
  | { role: "user"; text: string }
  | { role: "assistant"; text: string; trace: string }
  | { role: "error"; text: string; trace: string };

export interface ConversationRegistry {
  open(conversationId?: string): Conversation;
  get(conversationId: string): AgentClient | undefined;
  record(conversationId: string, turn: NewTurn): void;
  turns(conversationId: string): readonly ConversationTurn[] | undefined;
  /** Starts a new remote session and clears the recorded turns. */
  reset(conversationId: string): string | undefined;
  size(): number;
}

interface Entry {
  client: AgentClient;
  turns: ConversationTurn[];
}

/**
 * One agent client (and so one remote session) per conversation. Map order
 * tracks recency; idle conversations are evicted oldest first when full.
 * Turns live in memory only and go with the conversation when it is evicted.
 */
export function createConversationRegistry(options: {
  createClient: () => AgentClient;
  maxConversations: number;
  logger: Logger;
  now?: () => Date;
}): ConversationRegistry {
  const conversations = new Map<string, Entry>();
  const now = options.now ?? (() => new Date());

  const evict = (): void => {
    for (const [conversationId, { client }] of conversations) {
      if (conversations.size < options.maxConversations) {
        return;
      }

      if (client.isBusy()) {
        continue;
      }

      conversations.delete(conversationId);
      options.logger.debug("Conversation evicted", { conversationId });
    }
  };

  return {
    open(conversationId) {
      const id = conversationId?.trim() || randomUUID();
      const existing = conversations.get(id);
      if (existing) {
        conversations.delete(id);
        conversations.set(id, existing);
        return { conversationId: id, client: existing.client };
      }

      evict();
      const client = options.createClient();
      conversations.set(id, { client, turns: [] });
      options.logger.debug("Conversation opened", {
        conversationId: id,
        sessionId: client.currentSessionId(),
      });
      return { conversationId: id, client };
    },
    get(conversationId) {
      return conversations.get(conversationId)?.client;
    },
    record(conversationId, turn) {
      const entry = conversations.get(conversationId);
      if (!entry) {
        options.logger.warn("Turn recorded for unknown conversation", { conversationId });
        return;
      }

      entry.turns.push({ ...turn, at: now().toISOString() });
    },
    turns(conversationId) {
      return conversations.get(conversationId)?.turns;
    },
    reset(conversationId) {
      const entry = conversations.get(conversationId);
      if (!entry) {
        return undefined;
      }

      entry.turns = [];
      return entry.client.newSession();
    },
    size() {
      return conversations.size;
    },
  };
}
