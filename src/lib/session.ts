import { randomUUID } from "node:crypto";

export interface Session {
  readonly sessionId: string;
  readonly createdAt: Date;
}

export interface SessionHolder {
  current(): Session;
  currentSessionId(): string;
  reset(): string;
}

export function createSessionHolder(options?: {
  generateId?: () => string;
  now?: () => Date;
}): SessionHolder {
  const generateId = options?.generateId ?? randomUUID;
  const now = options?.now ?? (() => new Date());
  let session: Session | undefined;

  const start = (): Session => {
    const previous = session?.sessionId;
    let sessionId = generateId();
    // A custom generator may repeat itself; a reset must still change the id.
    while (sessionId === previous) {
      sessionId = randomUUID();
    }

    session = Object.freeze({ sessionId, createdAt: now() });
    return session;
  };

  const current = (): Session => session ?? start();

  return {
    current,
    currentSessionId() {
      return current().sessionId;
    },
    reset() {
      return start().sessionId;
    },
  };
}
