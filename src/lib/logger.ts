export interface Logger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
  child(scope: string): Logger;
}

type Level = "DEBUG" | "INFO" | "WARN" | "ERROR";

function toSerializable(data: unknown): unknown {
  if (data instanceof Error) {
    return { name: data.name, message: data.message };
  }

  if (typeof data === "object" && data !== null && !Array.isArray(data)) {
    return Object.fromEntries(
      Object.entries(data).map(([key, value]) => [
        key,
        value instanceof Error ? { name: value.name, message: value.message } : value,
      ]),
    );
  }

  return data;
}

export function formatLine(level: Level, scope: string | undefined, message: string, data?: unknown): string {
  const prefix = scope ? `[${level}] [${scope}] ${message}` : `[${level}] ${message}`;
  if (data === undefined) {
    return prefix;
  }

  try {
    return `${prefix} ${JSON.stringify(toSerializable(data))}`;
  } catch {
    return `${prefix} [unserializable-data]`;
  }
}

export function createLogger(debugEnabled: boolean, scope?: string): Logger {
  const write = (level: Level, message: string, data?: unknown): void => {
    console.error(formatLine(level, scope, message, data));
  };

  return {
    debug(message, data) {
      if (!debugEnabled) {
        return;
      }
      write("DEBUG", message, data);
    },
    info(message, data) {
      write("INFO", message, data);
    },
    warn(message, data) {
      write("WARN", message, data);
    },
    error(message, data) {
      write("ERROR", message, data);
    },
    child(childScope) {
      return createLogger(debugEnabled, scope ? `${scope}:${childScope}` : childScope);
    },
  };
}
