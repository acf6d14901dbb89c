import type { Logger } from "./logger.js";

/** Receives each rendered trace fragment as soon as it exists. */
export interface TraceSink {
  push(fragment: string): void;
}

export interface BufferSink extends TraceSink {
  readonly fragments: readonly string[];
}

export const nullSink: TraceSink = {
  push() {
    return;
  },
};

export function createBufferSink(): BufferSink {
  const fragments: string[] = [];
  return {
    fragments,
    push(fragment) {
      fragments.push(fragment);
    },
  };
}

export function createCallbackSink(callback: (fragment: string) => void): TraceSink {
  return {
    push(fragment) {
      callback(fragment);
    },
  };
}

export function pushSafely(sink: TraceSink, fragment: string, logger: Logger): void {
  try {
    sink.push(fragment);
  } catch (error) {
    logger.warn("Trace sink rejected a fragment", { error });
  }
}
