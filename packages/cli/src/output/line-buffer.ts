export type LineBuffer = {
  push(chunk: string): void;
  /** Emits whatever partial line is still held. */
  end(): void;
};

/**
 * Accumulates chunks and emits complete lines (split on newline). Partial
 * trailing content is held until the next chunk completes the line or
 * `end()` is called. Blank lines are dropped.
 */
export function createLineBuffer(onLine: (line: string) => void): LineBuffer {
  let buffer = "";

  return {
    push(chunk) {
      buffer += chunk;
      const lines = buffer.split("\n");
      buffer = lines.pop() ?? "";
      for (const line of lines) {
        if (line.trim()) onLine(line);
      }
    },
    end() {
      const rest = buffer;
      buffer = "";
      if (rest.trim()) onLine(rest);
    },
  };
}
