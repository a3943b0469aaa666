import { appendFile, mkdir, rm } from "node:fs/promises";
import { join, resolve } from "node:path";
import type { LogSink } from "@linetap/sdk";
import { createLog } from "../debug";
import { LinetapError } from "../errors";

const debug = createLog("logs");

export class LogWriteError extends LinetapError {
  constructor(message: string, cause?: unknown) {
    super(message, "LogWriteError", { cause });
  }
}

export function logDir(workspaceDir: string, dir: string): string {
  return resolve(workspaceDir, dir);
}

export function logFile(dir: string, category: string): string {
  return join(dir, `${category}.log`);
}

export async function initLogDir(dir: string, options: { clear: boolean }): Promise<void> {
  if (options.clear) {
    await rm(dir, { recursive: true, force: true });
  }
  await mkdir(dir, { recursive: true });
}

export function formatLogLine(text: string, timestamp: Date | null): string {
  return timestamp ? `[${timestamp.toISOString()}] ${text}\n` : `${text}\n`;
}

export async function appendLog(
  dir: string,
  category: string,
  text: string,
  timestamp: Date | null = new Date(),
): Promise<void> {
  await appendFile(logFile(dir, category), formatLogLine(text, timestamp), "utf-8");
}

/**
 * Appends lines to per-category files strictly in the order they were
 * handed over. Failures are kept and reported by `settle()`.
 */
export class LogWriter {
  private tail: Promise<void> = Promise.resolve();
  private failure: { error: unknown } | null = null;
  private written = 0;

  constructor(
    readonly dir: string,
    private readonly options: { timestamps: boolean } = { timestamps: true },
  ) {}

  get linesWritten(): number {
    return this.written;
  }

  append(category: string, text: string): void {
    const timestamp = this.options.timestamps ? new Date() : null;
    this.tail = this.tail
      .then(() => appendLog(this.dir, category, text, timestamp))
      .then(() => {
        this.written++;
      })
      .catch((error: unknown) => {
        debug("append to %s failed: %O", category, error);
        this.failure ??= { error };
      });
  }

  /** Waits for queued appends; rejects if any of them failed. */
  async settle(): Promise<void> {
    await this.tail;
    if (this.failure) {
      const { error } = this.failure;
      const reason = error instanceof Error ? error.message : String(error);
      throw new LogWriteError(`Failed to write logs in ${this.dir}: ${reason}`, error);
    }
  }
}

export function createFileLogSink(
  writer: LogWriter,
  category: string,
  echo?: (line: string) => void,
): LogSink {
  return (line, toStdout) => {
    writer.append(category, line);
    if (toStdout && echo) echo(line);
  };
}
