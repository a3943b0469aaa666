export type StreamName = "stdout" | "stderr";

export type WriteCallback = (err?: Error | null) => void;

/**
 * Echoes raw text to the real terminal stream. Called synchronously on
 * every write, before any buffering. Returns the stream's backpressure
 * signal.
 */
export type PassthroughSink = (text: string, done?: WriteCallback) => boolean;

/**
 * Receives one finalized line, without its trailing newline.
 * `toStdout` asks the sink to echo the line to the terminal as well; the
 * interceptors always pass `false` because their passthrough already did.
 */
export type LogSink = (line: string, toStdout: boolean) => void;

export interface ScheduleOptions {
  /** The request may come from outside the owner loop's own turn. */
  fromOtherContext?: boolean;
  /** Do not emit a diagnostic when the operation is already queued. */
  quiet?: boolean;
}

export interface OwnerScheduler {
  /**
   * Queues `op` to run later on the owner loop and returns immediately.
   * An operation already waiting in the queue is not queued again.
   */
  schedule(op: () => void, options?: ScheduleOptions): void;
}

/** The real stream behind an interceptor. */
export interface UnderlyingStream {
  flush(): void;
  isatty(): boolean;
}

/** Drop-in surface installed in place of a process output stream. */
export interface ConsoleStream {
  write(text: string, done?: WriteCallback): boolean;
  flush(): void;
  isatty(): boolean;
}
