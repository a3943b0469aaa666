import type { LogSink, PassthroughSink, StreamName, UnderlyingStream } from "@linetap/sdk";
import { Mutex } from "./lock";

/**
 * Per-stream buffer of fragments not yet shipped as a log line.
 * `fragments` and `flushScheduled` are only touched under `lock`.
 */
export class StreamState {
  private fragments: string[] = [];
  private flushScheduled = false;
  private readonly lock = new Mutex();

  constructor(
    readonly name: StreamName,
    readonly underlying: UnderlyingStream,
    readonly passthrough: PassthroughSink,
    readonly logSink: LogSink,
  ) {}

  append(text: string): void {
    this.lock.runExclusive(() => {
      this.fragments.push(text);
    });
  }

  /** Marks a deferred flush as outstanding. False if one already is. */
  requestSchedule(): boolean {
    return this.lock.runExclusive(() => {
      if (this.flushScheduled) return false;
      this.flushScheduled = true;
      return true;
    });
  }

  clearScheduled(): void {
    this.lock.runExclusive(() => {
      this.flushScheduled = false;
    });
  }

  /** Joins and clears the pending fragments. Empty string when none. */
  takePending(): string {
    return this.lock.runExclusive(() => {
      if (this.fragments.length === 0) return "";
      const joined = this.fragments.join("");
      this.fragments = [];
      return joined;
    });
  }

  get pendingCount(): number {
    return this.lock.runExclusive(() => this.fragments.length);
  }

  get scheduled(): boolean {
    return this.lock.runExclusive(() => this.flushScheduled);
  }
}
