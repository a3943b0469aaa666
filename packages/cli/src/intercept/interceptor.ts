import type { ConsoleStream, OwnerScheduler, WriteCallback } from "@linetap/sdk";
import type { StreamState } from "./stream-state";

const LINE_TERMINATOR = "\n";

/**
 * Splits every write into an immediate terminal echo and a buffered log
 * path. Text ending in a newline ships at once on the caller; anything
 * else waits for one deferred flush on the owner loop so fragments from
 * several writes coalesce into one line.
 */
export class StreamInterceptor implements ConsoleStream {
  // Stable identity so the scheduler can recognise a repeated request.
  private readonly deferredShip = (): void => this.shipLog();

  constructor(
    readonly state: StreamState,
    private readonly scheduler: OwnerScheduler,
  ) {}

  write(text: string, done?: WriteCallback): boolean {
    const accepted = this.state.passthrough(text, done);
    this.record(text);
    return accepted;
  }

  /**
   * The log half of `write`, for callers that have already echoed the
   * raw chunk themselves and only hand over its decoded text.
   */
  record(text: string): void {
    this.state.append(text);
    if (text.endsWith(LINE_TERMINATOR)) {
      this.shipLog();
    } else if (this.state.requestSchedule()) {
      this.scheduler.schedule(this.deferredShip, { fromOtherContext: true, quiet: true });
    }
  }

  flush(): void {
    this.state.underlying.flush();
  }

  isatty(): boolean {
    return this.state.underlying.isatty();
  }

  /** Ships everything buffered as one line. No-op when nothing is pending. */
  shipLog(): void {
    this.state.clearScheduled();

    let line = this.state.takePending();
    if (!line) return;

    // Log lines carry no trailing terminator.
    if (line.endsWith(LINE_TERMINATOR)) {
      line = line.slice(0, -LINE_TERMINATOR.length);
    }
    this.state.logSink(line, false);
  }
}
