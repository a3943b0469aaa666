import type { LogSink, StreamName, TapConfig } from "@linetap/sdk";
import { streamCategory } from "../config/loader";
import { createLog } from "../debug";
import { OwnerLoop } from "../dispatch/owner-loop";
import {
  installConsoleRedirect,
  type ConsoleRedirect,
  type RedirectStreams,
} from "../intercept/install";
import { createFileLogSink, initLogDir, logDir, LogWriter } from "../logs/writer";
import { formatStatus } from "../output/format";

const debug = createLog("session");

export type TapSessionOptions = {
  config: TapConfig;
  workspaceDir: string;
  /** Streams to redirect. Defaults to the process's own stdout and stderr. */
  streams?: RedirectStreams;
  scheduler?: OwnerLoop;
};

export type TapSession = {
  readonly redirect: ConsoleRedirect;
  readonly writer: LogWriter;
  readonly loop: OwnerLoop;
  readonly logDir: string;
  /** Logs a status line under the status category and echoes it to stdout. */
  announce(message: string): void;
  /** Ships deferred partial lines, restores the streams and settles the writer. */
  close(): Promise<void>;
};

export async function startTapSession(options: TapSessionOptions): Promise<TapSession> {
  const { config } = options;
  const dir = logDir(options.workspaceDir, config.logs.dir);
  await initLogDir(dir, { clear: config.logs.clearOnStart });
  debug("session %s logging to %s", config.name, dir);

  const writer = new LogWriter(dir, { timestamps: config.logs.timestamps });
  const loop = options.scheduler ?? new OwnerLoop();
  const candidates: RedirectStreams = options.streams ?? {
    stdout: process.stdout,
    stderr: process.stderr,
  };

  const streams: RedirectStreams = {};
  for (const name of ["stdout", "stderr"] as const) {
    if (config.streams[name].enabled) streams[name] = candidates[name];
  }

  const redirect = installConsoleRedirect({
    streams,
    logSinkFor: (name: StreamName): LogSink =>
      createFileLogSink(writer, streamCategory(config, name)),
    scheduler: loop,
  });

  const useColor = candidates.stdout?.isTTY === true;
  const statusSink = createFileLogSink(writer, config.statusCategory, (line) => {
    const text = formatStatus(line, useColor) + "\n";
    if (redirect.stdout) {
      redirect.echo("stdout", text);
    } else {
      candidates.stdout?.write(text);
    }
  });

  let closed = false;

  return {
    redirect,
    writer,
    loop,
    logDir: dir,
    announce(message) {
      statusSink(message, true);
    },
    async close() {
      if (closed) return;
      closed = true;
      await loop.whenIdle();
      redirect.restore();
      await writer.settle();
      debug("session %s closed after %d lines", config.name, writer.linesWritten);
    },
  };
}
