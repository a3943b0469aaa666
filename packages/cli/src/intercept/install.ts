import { StringDecoder } from "node:string_decoder";
import type {
  LogSink,
  OwnerScheduler,
  StreamName,
  UnderlyingStream,
  WriteCallback,
} from "@linetap/sdk";
import { createLog } from "../debug";
import { StreamInterceptor } from "./interceptor";
import { StreamState } from "./stream-state";

const debug = createLog("intercept");

/** The parts of a Node writable (process.stdout, a Writable) the redirect needs. */
export interface RedirectableStream {
  write(chunk: string | Uint8Array, cb?: WriteCallback): boolean;
  write(chunk: string | Uint8Array, encoding?: BufferEncoding, cb?: WriteCallback): boolean;
  readonly writableCorked: number;
  uncork(): void;
  isTTY?: boolean;
}

export type RedirectStreams = Partial<Record<StreamName, RedirectableStream>>;

export type InstallOptions = {
  streams: RedirectStreams;
  logSinkFor: (name: StreamName) => LogSink;
  scheduler: OwnerScheduler;
};

export type ConsoleRedirect = {
  readonly stdout?: StreamInterceptor;
  readonly stderr?: StreamInterceptor;
  readonly installed: boolean;
  /** Writes to a redirected stream's original `write`, bypassing logging. */
  echo(name: StreamName, text: string): void;
  restore(): void;
};

export function underlyingOf(stream: RedirectableStream): UnderlyingStream {
  return {
    flush: () => {
      while (stream.writableCorked > 0) stream.uncork();
    },
    isatty: () => stream.isTTY === true,
  };
}

// Encodings whose strings spell out bytes rather than text.
const BYTE_ENCODINGS: ReadonlySet<BufferEncoding> = new Set(["hex", "base64", "base64url"]);

type Installed = {
  interceptor: StreamInterceptor;
  forward: RedirectableStream["write"];
  restore: () => void;
};

function redirect(
  name: StreamName,
  stream: RedirectableStream,
  logSink: LogSink,
  scheduler: OwnerScheduler,
): Installed {
  const original = stream.write;
  const forward: RedirectableStream["write"] = stream.write.bind(stream);
  const decoder = new StringDecoder("utf8");

  const state = new StreamState(
    name,
    underlyingOf(stream),
    (text, done) => forward(text, done),
    logSink,
  );
  const interceptor = new StreamInterceptor(state, scheduler);

  // The terminal gets the caller's chunk untouched; only the log sees decoded text.
  function textOf(chunk: string | Uint8Array, encoding: BufferEncoding | undefined): string {
    if (typeof chunk !== "string") {
      return decoder.write(Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength));
    }
    if (encoding !== undefined && BYTE_ENCODINGS.has(encoding)) {
      return decoder.write(Buffer.from(chunk, encoding));
    }
    return chunk;
  }

  function write(
    chunk: string | Uint8Array,
    encodingOrCb?: BufferEncoding | WriteCallback,
    cb?: WriteCallback,
  ): boolean {
    const encoding = typeof encodingOrCb === "string" ? encodingOrCb : undefined;
    const done = typeof encodingOrCb === "function" ? encodingOrCb : cb;

    const accepted = forward(chunk, encoding, done);
    interceptor.record(textOf(chunk, encoding));
    return accepted;
  }

  stream.write = write;
  debug("installed %s redirect", name);

  return {
    interceptor,
    forward,
    restore: () => {
      stream.write = original;
      debug("restored %s", name);
    },
  };
}

/**
 * Replaces `write` on each given stream with an interceptor that echoes
 * to the original stream and ships completed lines to the stream's log
 * sink. The caller owns the returned handle; nothing is kept globally.
 */
export function installConsoleRedirect(options: InstallOptions): ConsoleRedirect {
  const installed = new Map<StreamName, Installed>();
  for (const name of ["stdout", "stderr"] as const) {
    const stream = options.streams[name];
    if (!stream) continue;
    installed.set(name, redirect(name, stream, options.logSinkFor(name), options.scheduler));
  }

  let active = true;

  return {
    stdout: installed.get("stdout")?.interceptor,
    stderr: installed.get("stderr")?.interceptor,
    get installed() {
      return active;
    },
    echo(name, text) {
      installed.get(name)?.forward(text);
    },
    restore() {
      if (!active) return;
      active = false;
      for (const entry of installed.values()) entry.restore();
    },
  };
}
