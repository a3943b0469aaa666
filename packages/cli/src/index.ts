export { LinetapError, toErrorPayload } from "./errors";
export type { ErrorPayload, LinetapErrorCode } from "./errors";
export { Mutex, LockError } from "./intercept/lock";
export { StreamState } from "./intercept/stream-state";
export { StreamInterceptor } from "./intercept/interceptor";
export {
  installConsoleRedirect,
  underlyingOf,
  type ConsoleRedirect,
  type InstallOptions,
  type RedirectableStream,
  type RedirectStreams,
} from "./intercept/install";
export { OwnerLoop, type DeferFn } from "./dispatch/owner-loop";
export {
  LogWriter,
  LogWriteError,
  appendLog,
  createFileLogSink,
  initLogDir,
  logDir,
} from "./logs/writer";
export { loadTapConfig, ConfigError, defaultTapConfig } from "./config/loader";
export { startTapSession, type TapSession, type TapSessionOptions } from "./session/tap";
export { startProcess, ProcessRunnerError, type ProcessHandle } from "./runner/process";
