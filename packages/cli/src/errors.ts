export type LinetapErrorCode =
  | "ConfigError"
  | "LockError"
  | "LogWriteError"
  | "ProcessRunnerError";

/** What `--json` prints for a failed command. */
export type ErrorPayload = {
  error: LinetapErrorCode | "UnknownError";
  message: string;
  [detail: string]: unknown;
};

export type LinetapErrorOptions = {
  details?: Record<string, unknown>;
  cause?: unknown;
};

/** Base of every error linetap raises. The code doubles as the error's name. */
export abstract class LinetapError extends Error {
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    readonly code: LinetapErrorCode,
    options: LinetapErrorOptions = {},
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = code;
    this.details = options.details;
  }

  toJSON(): ErrorPayload {
    return {
      error: this.code,
      message: this.message,
      ...this.details,
    };
  }
}

export function toErrorPayload(err: unknown): ErrorPayload {
  if (err instanceof LinetapError) return err.toJSON();
  return { error: "UnknownError", message: err instanceof Error ? err.message : String(err) };
}
