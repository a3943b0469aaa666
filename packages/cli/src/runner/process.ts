import { spawn, type ChildProcess, type StdioOptions } from "node:child_process";
import { platform } from "node:os";
import type { StreamName } from "@linetap/sdk";
import { createLog } from "../debug";
import { LinetapError } from "../errors";

const debug = createLog("runner:process");

export class ProcessRunnerError extends LinetapError {
  constructor(message: string, command: string) {
    super(message, "ProcessRunnerError", { details: { command } });
  }
}

export type ProcessRunnerOptions = {
  command: string;
  cwd: string;
  env?: Record<string, string>;
  /** Raw output chunks, decoded as UTF-8, exactly as the child wrote them. */
  onOutput?: (stream: StreamName, text: string) => void;
};

export type ProcessHandle = {
  readonly command: string;
  readonly pid: number | undefined;
  readonly running: boolean;
  stop(timeoutMs?: number): Promise<number | null>;
  /** Exit code, or null when killed by a signal. Rejects if the spawn fails. */
  readonly exitPromise: Promise<number | null>;
};

export type SpawnFn = (
  cmd: string,
  args: string[],
  options: { cwd: string; env: Record<string, string>; stdio: StdioOptions },
) => ChildProcess;

function defaultSpawn(
  cmd: string,
  args: string[],
  options: { cwd: string; env: Record<string, string>; stdio: StdioOptions },
): ChildProcess {
  return spawn(cmd, args, options);
}

function getShellArgs(command: string): { cmd: string; args: string[] } {
  if (platform() === "win32") {
    return { cmd: "cmd.exe", args: ["/c", command] };
  }
  return { cmd: "sh", args: ["-c", command] };
}

const DEFAULT_STOP_TIMEOUT = 5000;

export function startProcess(
  options: ProcessRunnerOptions,
  spawnFn: SpawnFn = defaultSpawn,
): ProcessHandle {
  debug("startProcess: command=%s cwd=%s", options.command, options.cwd);
  const { cmd, args } = getShellArgs(options.command);
  const mergedEnv: Record<string, string> = {};
  for (const [k, v] of Object.entries(process.env)) {
    if (v !== undefined) mergedEnv[k] = v;
  }
  Object.assign(mergedEnv, options.env);

  const child = spawnFn(cmd, args, {
    cwd: options.cwd,
    env: mergedEnv,
    stdio: ["inherit", "pipe", "pipe"],
  });
  debug("startProcess: pid=%d", child.pid);

  let isRunning = true;
  const { onOutput } = options;

  if (onOutput) {
    for (const stream of ["stdout", "stderr"] as const) {
      const readable = child[stream];
      if (!readable) continue;
      readable.setEncoding("utf8");
      readable.on("data", (chunk: string) => onOutput(stream, chunk));
    }
  }

  const exitPromise = new Promise<number | null>((resolve, reject) => {
    child.on("error", (err) => {
      isRunning = false;
      reject(
        new ProcessRunnerError(
          `Command "${options.command}" failed to start: ${err.message}`,
          options.command,
        ),
      );
    });
    child.on("close", (code) => {
      debug("process closed: pid=%d exit=%d", child.pid, code);
      isRunning = false;
      resolve(code);
    });
  });

  const stop = async (timeoutMs = DEFAULT_STOP_TIMEOUT): Promise<number | null> => {
    if (!isRunning) return exitPromise;

    if (platform() === "win32") {
      child.kill("SIGKILL");
      return exitPromise;
    }

    child.kill("SIGTERM");
    const timer = setTimeout(() => {
      if (isRunning) child.kill("SIGKILL");
    }, timeoutMs);

    try {
      return await exitPromise;
    } finally {
      clearTimeout(timer);
    }
  };

  return {
    command: options.command,
    get pid() {
      return child.pid;
    },
    get running() {
      return isRunning;
    },
    stop,
    exitPromise,
  };
}
