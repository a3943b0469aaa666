import { Command } from "commander";
import { basename } from "node:path";
import type { StreamName, TapConfig } from "@linetap/sdk";
import { DEFAULT_CONFIG_PATH, loadTapConfig, type LoadOptions } from "../../config/loader";
import { startProcess, type ProcessHandle, type ProcessRunnerOptions } from "../../runner/process";
import { startTapSession, type TapSession, type TapSessionOptions } from "../../session/tap";

export type RunDeps = {
  loadConfig: (configPath: string, options: LoadOptions) => Promise<TapConfig>;
  startSession: (options: TapSessionOptions) => Promise<TapSession>;
  startProcess: (options: ProcessRunnerOptions) => ProcessHandle;
  /** Where the child's output is written; the patched process streams by default. */
  output: (stream: StreamName, text: string) => void;
  onSignal: (handler: () => void) => () => void;
};

export type RunResult = {
  exitCode: number;
  logDir: string;
};

function writeToProcess(stream: StreamName, text: string): void {
  (stream === "stdout" ? process.stdout : process.stderr).write(text);
}

function onTerminationSignal(handler: () => void): () => void {
  process.on("SIGINT", handler);
  process.on("SIGTERM", handler);
  return () => {
    process.off("SIGINT", handler);
    process.off("SIGTERM", handler);
  };
}

const defaultDeps: RunDeps = {
  loadConfig: loadTapConfig,
  startSession: startTapSession,
  startProcess: (options) => startProcess(options),
  output: writeToProcess,
  onSignal: onTerminationSignal,
};

export async function runTapped(
  command: string,
  options: { configPath: string; cwd: string },
  deps: RunDeps = defaultDeps,
): Promise<RunResult> {
  const config = await deps.loadConfig(options.configPath, {
    allowMissing: options.configPath === DEFAULT_CONFIG_PATH,
    fallbackName: basename(options.cwd),
  });

  const session = await deps.startSession({ config, workspaceDir: options.cwd });
  let exitCode = 1;
  let failure: unknown = null;

  try {
    session.announce(`${config.name}: running ${command}`);
    const handle = deps.startProcess({
      command,
      cwd: options.cwd,
      onOutput: deps.output,
    });

    const detach = deps.onSignal(() => {
      session.announce(`${config.name}: stopping ${command}`);
      handle.stop().catch((err: unknown) => {
        failure ??= err;
      });
    });
    try {
      const code = await handle.exitPromise;
      exitCode = code ?? 1;
      session.announce(
        code === null ? `${config.name}: terminated by signal` : `${config.name}: exited with code ${code}`,
      );
    } finally {
      detach();
    }
  } catch (err) {
    failure = err;
  }

  await session.close();
  if (failure !== null) throw failure;
  return { exitCode, logDir: session.logDir };
}

export const runCommand = new Command("run")
  .description("Run a command, echoing its output and shipping each line to log files")
  .option("--config <path>", "Path to linetap.yaml config file", DEFAULT_CONFIG_PATH)
  .argument("<command...>", "Command to run (use -- before options meant for the command)")
  .passThroughOptions()
  .action(async (commandParts: string[], options: { config: string }) => {
    const result = await runTapped(commandParts.join(" "), {
      configPath: options.config,
      cwd: process.cwd(),
    });
    process.exitCode = result.exitCode;
  });
