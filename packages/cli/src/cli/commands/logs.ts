import { Command } from "commander";
import { spawn } from "node:child_process";
import { readdir, readFile } from "node:fs/promises";
import { join, basename } from "node:path";
import { platform } from "node:os";
import { DEFAULT_CONFIG_PATH, loadTapConfig } from "../../config/loader";
import { logDir, logFile } from "../../logs/writer";
import { createLineBuffer } from "../../output/line-buffer";
import { createCategoryFormatter, type CategoryFormatter } from "../../output/format";

export async function listLogCategories(dir: string): Promise<string[]> {
  let entries: string[];
  try {
    entries = await readdir(dir);
  } catch {
    return [];
  }
  return entries
    .filter((f) => f.endsWith(".log"))
    .map((f) => basename(f, ".log"))
    .sort((a, b) => a.localeCompare(b));
}

/** Last `count` non-blank lines of a log file. */
export async function readLogTail(filePath: string, count: number): Promise<string[]> {
  const lines: string[] = [];
  const buffer = createLineBuffer((line) => lines.push(line));
  buffer.push(await readFile(filePath, "utf-8"));
  buffer.end();
  return count > 0 ? lines.slice(-count) : [];
}

function followFile(
  filePath: string,
  category: string,
  lines: number,
  format: CategoryFormatter,
  signal: AbortSignal,
): void {
  const isWindows = platform() === "win32";
  // Use absolute paths to avoid searching PATH (security-sensitive)
  const child = isWindows
    ? spawn(
      join(
        process.env.SYSTEMROOT ?? "C:\\Windows",
        "System32",
        "WindowsPowerShell",
        "v1.0",
        "powershell.exe",
      ),
      ["-Command", `Get-Content -Path '${filePath}' -Wait -Tail ${lines}`],
      { stdio: ["ignore", "pipe", "ignore"] },
    )
    : spawn("/usr/bin/tail", ["-n", String(lines), "-f", filePath], {
      stdio: ["ignore", "pipe", "ignore"],
    });

  const buffer = createLineBuffer((line) => process.stdout.write(format(category, line) + "\n"));
  child.stdout?.setEncoding("utf8");
  child.stdout?.on("data", (chunk: string) => buffer.push(chunk));

  const onAbort = () => child.kill("SIGTERM");
  if (signal.aborted) {
    child.kill("SIGTERM");
  } else {
    signal.addEventListener("abort", onAbort, { once: true });
  }
}

function parseLineCount(value: string): number {
  const n = Number.parseInt(value, 10);
  return Number.isNaN(n) || n < 0 ? 50 : n;
}

type LogsOptions = { list?: boolean; follow?: boolean; lines: number; config: string };

export const logsCommand = new Command("logs")
  .description("Show log files written by linetap run")
  .argument("[category]", "Log category to show (omit for all)")
  .option("--list", "List available log categories")
  .option("-f, --follow", "Keep printing new lines as they are written")
  .option("-n, --lines <n>", "Number of trailing lines to print", parseLineCount, 50)
  .option("--config <path>", "Path to linetap.yaml config file", DEFAULT_CONFIG_PATH)
  .action(async (category: string | undefined, options: LogsOptions) => {
    const workspaceDir = process.cwd();
    const config = await loadTapConfig(options.config, {
      allowMissing: true,
      fallbackName: basename(workspaceDir),
    });
    const dir = logDir(workspaceDir, config.logs.dir);
    const categories = await listLogCategories(dir);

    if (categories.length === 0) {
      console.log("No log files found. Run `linetap run <command>` first.");
      return;
    }

    if (options.list) {
      console.log("Available log categories:");
      for (const name of categories) {
        console.log(`  ${name}`);
      }
      return;
    }

    let selected = categories;
    if (category) {
      if (!categories.includes(category)) {
        console.error(`No log file found for "${category}". Use --list to see available logs.`);
        process.exitCode = 1;
        return;
      }
      selected = [category];
    }

    const format = createCategoryFormatter(process.stdout.isTTY === true);

    if (!options.follow) {
      for (const name of selected) {
        for (const line of await readLogTail(logFile(dir, name), options.lines)) {
          process.stdout.write(format(name, line) + "\n");
        }
      }
      return;
    }

    const controller = new AbortController();
    process.on("SIGINT", () => controller.abort());
    process.on("SIGTERM", () => controller.abort());

    for (const name of selected) {
      followFile(logFile(dir, name), name, options.lines, format, controller.signal);
    }

    // Keep alive until interrupted
    await new Promise<void>((resolve) => {
      controller.signal.addEventListener("abort", () => resolve(), { once: true });
    });
  });
