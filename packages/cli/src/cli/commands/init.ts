import { Command } from "commander";
import { writeFile } from "node:fs/promises";
import { basename } from "node:path";
import { dump as toYaml } from "js-yaml";
import { DEFAULT_CONFIG_PATH, defaultTapConfig } from "../../config/loader";

export function renderStarterConfig(name: string): string {
  const config = defaultTapConfig(name);
  const starter = {
    version: config.version,
    name: config.name,
    logs: config.logs,
    streams: {
      stdout: { enabled: true, category: "stdout" },
      stderr: { enabled: true, category: "stderr" },
    },
    statusCategory: config.statusCategory,
  };
  return toYaml(starter, { quotingType: '"', forceQuotes: false });
}

/** Writes a starter config. Returns false when the file already exists. */
export async function writeStarterConfig(configPath: string, name: string): Promise<boolean> {
  try {
    await writeFile(configPath, renderStarterConfig(name), { encoding: "utf-8", flag: "wx" });
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "EEXIST") return false;
    throw err;
  }
  return true;
}

export const initCommand = new Command("init")
  .description("Write a starter linetap.yaml in the current directory")
  .option("--config <path>", "Path to linetap.yaml config file", DEFAULT_CONFIG_PATH)
  .option("--name <name>", "Name recorded in the config (defaults to the directory name)")
  .action(async (options: { config: string; name?: string }) => {
    const name = options.name ?? basename(process.cwd());
    const created = await writeStarterConfig(options.config, name);
    if (created) {
      console.log(`Created ${options.config} for ${name}`);
    } else {
      console.log(`${options.config} already exists — leaving it unchanged.`);
    }
  });
