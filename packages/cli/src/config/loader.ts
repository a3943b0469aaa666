import { readFile } from "node:fs/promises";
import { load as parseYaml } from "js-yaml";
import { tapConfigSchema, type TapConfig } from "@linetap/sdk";
import { createLog } from "../debug";
import { LinetapError } from "../errors";

const debug = createLog("config");

export const DEFAULT_CONFIG_PATH = "linetap.yaml";

export class ConfigError extends LinetapError {
  constructor(message: string, cause?: unknown) {
    super(message, "ConfigError", { cause });
  }
}

export type LoadOptions = {
  /** Fall back to defaults when the file does not exist. */
  allowMissing?: boolean;
  /** Workspace name used for the defaults. */
  fallbackName?: string;
};

function formatZodIssues(issues: { path: (string | number)[]; message: string }[]): string {
  return issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `  - ${path}: ${issue.message}`;
    })
    .join("\n");
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export function defaultTapConfig(name: string): TapConfig {
  return tapConfigSchema.parse({ version: "1", name });
}

export async function loadTapConfig(
  configPath = DEFAULT_CONFIG_PATH,
  options: LoadOptions = {},
): Promise<TapConfig> {
  debug("loading config from %s", configPath);

  let raw: string;
  try {
    raw = await readFile(configPath, "utf-8");
  } catch (err) {
    if (options.allowMissing && isMissingFile(err)) {
      debug("no config at %s, using defaults", configPath);
      return defaultTapConfig(options.fallbackName ?? "linetap");
    }
    throw new ConfigError(`Could not read config file: ${configPath}`, err);
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(raw);
  } catch (err) {
    throw new ConfigError(`Invalid YAML in ${configPath}`, err);
  }

  const result = tapConfigSchema.safeParse(parsed);
  if (!result.success) {
    debug("validation failed: %d issues", result.error.issues.length);
    const details = formatZodIssues(result.error.issues);
    throw new ConfigError(`Invalid config in ${configPath}:\n${details}`, result.error);
  }

  debug("loaded config %s (log dir %s)", result.data.name, result.data.logs.dir);
  return result.data;
}

/** Stream name to log category, honouring per-stream overrides. */
export function streamCategory(config: TapConfig, stream: "stdout" | "stderr"): string {
  return config.streams[stream].category ?? stream;
}
