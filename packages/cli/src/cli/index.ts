import { Command } from "commander";
import { toErrorPayload } from "../errors";
import { initCommand } from "./commands/init";
import { runCommand } from "./commands/run";
import { logsCommand } from "./commands/logs";

export const program = new Command();

program
  .name("linetap")
  .description("Tee a command's console output to the terminal and to line-oriented log files")
  .version("0.1.0")
  .option("--json", "Output machine-readable JSON errors")
  .enablePositionalOptions();

program.addCommand(runCommand);
program.addCommand(logsCommand);
program.addCommand(initCommand);

export function formatErrorForOutput(err: unknown, json: boolean): string {
  if (json) {
    return JSON.stringify(toErrorPayload(err));
  }
  return err instanceof Error ? err.message : String(err);
}

export async function main(argv: string[] = process.argv): Promise<void> {
  try {
    await program.parseAsync(argv);
  } catch (err) {
    const json = program.opts().json === true;
    if (json) {
      process.stdout.write(formatErrorForOutput(err, true) + "\n");
    } else {
      console.error(formatErrorForOutput(err, false));
    }
    process.exitCode = 1;
  }
}
