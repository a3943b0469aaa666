import createDebug from "debug";
import { format } from "node:util";

export type Log = createDebug.Debugger;

// Bound when this module loads, before any redirect patches stderr, so
// diagnostics never reach a stream's log buffer.
const writeStderr = process.stderr.write.bind(process.stderr);

/** Namespaced diagnostics, enabled with `DEBUG=linetap:*`. */
export function createLog(namespace: string): Log {
  const log = createDebug(`linetap:${namespace}`);
  log.log = (...args: unknown[]): void => {
    writeStderr(format(...args) + "\n");
  };
  return log;
}
