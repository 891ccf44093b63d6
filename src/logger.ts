import { type ILogObj, Logger } from "tslog";
import type { LogLevelName } from "./types.js";

export type NbLogger = Logger<ILogObj>;

const MIN_LEVEL: Record<LogLevelName, number> = {
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  silent: 7
};

/**
 * Root logger. Output goes to stderr so stdout carries only command results.
 */
export function createLogger(level: LogLevelName = "info", name = "nbpilot"): NbLogger {
  return new Logger<ILogObj>({
    name,
    type: level === "silent" ? "hidden" : "pretty",
    minLevel: MIN_LEVEL[level],
    hideLogPositionForProduction: true,
    prettyLogTemplate: "{{hh}}:{{MM}}:{{ss}} {{logLevelName}} [{{name}}] ",
    overwrite: {
      transportFormatted: (logMetaMarkup: string, logArgs: unknown[], logErrors: string[]) => {
        console.error(logMetaMarkup + logArgs.map(formatArg).join(" "), ...logErrors);
      }
    }
  });
}

export function silentLogger(): NbLogger {
  return createLogger("silent");
}

function formatArg(arg: unknown): string {
  if (typeof arg === "string") {
    return arg;
  }
  if (arg instanceof Error) {
    return arg.message;
  }
  try {
    return JSON.stringify(arg);
  } catch {
    return String(arg);
  }
}
