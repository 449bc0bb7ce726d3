import chalk from "chalk";
import type { Invocation, Logger } from "../types/committer";
import { CommitterError, UsageError } from "./errors";
import { USAGE } from "./invocation";

export interface LoggerOptions {
  verbose?: boolean;
  color?: boolean;
  stdout?: (line: string) => void;
  stderr?: (line: string) => void;
}

/**
 * Console logger: the success line goes to stdout, everything else to stderr
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const {
    verbose = false,
    color = true,
    stdout = (line: string) => console.log(line),
    stderr = (line: string) => console.error(line),
  } = options;
  const paint = new chalk.Instance({ level: color ? chalk.level : 0 });

  return {
    success: (message) => stdout(paint.green(message)),
    warn: (message) => stderr(paint.yellow(message)),
    error: (message) => stderr(paint.red(message)),
    debug: (message) => {
      if (verbose) stderr(paint.dim(`→ ${message}`));
    },
  };
}

export function formatSuccess(invocation: Invocation): string {
  const count = invocation.files.length;
  return `Committed "${invocation.message}" with ${count} ${count === 1 ? "file" : "files"}`;
}

export function reportSuccess(invocation: Invocation, logger: Logger): number {
  logger.success(formatSuccess(invocation));
  return 0;
}

/**
 * Print a single line for the failure and return the exit code
 */
export function reportFailure(error: unknown, logger: Logger): number {
  if (!(error instanceof CommitterError)) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error(`Error: ${message}`);
    return 1;
  }

  for (const line of error.output) {
    logger.debug(line);
  }

  const line =
    error instanceof UsageError
      ? `${error.label}: ${error.message} (usage: ${USAGE})`
      : `${error.label}: ${error.message}`;

  if (error.label === "Warning") {
    logger.warn(line);
  } else {
    logger.error(line);
  }
  return error.exitCode;
}
