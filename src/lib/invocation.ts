import { existsSync } from "fs";
import type { Invocation } from "../types/committer";
import { UsageError, ValidationError } from "./errors";

export const USAGE = 'committer [--force] "<commit message>" <file> [<file> ...]';

export interface ParseOptions {
  /** Set when the leading --force flag was consumed */
  force?: boolean;
  exists?: (path: string) => boolean;
}

/**
 * Build an Invocation from the positional arguments left after flag parsing
 */
export function parseInvocation(
  args: readonly string[],
  options: ParseOptions = {}
): Invocation {
  const { force = false, exists = existsSync } = options;

  if (force && args.length === 0) {
    throw new UsageError("--force needs a commit message and at least one file");
  }
  if (args.length < 2) {
    throw new UsageError("expected a commit message and at least one file");
  }

  const [message, ...files] = args;
  if (files.length === 0) {
    throw new UsageError("no files given");
  }

  if (message.trim().length === 0) {
    throw new ValidationError("commit message must not be empty");
  }
  // Usually means the message argument was left out
  if (exists(message)) {
    throw new ValidationError(
      `first argument looks like a file path ("${message}"); provide the commit message first`
    );
  }
  if (files.includes(".")) {
    throw new ValidationError('"." is not allowed; list the paths to commit explicitly');
  }

  return Object.freeze({
    message,
    files: Object.freeze([...files]),
    forceDeleteLock: force,
  });
}
