import type {
  CommitAttempt,
  CommitOutcome,
  FileProbe,
  Logger,
} from "../types/committer";
import type { GitEngine } from "../utils/git";
import { CommitError, splitLines } from "./errors";
import { extractLockPath } from "./lock";

export interface CommitRequest {
  message: string;
  files: readonly string[];
  forceDeleteLock: boolean;
}

async function attemptCommit(
  request: CommitRequest,
  engine: GitEngine
): Promise<CommitAttempt> {
  const { exitCode, output } = await engine.commit(request.message, request.files);
  const lines = splitLines(output);
  if (exitCode === 0) {
    return { exitCode, output: lines };
  }
  return { exitCode, output: lines, lockPath: extractLockPath(lines) };
}

/**
 * Run the commit. When lock recovery is enabled and the first attempt failed
 * on a lock file that still exists, remove it and try exactly once more.
 */
export async function executeCommit(
  request: CommitRequest,
  engine: GitEngine,
  probe: FileProbe,
  logger: Logger
): Promise<CommitOutcome> {
  const first = await attemptCommit(request, engine);
  if (first.exitCode === 0) {
    return { status: "success", attempts: [first] };
  }

  if (!request.forceDeleteLock) {
    return { status: "failed", attempts: [first] };
  }

  const lockPath = first.lockPath;
  if (!lockPath) {
    logger.debug("Commit failed without naming a lock file; not retrying");
    return { status: "failed", attempts: [first] };
  }
  if (!probe.exists(lockPath)) {
    logger.debug(`Lock file ${lockPath} is already gone; not retrying`);
    return { status: "failed", attempts: [first] };
  }

  probe.remove(lockPath);
  logger.warn(`Removed stale git lock: ${lockPath}`);

  const second = await attemptCommit(request, engine);
  return {
    status: second.exitCode === 0 ? "success" : "failed",
    attempts: [first, second],
    removedLock: lockPath,
  };
}

/**
 * Throw for a failed outcome, reporting the last attempt
 */
export function assertCommitted(outcome: CommitOutcome): void {
  if (outcome.status === "success") return;
  const last = outcome.attempts[outcome.attempts.length - 1];
  throw new CommitError(last.output, last.exitCode);
}
