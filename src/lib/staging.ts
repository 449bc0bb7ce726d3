import type { StagingResult } from "../types/committer";
import type { GitEngine } from "../utils/git";
import { NoChangesError } from "./errors";

/**
 * Unstage everything, then stage exactly `files` (deletions included)
 */
export async function stageFiles(
  files: readonly string[],
  engine: GitEngine,
  ref = "HEAD"
): Promise<StagingResult> {
  await engine.resetIndexToCommit(ref);
  await engine.stagePaths(files);
  const empty = await engine.stagedDiffIsEmpty(files);
  return { hasChanges: !empty };
}

export function assertHasChanges(result: StagingResult, files: readonly string[]): void {
  if (!result.hasChanges) {
    throw new NoChangesError(files);
  }
}
