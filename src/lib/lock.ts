/**
 * Lock file detection in git's failure output.
 *
 * git reports a held lock as, e.g.:
 *   fatal: Unable to create '/repo/.git/index.lock': File exists.
 * Only the quoting and the ".lock" suffix are relied upon here.
 */

export const LOCK_SUFFIX = ".lock";

const QUOTED_PATH = /(['"])([^'"]+)\1/g;

/**
 * Return the first quoted path ending in the lock suffix, scanning line by line
 */
export function extractLockPath(output: readonly string[]): string | undefined {
  for (const line of output) {
    for (const match of line.matchAll(QUOTED_PATH)) {
      const candidate = match[2];
      if (candidate.endsWith(LOCK_SUFFIX)) {
        return candidate;
      }
    }
  }
  return undefined;
}
