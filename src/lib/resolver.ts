import type { FileProbe, PathResolution } from "../types/committer";
import type { GitEngine } from "../utils/git";
import { NotFoundError } from "./errors";

/**
 * Find where a path is known: on disk, in the index, then in the last commit.
 * The filesystem check runs first since it needs no git process.
 */
export async function resolvePath(
  path: string,
  engine: GitEngine,
  probe: Pick<FileProbe, "exists">,
  ref = "HEAD"
): Promise<PathResolution> {
  if (probe.exists(path)) {
    return { path, existsIn: "workingTree" };
  }
  if (await engine.pathExistsInTrackedIndex(path)) {
    return { path, existsIn: "trackedIndex" };
  }
  if (await engine.blobExistsInCommit(ref, path)) {
    return { path, existsIn: "lastCommit" };
  }
  return { path, existsIn: "none" };
}

/**
 * Resolve every path in order, stopping at the first unknown one
 */
export async function assertPathsKnown(
  files: readonly string[],
  engine: GitEngine,
  probe: Pick<FileProbe, "exists">,
  ref = "HEAD"
): Promise<PathResolution[]> {
  const resolutions: PathResolution[] = [];
  for (const file of files) {
    const resolution = await resolvePath(file, engine, probe, ref);
    if (resolution.existsIn === "none") {
      throw new NotFoundError(file);
    }
    resolutions.push(resolution);
  }
  return resolutions;
}
