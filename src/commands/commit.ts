import type { FileProbe, Invocation, Logger } from "../types/committer";
import { createGitEngine, spawnGit, type GitEngine } from "../utils/git";
import { createFileProbe } from "../utils/fs";
import { getConfig } from "../lib/config";
import { FatalError } from "../lib/errors";
import { parseInvocation } from "../lib/invocation";
import { assertPathsKnown } from "../lib/resolver";
import { assertHasChanges, stageFiles } from "../lib/staging";
import { assertCommitted, executeCommit } from "../lib/executor";
import { createLogger, reportFailure, reportSuccess } from "../lib/reporter";

const LAST_COMMIT = "HEAD";

export interface CommitOptions {
  args: string[];
  /** Directory git runs in and relative paths resolve against */
  cwd?: string;
  force?: boolean;
  verbose?: boolean;
  engine?: GitEngine;
  probe?: FileProbe;
  logger?: Logger;
  home?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Commit exactly the named files
 * - Validates the message and file list
 * - Checks every file is known to the working tree, index or last commit
 * - Resets the index, stages only those files and refuses empty commits
 * - Commits, retrying once after removing a stale lock when allowed
 *
 * Resolves to the process exit code.
 */
export async function commitCommand(options: CommitOptions): Promise<number> {
  const {
    cwd = process.cwd(),
    engine = createGitEngine(spawnGit(cwd)),
    probe = createFileProbe(cwd),
    env = process.env,
  } = options;
  const colorFromEnv = !env.NO_COLOR;
  let logger =
    options.logger ?? createLogger({ verbose: options.verbose, color: colorFromEnv });

  try {
    const parsed = parseInvocation(options.args, {
      force: options.force,
      exists: (path) => probe.exists(path),
    });

    if (!(await engine.isRepository())) {
      throw new FatalError("Not a git repository");
    }

    const repoRoot = await engine.getRepoRoot();
    const config = getConfig({ home: options.home, repoRoot, env });
    if (!options.logger) {
      logger = createLogger({
        verbose: options.verbose || config.general.verbose,
        color: config.general.color,
      });
    }

    const invocation: Invocation = {
      ...parsed,
      forceDeleteLock: parsed.forceDeleteLock || config.commit.forceDeleteLock,
    };

    logger.debug(`Resolving ${invocation.files.length} path(s) against the working tree, index and ${LAST_COMMIT}`);
    const resolutions = await assertPathsKnown(invocation.files, engine, probe, LAST_COMMIT);
    for (const { path, existsIn } of resolutions) {
      logger.debug(`${path}: ${existsIn}`);
    }

    logger.debug(`Resetting index to ${LAST_COMMIT} and staging ${invocation.files.join(" ")}`);
    const staging = await stageFiles(invocation.files, engine, LAST_COMMIT);
    assertHasChanges(staging, invocation.files);

    logger.debug("Committing");
    const outcome = await executeCommit(invocation, engine, probe, logger);
    assertCommitted(outcome);

    return reportSuccess(invocation, logger);
  } catch (error) {
    return reportFailure(error, logger);
  }
}
