import { spawn } from "child_process";
import { FatalError, splitLines, summarizeOutput } from "../lib/errors";

export interface GitResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  output: string; // stdout and stderr interleaved in arrival order
}

export type GitRunner = (args: string[]) => Promise<GitResult>;

/**
 * Operations the commit flow needs from git
 */
export interface GitEngine {
  isRepository(): Promise<boolean>;
  getRepoRoot(): Promise<string>;
  pathExistsInTrackedIndex(path: string): Promise<boolean>;
  blobExistsInCommit(ref: string, path: string): Promise<boolean>;
  resetIndexToCommit(ref: string): Promise<void>;
  stagePaths(paths: readonly string[]): Promise<void>;
  stagedDiffIsEmpty(paths: readonly string[]): Promise<boolean>;
  commit(
    message: string,
    paths: readonly string[]
  ): Promise<{ exitCode: number; output: string }>;
}

/**
 * Spawn git with an argument vector and collect its output.
 * Resolves with a non-zero exit code rather than rejecting; rejects only
 * when git cannot be started at all.
 */
export function spawnGit(cwd: string = process.cwd()): GitRunner {
  return (args) =>
    new Promise<GitResult>((resolve, reject) => {
      const child = spawn("git", args, { cwd, stdio: ["ignore", "pipe", "pipe"] });
      let stdout = "";
      let stderr = "";
      let output = "";

      child.stdout.setEncoding("utf-8");
      child.stderr.setEncoding("utf-8");
      child.stdout.on("data", (chunk: string) => {
        stdout += chunk;
        output += chunk;
      });
      child.stderr.on("data", (chunk: string) => {
        stderr += chunk;
        output += chunk;
      });

      child.on("error", (error) => {
        reject(new FatalError(`Unable to run git: ${error.message}`));
      });
      child.on("close", (code) => {
        resolve({ exitCode: code ?? 1, stdout, stderr, output });
      });
    });
}

/**
 * One-line failure for a git step; the full stderr rides along for --verbose
 */
export function gitFailure(args: string[], result: GitResult): FatalError {
  const lines = splitLines(result.stderr);
  const detail = lines.length > 0 ? summarizeOutput(lines) : `exit ${result.exitCode}`;
  return new FatalError(`Git command failed: git ${args.join(" ")}: ${detail}`, lines);
}

/**
 * Execute a git command and return its trimmed stdout, failing on a
 * non-zero exit
 */
export async function git(runner: GitRunner, args: string[]): Promise<string> {
  const result = await runner(args);
  if (result.exitCode !== 0) {
    throw gitFailure(args, result);
  }
  return result.stdout.trim();
}

export function createGitEngine(runner: GitRunner = spawnGit()): GitEngine {
  return {
    async isRepository() {
      const result = await runner(["rev-parse", "--is-inside-work-tree"]);
      return result.exitCode === 0 && result.stdout.trim() === "true";
    },

    async getRepoRoot() {
      return git(runner, ["rev-parse", "--show-toplevel"]);
    },

    async pathExistsInTrackedIndex(path) {
      const result = await runner(["ls-files", "--error-unmatch", "--", path]);
      return result.exitCode === 0;
    },

    async blobExistsInCommit(ref, path) {
      // "./" makes git resolve the path against the working directory
      const result = await runner(["cat-file", "-e", `${ref}:./${path}`]);
      return result.exitCode === 0;
    },

    async resetIndexToCommit(ref) {
      // The pathspec limits the reset to the index; the branch never moves
      await git(runner, ["reset", "--quiet", ref, "--", ":/"]);
    },

    async stagePaths(paths) {
      if (paths.length === 0) return;
      await git(runner, ["add", "--all", "--", ...paths]);
    },

    async stagedDiffIsEmpty(paths) {
      const args = ["diff", "--cached", "--quiet", "--", ...paths];
      const result = await runner(args);
      if (result.exitCode === 0) return true;
      if (result.exitCode === 1) return false;
      throw gitFailure(args, result);
    },

    async commit(message, paths) {
      const result = await runner(["commit", "-m", message, "--", ...paths]);
      return { exitCode: result.exitCode, output: result.output };
    },
  };
}
