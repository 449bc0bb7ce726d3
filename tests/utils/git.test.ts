import { describe, expect, it } from "vitest";
import { createGitEngine, git, type GitResult, type GitRunner } from "../../src/utils/git";
import { FatalError } from "../../src/lib/errors";

function result(exitCode: number, stdout = "", stderr = ""): GitResult {
  return { exitCode, stdout, stderr, output: stdout + stderr };
}

/**
 * Runner that records argument vectors and answers from a queue
 */
function fakeRunner(...responses: GitResult[]) {
  const calls: string[][] = [];
  const runner: GitRunner = async (args) => {
    calls.push(args);
    return responses.shift() ?? result(0);
  };
  return { runner, calls };
}

describe("git", () => {
  it("returns trimmed stdout", async () => {
    const { runner } = fakeRunner(result(0, "/work/repo\n"));
    expect(await git(runner, ["rev-parse", "--show-toplevel"])).toBe("/work/repo");
  });

  it("throws a FatalError on a non-zero exit", async () => {
    const { runner } = fakeRunner(result(128, "", "fatal: bad revision 'HEAD'\n"));
    await expect(git(runner, ["reset", "--quiet", "HEAD"])).rejects.toThrow(
      new FatalError("Git command failed: git reset --quiet HEAD: fatal: bad revision 'HEAD'")
    );
  });
});

describe("gitFailure", () => {
  it("keeps the message to one line and the full stderr as output", async () => {
    const stderr = [
      "fatal: Unable to create '/work/repo/.git/index.lock': File exists.",
      "",
      "Another git process seems to be running in this repository, e.g.",
      "an editor opened by 'git commit'. Please make sure all processes",
      "are terminated then try again.",
    ].join("\n");
    const { runner } = fakeRunner(result(128, "", stderr));

    const error = await git(runner, ["reset", "--quiet", "HEAD", "--", ":/"]).catch(
      (caught: unknown) => caught
    );

    expect(error).toBeInstanceOf(FatalError);
    expect(error).toMatchObject({
      message:
        "Git command failed: git reset --quiet HEAD -- :/: fatal: Unable to create '/work/repo/.git/index.lock': File exists.",
      output: [
        "fatal: Unable to create '/work/repo/.git/index.lock': File exists.",
        "Another git process seems to be running in this repository, e.g.",
        "an editor opened by 'git commit'. Please make sure all processes",
        "are terminated then try again.",
      ],
    });
  });

  it("falls back to the exit code when stderr is empty", async () => {
    const { runner } = fakeRunner(result(129));
    await expect(git(runner, ["status"])).rejects.toThrow("Git command failed: git status: exit 129");
  });
});

describe("createGitEngine", () => {
  it("detects a work tree", async () => {
    const { runner, calls } = fakeRunner(result(0, "true\n"), result(128, "", "fatal: not a git repository"));
    const engine = createGitEngine(runner);
    expect(await engine.isRepository()).toBe(true);
    expect(await engine.isRepository()).toBe(false);
    expect(calls[0]).toEqual(["rev-parse", "--is-inside-work-tree"]);
  });

  it("asks the index with --error-unmatch", async () => {
    const { runner, calls } = fakeRunner(result(0, "a.txt\n"), result(1));
    const engine = createGitEngine(runner);
    expect(await engine.pathExistsInTrackedIndex("a.txt")).toBe(true);
    expect(await engine.pathExistsInTrackedIndex("b.txt")).toBe(false);
    expect(calls).toEqual([
      ["ls-files", "--error-unmatch", "--", "a.txt"],
      ["ls-files", "--error-unmatch", "--", "b.txt"],
    ]);
  });

  it("looks up blobs relative to the working directory", async () => {
    const { runner, calls } = fakeRunner(result(0), result(128));
    const engine = createGitEngine(runner);
    expect(await engine.blobExistsInCommit("HEAD", "src/a.ts")).toBe(true);
    expect(await engine.blobExistsInCommit("HEAD", "gone.ts")).toBe(false);
    expect(calls).toEqual([
      ["cat-file", "-e", "HEAD:./src/a.ts"],
      ["cat-file", "-e", "HEAD:./gone.ts"],
    ]);
  });

  it("resets and stages with argument vectors", async () => {
    const { runner, calls } = fakeRunner();
    const engine = createGitEngine(runner);
    await engine.resetIndexToCommit("HEAD");
    await engine.stagePaths(["a b.txt", "-dash.txt"]);
    await engine.stagePaths([]);
    expect(calls).toEqual([
      ["reset", "--quiet", "HEAD", "--", ":/"],
      ["add", "--all", "--", "a b.txt", "-dash.txt"],
    ]);
  });

  it("maps diff --quiet exit codes", async () => {
    const { runner, calls } = fakeRunner(result(0), result(1), result(128, "", "fatal: oops"));
    const engine = createGitEngine(runner);
    expect(await engine.stagedDiffIsEmpty(["a.txt"])).toBe(true);
    expect(await engine.stagedDiffIsEmpty(["a.txt"])).toBe(false);
    await expect(engine.stagedDiffIsEmpty(["a.txt"])).rejects.toThrow(FatalError);
    expect(calls[0]).toEqual(["diff", "--cached", "--quiet", "--", "a.txt"]);
  });

  it("returns the commit's exit code and combined output without throwing", async () => {
    const failure: GitResult = {
      exitCode: 128,
      stdout: "",
      stderr: "fatal: Unable to create '/r/.git/index.lock': File exists.\n",
      output: "fatal: Unable to create '/r/.git/index.lock': File exists.\n",
    };
    const { runner, calls } = fakeRunner(failure);
    const engine = createGitEngine(runner);

    expect(await engine.commit('say "hi"', ["a.txt"])).toEqual({
      exitCode: 128,
      output: "fatal: Unable to create '/r/.git/index.lock': File exists.\n",
    });
    expect(calls).toEqual([["commit", "-m", 'say "hi"', "--", "a.txt"]]);
  });
});
