// Main exports for programmatic usage
export { commitCommand, type CommitOptions } from "./commands/commit";
export * from "./utils/git";
export * from "./utils/fs";
export * from "./program";
export * from "./lib/config";
export * from "./lib/errors";
export * from "./lib/invocation";
export * from "./lib/resolver";
export * from "./lib/staging";
export * from "./lib/executor";
export * from "./lib/lock";
export * from "./lib/reporter";
export * from "./types/committer";
