/**
 * Types for the scoped commit flow
 */

export interface Invocation {
  readonly message: string;
  readonly files: readonly string[];
  readonly forceDeleteLock: boolean;
}

/**
 * Where a requested path was found, checked in this order
 */
export type PathSource = "workingTree" | "trackedIndex" | "lastCommit" | "none";

export interface PathResolution {
  path: string;
  existsIn: PathSource;
}

export interface StagingResult {
  hasChanges: boolean;
}

export interface CommitAttempt {
  exitCode: number;
  output: string[];
  lockPath?: string; // only set when exitCode != 0
}

export type CommitStatus = "success" | "failed";

export interface CommitOutcome {
  status: CommitStatus;
  attempts: CommitAttempt[];
  removedLock?: string;
}

/**
 * Filesystem capabilities the flow needs besides git
 */
export interface FileProbe {
  exists(path: string): boolean;
  remove(path: string): void;
}

export interface Logger {
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  debug(message: string): void;
}
