import { existsSync, rmSync } from "fs";
import { resolve } from "path";
import type { FileProbe } from "../types/committer";

/**
 * Filesystem probe resolving relative paths against `cwd`, the directory
 * git runs in
 */
export function createFileProbe(cwd: string = process.cwd()): FileProbe {
  return {
    exists: (path) => existsSync(resolve(cwd, path)),
    remove: (path) => rmSync(resolve(cwd, path), { force: true }),
  };
}
