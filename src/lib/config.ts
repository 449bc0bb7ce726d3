/**
 * Configuration file management for committer
 *
 * Reads the global ~/.committer and project-level .committer config.
 * Project config overrides global config. Neither file is created.
 */

import { existsSync, readFileSync } from "fs";
import { homedir } from "os";
import { join } from "path";
import { FatalError } from "./errors";

const CONFIG_DIR = ".committer";
const JSON_CONFIG_FILE = "config.json";

/**
 * JSON config structure
 */
export interface CommitterConfig {
  commit: {
    forceDeleteLock: boolean;
  };
  general: {
    verbose: boolean;
    color: boolean;
  };
}

export type PartialConfig = {
  [K in keyof CommitterConfig]?: Partial<CommitterConfig[K]>;
};

export const DEFAULT_CONFIG: CommitterConfig = {
  commit: {
    forceDeleteLock: false,
  },
  general: {
    verbose: false,
    color: true,
  },
};

/**
 * Check if a value is a plain object
 */
function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readBoolean(
  section: Record<string, unknown>,
  key: string,
  file: string
): boolean | undefined {
  const value = section[key];
  if (value === undefined) return undefined;
  if (typeof value !== "boolean") {
    throw new FatalError(`invalid config ${file}: "${key}" must be a boolean`);
  }
  return value;
}

function readSection(
  raw: Record<string, unknown>,
  key: keyof CommitterConfig,
  file: string
): Record<string, unknown> {
  const section = raw[key];
  if (section === undefined) return {};
  if (!isObject(section)) {
    throw new FatalError(`invalid config ${file}: "${key}" must be an object`);
  }
  return section;
}

/**
 * Validate parsed JSON into a partial config. Unknown keys are ignored.
 */
export function parseConfig(raw: unknown, file: string): PartialConfig {
  if (!isObject(raw)) {
    throw new FatalError(`invalid config ${file}: expected a JSON object`);
  }
  const commit = readSection(raw, "commit", file);
  const general = readSection(raw, "general", file);

  return {
    commit: {
      forceDeleteLock: readBoolean(commit, "forceDeleteLock", file),
    },
    general: {
      verbose: readBoolean(general, "verbose", file),
      color: readBoolean(general, "color", file),
    },
  };
}

/**
 * Merge override into base, with override taking precedence
 */
export function mergeConfig(base: CommitterConfig, override: PartialConfig): CommitterConfig {
  return {
    commit: {
      forceDeleteLock: override.commit?.forceDeleteLock ?? base.commit.forceDeleteLock,
    },
    general: {
      verbose: override.general?.verbose ?? base.general.verbose,
      color: override.general?.color ?? base.general.color,
    },
  };
}

function readConfigFile(path: string): PartialConfig | undefined {
  if (!existsSync(path)) return undefined;

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new FatalError(`invalid config ${path}: ${detail}`);
  }
  return parseConfig(raw, path);
}

export function getGlobalConfigPath(home: string = homedir()): string {
  return join(home, CONFIG_DIR, JSON_CONFIG_FILE);
}

export function getRepoConfigPath(repoRoot: string): string {
  return join(repoRoot, CONFIG_DIR, JSON_CONFIG_FILE);
}

export interface ConfigLocations {
  home?: string;
  repoRoot?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Get the config with layered loading:
 * 1. Start with defaults
 * 2. Merge global ~/.committer/config.json
 * 3. Merge project .committer/config.json
 */
export function getConfig(locations: ConfigLocations = {}): CommitterConfig {
  const { home = homedir(), repoRoot, env = process.env } = locations;
  let config = DEFAULT_CONFIG;

  const globalConfig = readConfigFile(getGlobalConfigPath(home));
  if (globalConfig) {
    config = mergeConfig(config, globalConfig);
  }

  if (repoRoot) {
    const projectConfig = readConfigFile(getRepoConfigPath(repoRoot));
    if (projectConfig) {
      config = mergeConfig(config, projectConfig);
    }
  }

  if (env.NO_COLOR !== undefined && env.NO_COLOR !== "") {
    config = mergeConfig(config, { general: { color: false } });
  }

  return config;
}
