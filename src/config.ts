/**
 * Config management for logrelay
 *
 * The only setting that must come from outside is the error log path.
 * It lives in .logrelay/config.json, looked up from the current directory
 * or its parents, and can be overridden from the command line.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "fs";
import { homedir } from "os";
import { dirname, isAbsolute, join, resolve } from "path";
import type { RelayConfig } from "./types.js";

const CONFIG_FOLDER = ".logrelay";
const CONFIG_FILE = "config.json";

/**
 * Stored form: errorLogPath may be relative to the directory holding .logrelay/
 */
interface StoredConfig {
  errorLogPath: string;
  catchAll?: boolean;
}

function isStoredConfig(value: unknown): value is StoredConfig {
  if (typeof value !== "object" || value === null) return false;
  if (
    !("errorLogPath" in value) ||
    typeof value.errorLogPath !== "string" ||
    value.errorLogPath.length === 0
  ) {
    return false;
  }
  return !("catchAll" in value) || typeof value.catchAll === "boolean";
}

/**
 * Expands ~ to home directory
 */
export function expandPath(path: string): string {
  if (path.startsWith("~/")) {
    return path.replace("~", homedir());
  }
  return path;
}

/**
 * Finds the .logrelay/ directory by walking up from startDir.
 * Returns null if none exists.
 */
export function findConfigDir(startDir: string = process.cwd()): string | null {
  let dir = resolve(startDir);

  for (;;) {
    const configDir = join(dir, CONFIG_FOLDER);
    if (existsSync(join(configDir, CONFIG_FILE))) {
      return configDir;
    }

    const parent = dirname(dir);
    if (parent === dir) return null; // Reached root
    dir = parent;
  }
}

function getConfigPath(configDir: string): string {
  return join(configDir, CONFIG_FILE);
}

/**
 * Loads config from .logrelay/config.json.
 * Throws if there is none, or if it is invalid.
 *
 * @param startDir - Directory to start searching from (defaults to cwd)
 */
export function loadConfig(startDir?: string): RelayConfig {
  const configDir = findConfigDir(startDir);
  if (!configDir) {
    throw new Error(
      "No logrelay config found. Run 'logrelay init --error-log <path>' or pass --error-file."
    );
  }
  const configPath = getConfigPath(configDir);

  try {
    const parsed: unknown = JSON.parse(readFileSync(configPath, "utf-8"));
    return validateConfig(parsed, dirname(configDir));
  } catch (err) {
    throw new Error(
      `Failed to load config from ${configPath}: ${err instanceof Error ? err.message : String(err)}`
    );
  }
}

/**
 * Validates a parsed config and resolves the error log path
 *
 * @param baseDir - Directory relative paths resolve against (parent of .logrelay/)
 */
function validateConfig(parsed: unknown, baseDir: string): RelayConfig {
  if (!isStoredConfig(parsed)) {
    throw new Error("errorLogPath must be a non-empty string and catchAll a boolean");
  }

  const errorLogPath = expandPath(parsed.errorLogPath);
  return {
    errorLogPath: isAbsolute(errorLogPath) ? errorLogPath : resolve(baseDir, errorLogPath),
    catchAll: parsed.catchAll ?? true,
  };
}

/**
 * Creates .logrelay/config.json in dir. The path is stored as given.
 * Throws if a config already exists there.
 */
export function initConfig(errorLogPath: string, dir: string = process.cwd()): string {
  const configDir = join(resolve(dir), CONFIG_FOLDER);
  const configPath = getConfigPath(configDir);

  if (existsSync(configPath)) {
    throw new Error("logrelay is already initialized. Config exists at " + configPath);
  }
  if (!existsSync(configDir)) {
    mkdirSync(configDir, { recursive: true });
  }

  const stored: StoredConfig = { errorLogPath, catchAll: true };
  writeFileSync(configPath, JSON.stringify(stored, null, 2) + "\n", "utf-8");
  return configPath;
}

export interface ConfigOverrides {
  errorFile?: string;
  catchAll?: boolean;
}

/**
 * Merges command-line overrides over the config file.
 *
 * With --error-file given, no config file is needed. The file is then read
 * only for catchAll, and not at all when catchAll is overridden too; an
 * invalid file that does get read still fails the call.
 */
export function resolveRelayConfig(overrides: ConfigOverrides, startDir?: string): RelayConfig {
  if (overrides.errorFile !== undefined) {
    const errorLogPath = resolve(startDir ?? process.cwd(), expandPath(overrides.errorFile));
    if (overrides.catchAll !== undefined) {
      return { errorLogPath, catchAll: overrides.catchAll };
    }
    const base = findConfigDir(startDir) ? loadConfig(startDir) : null;
    return { errorLogPath, catchAll: base?.catchAll ?? true };
  }

  const config = loadConfig(startDir);
  return {
    ...config,
    catchAll: overrides.catchAll ?? config.catchAll,
  };
}
