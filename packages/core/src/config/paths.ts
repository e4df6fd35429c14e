import { homedir } from "node:os";
import { isAbsolute, join, resolve } from "node:path";
import { DEFAULT_DATABASE_FILENAME, DEFAULT_ROOT_PATH } from "./defaults.js";

/**
 * Expands a leading "~" to the current user's home directory.
 */
export function expandHomePath(input: string): string {
  if (input === "~") {
    return homedir();
  }
  if (input.startsWith("~/")) {
    return resolve(homedir(), input.slice(2));
  }
  return input;
}

/**
 * Resolves the configured root path (or default) to an absolute path.
 */
export function resolveRootPath(input?: string): string {
  return resolve(expandHomePath(input ?? DEFAULT_ROOT_PATH));
}

/**
 * Index database location. Relative overrides resolve against the root;
 * ":memory:" passes through untouched.
 */
export function resolveDatabasePath(rootPath: string, override?: string): string {
  if (override === undefined) {
    return join(rootPath, DEFAULT_DATABASE_FILENAME);
  }
  if (override === ":memory:") {
    return override;
  }
  const expanded = expandHomePath(override);
  return isAbsolute(expanded) ? expanded : resolve(rootPath, expanded);
}
