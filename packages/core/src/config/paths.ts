import { homedir } from "node:os";
import { join, resolve } from "node:path";
import { DEFAULT_ROOT_PATH, LEDGER_DIR_NAME, ROOT_PATH_ENV } from "./defaults.js";

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
 * Resolves the root path to an absolute path: the explicit input, then
 * DOCCLAIMS_ROOT_PATH, then the default.
 */
export function resolveRootPath(input?: string): string {
  const fromEnv = process.env[ROOT_PATH_ENV];
  return resolve(
    expandHomePath(input ?? (fromEnv !== undefined && fromEnv !== "" ? fromEnv : DEFAULT_ROOT_PATH)),
  );
}

/** SQLite file for one resolver's ledger. */
export function ledgerDatabasePath(rootPath: string, resolverId: string): string {
  return join(rootPath, LEDGER_DIR_NAME, `${resolverId}.db`);
}
