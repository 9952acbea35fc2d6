import { join } from "node:path";
import { homedir } from "node:os";

export const DEFAULT_ROOT_PATH = join(homedir(), "docclaims");
export const DEFAULT_CONFIG_PATH = join(DEFAULT_ROOT_PATH, "config.json");

/** Environment variable that overrides the root path when none is passed explicitly. */
export const ROOT_PATH_ENV = "DOCCLAIMS_ROOT_PATH";

/** Ledger databases live here, one file per resolver. */
export const LEDGER_DIR_NAME = "ledgers";
