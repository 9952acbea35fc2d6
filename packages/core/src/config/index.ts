export {
  DEFAULT_ROOT_PATH,
  DEFAULT_CONFIG_PATH,
  LEDGER_DIR_NAME,
  ROOT_PATH_ENV,
} from "./defaults.js";
export { loadConfig, saveConfig, type LoadConfigOptions } from "./loader.js";
export { expandHomePath, ledgerDatabasePath, resolveRootPath } from "./paths.js";
