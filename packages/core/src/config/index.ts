export {
  DEFAULT_ROOT_PATH,
  CONFIG_FILENAME,
  DEFAULT_DATABASE_FILENAME,
} from "./defaults.js";
export {
  loadConfig,
  resolveConfigPath,
  type LoadConfigOptions,
} from "./loader.js";
export {
  expandHomePath,
  resolveRootPath,
  resolveDatabasePath,
} from "./paths.js";
