export { DEFAULT_ROOT_PATH, DEFAULT_CONFIG_PATH } from "./defaults.js";
export { loadConfig, saveConfig, type LoadConfigOptions } from "./loader.js";
export {
  expandHomePath,
  resolveRootPath,
  resolveDatabasePath,
} from "./paths.js";
