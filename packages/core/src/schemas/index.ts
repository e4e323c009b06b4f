export {
  DEFAULTS,
  IndexConfigSchema,
  ChecksumAlgorithm,
  MigrationStrategy,
  type IndexConfig,
  type LoggingConfig,
  type StoreConfig,
} from "./index-config.js";
