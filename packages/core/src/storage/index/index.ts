export type { FileRecord, UpsertOptions, DuplicateGroup } from "./types.js";
export {
  initializeDatabase,
  CURRENT_SCHEMA_VERSION,
  type SchemaVersion,
} from "./schema.js";
export {
  migrateSchema,
  detectSchemaVersion,
  type MigrationContext,
  type MigrationReport,
  type MigrationStepEvent,
} from "./migrations.js";
export {
  createDedupIndex,
  type DedupIndex,
  type DedupIndexOptions,
} from "./manager.js";
export {
  openIndexDatabase,
  type OpenIndexOptions,
  type OpenedIndex,
} from "./open.js";
