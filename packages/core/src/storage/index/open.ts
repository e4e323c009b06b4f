import type Database from "better-sqlite3";
import type { Logger } from "pino";
import {
  ChecksumAlgorithm,
  type StoreConfig,
} from "../../schemas/index-config.js";
import { resolveDatabasePath } from "../../config/paths.js";
import { StorageError, withStorage } from "../../errors/catalog.js";
import type { FileLinker } from "../../fs/linker.js";
import { CURRENT_SCHEMA_VERSION, initializeDatabase } from "./schema.js";
import type { SchemaVersion } from "./schema.js";
import {
  detectSchemaVersion,
  migrateSchema,
  type MigrationReport,
  type MigrationStepEvent,
} from "./migrations.js";
import { createDedupIndex, type DedupIndex } from "./manager.js";

export interface OpenIndexOptions {
  config: StoreConfig;
  logger: Logger;
  linker: FileLinker;
  onMigrationStep?: (event: MigrationStepEvent) => void;
}

export interface OpenedIndex {
  index: DedupIndex;
  db: Database.Database;
  /** Version found on disk before any migration ran */
  schemaVersion: SchemaVersion;
  /** Algorithm recorded in the store, which wins over configuration */
  checksumAlgorithm: ChecksumAlgorithm;
  migration: MigrationReport | null;
}

/** Read the recorded checksum algorithm, recording `fallback` on first open. */
function resolveChecksumAlgorithm(
  db: Database.Database,
  fallback: ChecksumAlgorithm,
): ChecksumAlgorithm {
  const row = db
    .prepare<[], { chksum_type: string }>(
      "SELECT chksum_type FROM versioning LIMIT 1",
    )
    .get();

  if (!row) {
    db.prepare("INSERT INTO versioning (chksum_type) VALUES (?)").run(fallback);
    return fallback;
  }

  const parsed = ChecksumAlgorithm.safeParse(row.chksum_type);
  if (!parsed.success) {
    throw new StorageError(`Unknown checksum type in store: ${row.chksum_type}`, {
      chksumType: row.chksum_type,
    });
  }
  return parsed.data;
}

/**
 * Open (or create) the index database: detect the on-disk schema version
 * once, migrate to the current version when `autoMigrate` is set, and
 * resolve the checksum algorithm.
 */
export function openIndexDatabase(options: OpenIndexOptions): OpenedIndex {
  const { config, logger, linker, onMigrationStep } = options;
  const databasePath = resolveDatabasePath(config.databasePath);

  const db = withStorage("open", () => initializeDatabase(databasePath));

  try {
    const detected = detectSchemaVersion(db) ?? CURRENT_SCHEMA_VERSION;
    logger.debug(
      { databasePath, schemaVersion: detected },
      "Opened index database",
    );

    let migration: MigrationReport | null = null;
    if (detected < CURRENT_SCHEMA_VERSION) {
      if (!config.autoMigrate) {
        throw new StorageError(
          `Index schema version ${detected} is older than ${CURRENT_SCHEMA_VERSION}; migration required`,
          { schemaVersion: detected },
        );
      }
      migration = migrateSchema(
        {
          db,
          logger,
          strategy: config.migrationStrategy,
          reclaimSpace: config.reclaimSpace,
          onStep: onMigrationStep,
        },
        detected,
        CURRENT_SCHEMA_VERSION,
      );
    }

    const checksumAlgorithm = withStorage("read versioning", () =>
      resolveChecksumAlgorithm(db, config.checksumAlgorithm),
    );

    const index = createDedupIndex(db, {
      linker,
      logger,
      migrationStrategy: config.migrationStrategy,
      reclaimSpace: config.reclaimSpace,
      onMigrationStep,
    });

    return { index, db, schemaVersion: detected, checksumAlgorithm, migration };
  } catch (err) {
    db.close();
    throw err;
  }
}
