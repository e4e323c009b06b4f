/**
 * Additive schema migrations for the files table.
 *
 * Each step names the full column list and indexes of its target schema.
 * A step whose columns and indexes already exist is skipped, which makes
 * re-running a migration a no-op.
 *
 * Strategies:
 * - rebuild: copy rows into a temporary table, drop and recreate the live
 *   table with the new columns, copy back, drop the temporary table
 * - alter: ALTER TABLE ... ADD COLUMN with a default
 *
 * Every step runs in one transaction; VACUUM runs after the last commit.
 */

import type Database from "better-sqlite3";
import type { Logger } from "pino";
import type { MigrationStrategy } from "../../schemas/index-config.js";
import { withStorage } from "../../errors/catalog.js";
import {
  CHECKSUM_INDEX,
  CURRENT_SCHEMA_VERSION,
  FILES_TABLE,
  hasIndex,
  tableColumns,
  type SchemaVersion,
} from "./schema.js";

const BACKUP_TABLE = "files_backup";

interface ColumnSpec {
  name: string;
  definition: string;
  /** SQL literal copied into rows that predate the column */
  fill?: string;
}

interface IndexSpec {
  name: string;
  sql: string;
}

interface MigrationStep {
  version: SchemaVersion;
  description: string;
  columns: ColumnSpec[];
  indexes: IndexSpec[];
}

const PATH_COLUMN: ColumnSpec = {
  name: "path",
  definition: "varchar NOT NULL PRIMARY KEY",
};
const CHECKSUM_COLUMN: ColumnSpec = {
  name: "chksum",
  definition: "varchar NOT NULL",
};
const SYMLINK_COLUMN: ColumnSpec = {
  name: "symlink",
  definition: "boolean DEFAULT 0",
  fill: "0",
};
const LINK_COLUMN: ColumnSpec = {
  name: "link",
  definition: "boolean DEFAULT 0",
  fill: "0",
};

const MIGRATIONS: readonly MigrationStep[] = [
  {
    version: 1,
    description: "add symlink flag",
    columns: [PATH_COLUMN, CHECKSUM_COLUMN, SYMLINK_COLUMN],
    indexes: [],
  },
  {
    version: 2,
    description: "add link flag and checksum index",
    columns: [PATH_COLUMN, CHECKSUM_COLUMN, SYMLINK_COLUMN, LINK_COLUMN],
    indexes: [
      {
        name: CHECKSUM_INDEX,
        sql: `CREATE INDEX IF NOT EXISTS ${CHECKSUM_INDEX} ON ${FILES_TABLE} (chksum)`,
      },
    ],
  },
];

export interface MigrationStepEvent {
  version: SchemaVersion;
  statement: string;
}

export interface MigrationContext {
  db: Database.Database;
  logger: Logger;
  strategy: MigrationStrategy;
  /** Run VACUUM once any step was applied */
  reclaimSpace: boolean;
  /** Called after each statement of a step, inside its transaction */
  onStep?: (event: MigrationStepEvent) => void;
}

export interface MigrationReport {
  fromVersion: SchemaVersion;
  toVersion: SchemaVersion;
  applied: SchemaVersion[];
  skipped: SchemaVersion[];
  reclaimed: boolean;
}

function isApplied(db: Database.Database, step: MigrationStep): boolean {
  const live = new Set(tableColumns(db));
  return (
    step.columns.every((c) => live.has(c.name)) &&
    step.indexes.every((i) => hasIndex(db, i.name))
  );
}

/**
 * Highest version whose columns and indexes are all present. Returns null
 * when the files table does not exist.
 */
export function detectSchemaVersion(
  db: Database.Database,
): SchemaVersion | null {
  if (tableColumns(db).length === 0) {
    return null;
  }
  let version: SchemaVersion = 0;
  for (const step of MIGRATIONS) {
    if (!isApplied(db, step)) break;
    version = step.version;
  }
  return version;
}

function columnDefinitions(columns: ColumnSpec[]): string {
  return columns.map((c) => `${c.name} ${c.definition}`).join(", ");
}

function rebuildStatements(
  step: MigrationStep,
  liveColumns: Set<string>,
): string[] {
  const names = step.columns.map((c) => c.name).join(", ");
  const copied = step.columns
    .map((c) => {
      if (liveColumns.has(c.name)) return c.name;
      if (c.fill !== undefined) return c.fill;
      throw new Error(`Cannot rebuild ${FILES_TABLE}: column ${c.name} is missing`);
    })
    .join(", ");
  const definitions = columnDefinitions(step.columns);

  return [
    `CREATE TEMPORARY TABLE ${BACKUP_TABLE} (${definitions})`,
    `INSERT INTO ${BACKUP_TABLE} (${names}) SELECT ${copied} FROM ${FILES_TABLE} ORDER BY rowid`,
    `DROP TABLE ${FILES_TABLE}`,
    `CREATE TABLE ${FILES_TABLE} (${definitions})`,
    `INSERT INTO ${FILES_TABLE} (${names}) SELECT ${names} FROM ${BACKUP_TABLE} ORDER BY rowid`,
    `DROP TABLE ${BACKUP_TABLE}`,
    ...step.indexes.map((i) => i.sql),
  ];
}

function alterStatements(
  step: MigrationStep,
  liveColumns: Set<string>,
): string[] {
  const added = step.columns
    .filter((c) => !liveColumns.has(c.name))
    .map((c) => {
      if (c.fill === undefined) {
        throw new Error(`Cannot add required column ${c.name} to ${FILES_TABLE}`);
      }
      return `ALTER TABLE ${FILES_TABLE} ADD COLUMN ${c.name} ${c.definition}`;
    });
  return [...added, ...step.indexes.map((i) => i.sql)];
}

function applyStep(context: MigrationContext, step: MigrationStep): void {
  const { db, strategy, onStep } = context;

  withStorage(`migration to version ${step.version}`, () => {
    const live = new Set(tableColumns(db));
    const statements =
      strategy === "rebuild"
        ? rebuildStatements(step, live)
        : alterStatements(step, live);

    for (const statement of statements) {
      db.exec(statement);
      onStep?.({ version: step.version, statement });
    }
  });
}

/**
 * Migrate the files table from `fromVersion` to `toVersion` in a single
 * transaction. Steps whose columns and indexes already exist are skipped;
 * any failure rolls every step back.
 */
export function migrateSchema(
  context: MigrationContext,
  fromVersion: SchemaVersion,
  toVersion: SchemaVersion = CURRENT_SCHEMA_VERSION,
): MigrationReport {
  if (fromVersion > toVersion) {
    throw new RangeError(
      `Cannot migrate schema down from ${fromVersion} to ${toVersion}`,
    );
  }

  const { db, logger } = context;
  const report: MigrationReport = {
    fromVersion,
    toVersion,
    applied: [],
    skipped: [],
    reclaimed: false,
  };

  const run = db.transaction(() => {
    for (const step of MIGRATIONS) {
      if (step.version <= fromVersion || step.version > toVersion) continue;

      if (isApplied(db, step)) {
        logger.info(
          { version: step.version },
          "Schema migration already applied",
        );
        report.skipped.push(step.version);
        continue;
      }

      logger.info(
        { version: step.version, strategy: context.strategy },
        `Migrating schema: ${step.description}`,
      );
      applyStep(context, step);
      report.applied.push(step.version);
    }
  });
  withStorage("schema migration", () => run());

  if (context.reclaimSpace && report.applied.length > 0) {
    withStorage("vacuum", () => db.exec("VACUUM"));
    report.reclaimed = true;
  }

  return report;
}
