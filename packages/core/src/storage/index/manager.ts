import type Database from "better-sqlite3";
import type { Logger } from "pino";
import type { FileLinker } from "../../fs/linker.js";
import type { MigrationStrategy } from "../../schemas/index-config.js";
import {
  ChecksumMismatchError,
  StorageError,
  SymlinkNotMergeableError,
  withStorage,
} from "../../errors/catalog.js";
import {
  migrateSchema,
  type MigrationReport,
  type MigrationStepEvent,
} from "./migrations.js";
import type { SchemaVersion } from "./schema.js";
import type { DuplicateGroup, FileRecord, UpsertOptions } from "./types.js";

export interface DedupIndex {
  /** Insert or replace the record for `path`; `isLinked` resets unless `options.linked`. */
  upsert(
    path: string,
    checksum: string,
    isSymlink: boolean,
    options?: UpsertOptions,
  ): FileRecord;
  findByPath(path: string): FileRecord | undefined;
  /**
   * Non-symlink records sharing `checksum`, linked records first, then in
   * insertion order. Every iteration re-runs the query; the connection is
   * busy until an iteration finishes, so collect it before writing.
   */
  findDuplicates(checksum: string): Iterable<FileRecord>;
  duplicateGroups(): DuplicateGroup[];
  /** Hard-link `duplicatePath` to `anchorPath` and flag both as linked, atomically. */
  merge(anchorPath: string, duplicatePath: string): void;
  remove(path: string): boolean;
  /** Rename `oldPath` and everything beneath it. Returns the number of rows rewritten. */
  updatePath(oldPath: string, newPath: string): number;
  listPaths(): string[];
  count(): number;
  migrateSchema(
    fromVersion: SchemaVersion,
    toVersion?: SchemaVersion,
  ): MigrationReport;
  close(): void;
}

export interface DedupIndexOptions {
  linker: FileLinker;
  logger: Logger;
  migrationStrategy?: MigrationStrategy;
  reclaimSpace?: boolean;
  onMigrationStep?: (event: MigrationStepEvent) => void;
}

interface RawRow {
  path: string;
  chksum: string;
  symlink: number | null;
  link: number | null;
}

function rowToRecord(row: RawRow): FileRecord {
  return {
    path: row.path,
    checksum: row.chksum,
    isSymlink: Boolean(row.symlink),
    isLinked: Boolean(row.link),
  };
}

const COLUMNS = "path, chksum, symlink, link";

// "/dir/" and "/dir" name the same directory; "/" becomes ""
function trimTrailingSeparators(path: string): string {
  return path.replace(/\/+$/, "");
}

function prepareStatements(db: Database.Database) {
  return {
    upsert: db.prepare<{
      path: string;
      chksum: string;
      symlink: number;
      link: number;
    }>(
      `INSERT INTO files (path, chksum, symlink, link)
       VALUES (@path, @chksum, @symlink, @link)
       ON CONFLICT(path) DO UPDATE SET
         chksum = excluded.chksum,
         symlink = excluded.symlink,
         link = excluded.link`,
    ),

    findByPath: db.prepare<{ path: string }, RawRow>(
      `SELECT ${COLUMNS} FROM files WHERE path = @path`,
    ),

    // Rows only come back when at least two non-symlink records match
    findDuplicates: db.prepare<{ chksum: string }, RawRow>(
      `SELECT ${COLUMNS} FROM files
       WHERE chksum = @chksum AND IFNULL(symlink, 0) = 0
         AND (SELECT COUNT(*) FROM files
              WHERE chksum = @chksum AND IFNULL(symlink, 0) = 0) > 1
       ORDER BY IFNULL(link, 0) DESC, rowid ASC`,
    ),

    duplicateChecksums: db.prepare<[], { chksum: string }>(
      `SELECT chksum FROM files WHERE IFNULL(symlink, 0) = 0
       GROUP BY chksum HAVING COUNT(*) > 1
       ORDER BY MIN(rowid)`,
    ),

    setLinked: db.prepare<{ path: string }>(
      "UPDATE files SET link = 1 WHERE path = @path",
    ),

    remove: db.prepare<{ path: string }>(
      "DELETE FROM files WHERE path = @path",
    ),

    updatePath: db.prepare<{ oldPath: string; newPath: string; prefix: string }>(
      `UPDATE files SET path = @newPath || substr(path, length(@oldPath) + 1)
       WHERE path = @oldPath OR substr(path, 1, length(@prefix)) = @prefix`,
    ),

    listPaths: db.prepare<[], { path: string }>(
      "SELECT path FROM files ORDER BY rowid",
    ),

    count: db.prepare<[], { cnt: number }>(
      "SELECT COUNT(*) AS cnt FROM files",
    ),
  };
}

type Statements = ReturnType<typeof prepareStatements>;

/**
 * Create a DedupIndex over a database already at the current schema
 * version (see openIndexDatabase). Statements are prepared on first use and
 * again after migrateSchema.
 */
export function createDedupIndex(
  db: Database.Database,
  options: DedupIndexOptions,
): DedupIndex {
  const { linker, logger } = options;

  let prepared: Statements | null = null;
  function statements(): Statements {
    prepared ??= withStorage("prepare statements", () =>
      prepareStatements(db),
    );
    return prepared;
  }

  function findByPath(path: string): FileRecord | undefined {
    const row = statements().findByPath.get({ path });
    return row ? rowToRecord(row) : undefined;
  }

  function requireRecord(path: string): FileRecord {
    const record = findByPath(path);
    if (!record) {
      throw new StorageError(`No record for ${path}`, {
        path,
        reason: "RECORD_NOT_FOUND",
      });
    }
    return record;
  }

  /** Returns false when both paths name the same record. */
  const mergeTransaction = db.transaction(
    (anchorPath: string, duplicatePath: string): boolean => {
      const anchor = requireRecord(anchorPath);
      const duplicate = requireRecord(duplicatePath);

      if (anchor.isSymlink || duplicate.isSymlink) {
        throw new SymlinkNotMergeableError({
          path: anchor.isSymlink ? anchorPath : duplicatePath,
        });
      }
      if (anchorPath === duplicatePath) {
        return false;
      }
      if (anchor.checksum !== duplicate.checksum) {
        throw new ChecksumMismatchError({
          anchorPath,
          anchorChecksum: anchor.checksum,
          duplicatePath,
          duplicateChecksum: duplicate.checksum,
        });
      }

      const stmts = statements();
      stmts.setLinked.run({ path: anchorPath });
      stmts.setLinked.run({ path: duplicatePath });

      // Last, so a failed link rolls the flags back
      linker.hardlink(anchorPath, duplicatePath);
      return true;
    },
  );

  return {
    upsert(path, checksum, isSymlink, upsertOptions) {
      return withStorage("upsert", () => {
        statements().upsert.run({
          path,
          chksum: checksum,
          symlink: isSymlink ? 1 : 0,
          link: upsertOptions?.linked ? 1 : 0,
        });
        return requireRecord(path);
      });
    },

    findByPath(path) {
      return withStorage("findByPath", () => findByPath(path));
    },

    findDuplicates(checksum) {
      return {
        *[Symbol.iterator]() {
          const rows = withStorage("findDuplicates", () =>
            statements().findDuplicates.iterate({ chksum: checksum }),
          );
          for (const row of rows) {
            yield rowToRecord(row);
          }
        },
      };
    },

    duplicateGroups() {
      return withStorage("duplicateGroups", () => {
        const stmts = statements();
        return stmts.duplicateChecksums.all().map(({ chksum }) => ({
          checksum: chksum,
          records: stmts.findDuplicates.all({ chksum }).map(rowToRecord),
        }));
      });
    },

    merge(anchorPath, duplicatePath) {
      const merged = withStorage("merge", () =>
        mergeTransaction(anchorPath, duplicatePath),
      );
      if (merged) {
        logger.info({ anchorPath, duplicatePath }, "Merged duplicate");
      }
    },

    remove(path) {
      return withStorage("remove", () => {
        const result = statements().remove.run({ path });
        return result.changes > 0;
      });
    },

    updatePath(oldPath, newPath) {
      const from = trimTrailingSeparators(oldPath);
      const to = trimTrailingSeparators(newPath);
      return withStorage("updatePath", () => {
        const result = statements().updatePath.run({
          oldPath: from,
          newPath: to,
          prefix: from + "/",
        });
        return result.changes;
      });
    },

    listPaths() {
      return withStorage("listPaths", () =>
        statements().listPaths.all().map((r) => r.path),
      );
    },

    count() {
      return withStorage("count", () => {
        const row = statements().count.get();
        return row?.cnt ?? 0;
      });
    },

    migrateSchema(fromVersion, toVersion) {
      const report = migrateSchema(
        {
          db,
          logger,
          strategy: options.migrationStrategy ?? "rebuild",
          reclaimSpace: options.reclaimSpace ?? true,
          onStep: options.onMigrationStep,
        },
        fromVersion,
        toVersion,
      );
      if (report.applied.length > 0) {
        prepared = null;
      }
      return report;
    },

    close() {
      db.close();
    },
  };
}
