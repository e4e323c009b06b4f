import Database from 'better-sqlite3'

export const FILES_TABLE = 'files'
export const CHECKSUM_INDEX = 'csum_idx'

/** 0: path + chksum, 1: + symlink, 2: + link and csum_idx */
export type SchemaVersion = 0 | 1 | 2
export const CURRENT_SCHEMA_VERSION: SchemaVersion = 2

const CREATE_TABLE_SQL = `
CREATE TABLE IF NOT EXISTS files (
  path varchar NOT NULL PRIMARY KEY,
  chksum varchar NOT NULL,
  symlink boolean DEFAULT 0,
  link boolean DEFAULT 0
)`

const CREATE_INDEXES_SQL = [
  'CREATE INDEX IF NOT EXISTS csum_idx ON files (chksum)',
]

const CREATE_VERSIONING_SQL =
  'CREATE TABLE IF NOT EXISTS versioning (chksum_type varchar NOT NULL)'

/** Column names of the live files table, empty when the table is missing */
export function tableColumns(db: Database.Database): string[] {
  const rows = db
    .prepare<[], { name: string }>(`PRAGMA table_info(${FILES_TABLE})`)
    .all()
  return rows.map((r) => r.name)
}

export function hasIndex(db: Database.Database, name: string): boolean {
  const row = db
    .prepare<[string], { name: string }>(
      "SELECT name FROM sqlite_master WHERE type = 'index' AND name = ?",
    )
    .get(name)
  return row !== undefined
}

/** Open/create SQLite database, create the current schema if absent, set WAL mode */
export function initializeDatabase(dbPath: string): Database.Database {
  const db = new Database(dbPath)

  db.pragma('journal_mode = WAL')

  // Legacy stores keep their layout until migrated
  if (tableColumns(db).length === 0) {
    db.exec(CREATE_TABLE_SQL)
    for (const sql of CREATE_INDEXES_SQL) {
      db.exec(sql)
    }
  }
  db.exec(CREATE_VERSIONING_SQL)

  return db
}
