import { describe, it, expect } from "vitest";
import { mkdtemp, rm } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import Database from "better-sqlite3";
import { hasIndex, initializeDatabase, tableColumns } from "./schema.js";

describe("initializeDatabase", () => {
  it("creates the files table with all columns", () => {
    const db = initializeDatabase(":memory:");
    expect(tableColumns(db)).toEqual(["path", "chksum", "symlink", "link"]);
    db.close();
  });

  it("creates the checksum index", () => {
    const db = initializeDatabase(":memory:");
    expect(hasIndex(db, "csum_idx")).toBe(true);
    db.close();
  });

  it("creates the versioning table", () => {
    const db = initializeDatabase(":memory:");
    const row = db
      .prepare(
        "SELECT name FROM sqlite_master WHERE type='table' AND name='versioning'",
      )
      .get() as { name: string } | undefined;
    expect(row?.name).toBe("versioning");
    db.close();
  });

  it("sets WAL journal mode", async () => {
    const tempDir = await mkdtemp(join(tmpdir(), "schema-wal-"));
    const db = initializeDatabase(join(tempDir, "wal-test.db"));
    const result = db.pragma("journal_mode") as { journal_mode: string }[];
    expect(result[0]?.journal_mode).toBe("wal");
    db.close();
    await rm(tempDir, { recursive: true });
  });

  it("is idempotent when called twice on same path", async () => {
    const tempDir = await mkdtemp(join(tmpdir(), "schema-test-"));
    const dbPath = join(tempDir, "test.db");

    const db1 = initializeDatabase(dbPath);
    db1
      .prepare("INSERT INTO files (path, chksum) VALUES (?, ?)")
      .run("/a", "h1");
    db1.close();

    const db2 = initializeDatabase(dbPath);
    const count = db2.prepare("SELECT COUNT(*) AS cnt FROM files").get() as {
      cnt: number;
    };
    expect(count.cnt).toBe(1);
    db2.close();

    await rm(tempDir, { recursive: true });
  });

  it("leaves a legacy files table untouched", async () => {
    const tempDir = await mkdtemp(join(tmpdir(), "schema-legacy-"));
    const dbPath = join(tempDir, "legacy.db");

    const legacy = new Database(dbPath);
    legacy.exec(
      "CREATE TABLE files (path varchar NOT NULL PRIMARY KEY, chksum varchar NOT NULL)",
    );
    legacy.close();

    const db = initializeDatabase(dbPath);
    expect(tableColumns(db)).toEqual(["path", "chksum"]);
    expect(hasIndex(db, "csum_idx")).toBe(false);
    db.close();

    await rm(tempDir, { recursive: true });
  });
});
