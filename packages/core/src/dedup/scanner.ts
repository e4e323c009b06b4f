import { lstat, readdir, stat } from "node:fs/promises";
import { existsSync } from "node:fs";
import { join, resolve } from "node:path";
import { hashFile } from "../fs/hasher.js";
import type { DedupDeps, ScanSummary, UpdateResult } from "./types.js";

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Hard-link every other non-symlink record of `checksum` to one anchor.
 * The anchor is the first record findDuplicates returns besides `path`,
 * so already-linked files win. Records whose file is gone are left alone,
 * as are linked records that already share the anchor's inode.
 */
function linkDuplicates(
  deps: DedupDeps,
  path: string,
  checksum: string,
): string[] {
  const { index, linker, logger } = deps;

  // Collect first: the cursor holds the connection
  const candidates = [...index.findDuplicates(checksum)].filter((record) => {
    if (record.path === path) return false;
    if (!existsSync(record.path)) {
      logger.warn({ path: record.path }, "Indexed file is missing");
      return false;
    }
    return true;
  });

  const [anchor, ...others] = candidates;
  if (!anchor) {
    return [];
  }

  const pending = others.filter(
    (record) => !(record.isLinked && linker.sameFile(anchor.path, record.path)),
  );

  const merged: string[] = [];
  for (const record of [...pending, { path }]) {
    index.merge(anchor.path, record.path);
    merged.push(record.path);
  }
  return merged;
}

/**
 * Hash `path`, record it, and link it with any duplicates. Returns null
 * when the path is missing (e.g. a broken symlink) or not a regular file.
 */
export async function updateChecksum(
  deps: DedupDeps,
  path: string,
): Promise<UpdateResult | null> {
  const { index, logger, checksumAlgorithm } = deps;
  const absPath = resolve(path);

  try {
    const target = await stat(absPath);
    if (!target.isFile()) {
      logger.debug({ path: absPath }, "Not a regular file; skipping update");
      return null;
    }
    const isSymlink = (await lstat(absPath)).isSymbolicLink();
    const checksum = await hashFile(absPath, checksumAlgorithm);

    index.upsert(absPath, checksum, isSymlink);
    const merged = isSymlink ? [] : linkDuplicates(deps, absPath, checksum);

    return { path: absPath, checksum, isSymlink, merged };
  } catch (err) {
    if (isNotFound(err)) {
      logger.error({ path: absPath }, "Path does not exist; skipping update");
      return null;
    }
    logger.error(
      { path: absPath, error: (err as Error).message },
      "Unable to update checksum",
    );
    throw err;
  }
}

async function* walk(dir: string): AsyncGenerator<string> {
  const entries = await readdir(dir, { withFileTypes: true });
  for (const entry of entries) {
    const entryPath = join(dir, entry.name);
    if (entry.isDirectory()) {
      yield* walk(entryPath);
    } else if (entry.isFile() || entry.isSymbolicLink()) {
      yield entryPath;
    }
  }
}

/** Update every file and symlink under `root`. Directory symlinks are not followed. */
export async function scanTree(
  deps: DedupDeps,
  root: string,
): Promise<ScanSummary> {
  const { logger } = deps;
  const absRoot = resolve(root);
  const summary: ScanSummary = { scanned: 0, skipped: 0, merged: 0 };

  logger.info({ root: absRoot }, "Updating all checksums");

  for await (const path of walk(absRoot)) {
    const result = await updateChecksum(deps, path);
    if (result) {
      summary.scanned++;
      summary.merged += result.merged.length;
    } else {
      summary.skipped++;
    }
  }

  logger.info({ root: absRoot, ...summary }, "Done updating all checksums");
  return summary;
}
