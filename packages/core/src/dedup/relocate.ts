import { lstat, readdir } from "node:fs/promises";
import { RelocationError } from "../errors/catalog.js";
import { destinationWithSubdirectory } from "../fs/linker.js";
import type { FileRecord } from "../storage/index/types.js";
import type { DedupDeps, RelocateOptions, Relocation } from "./types.js";

async function isRegularFile(path: string): Promise<boolean> {
  try {
    return (await lstat(path)).isFile();
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") return false;
    throw err;
  }
}

async function isEmptyOrMissing(dir: string): Promise<boolean> {
  try {
    return (await readdir(dir)).length === 0;
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") return true;
    throw err;
  }
}

/**
 * Move every duplicate except its group's anchor into `dupDir`, keeping
 * the path below the directories the two share. With `symlink`, each moved
 * path is replaced by a symlink to the anchor and stays indexed as a
 * symlink; otherwise its record is removed.
 */
export async function relocateDuplicates(
  deps: DedupDeps,
  options: RelocateOptions,
): Promise<Relocation[]> {
  const { index, linker, logger } = deps;
  const { dupDir, symlink } = options;

  if (!(await isEmptyOrMissing(dupDir))) {
    throw new RelocationError(`${dupDir} is not empty; refusing to move files`, {
      dupDir,
    });
  }

  logger.info({ dupDir, symlink }, "Relocating duplicates");
  const relocations: Relocation[] = [];

  try {
    for (const group of index.duplicateGroups()) {
      const present: FileRecord[] = [];
      for (const record of group.records) {
        if (await isRegularFile(record.path)) present.push(record);
      }

      const [anchor, ...rest] = present;
      if (!anchor) continue;

      for (const record of rest) {
        const to = destinationWithSubdirectory(record.path, dupDir);
        linker.move(record.path, to, { removeEmptyParent: !symlink });

        if (symlink) {
          linker.symlink(anchor.path, record.path);
          index.upsert(record.path, record.checksum, true);
        } else {
          index.remove(record.path);
        }

        relocations.push({ from: record.path, to, anchor: anchor.path });
      }
    }
  } catch (err) {
    logger.error(
      { dupDir, error: (err as Error).message },
      "Unable to relocate duplicates",
    );
    throw err;
  }

  logger.info({ moved: relocations.length }, "Relocation complete");
  return relocations;
}
