/**
 * Filesystem side of a merge: hard links, symlinks and moves.
 *
 * All operations are synchronous so they can run inside a better-sqlite3
 * transaction; a thrown error rolls the surrounding row updates back.
 */

import {
  existsSync,
  linkSync,
  mkdirSync,
  readdirSync,
  renameSync,
  rmdirSync,
  rmSync,
  statSync,
  symlinkSync,
} from "node:fs";
import { dirname, join, resolve, sep } from "node:path";
import { randomUUID } from "node:crypto";

export interface MoveOptions {
  /** Remove the source's parent directory when the move leaves it empty. */
  removeEmptyParent?: boolean;
}

export interface FileLinker {
  /** True when both paths resolve to the same device and inode. */
  sameFile(a: string, b: string): boolean;
  /**
   * Make `linkPath` a hard link to `target`. Returns false when the two
   * already share an inode.
   */
  hardlink(target: string, linkPath: string): boolean;
  /** Replace `linkPath` with an absolute symlink to `target`. */
  symlink(target: string, linkPath: string): void;
  move(src: string, dst: string, options?: MoveOptions): void;
}

function requirePath(value: string, what: string): void {
  if (value === "") {
    throw new Error(`${what} requires a path`);
  }
}

export function createNodeFileLinker(): FileLinker {
  function sameFile(a: string, b: string): boolean {
    if (!existsSync(a) || !existsSync(b)) {
      return false;
    }
    const statA = statSync(a);
    const statB = statSync(b);
    return statA.dev === statB.dev && statA.ino === statB.ino;
  }

  return {
    sameFile,

    hardlink(target, linkPath) {
      requirePath(target, "hardlink target");
      requirePath(linkPath, "hardlink");
      if (!existsSync(target)) {
        throw new Error(`hardlink target does not exist: ${target}`);
      }
      if (sameFile(target, linkPath)) {
        return false;
      }

      const absLink = resolve(linkPath);
      mkdirSync(dirname(absLink), { recursive: true });

      // Link beside the destination, then rename over it
      const tempPath = `${absLink}.link.${randomUUID()}`;
      linkSync(resolve(target), tempPath);
      try {
        renameSync(tempPath, absLink);
      } catch (err) {
        rmSync(tempPath, { force: true });
        throw err;
      }
      return true;
    },

    symlink(target, linkPath) {
      requirePath(target, "symlink target");
      requirePath(linkPath, "symlink");
      if (!existsSync(target)) {
        throw new Error(`symlink target does not exist: ${target}`);
      }

      const absLink = resolve(linkPath);
      mkdirSync(dirname(absLink), { recursive: true });
      rmSync(absLink, { force: true });
      symlinkSync(resolve(target), absLink);
    },

    move(src, dst, options) {
      requirePath(src, "move source");
      requirePath(dst, "move destination");

      mkdirSync(dirname(dst), { recursive: true });
      renameSync(src, dst);

      if (options?.removeEmptyParent) {
        const parent = dirname(src);
        if (readdirSync(parent).length === 0) {
          rmdirSync(parent);
        }
      }
    },
  };
}

/**
 * Rebuilds `src` under `dstDir`, dropping the leading directories the two
 * paths share: `/usr/local/a.txt` into `/media/cdrom` becomes
 * `/media/cdrom/usr/local/a.txt`.
 */
export function destinationWithSubdirectory(src: string, dstDir: string): string {
  requirePath(src, "destinationWithSubdirectory source");
  requirePath(dstDir, "destinationWithSubdirectory destination");

  const absSrc = resolve(src);
  const absDst = resolve(dstDir);
  const srcParts = absSrc.split(sep);
  const dstParts = absDst.split(sep);

  let shared = 0;
  while (
    shared < srcParts.length - 1 &&
    shared < dstParts.length &&
    srcParts[shared] === dstParts[shared]
  ) {
    shared++;
  }

  const destination = join(absDst, ...srcParts.slice(shared));
  if (destination === absSrc) {
    throw new Error(
      `Unable to determine new destination; ${destination} and ${absSrc} are the same path`,
    );
  }
  return destination;
}
