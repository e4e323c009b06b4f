import { describe, it, expect, beforeEach, afterEach } from "vitest";
import {
  mkdtemp,
  rm,
  writeFile,
  mkdir,
  lstat,
  readlink,
  stat,
  readdir,
  readFile,
  symlink,
} from "node:fs/promises";
import { existsSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import {
  createNodeFileLinker,
  destinationWithSubdirectory,
} from "./linker.js";

describe("createNodeFileLinker", () => {
  const linker = createNodeFileLinker();
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "linker-test-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true });
  });

  describe("hardlink", () => {
    it("replaces the link path with a hard link to the target", async () => {
      const target = join(dir, "a.txt");
      const link = join(dir, "b.txt");
      await writeFile(target, "same");
      await writeFile(link, "same");

      expect(linker.hardlink(target, link)).toBe(true);

      expect((await stat(link)).ino).toBe((await stat(target)).ino);
      expect((await stat(target)).nlink).toBe(2);
      expect((await readdir(dir)).sort()).toEqual(["a.txt", "b.txt"]);
    });

    it("is a no-op when both already share an inode", async () => {
      const target = join(dir, "a.txt");
      const link = join(dir, "b.txt");
      await writeFile(target, "same");

      expect(linker.hardlink(target, link)).toBe(true);
      expect(linker.hardlink(target, link)).toBe(false);
      expect(linker.sameFile(target, link)).toBe(true);
    });

    it("creates missing parent directories", async () => {
      const target = join(dir, "a.txt");
      const link = join(dir, "nested", "deep", "a.txt");
      await writeFile(target, "content");

      linker.hardlink(target, link);

      expect(await readFile(link, "utf-8")).toBe("content");
    });

    it("leaves a symlink to the target alone", async () => {
      const target = join(dir, "a.txt");
      const link = join(dir, "link.txt");
      await writeFile(target, "content");
      await symlink(target, link);

      expect(linker.hardlink(target, link)).toBe(false);
      expect((await lstat(link)).isSymbolicLink()).toBe(true);
    });

    it("rejects empty paths and missing targets", () => {
      expect(() => linker.hardlink("", join(dir, "x"))).toThrow(
        "hardlink target requires a path",
      );
      expect(() => linker.hardlink(join(dir, "x"), "")).toThrow(
        "hardlink requires a path",
      );
      expect(() => linker.hardlink(join(dir, "missing"), join(dir, "x"))).toThrow(
        /hardlink target does not exist/,
      );
    });
  });

  describe("symlink", () => {
    it("replaces the path with an absolute symlink", async () => {
      const target = join(dir, "a.txt");
      const link = join(dir, "sub", "b.txt");
      await writeFile(target, "content");
      await mkdir(join(dir, "sub"));
      await writeFile(link, "old");

      linker.symlink(target, link);

      expect((await lstat(link)).isSymbolicLink()).toBe(true);
      expect(await readlink(link)).toBe(target);
      expect(linker.sameFile(target, link)).toBe(true);
    });

    it("can be repeated", async () => {
      const target = join(dir, "a.txt");
      const link = join(dir, "b.txt");
      await writeFile(target, "content");

      linker.symlink(target, link);
      linker.symlink(target, link);

      expect(await readlink(link)).toBe(target);
    });
  });

  describe("move", () => {
    it("moves into a new directory and removes the emptied parent", async () => {
      const src = join(dir, "from", "a.txt");
      const dst = join(dir, "to", "x", "a.txt");
      await mkdir(join(dir, "from"));
      await writeFile(src, "content");

      linker.move(src, dst, { removeEmptyParent: true });

      expect(await readFile(dst, "utf-8")).toBe("content");
      expect(existsSync(join(dir, "from"))).toBe(false);
    });

    it("keeps the parent when asked to", async () => {
      const src = join(dir, "from", "a.txt");
      const dst = join(dir, "to", "a.txt");
      await mkdir(join(dir, "from"));
      await writeFile(src, "content");

      linker.move(src, dst);

      expect(existsSync(join(dir, "from"))).toBe(true);
    });
  });

  it("sameFile is false for distinct or missing files", async () => {
    const a = join(dir, "a.txt");
    const b = join(dir, "b.txt");
    await writeFile(a, "same");
    await writeFile(b, "same");

    expect(linker.sameFile(a, b)).toBe(false);
    expect(linker.sameFile(a, join(dir, "missing"))).toBe(false);
  });
});

describe("destinationWithSubdirectory", () => {
  it("rebuilds the unshared part of the source under the destination", () => {
    expect(destinationWithSubdirectory("/usr/local/test.txt", "/media/cdrom")).toBe(
      "/media/cdrom/usr/local/test.txt",
    );
    expect(
      destinationWithSubdirectory(
        "/media/cdrom/othersubdir/test.txt",
        "/media/cdrom/subdir",
      ),
    ).toBe("/media/cdrom/subdir/othersubdir/test.txt");
  });

  it("compares whole path segments", () => {
    expect(destinationWithSubdirectory("/data/abc/x.txt", "/data/abd")).toBe(
      "/data/abd/abc/x.txt",
    );
  });

  it("rejects empty arguments", () => {
    expect(() => destinationWithSubdirectory("", "/dups")).toThrow();
    expect(() => destinationWithSubdirectory("/a.txt", "")).toThrow();
  });

  it("rejects a destination equal to the source", () => {
    expect(() =>
      destinationWithSubdirectory("/media/cdrom/test.txt", "/media/cdrom"),
    ).toThrow(/are the same path/);
  });
});
