import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { hashFile } from "./hasher.js";

describe("hashFile", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "hasher-test-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true });
  });

  it("returns the sha1 hex digest by default", async () => {
    const path = join(dir, "abc.txt");
    await writeFile(path, "abc");

    expect(await hashFile(path)).toBe(
      "a9993e364706816aba3e25717850c26c9cd0d89d",
    );
  });

  it("supports md5", async () => {
    const path = join(dir, "abc.txt");
    await writeFile(path, "abc");

    expect(await hashFile(path, "md5")).toBe(
      "900150983cd24fb0d6963f7d28e17f72",
    );
  });

  it("hashes empty files", async () => {
    const path = join(dir, "empty.txt");
    await writeFile(path, "");

    expect(await hashFile(path)).toBe(
      "da39a3ee5e6b4b0d3255bfef95601890afd80709",
    );
  });

  it("rejects an empty path", async () => {
    await expect(hashFile("")).rejects.toThrow("hashFile requires a path");
  });

  it("rejects a missing file", async () => {
    await expect(hashFile(join(dir, "nope.txt"))).rejects.toMatchObject({
      code: "ENOENT",
    });
  });
});
