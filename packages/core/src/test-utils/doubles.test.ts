import { describe, it, expect } from "vitest";
import {
  createMockLinker,
  createMockLogger,
  makeStoreConfig,
} from "./doubles.js";

describe("test doubles", () => {
  it("mock logger records calls", () => {
    const logger = createMockLogger();
    logger.info({ path: "/a" }, "hello");
    expect(logger.info).toHaveBeenCalledWith({ path: "/a" }, "hello");
  });

  it("mock linker reports a fresh hard link", () => {
    const linker = createMockLinker();
    expect(linker.hardlink("/a", "/b")).toBe(true);
    expect(linker.sameFile("/a", "/b")).toBe(false);
  });

  it("store config defaults to an in-memory database", () => {
    expect(makeStoreConfig().databasePath).toBe(":memory:");
    expect(makeStoreConfig({ checksumAlgorithm: "md5" }).checksumAlgorithm).toBe(
      "md5",
    );
  });
});
