/**
 * Test doubles for the logger and filesystem linker.
 */

import { vi } from "vitest";
import type { Logger } from "pino";
import type { FileLinker } from "../fs/linker.js";
import type { StoreConfig } from "../schemas/index-config.js";

export function createMockLogger(): Logger {
  const logger: Partial<Logger> = {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  };
  return logger as Logger;
}

/** Linker that records calls without touching the filesystem. */
export function createMockLinker(): FileLinker {
  return {
    sameFile: vi.fn().mockReturnValue(false),
    hardlink: vi.fn().mockReturnValue(true),
    symlink: vi.fn(),
    move: vi.fn(),
  };
}

export function makeStoreConfig(overrides?: Partial<StoreConfig>): StoreConfig {
  return {
    databasePath: ":memory:",
    checksumAlgorithm: "sha1",
    migrationStrategy: "rebuild",
    reclaimSpace: true,
    autoMigrate: true,
    ...overrides,
  };
}
