import { z } from "zod";

export const DEFAULTS = {
  logging: {
    level: "info" as const,
    pretty: false,
  },
  index: {
    databasePath: "~/.dedup-index/index.db",
    checksumAlgorithm: "sha1" as const,
    migrationStrategy: "rebuild" as const,
    reclaimSpace: true,
    autoMigrate: true,
  },
};

export const ChecksumAlgorithm = z.enum(["sha1", "md5"]);

export const MigrationStrategy = z.enum(["rebuild", "alter"]);

export const IndexConfigSchema = z.object({
  logging: z
    .object({
      level: z
        .enum(["fatal", "error", "warn", "info", "debug"])
        .default(DEFAULTS.logging.level),
      pretty: z.boolean().default(DEFAULTS.logging.pretty),
    })
    .default(DEFAULTS.logging),
  index: z
    .object({
      databasePath: z.string().min(1).default(DEFAULTS.index.databasePath),
      checksumAlgorithm: ChecksumAlgorithm.default(
        DEFAULTS.index.checksumAlgorithm,
      ).describe("Used only when a new store is created"),
      migrationStrategy: MigrationStrategy.default(
        DEFAULTS.index.migrationStrategy,
      ),
      reclaimSpace: z.boolean().default(DEFAULTS.index.reclaimSpace),
      autoMigrate: z.boolean().default(DEFAULTS.index.autoMigrate),
    })
    .default(DEFAULTS.index),
});

export type IndexConfig = z.infer<typeof IndexConfigSchema>;
export type LoggingConfig = IndexConfig["logging"];
export type StoreConfig = IndexConfig["index"];
export type ChecksumAlgorithm = z.infer<typeof ChecksumAlgorithm>;
export type MigrationStrategy = z.infer<typeof MigrationStrategy>;
