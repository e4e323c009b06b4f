import type { Logger } from "pino";
import type { DedupIndex } from "../storage/index/manager.js";
import type { FileLinker } from "../fs/linker.js";
import type { ChecksumAlgorithm } from "../schemas/index-config.js";

export interface DedupDeps {
  index: DedupIndex;
  linker: FileLinker;
  checksumAlgorithm: ChecksumAlgorithm;
  logger: Logger;
}

export interface UpdateResult {
  path: string;
  checksum: string;
  isSymlink: boolean;
  /** Paths hard-linked to an anchor during this update */
  merged: string[];
}

export interface ScanSummary {
  scanned: number;
  skipped: number;
  merged: number;
}

export interface RelocateOptions {
  dupDir: string;
  /** Symlink moved paths back to their anchor and keep them as symlink records */
  symlink: boolean;
}

export interface Relocation {
  from: string;
  to: string;
  anchor: string;
}
