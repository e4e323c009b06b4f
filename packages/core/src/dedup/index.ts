export { updateChecksum, scanTree } from "./scanner.js";
export { vacuum } from "./vacuum.js";
export { relocateDuplicates } from "./relocate.js";
export type {
  DedupDeps,
  UpdateResult,
  ScanSummary,
  RelocateOptions,
  Relocation,
} from "./types.js";
