import { existsSync } from "node:fs";
import type { DedupDeps } from "./types.js";

/** Remove records whose path no longer exists. Returns the removed paths. */
export function vacuum(deps: Pick<DedupDeps, "index" | "logger">): string[] {
  const { index, logger } = deps;
  logger.info("Vacuuming index");

  const missing = index.listPaths().filter((path) => !existsSync(path));
  for (const path of missing) {
    logger.info({ path }, "Removing entry; file does not exist");
    index.remove(path);
  }

  logger.info({ removed: missing.length }, "Vacuum complete");
  return missing;
}
