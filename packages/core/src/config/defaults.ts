import { join } from "node:path";
import { homedir } from "node:os";

export const DEFAULT_ROOT_PATH = join(homedir(), ".dedup-index");
export const DEFAULT_CONFIG_PATH = join(DEFAULT_ROOT_PATH, "config.json");
