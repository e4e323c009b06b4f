import { readFile, writeFile, mkdir } from "node:fs/promises";
import { dirname, join } from "node:path";
import {
  IndexConfigSchema,
  type IndexConfig,
} from "../schemas/index-config.js";
import { resolveRootPath } from "./paths.js";

export interface LoadConfigOptions {
  configPath?: string;
  rootPath?: string;
}

function configPathFor(options?: LoadConfigOptions): string {
  return (
    options?.configPath ??
    join(resolveRootPath(options?.rootPath), "config.json")
  );
}

export async function loadConfig(
  options?: LoadConfigOptions,
): Promise<IndexConfig> {
  const configPath = configPathFor(options);

  let raw: string | undefined;
  try {
    raw = await readFile(configPath, "utf-8");
  } catch (err: unknown) {
    if (
      !(err instanceof Error) ||
      !("code" in err) ||
      err.code !== "ENOENT"
    ) {
      throw err;
    }
    // File doesn't exist, defaults apply
  }

  const parsed: unknown = raw !== undefined ? JSON.parse(raw) : {};
  const config = IndexConfigSchema.parse(parsed);

  // Write back so that defaults are visible and editable in config.json
  const serialized = JSON.stringify(config, null, 2) + "\n";
  if (serialized !== raw) {
    await mkdir(dirname(configPath), { recursive: true });
    await writeFile(configPath, serialized);
  }

  return config;
}

export async function saveConfig(
  config: IndexConfig,
  options?: LoadConfigOptions,
): Promise<void> {
  const configPath = configPathFor(options);
  await mkdir(dirname(configPath), { recursive: true });
  await writeFile(configPath, JSON.stringify(config, null, 2) + "\n", "utf-8");
}
