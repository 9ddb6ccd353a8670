import { readFile, writeFile, mkdir } from "node:fs/promises";
import { dirname, join } from "node:path";
import {
  StorageConfigSchema,
  type StorageConfig,
} from "../schemas/storage-config.js";
import { resolveRootPath, resolveStorageRoot } from "./paths.js";

export interface LoadConfigOptions {
  configPath?: string;
  rootPath?: string;
}

function resolveConfigPath(options?: LoadConfigOptions): string {
  return (
    options?.configPath ??
    join(resolveRootPath(options?.rootPath), "config.json")
  );
}

/**
 * Loads and validates config.json. Credentials never live here: they are
 * read from the environment by the credential source at call time.
 */
export async function loadConfig(
  options?: LoadConfigOptions,
): Promise<StorageConfig> {
  const configPath = resolveConfigPath(options);

  let raw: string | undefined;
  try {
    raw = await readFile(configPath, "utf-8");
  } catch (err: unknown) {
    if (
      err instanceof Error &&
      "code" in err &&
      err.code === "ENOENT"
    ) {
      // No file yet: defaults fill an empty object
    } else {
      throw err;
    }
  }

  const parsed: unknown = raw !== undefined ? JSON.parse(raw) : {};
  const config = StorageConfigSchema.parse(parsed);

  // Write back so that defaults are visible and editable in config.json
  const serialized = JSON.stringify(config, null, 2) + "\n";
  if (serialized !== raw) {
    await mkdir(dirname(configPath), { recursive: true });
    await writeFile(configPath, serialized);
  }

  return {
    ...config,
    storage: {
      ...config.storage,
      filesystem: { root: resolveStorageRoot(config.storage.filesystem.root) },
    },
  };
}

export async function saveConfig(
  config: StorageConfig,
  options?: LoadConfigOptions,
): Promise<void> {
  const configPath = resolveConfigPath(options);
  await mkdir(dirname(configPath), { recursive: true });
  await writeFile(configPath, JSON.stringify(config, null, 2) + "\n", "utf-8");
}
