import { join } from "node:path";
import { homedir } from "node:os";

export const DEFAULT_ROOT_PATH = join(homedir(), "stowage");
export const DEFAULT_DATA_DIR = join(DEFAULT_ROOT_PATH, "data");
export const DEFAULT_CONFIG_PATH = join(DEFAULT_ROOT_PATH, "config.json");
