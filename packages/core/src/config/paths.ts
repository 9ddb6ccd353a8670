import { homedir } from "node:os";
import { resolve } from "node:path";
import { DEFAULT_ROOT_PATH } from "./defaults.js";

/** "~" and "~/..." point into the current user's home directory. */
export function expandHomePath(input: string): string {
  if (input === "~") {
    return homedir();
  }
  return input.startsWith("~/") ? resolve(homedir(), input.slice(2)) : input;
}

/** Absolute stowage root; ~/stowage when none is given. */
export function resolveRootPath(input?: string): string {
  return resolve(expandHomePath(input ?? DEFAULT_ROOT_PATH));
}

/** Absolute root directory of the filesystem backend. */
export function resolveStorageRoot(root: string): string {
  return resolve(expandHomePath(root));
}
