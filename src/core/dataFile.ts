import { existsSync } from "fs";
import path from "path";
import { fileURLToPath } from "url";
import { internal } from "./errors.js";

/**
 * Locates a file shipped with the package (`data/`, `db/`), whether running from sources or from `dist/`.
 */
export function packageFilePath(relative: string): string {
  let dir = path.dirname(fileURLToPath(import.meta.url));
  for (let i = 0; i < 5; i++) {
    const candidate = path.join(dir, relative);
    if (existsSync(candidate)) return candidate;
    dir = path.dirname(dir);
  }
  throw internal(`package file not found: ${relative}`);
}

export function dataFilePath(name: string): string {
  return packageFilePath(path.join("data", name));
}
