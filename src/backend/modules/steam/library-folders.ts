import { existsSync, readFileSync } from "fs";
import { join } from "path";
import { logger } from "../../logger.js";

const log = logger.child({ module: "steam" });

const PATH_ENTRY = /"path"\s+"([^"]+)"/g;

/**
 * Extracts the library paths listed in a `libraryfolders.vdf` document.
 * Only the `"path"` entries are read; escaped backslashes are unescaped.
 *
 * @example
 *   parseLibraryFolders('"0" { "path" "/home/me/.steam/steam" }')
 *   // → ["/home/me/.steam/steam"]
 */
export function parseLibraryFolders(vdf: string): string[] {
  const paths: string[] = [];
  for (const match of vdf.matchAll(PATH_ENTRY)) {
    const path = match[1].replace(/\\\\/g, "\\");
    if (!paths.includes(path)) paths.push(path);
  }
  return paths;
}

/**
 * Every Steam library known to the install at `steamRoot`.
 * The root itself is always the first library.
 */
export function listLibraryFolders(steamRoot: string): string[] {
  const libraries = [steamRoot];
  const vdfPath = join(steamRoot, "steamapps", "libraryfolders.vdf");

  if (!existsSync(vdfPath)) return libraries;

  let vdf: string;
  try {
    vdf = readFileSync(vdfPath, "utf-8");
  } catch (err) {
    log.warn({ err, vdfPath }, "Failed to read Steam library folders");
    return libraries;
  }

  for (const path of parseLibraryFolders(vdf)) {
    if (!libraries.includes(path)) libraries.push(path);
  }
  return libraries;
}
