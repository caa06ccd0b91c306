/**
 * Directory Lister
 *
 * Produces the ordered entry list shown in a pane: the parent sentinel
 * first, then directories, then files.
 */

import type { Dirent } from "node:fs";
import { readdir, realpath, stat } from "node:fs/promises";
import { homedir } from "node:os";
import { dirname, join, resolve } from "node:path";
import type { Entry, EntryInfo, ParentEntry, RegularEntry } from "./types.js";
import { AccessError, NotADirectoryError, isErrnoException } from "./errors.js";
import { createLogger } from "./logger.js";

const log = createLogger("Lister");

/**
 * Expands a leading `~` to the home directory.
 */
export function expandHome(path: string): string {
  if (path === "~") {
    return homedir();
  }
  if (path.startsWith("~/")) {
    return join(homedir(), path.slice(2));
  }
  return path;
}

/**
 * Resolves a path to its canonical absolute form (home expanded,
 * symbolic links resolved).
 *
 * @throws AccessError if the path cannot be resolved
 */
export async function canonicalizePath(path: string): Promise<string> {
  try {
    return await realpath(resolve(expandHome(path)));
  } catch (error) {
    const detail = isErrnoException(error) ? error.code : String(error);
    throw new AccessError(`Cannot resolve "${path}" (${detail})`);
  }
}

/**
 * Builds the sentinel for a directory. At the root, dirname returns the
 * root itself, so the sentinel points back at it.
 */
export function parentEntryFor(directory: string): ParentEntry {
  return { kind: "parent", path: dirname(directory) };
}

/**
 * True when the directory is its own parent (filesystem root).
 */
export function isRoot(directory: string): boolean {
  return dirname(directory) === directory;
}

/**
 * Orders directories before files, then by case-insensitive name.
 * Exact name breaks ties so the order is total.
 */
export function compareEntries(a: RegularEntry, b: RegularEntry): number {
  if (a.isDirectory !== b.isDirectory) {
    return a.isDirectory ? -1 : 1;
  }
  return compareStrings(a.name.toLowerCase(), b.name.toLowerCase()) || compareStrings(a.name, b.name);
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

async function statEntry(path: string): Promise<EntryInfo | null> {
  try {
    const stats = await stat(path);
    return { mode: stats.mode, size: stats.size, mtime: stats.mtime };
  } catch (error) {
    log.debug(`Stat failed for ${path}`, error);
    return null;
  }
}

/**
 * Lists a directory for display in a pane.
 *
 * @param directory - Path to list; canonicalized before reading
 * @returns Sentinel followed by the sorted children
 * @throws AccessError if the directory cannot be resolved or read
 * @throws NotADirectoryError if the path is not a directory
 */
export async function listDirectory(directory: string): Promise<Entry[]> {
  const canonical = await canonicalizePath(directory);
  log.debug(`Listing directory: ${canonical}`);

  let dirents: Dirent[];
  try {
    dirents = await readdir(canonical, { withFileTypes: true });
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOTDIR") {
      throw new NotADirectoryError(`"${canonical}" is not a directory`);
    }
    const detail = error instanceof Error ? error.message : String(error);
    throw new AccessError(`Cannot read "${canonical}": ${detail}`);
  }

  const children = await Promise.all(
    dirents.map(async (dirent): Promise<RegularEntry> => {
      const path = join(canonical, dirent.name);
      const info = await statEntry(path);
      const isDirectory =
        info !== null ? (info.mode & 0o170000) === 0o040000 : dirent.isDirectory();
      return { kind: "regular", path, name: dirent.name, isDirectory, info };
    })
  );

  children.sort(compareEntries);

  log.debug(`Found ${children.length} entries`);
  return [parentEntryFor(canonical), ...children];
}
