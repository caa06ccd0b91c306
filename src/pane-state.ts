/**
 * Pane State
 *
 * Pure helpers over one pane's directory, cursor and listing. Every helper
 * returns a new PaneState; the controller owns the only references.
 */

import { dirname } from "node:path";
import type { Entry, PaneState } from "./types.js";
import { AccessError } from "./errors.js";
import { canonicalizePath, listDirectory } from "./directory-lister.js";
import { createLogger } from "./logger.js";

const log = createLogger("Pane");

export function createPane(initialPath: string): PaneState {
  return {
    currentDirectory: initialPath,
    cursorIndex: 0,
    entries: [],
  };
}

/**
 * Keeps the cursor inside the listing.
 */
export function clampCursor(cursorIndex: number, entryCount: number): number {
  if (entryCount === 0) {
    return 0;
  }
  return Math.min(Math.max(0, cursorIndex), entryCount - 1);
}

export function selectedEntry(pane: PaneState): Entry | undefined {
  return pane.entries[pane.cursorIndex];
}

/**
 * Moves the cursor by `delta` rows, clamped to the listing.
 */
export function moveCursor(pane: PaneState, delta: number): PaneState {
  return { ...pane, cursorIndex: clampCursor(pane.cursorIndex + delta, pane.entries.length) };
}

export function moveCursorTo(pane: PaneState, index: number): PaneState {
  return { ...pane, cursorIndex: clampCursor(index, pane.entries.length) };
}

/**
 * Lists `directory` and makes it the pane's current directory with the
 * cursor on the first row.
 *
 * @throws AccessError if the directory cannot be listed; the caller keeps
 * the previous pane
 */
export async function navigatePane(pane: PaneState, directory: string): Promise<PaneState> {
  const canonical = await canonicalizePath(directory);
  const entries = await listDirectory(canonical);
  return { ...pane, currentDirectory: canonical, cursorIndex: 0, entries };
}

export interface RefreshResult {
  pane: PaneState;
  /** Set when the pane's directory was unreadable and an ancestor was shown instead */
  fellBackFrom?: string;
}

/**
 * Re-lists the pane's directory, keeping the cursor where it was (clamped).
 * If the directory is gone or unreadable, the nearest listable ancestor
 * takes its place.
 *
 * @throws AccessError if not even the filesystem root can be listed
 */
export async function refreshPane(pane: PaneState): Promise<RefreshResult> {
  let directory = pane.currentDirectory;

  for (;;) {
    try {
      const canonical = await canonicalizePath(directory);
      const entries = await listDirectory(canonical);
      const sameDirectory = directory === pane.currentDirectory;
      const refreshed: PaneState = {
        currentDirectory: canonical,
        entries,
        cursorIndex: sameDirectory ? clampCursor(pane.cursorIndex, entries.length) : 0,
      };
      return sameDirectory ? { pane: refreshed } : { pane: refreshed, fellBackFrom: pane.currentDirectory };
    } catch (error) {
      const parent = dirname(directory);
      if (!(error instanceof AccessError) || parent === directory) {
        throw error;
      }
      log.warn(`Cannot list ${directory}, trying ${parent}`);
      directory = parent;
    }
  }
}
