/**
 * Twinpane Shared Types
 *
 * Core type definitions for directory entries, panes and operation results.
 */

/**
 * Error codes for file operations and listings.
 *
 * The controller turns these into status line text; nothing else
 * inspects them.
 */
export type ErrorCode =
  | "ACCESS_DENIED"
  | "NOT_A_DIRECTORY"
  | "ALREADY_EXISTS"
  | "USER_CANCELLED"
  | "PROTECTED_ENTRY"
  | "INVALID_NAME"
  | "OPERATION_FAILED";

/**
 * Stat data captured for an entry when its directory was listed.
 *
 * @property mode - Raw st_mode bits (file type and permissions)
 * @property size - Size in bytes
 * @property mtime - Last modification time
 */
export interface EntryInfo {
  mode: number;
  size: number;
  mtime: Date;
}

/**
 * Synthetic "go to parent directory" item at index 0 of every listing.
 * At filesystem root, `path` is the root itself.
 */
export interface ParentEntry {
  kind: "parent";
  path: string;
}

/**
 * A real child of the listed directory.
 * `info` is null when stat failed; the entry is still listed.
 */
export interface RegularEntry {
  kind: "regular";
  path: string;
  name: string;
  isDirectory: boolean;
  info: EntryInfo | null;
}

export type Entry = ParentEntry | RegularEntry;

export interface PaneState {
  currentDirectory: string;
  cursorIndex: number;
  entries: Entry[];
}

export type PaneIndex = 0 | 1;

export type TextInputOperation = "rename" | "makeDirectory";

export type ControllerMode =
  | { kind: "browsing" }
  | {
      kind: "awaitingTextInput";
      forOperation: TextInputOperation;
      label: string;
      buffer: string;
      /** Entry being renamed; absent for directory creation */
      target?: RegularEntry;
    };

export interface NavigatorState {
  panes: [PaneState, PaneState];
  activeIndex: PaneIndex;
  statusMessage: string;
  mode: ControllerMode;
}

/**
 * Outcome of a file operation. Failures carry the error instead of throwing
 * so the controller can turn every outcome into a status message.
 */
export type OperationResult<T, E extends Error = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };
