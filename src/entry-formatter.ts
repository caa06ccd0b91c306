/**
 * Entry Formatter
 *
 * Renders one entry as a fixed-layout display line:
 * mode, right-aligned size, modification time, name.
 */

import type { Entry } from "./types.js";

export const PARENT_MARKER = "[..]";
export const DIRECTORY_SIZE_MARKER = "<DIR>";
export const UNKNOWN_MODE = "??????????";
export const UNKNOWN_VALUE = "?";

const SIZE_COLUMN_WIDTH = 8;

const FILE_TYPE_CHARS: ReadonlyArray<[number, string]> = [
  [0o140000, "s"],
  [0o120000, "l"],
  [0o100000, "-"],
  [0o060000, "b"],
  [0o040000, "d"],
  [0o020000, "c"],
  [0o010000, "p"],
];

/**
 * Converts st_mode bits into the 10-character `ls -l` form, e.g. "drwxr-xr-x".
 */
export function formatMode(mode: number): string {
  const fileType = mode & 0o170000;
  const typeChar = FILE_TYPE_CHARS.find(([bits]) => bits === fileType)?.[1] ?? "?";

  const triplet = (shift: number, specialBit: number, setChar: string): string => {
    const bits = (mode >> shift) & 0o7;
    const special = (mode & specialBit) !== 0;
    const exec = bits & 0o1;
    let execChar = exec ? "x" : "-";
    if (special) {
      execChar = exec ? setChar : setChar.toUpperCase();
    }
    return (bits & 0o4 ? "r" : "-") + (bits & 0o2 ? "w" : "-") + execChar;
  };

  return (
    typeChar +
    triplet(6, 0o4000, "s") +
    triplet(3, 0o2000, "s") +
    triplet(0, 0o1000, "t")
  );
}

/**
 * Formats a date as local "YYYY-MM-DD HH:MM".
 */
export function formatTimestamp(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, "0");
  const day = String(date.getDate()).padStart(2, "0");
  const hours = String(date.getHours()).padStart(2, "0");
  const minutes = String(date.getMinutes()).padStart(2, "0");
  return `${year}-${month}-${day} ${hours}:${minutes}`;
}

/**
 * Formats an entry for a pane row. Never throws: missing stat data
 * becomes placeholder columns.
 */
export function formatEntry(entry: Entry): string {
  if (entry.kind === "parent") {
    return PARENT_MARKER;
  }

  const name = entry.isDirectory ? `${entry.name}/` : entry.name;
  const { info } = entry;

  let mode = UNKNOWN_MODE;
  let size = UNKNOWN_VALUE;
  let mtime = UNKNOWN_VALUE;

  if (info !== null) {
    mode = formatMode(info.mode);
    size = entry.isDirectory ? DIRECTORY_SIZE_MARKER : String(info.size);
    mtime = Number.isNaN(info.mtime.getTime()) ? UNKNOWN_VALUE : formatTimestamp(info.mtime);
  }

  return `${mode} ${size.padStart(SIZE_COLUMN_WIDTH)} ${mtime} ${name}`;
}
