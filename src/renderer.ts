/**
 * Renderer
 *
 * Turns controller state into a frame: one row of styled spans per screen
 * line. The left pane gets half the width, the right pane the rest, and the
 * bottom row holds the status line or the active text prompt.
 */

import type { NavigatorState, PaneState } from "./types.js";
import { formatEntry } from "./entry-formatter.js";
import { charWidth, sanitizeText } from "./text-width.js";

export type TextStyle = "normal" | "bold" | "dim" | "reverse" | "standout";

export interface Span {
  text: string;
  style: TextStyle;
}

export type FrameRow = Span[];

export interface ScreenSize {
  width: number;
  height: number;
}

export interface Frame extends ScreenSize {
  rows: FrameRow[];
}

/**
 * Truncates or pads `text` to exactly `width` terminal cells, with
 * control characters replaced. A wide character that would straddle the
 * edge is dropped and the cell padded.
 */
export function fitText(text: string, width: number): string {
  if (width <= 0) {
    return "";
  }
  let result = "";
  let used = 0;
  for (const char of sanitizeText(text)) {
    const cells = charWidth(char);
    if (used + cells > width) {
      break;
    }
    result += char;
    used += cells;
  }
  return result + " ".repeat(width - used);
}

/**
 * First entry index shown when `visibleRows` rows are available.
 */
export function scrollOffset(cursorIndex: number, visibleRows: number): number {
  return Math.max(0, cursorIndex - visibleRows + 1);
}

/**
 * Number of entry rows between the title row and the status row.
 */
export function visibleEntryRows(height: number): number {
  return Math.max(0, height - 2);
}

function renderPane(pane: PaneState, width: number, height: number, active: boolean): Span[] {
  const spans: Span[] = [
    { text: fitText(` ${pane.currentDirectory} `, width), style: active ? "bold" : "dim" },
  ];

  const rows = visibleEntryRows(height);
  const start = scrollOffset(pane.cursorIndex, rows);
  for (let i = 0; i < rows; i++) {
    const index = start + i;
    const entry = pane.entries[index];
    if (entry === undefined) {
      spans.push({ text: fitText("", width), style: "normal" });
      continue;
    }
    const highlighted = active && index === pane.cursorIndex;
    spans.push({ text: fitText(formatEntry(entry), width), style: highlighted ? "reverse" : "normal" });
  }

  return spans;
}

function bottomLine(state: NavigatorState, width: number): Span {
  if (state.mode.kind === "awaitingTextInput") {
    return { text: fitText(state.mode.label + state.mode.buffer, width), style: "normal" };
  }
  return { text: fitText(state.statusMessage, width), style: "standout" };
}

/**
 * Draws both panes and the status line into a `size.width` x `size.height` grid.
 */
export function renderFrame(state: NavigatorState, size: ScreenSize): Frame {
  const width = Math.max(0, Math.floor(size.width));
  const height = Math.max(0, Math.floor(size.height));
  const rows: FrameRow[] = [];

  if (height === 0) {
    return { width, height, rows };
  }

  const leftWidth = Math.floor(width / 2);
  const rightWidth = width - leftWidth;
  const paneHeight = height - 1;

  const left = renderPane(state.panes[0], leftWidth, height, state.activeIndex === 0);
  const right = renderPane(state.panes[1], rightWidth, height, state.activeIndex === 1);

  for (let y = 0; y < paneHeight; y++) {
    const row: FrameRow = [];
    const leftSpan = left[y];
    const rightSpan = right[y];
    if (leftSpan !== undefined && leftWidth > 0) {
      row.push(leftSpan);
    }
    if (rightSpan !== undefined && rightWidth > 0) {
      row.push(rightSpan);
    }
    rows.push(row);
  }

  rows.push([bottomLine(state, width)]);
  return { width, height, rows };
}

/**
 * Plain text of a frame row, for tests and logging.
 */
export function rowText(row: FrameRow): string {
  return row.map((span) => span.text).join("");
}
