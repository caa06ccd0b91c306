/**
 * Navigation Controller
 *
 * Owns both panes, the active pane index, the status line and the
 * text-input mode. Every key event is handled to completion before the
 * next one is read; failures of listings and file operations end up in
 * the status line and never escape `handleKey`.
 */

import { basename } from "node:path";
import type {
  ControllerMode,
  Entry,
  NavigatorState,
  PaneIndex,
  PaneState,
  RegularEntry,
  TextInputOperation,
} from "./types.js";
import type { FileOperationError } from "./errors.js";
import type { FileOperationResult } from "./file-operations.js";
import { copyOrMove, deleteEntry, makeDirectory, renameEntry } from "./file-operations.js";
import {
  createPane,
  moveCursor,
  moveCursorTo,
  navigatePane,
  refreshPane,
  selectedEntry,
} from "./pane-state.js";
import { isRoot } from "./directory-lister.js";
import type { Action, KeyEvent } from "./keymap.js";
import { HELP_TEXT, actionForKey } from "./keymap.js";
import type { Opener } from "./opener.js";
import { uiLog as log } from "./logger.js";

export const DEFAULT_PAGE_SIZE = 20;

export interface NavigationControllerOptions {
  leftDirectory: string;
  rightDirectory: string;
  opener: Opener;
  /** Rows moved by page up / page down until the viewport reports its size */
  pageSize?: number;
}

const CANCEL_MESSAGES: Record<TextInputOperation, string> = {
  rename: "Rename cancelled",
  makeDirectory: "Directory creation cancelled",
};

/**
 * Message text for anything thrown by a listing or the opener.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Status line text for a failed operation. Refusals and cancellations are
 * shown as-is; everything else is prefixed.
 */
export function statusForFailure(error: FileOperationError, cancelMessage?: string): string {
  switch (error.code) {
    case "USER_CANCELLED":
      return cancelMessage ?? "Cancelled";
    case "PROTECTED_ENTRY":
      return error.message;
    default:
      return `Error: ${error.message}`;
  }
}

export class NavigationController {
  private panes: [PaneState, PaneState];
  private activeIndex: PaneIndex = 0;
  private statusMessage = HELP_TEXT;
  private mode: ControllerMode = { kind: "browsing" };
  private finished = false;
  private pageSize: number;
  private readonly opener: Opener;

  constructor(options: NavigationControllerOptions) {
    this.panes = [createPane(options.leftDirectory), createPane(options.rightDirectory)];
    this.opener = options.opener;
    this.pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
  }

  /**
   * Snapshot for the renderer.
   */
  get state(): NavigatorState {
    return {
      panes: [this.panes[0], this.panes[1]],
      activeIndex: this.activeIndex,
      statusMessage: this.statusMessage,
      mode: this.mode,
    };
  }

  get isFinished(): boolean {
    return this.finished;
  }

  /**
   * Tells the controller how many entry rows are visible, for paging.
   */
  setPageSize(rows: number): void {
    this.pageSize = Math.max(1, rows);
  }

  /**
   * Lists both starting directories.
   */
  async start(): Promise<void> {
    await this.refreshAll();
  }

  async handleKey(key: KeyEvent): Promise<void> {
    if (this.mode.kind === "awaitingTextInput") {
      await this.handleTextInputKey(key);
      return;
    }

    const action = actionForKey(key);
    if (action !== undefined) {
      await this.dispatch(action);
    }
  }

  async dispatch(action: Action): Promise<void> {
    log.debug(`Action: ${action}`);
    const pane = this.activePane();
    const entry = selectedEntry(pane);

    switch (action) {
      case "quit":
        this.finished = true;
        return;
      case "switchPane":
        this.activeIndex = this.otherIndex();
        return;
      case "cursorUp":
        this.updateActivePane(moveCursor(pane, -1));
        return;
      case "cursorDown":
        this.updateActivePane(moveCursor(pane, 1));
        return;
      case "cursorPageUp":
        this.updateActivePane(moveCursor(pane, -this.pageSize));
        return;
      case "cursorPageDown":
        this.updateActivePane(moveCursor(pane, this.pageSize));
        return;
      case "cursorHome":
        this.updateActivePane(moveCursorTo(pane, 0));
        return;
      case "cursorEnd":
        this.updateActivePane(moveCursorTo(pane, pane.entries.length - 1));
        return;
      case "refresh":
        this.statusMessage = "Refreshed";
        await this.refreshAll();
        return;
    }

    if (entry === undefined) {
      this.statusMessage = "Nothing selected";
      return;
    }

    switch (action) {
      case "activate":
        await this.activate(entry);
        break;
      case "goToParent":
        await this.goToParent();
        break;
      case "copy":
      case "move":
        await this.transfer(entry, action === "move");
        break;
      case "delete":
        this.reportResult(await deleteEntry(entry), (path) => `Deleted: ${basename(path)}`);
        break;
      case "makeDirectory":
        this.beginTextInput("makeDirectory", "Create dir: ");
        return;
      case "rename":
        if (entry.kind === "parent") {
          this.statusMessage = "Nothing to rename";
          return;
        }
        this.beginTextInput("rename", `Rename ${entry.name} -> `, entry);
        return;
    }

    await this.refreshAll();
  }

  private activePane(): PaneState {
    return this.panes[this.activeIndex];
  }

  private otherIndex(): PaneIndex {
    return this.activeIndex === 0 ? 1 : 0;
  }

  private updateActivePane(pane: PaneState): void {
    this.panes[this.activeIndex] = pane;
  }

  private async activate(entry: Entry): Promise<void> {
    if (entry.kind === "parent" || entry.isDirectory) {
      await this.navigateActivePane(entry.path);
      return;
    }

    try {
      await this.opener(entry.path);
      this.statusMessage = `Opening: ${entry.name}`;
    } catch (error) {
      this.statusMessage = `Failed to open: ${describeError(error)}`;
    }
  }

  private async goToParent(): Promise<void> {
    const pane = this.activePane();
    if (isRoot(pane.currentDirectory)) {
      this.statusMessage = "Already at the root";
      return;
    }
    const parentEntry = pane.entries[0];
    if (parentEntry?.kind === "parent") {
      const from = pane.currentDirectory;
      await this.navigateActivePane(parentEntry.path);
      this.focusPath(this.activeIndex, from);
    }
  }

  private async navigateActivePane(directory: string): Promise<void> {
    try {
      this.updateActivePane(await navigatePane(this.activePane(), directory));
    } catch (error) {
      log.warn(`Navigation to ${directory} failed`, error);
      this.statusMessage = `Error: ${describeError(error)}`;
    }
  }

  private async transfer(entry: Entry, move: boolean): Promise<void> {
    const destination = this.panes[this.otherIndex()].currentDirectory;
    const result = await copyOrMove(entry.path, destination, move);
    this.reportResult(result, (path) => `${move ? "Moved" : "Copied"}: ${basename(path)}`);
  }

  private beginTextInput(forOperation: TextInputOperation, label: string, target?: RegularEntry): void {
    this.mode =
      target === undefined
        ? { kind: "awaitingTextInput", forOperation, label, buffer: "" }
        : { kind: "awaitingTextInput", forOperation, label, buffer: "", target };
  }

  private async handleTextInputKey(key: KeyEvent): Promise<void> {
    if (this.mode.kind !== "awaitingTextInput") {
      return;
    }
    const mode = this.mode;

    switch (key.name) {
      case "escape":
        this.mode = { kind: "browsing" };
        this.statusMessage = CANCEL_MESSAGES[mode.forOperation];
        return;
      case "enter":
        this.mode = { kind: "browsing" };
        await this.submitTextInput(mode.forOperation, mode.buffer, mode.target);
        return;
      case "backspace":
        this.mode = { ...mode, buffer: Array.from(mode.buffer).slice(0, -1).join("") };
        return;
    }

    if (isPrintable(key)) {
      this.mode = { ...mode, buffer: mode.buffer + key.ch };
    }
  }

  private async submitTextInput(
    forOperation: TextInputOperation,
    text: string,
    target: RegularEntry | undefined
  ): Promise<void> {
    const cancelMessage = CANCEL_MESSAGES[forOperation];
    const paneIndex = this.activeIndex;
    let result: FileOperationResult;

    if (forOperation === "rename") {
      if (target === undefined) {
        this.statusMessage = "Nothing to rename";
        return;
      }
      result = await renameEntry(target, text);
      this.reportResult(result, (path) => `Renamed to ${basename(path)}`, cancelMessage);
    } else {
      result = await makeDirectory(this.activePane().currentDirectory, text);
      this.reportResult(result, (path) => `Created directory: ${basename(path)}`, cancelMessage);
    }

    await this.refreshAll();
    if (result.ok) {
      this.focusPath(paneIndex, result.value);
    }
  }

  private reportResult(
    result: FileOperationResult,
    onSuccess: (path: string) => string,
    cancelMessage?: string
  ): void {
    this.statusMessage = result.ok
      ? onSuccess(result.value)
      : statusForFailure(result.error, cancelMessage);
  }

  /**
   * Moves a pane's cursor onto the entry at `path`, if it is listed.
   */
  private focusPath(paneIndex: PaneIndex, path: string): void {
    const pane = this.panes[paneIndex];
    const index = pane.entries.findIndex(
      (entry) => entry.kind === "regular" && entry.path === path
    );
    if (index >= 0) {
      this.panes[paneIndex] = moveCursorTo(pane, index);
    }
  }

  /**
   * Re-lists both panes so entries and cursors match the disk.
   */
  private async refreshAll(): Promise<void> {
    for (const index of [0, 1] as const) {
      try {
        const { pane, fellBackFrom } = await refreshPane(this.panes[index]);
        this.panes[index] = pane;
        if (fellBackFrom !== undefined) {
          this.statusMessage = `Directory no longer available: ${fellBackFrom}`;
        }
      } catch (error) {
        log.error(`Refresh failed for pane ${index}`, error);
        this.statusMessage = `Error: ${describeError(error)}`;
      }
    }
  }
}

/**
 * True for a key that should be typed into a text prompt.
 */
export function isPrintable(key: KeyEvent): key is KeyEvent & { ch: string } {
  if (key.ctrl || key.meta || key.ch === undefined) {
    return false;
  }
  const chars = Array.from(key.ch);
  if (chars.length !== 1) {
    return false;
  }
  const code = key.ch.codePointAt(0) ?? 0;
  return code >= 0x20 && code !== 0x7f;
}
