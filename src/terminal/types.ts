/**
 * Terminal Surface
 *
 * The narrow contract the application loop needs from a terminal:
 * draw a frame, read the next key, report the size, tear down.
 */

import type { KeyEvent } from "../keymap.js";
import type { Frame, ScreenSize } from "../renderer.js";

/** Pseudo-key emitted when the terminal is resized; bound to nothing. */
export const RESIZE_KEY = "resize";

export interface TerminalSurface {
  size(): ScreenSize;
  draw(frame: Frame): void;
  /** Resolves with the next key press, in arrival order */
  readKey(): Promise<KeyEvent>;
  destroy(): void;
}
