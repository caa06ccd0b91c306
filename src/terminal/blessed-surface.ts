/**
 * blessed-backed terminal surface.
 *
 * One full-screen box receives the whole frame as tagged text on every
 * draw. Key presses are normalized and queued for the application loop.
 */

import blessed from "blessed";
import type { Widgets } from "blessed";
import type { KeyEvent } from "../keymap.js";
import type { Frame, ScreenSize, Span, TextStyle } from "../renderer.js";
import { KeyQueue } from "./key-queue.js";
import { RESIZE_KEY, type TerminalSurface } from "./types.js";
import { uiLog as log } from "../logger.js";

const FALLBACK_SIZE: ScreenSize = { width: 80, height: 24 };

const STYLE_TAGS: Record<TextStyle, [string, string]> = {
  normal: ["", ""],
  bold: ["{bold}", "{/bold}"],
  dim: ["{gray-fg}", "{/gray-fg}"],
  reverse: ["{inverse}", "{/inverse}"],
  standout: ["{bold}{inverse}", "{/inverse}{/bold}"],
};

/**
 * Converts one span into blessed tag markup, escaping braces in the text.
 */
export function spanToTags(span: Span): string {
  const [open, close] = STYLE_TAGS[span.style];
  return `${open}${blessed.escape(span.text)}${close}`;
}

export function frameToTags(frame: Frame): string {
  return frame.rows.map((row) => row.map(spanToTags).join("")).join("\n");
}

/**
 * Maps blessed's (ch, key) pair to a KeyEvent. Digits arrive with the
 * name "number" and carriage return as "return".
 */
export function normalizeKey(
  ch: string | undefined,
  key: Widgets.Events.IKeyEventArg | undefined
): KeyEvent | undefined {
  let name = key?.name;
  if (name === undefined || name === "" || name === "number") {
    name = ch;
  }
  if (name === "return") {
    name = "enter";
  }
  if (name === undefined || name === "") {
    return undefined;
  }
  return {
    name,
    ch,
    ctrl: key?.ctrl ?? false,
    meta: key?.meta ?? false,
  };
}

/**
 * Takes over the terminal. Throws if the screen cannot be initialized.
 */
export function createBlessedSurface(): TerminalSurface {
  const screen = blessed.screen({
    smartCSR: true,
    fullUnicode: true,
    title: "twinpane",
  });
  const box = blessed.box({
    parent: screen,
    top: 0,
    left: 0,
    width: "100%",
    height: "100%",
    tags: true,
  });
  const queue = new KeyQueue();

  // blessed reports a carriage return as "return" and again as "enter";
  // only the first of the pair is kept.
  let swallowEnterEcho = false;

  screen.on("keypress", (ch: string | undefined, key: Widgets.Events.IKeyEventArg | undefined) => {
    if (key?.name === "enter" && swallowEnterEcho) {
      swallowEnterEcho = false;
      return;
    }
    if (key?.name === "return") {
      swallowEnterEcho = true;
      setImmediate(() => {
        swallowEnterEcho = false;
      });
    }
    const event = normalizeKey(ch, key);
    if (event !== undefined) {
      queue.push(event);
    }
  });

  screen.on("resize", () => {
    log.debug("Terminal resized");
    queue.push({ name: RESIZE_KEY });
  });

  return {
    size(): ScreenSize {
      const width = typeof screen.width === "number" ? screen.width : FALLBACK_SIZE.width;
      const height = typeof screen.height === "number" ? screen.height : FALLBACK_SIZE.height;
      return { width, height };
    },
    draw(frame: Frame): void {
      box.setContent(frameToTags(frame));
      screen.render();
    },
    readKey(): Promise<KeyEvent> {
      return queue.next();
    },
    destroy(): void {
      screen.destroy();
    },
  };
}
