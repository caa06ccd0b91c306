/**
 * Key bindings
 *
 * Translates terminal key events into controller actions. Function keys
 * have digit aliases for terminals that do not report F-keys.
 */

export type Action =
  | "quit"
  | "switchPane"
  | "cursorUp"
  | "cursorDown"
  | "cursorPageUp"
  | "cursorPageDown"
  | "cursorHome"
  | "cursorEnd"
  | "activate"
  | "goToParent"
  | "copy"
  | "move"
  | "delete"
  | "makeDirectory"
  | "rename"
  | "refresh";

/**
 * A single key press as reported by the terminal.
 *
 * @property name - Key name ("up", "f5", "enter", "a", ...)
 * @property ch - Printable character, when the key produces one
 */
export interface KeyEvent {
  name: string;
  ch?: string;
  ctrl?: boolean;
  meta?: boolean;
}

export const KEY_BINDINGS: Readonly<Record<string, Action>> = {
  q: "quit",
  escape: "quit",
  tab: "switchPane",
  up: "cursorUp",
  k: "cursorUp",
  down: "cursorDown",
  j: "cursorDown",
  pageup: "cursorPageUp",
  pagedown: "cursorPageDown",
  home: "cursorHome",
  end: "cursorEnd",
  enter: "activate",
  backspace: "goToParent",
  f5: "copy",
  "5": "copy",
  f6: "move",
  "6": "move",
  f7: "makeDirectory",
  "7": "makeDirectory",
  f8: "delete",
  "8": "delete",
  f2: "rename",
  "2": "rename",
  r: "refresh",
};

/** Bindings for keys pressed with ctrl held, by key name */
export const CTRL_KEY_BINDINGS: Readonly<Record<string, Action>> = {
  c: "quit",
};

/**
 * Returns the action bound to a key, if any. Ctrl keys use their own
 * table; meta keys are never bound.
 */
export function actionForKey(key: KeyEvent): Action | undefined {
  if (key.meta) {
    return undefined;
  }
  if (key.ctrl) {
    return Object.prototype.hasOwnProperty.call(CTRL_KEY_BINDINGS, key.name)
      ? CTRL_KEY_BINDINGS[key.name]
      : undefined;
  }
  const name = key.name || key.ch || "";
  return Object.prototype.hasOwnProperty.call(KEY_BINDINGS, name) ? KEY_BINDINGS[name] : undefined;
}

export const HELP_TEXT =
  "Tab switch pane | Enter open | F5 copy | F6 move | F7 mkdir | F8 delete | F2 rename | r refresh | q quit";
