/**
 * Navigation Controller Tests
 *
 * Drives the controller with key events against real temp directories.
 * The external opener is a mock.
 */

import { describe, test, expect, beforeEach, afterEach, vi, type Mock } from "vitest";
import { mkdir, readFile, readdir, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";

import {
  NavigationController,
  isPrintable,
  statusForFailure,
} from "../navigation-controller.js";
import { AlreadyExistsError, ProtectedEntryError, UserCancelledError } from "../errors.js";
import { HELP_TEXT, type KeyEvent } from "../keymap.js";
import type { Entry } from "../types.js";
import { pathExists } from "../file-operations.js";
import { cleanupTestDir, createTestDir, writeTestFile } from "./test-helpers.js";

function key(name: string, ch?: string): KeyEvent {
  return ch === undefined ? { name } : { name, ch };
}

function names(entries: Entry[]): string[] {
  return entries.map((entry) => (entry.kind === "parent" ? "[..]" : entry.name));
}

async function press(controller: NavigationController, ...keys: string[]): Promise<void> {
  for (const name of keys) {
    await controller.handleKey(key(name));
  }
}

async function typeText(controller: NavigationController, text: string): Promise<void> {
  for (const ch of text) {
    await controller.handleKey(key(ch, ch));
  }
}

describe("NavigationController", () => {
  let testDir: string;
  let left: string;
  let right: string;
  let opener: Mock<(path: string) => Promise<void>>;

  async function startController(pageSize?: number): Promise<NavigationController> {
    const controller = new NavigationController({
      leftDirectory: left,
      rightDirectory: right,
      opener,
      pageSize,
    });
    await controller.start();
    return controller;
  }

  beforeEach(async () => {
    testDir = await createTestDir("controller");
    left = join(testDir, "left");
    right = join(testDir, "right");
    await writeTestFile(join(left, "a.txt"), "hello");
    await mkdir(join(left, "sub"));
    await mkdir(right);
    opener = vi.fn<(path: string) => Promise<void>>(() => Promise.resolve());
  });

  afterEach(async () => {
    await cleanupTestDir(testDir);
  });

  describe("startup", () => {
    test("lists both panes and shows the help text", async () => {
      const controller = await startController();
      const { panes, activeIndex, statusMessage, mode } = controller.state;

      expect(panes[0].currentDirectory).toBe(left);
      expect(names(panes[0].entries)).toEqual(["[..]", "sub", "a.txt"]);
      expect(panes[1].currentDirectory).toBe(right);
      expect(names(panes[1].entries)).toEqual(["[..]"]);
      expect(activeIndex).toBe(0);
      expect(statusMessage).toBe(HELP_TEXT);
      expect(mode).toEqual({ kind: "browsing" });
    });
  });

  describe("cursor and focus", () => {
    test("tab switches the active pane back and forth", async () => {
      const controller = await startController();

      await press(controller, "tab");
      expect(controller.state.activeIndex).toBe(1);

      await press(controller, "tab");
      expect(controller.state.activeIndex).toBe(0);
    });

    test("down at the last entry leaves the cursor in place", async () => {
      const controller = await startController();

      await press(controller, "end");
      expect(controller.state.panes[0].cursorIndex).toBe(2);

      await press(controller, "down");
      expect(controller.state.panes[0].cursorIndex).toBe(2);
    });

    test("up at the first entry leaves the cursor in place", async () => {
      const controller = await startController();

      await press(controller, "up", "k");

      expect(controller.state.panes[0].cursorIndex).toBe(0);
    });

    test("only the active pane's cursor moves", async () => {
      const controller = await startController();

      await press(controller, "j");

      expect(controller.state.panes[0].cursorIndex).toBe(1);
      expect(controller.state.panes[1].cursorIndex).toBe(0);
    });

    test("page keys move by the page size", async () => {
      const controller = await startController(2);

      await press(controller, "pagedown");
      expect(controller.state.panes[0].cursorIndex).toBe(2);

      await press(controller, "pageup");
      expect(controller.state.panes[0].cursorIndex).toBe(0);
    });

    test("unbound keys change nothing", async () => {
      const controller = await startController();

      await press(controller, "x");

      expect(controller.state.statusMessage).toBe(HELP_TEXT);
      expect(controller.state.panes[0].cursorIndex).toBe(0);
    });
  });

  describe("activate", () => {
    test("enters a directory and resets the cursor", async () => {
      const controller = await startController();

      await press(controller, "down", "enter");

      expect(controller.state.panes[0].currentDirectory).toBe(join(left, "sub"));
      expect(controller.state.panes[0].cursorIndex).toBe(0);
      expect(names(controller.state.panes[0].entries)).toEqual(["[..]"]);
    });

    test("activating the sentinel goes to the parent directory", async () => {
      const controller = await startController();

      await press(controller, "enter");

      expect(controller.state.panes[0].currentDirectory).toBe(testDir);
    });

    test("hands files to the opener", async () => {
      const controller = await startController();

      await press(controller, "down", "down", "enter");

      expect(opener).toHaveBeenCalledWith(join(left, "a.txt"));
      expect(controller.state.statusMessage).toBe("Opening: a.txt");
    });

    test("reports an opener failure without stopping", async () => {
      opener.mockRejectedValueOnce(new Error("no opener installed"));
      const controller = await startController();

      await press(controller, "down", "down", "enter");

      expect(controller.state.statusMessage).toBe("Failed to open: no opener installed");
      expect(controller.isFinished).toBe(false);
    });

    test("reports a directory that vanished before it was entered", async () => {
      const controller = await startController();
      await rm(join(left, "sub"), { recursive: true });

      await press(controller, "down", "enter");

      expect(controller.state.statusMessage.startsWith("Error: Cannot resolve")).toBe(true);
      expect(controller.state.panes[0].currentDirectory).toBe(left);
    });

    test("backspace goes up and keeps the previous directory selected", async () => {
      const controller = await startController();

      await press(controller, "down", "enter", "backspace");

      expect(controller.state.panes[0].currentDirectory).toBe(left);
      expect(controller.state.panes[0].cursorIndex).toBe(1);
    });
  });

  describe("copy and move", () => {
    test("F5 copies the selection into the other pane", async () => {
      const controller = await startController();

      await press(controller, "down", "down", "f5");

      expect(controller.state.statusMessage).toBe("Copied: a.txt");
      expect(names(controller.state.panes[1].entries)).toEqual(["[..]", "a.txt"]);
      expect(await readFile(join(right, "a.txt"), "utf-8")).toBe("hello");
      expect(await pathExists(join(left, "a.txt"))).toBe(true);
    });

    test("6 moves the selection and clamps the cursor", async () => {
      const controller = await startController();

      await press(controller, "down", "down", "6");

      expect(controller.state.statusMessage).toBe("Moved: a.txt");
      expect(names(controller.state.panes[0].entries)).toEqual(["[..]", "sub"]);
      expect(controller.state.panes[0].cursorIndex).toBe(1);
      expect(names(controller.state.panes[1].entries)).toEqual(["[..]", "a.txt"]);
    });

    test("copies from the right pane into the left pane", async () => {
      await writeFile(join(right, "r.txt"), "r", "utf-8");
      const controller = await startController();

      await press(controller, "tab", "down", "f5");

      expect(controller.state.statusMessage).toBe("Copied: r.txt");
      expect(await pathExists(join(left, "r.txt"))).toBe(true);
    });

    test("reports a collision and leaves both files alone", async () => {
      await writeFile(join(right, "a.txt"), "existing", "utf-8");
      const controller = await startController();

      await press(controller, "down", "down", "f5");

      expect(controller.state.statusMessage).toBe(
        `Error: Destination already exists: ${join(right, "a.txt")}`
      );
      expect(await readFile(join(right, "a.txt"), "utf-8")).toBe("existing");
    });

    test("copies the directory behind the parent entry", async () => {
      const controller = await startController();

      await press(controller, "down", "enter", "f5");

      expect(controller.state.panes[0].currentDirectory).toBe(join(left, "sub"));
      expect(controller.state.statusMessage).toBe("Copied: left");
      expect(await readFile(join(right, "left", "a.txt"), "utf-8")).toBe("hello");
      expect(await pathExists(join(left, "a.txt"))).toBe(true);
    });

    test("reports a parent entry that contains the destination", async () => {
      const controller = await startController();

      await press(controller, "f5");

      expect(controller.state.statusMessage).toBe(`Error: Cannot copy "${testDir}" into itself`);
      expect(await readdir(right)).toEqual([]);
    });
  });

  describe("delete", () => {
    test("F8 deletes the selection and clamps the cursor", async () => {
      const controller = await startController();

      await press(controller, "down", "down", "f8");

      expect(controller.state.statusMessage).toBe("Deleted: a.txt");
      expect(await pathExists(join(left, "a.txt"))).toBe(false);
      expect(controller.state.panes[0].cursorIndex).toBe(1);
    });

    test("refuses to delete the parent sentinel", async () => {
      const controller = await startController();

      await press(controller, "f8");

      expect(controller.state.statusMessage).toBe("Cannot delete the parent entry");
      expect(await pathExists(left)).toBe(true);
    });
  });

  describe("rename", () => {
    test("prompts for a name and renames on enter", async () => {
      const controller = await startController();

      await press(controller, "down", "down", "f2");
      expect(controller.state.mode).toMatchObject({
        kind: "awaitingTextInput",
        forOperation: "rename",
        label: "Rename a.txt -> ",
        buffer: "",
      });

      await typeText(controller, "b.txt");
      await press(controller, "enter");

      expect(controller.state.mode).toEqual({ kind: "browsing" });
      expect(controller.state.statusMessage).toBe("Renamed to b.txt");
      expect(names(controller.state.panes[0].entries)).toEqual(["[..]", "sub", "b.txt"]);
      expect(controller.state.panes[0].cursorIndex).toBe(2);
    });

    test("an empty name cancels without touching the disk", async () => {
      const controller = await startController();

      await press(controller, "down", "down", "f2", "enter");

      expect(controller.state.statusMessage).toBe("Rename cancelled");
      expect((await readdir(left)).sort()).toEqual(["a.txt", "sub"]);
    });

    test("escape cancels the prompt", async () => {
      const controller = await startController();

      await press(controller, "down", "down", "f2");
      await typeText(controller, "zzz");
      await press(controller, "escape");

      expect(controller.state.mode).toEqual({ kind: "browsing" });
      expect(controller.state.statusMessage).toBe("Rename cancelled");
      expect(controller.isFinished).toBe(false);
    });

    test("the sentinel cannot be renamed", async () => {
      const controller = await startController();

      await press(controller, "f2");

      expect(controller.state.statusMessage).toBe("Nothing to rename");
      expect(controller.state.mode).toEqual({ kind: "browsing" });
    });

    test("bound keys are typed, not executed, while prompting", async () => {
      const controller = await startController();

      await press(controller, "down", "down", "f2");
      await typeText(controller, "q5");

      expect(controller.isFinished).toBe(false);
      expect(controller.state.mode).toMatchObject({ buffer: "q5" });
    });
  });

  describe("make directory", () => {
    test("creates the directory and selects it", async () => {
      const controller = await startController();

      await press(controller, "f7");
      await typeText(controller, "new");
      await press(controller, "enter");

      expect(controller.state.statusMessage).toBe("Created directory: new");
      expect(names(controller.state.panes[0].entries)).toEqual(["[..]", "new", "sub", "a.txt"]);
      expect(controller.state.panes[0].cursorIndex).toBe(1);
    });

    test("backspace edits the typed name", async () => {
      const controller = await startController();

      await press(controller, "f7");
      await typeText(controller, "abc");
      await press(controller, "backspace");

      expect(controller.state.mode).toMatchObject({ label: "Create dir: ", buffer: "ab" });
    });

    test("reports an existing directory", async () => {
      const controller = await startController();

      await press(controller, "f7");
      await typeText(controller, "sub");
      await press(controller, "enter");

      expect(controller.state.statusMessage).toBe(
        `Error: Directory already exists: ${join(left, "sub")}`
      );
    });

    test("an empty name cancels", async () => {
      const controller = await startController();

      await press(controller, "f7", "enter");

      expect(controller.state.statusMessage).toBe("Directory creation cancelled");
    });
  });

  describe("refresh and quit", () => {
    test("r re-lists both panes", async () => {
      const controller = await startController();
      await writeFile(join(right, "late.txt"), "late", "utf-8");

      await press(controller, "r");

      expect(controller.state.statusMessage).toBe("Refreshed");
      expect(names(controller.state.panes[1].entries)).toEqual(["[..]", "late.txt"]);
    });

    test("a vanished directory falls back to its parent", async () => {
      const controller = await startController();
      await rm(left, { recursive: true });

      await press(controller, "r");

      expect(controller.state.panes[0].currentDirectory).toBe(testDir);
      expect(controller.state.statusMessage).toBe(`Directory no longer available: ${left}`);
    });

    test("q finishes the controller", async () => {
      const controller = await startController();

      await press(controller, "q");

      expect(controller.isFinished).toBe(true);
    });
  });
});

describe("statusForFailure", () => {
  test("prefixes ordinary failures", () => {
    expect(statusForFailure(new AlreadyExistsError("Destination already exists: /x"))).toBe(
      "Error: Destination already exists: /x"
    );
  });

  test("shows refusals as-is", () => {
    expect(statusForFailure(new ProtectedEntryError("Nothing to rename"))).toBe("Nothing to rename");
  });

  test("uses the cancellation message for an empty name", () => {
    expect(statusForFailure(new UserCancelledError("Empty name"), "Rename cancelled")).toBe(
      "Rename cancelled"
    );
  });
});

describe("isPrintable", () => {
  test("accepts single visible characters", () => {
    expect(isPrintable({ name: "a", ch: "a" })).toBe(true);
    expect(isPrintable({ name: "space", ch: " " })).toBe(true);
    expect(isPrintable({ name: "ж", ch: "ж" })).toBe(true);
  });

  test("rejects control characters and modified keys", () => {
    expect(isPrintable({ name: "tab", ch: "\t" })).toBe(false);
    expect(isPrintable({ name: "a", ch: "a", ctrl: true })).toBe(false);
    expect(isPrintable({ name: "f5" })).toBe(false);
  });
});
