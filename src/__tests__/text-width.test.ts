import { describe, test, expect } from "vitest";

import { charWidth, displayWidth, isControlCharacter, sanitizeText } from "../text-width.js";

describe("charWidth", () => {
  test("gives ASCII one cell", () => {
    expect(charWidth("a")).toBe(1);
    expect(charWidth("~")).toBe(1);
  });

  test("gives CJK, kana, Hangul and emoji two cells", () => {
    expect(charWidth("日")).toBe(2);
    expect(charWidth("の")).toBe(2);
    expect(charWidth("フ")).toBe(2);
    expect(charWidth("한")).toBe(2);
    expect(charWidth("😀")).toBe(2);
  });

  test("gives combining marks no cells", () => {
    expect(charWidth("\u0301")).toBe(0);
  });

  test("gives accented Latin letters one cell", () => {
    expect(charWidth("\u00e9")).toBe(1);
  });
});

describe("displayWidth", () => {
  test("sums cells over code points", () => {
    expect(displayWidth("日本語のファイル名です.txt")).toBe(26);
    expect(displayWidth("e\u0301")).toBe(1);
  });
});

describe("sanitizeText", () => {
  test("replaces control characters with question marks", () => {
    expect(sanitizeText("a\nb\r\tc\u001b[0m\u007f")).toBe("a?b??c?[0m?");
  });

  test("leaves printable text alone", () => {
    expect(sanitizeText("report 日本.txt")).toBe("report 日本.txt");
  });
});

describe("isControlCharacter", () => {
  test("covers C0, DEL and C1", () => {
    expect(isControlCharacter(0x0a)).toBe(true);
    expect(isControlCharacter(0x7f)).toBe(true);
    expect(isControlCharacter(0x9b)).toBe(true);
    expect(isControlCharacter(0x20)).toBe(false);
  });
});
