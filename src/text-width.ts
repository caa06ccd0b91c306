/**
 * Terminal cell widths
 *
 * CJK ideographs, kana, Hangul, fullwidth forms and most emoji take two
 * cells; combining marks take none. Control characters are replaced
 * before display so a file name cannot break a row.
 */

// ============================================
// Character Widths
// ============================================

const WIDE_RANGES: ReadonlyArray<readonly [number, number]> = [
  [0x1100, 0x115f], // Hangul Jamo
  [0x2e80, 0x303e], // CJK radicals, symbols and punctuation
  [0x3041, 0x33ff], // Kana, CJK compatibility
  [0x3400, 0x4dbf], // CJK Extension A
  [0x4e00, 0x9fff], // CJK Unified Ideographs
  [0xa000, 0xa4cf], // Yi
  [0xac00, 0xd7a3], // Hangul syllables
  [0xf900, 0xfaff], // CJK Compatibility Ideographs
  [0xfe30, 0xfe4f], // CJK compatibility forms
  [0xff00, 0xff60], // Fullwidth forms
  [0xffe0, 0xffe6],
  [0x2600, 0x27bf], // Misc symbols, dingbats
  [0x1f1e6, 0x1f1ff], // Regional indicators
  [0x1f300, 0x1f64f], // Pictographs, emoticons
  [0x1f680, 0x1f6ff], // Transport and map
  [0x1f900, 0x1f9ff], // Supplemental symbols
  [0x20000, 0x3fffd], // CJK Extensions B and beyond
];

const ZERO_WIDTH_RANGES: ReadonlyArray<readonly [number, number]> = [
  [0x0300, 0x036f], // Combining diacritics
  [0x200b, 0x200f], // Zero-width space, joiners, marks
  [0xfe00, 0xfe0f], // Variation selectors
];

function inRanges(code: number, ranges: ReadonlyArray<readonly [number, number]>): boolean {
  return ranges.some(([from, to]) => code >= from && code <= to);
}

export function isControlCharacter(code: number): boolean {
  return code < 0x20 || (code >= 0x7f && code < 0xa0);
}

/**
 * Cells taken by one code point. Control characters count as one cell
 * because they are displayed as a replacement character.
 */
export function charWidth(char: string): number {
  const code = char.codePointAt(0) ?? 0;
  if (code < 0x7f) {
    return 1;
  }
  if (inRanges(code, ZERO_WIDTH_RANGES)) {
    return 0;
  }
  return inRanges(code, WIDE_RANGES) ? 2 : 1;
}

export function displayWidth(text: string): number {
  let width = 0;
  for (const char of text) {
    width += charWidth(char);
  }
  return width;
}

/**
 * Replaces control characters (newlines, tabs, escapes) with `?`.
 */
export function sanitizeText(text: string): string {
  let result = "";
  for (const char of text) {
    result += isControlCharacter(char.codePointAt(0) ?? 0) ? "?" : char;
  }
  return result;
}
