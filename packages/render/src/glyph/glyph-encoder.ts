import type { Cell } from '@gridrelay/protocol';

/**
 * Placeholder for values that are not Unicode scalar values
 */
export const REPLACEMENT_GLYPH = '?';

/**
 * The console's popup windows (e.g. F7 history) are bordered with box-drawing
 * characters. Under the Japanese and Korean locales (CP932, CP949) the console
 * reports them as code points 1..6. English locales report correct single-line
 * characters, and the Chinese locales use ASCII.
 */
const POPUP_BOX_DRAWING: Record<number, number> = {
  1: 0x2554, // ╔ DOUBLE DOWN AND RIGHT
  2: 0x2557, // ╗ DOUBLE DOWN AND LEFT
  3: 0x255a, // ╚ DOUBLE UP AND RIGHT
  4: 0x255d, // ╝ DOUBLE UP AND LEFT
  5: 0x2551, // ║ DOUBLE VERTICAL
  6: 0x2550, // ═ DOUBLE HORIZONTAL
};

export function isScalarValue(codePoint: number): boolean {
  return (
    Number.isInteger(codePoint) &&
    codePoint >= 0 &&
    codePoint <= 0x10ffff &&
    (codePoint < 0xd800 || codePoint > 0xdfff)
  );
}

/**
 * Map legacy popup border code points to their box-drawing characters
 */
export function remapCodePoint(codePoint: number): number {
  return POPUP_BOX_DRAWING[codePoint] ?? codePoint;
}

/**
 * Text for one cell. Trailing halves of wide characters encode to nothing,
 * since the leading cell already carries the glyph.
 */
export function encodeGlyph(cell: Cell): string {
  if (cell.wide === 'trailing') {
    return '';
  }
  const codePoint = remapCodePoint(cell.codePoint);
  if (!isScalarValue(codePoint)) {
    return REPLACEMENT_GLYPH;
  }
  return String.fromCodePoint(codePoint);
}
