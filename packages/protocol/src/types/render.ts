export const COLOR_FLAG = {
  RED: 1,
  GREEN: 2,
  BLUE: 4,
  BRIGHT: 8,
} as const;

/**
 * The 16 console colors. Bits 0-2 are red, green, blue and bit 3 is
 * intensity, so the low three bits double as the ANSI color index (0..7).
 */
export const CONSOLE_COLOR = {
  BLACK: 0,
  RED: 1,
  GREEN: 2,
  YELLOW: 3,
  BLUE: 4,
  MAGENTA: 5,
  CYAN: 6,
  LIGHT_GRAY: 7,
  DARK_GRAY: 8,
  BRIGHT_RED: 9,
  BRIGHT_GREEN: 10,
  BRIGHT_YELLOW: 11,
  BRIGHT_BLUE: 12,
  BRIGHT_MAGENTA: 13,
  BRIGHT_CYAN: 14,
  WHITE: 15,
} as const;

export type ConsoleColor = (typeof CONSOLE_COLOR)[keyof typeof CONSOLE_COLOR];

export const CONSOLE_COLORS: readonly ConsoleColor[] = Object.values(CONSOLE_COLOR);

export const BLACK = CONSOLE_COLOR.BLACK;
export const DARK_GRAY = CONSOLE_COLOR.DARK_GRAY;
export const LIGHT_GRAY = CONSOLE_COLOR.LIGHT_GRAY;
export const WHITE = CONSOLE_COLOR.WHITE;

export function isConsoleColor(value: number): value is ConsoleColor {
  return CONSOLE_COLORS.some(color => color === value);
}

/**
 * Keep the low nibble of a number as a ConsoleColor
 */
export function toConsoleColor(value: number): ConsoleColor {
  const color = value & 0x0f;
  return isConsoleColor(color) ? color : BLACK;
}

/**
 * Role of a cell in a double-width character. Only the leading cell carries
 * the glyph; the trailing cell is a placeholder.
 */
export type WideRole = 'normal' | 'leading' | 'trailing';

/**
 * Single console grid cell
 */
export interface Cell {
  /** Unicode scalar value */
  codePoint: number;
  fg: ConsoleColor;
  bg: ConsoleColor;
  wide: WideRole;
}

/**
 * Default cell (space, light gray on black)
 */
export const DEFAULT_CELL: Cell = {
  codePoint: 0x20,
  fg: LIGHT_GRAY,
  bg: BLACK,
  wide: 'normal',
};

/**
 * Cursor coordinates as [column, row], both 0-indexed
 */
export type CursorPosition = readonly [column: number, row: number];

/**
 * Rectangle definition
 */
export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}
