/**
 * ANSI escape code constants
 */
export const ESC = '\x1b';
export const CSI = `${ESC}[`;

export const CR = '\r';
export const CRLF = '\r\n';

/**
 * Cursor control
 */
export const CURSOR = {
  /** Move cursor up n rows, staying in the same column */
  up: (n: number = 1) => `${CSI}${n}A`,
  /** Move cursor to column (1-indexed) on the current row */
  toColumn: (col: number) => `${CSI}${col}G`,
  /** Move to home position */
  home: `${CSI}1;1H`,
  /** Hide cursor */
  hide: `${CSI}?25l`,
  /** Show cursor */
  show: `${CSI}?25h`,
} as const;

/**
 * Screen control
 */
export const SCREEN = {
  /** Clear entire screen */
  clear: `${CSI}2J`,
  /** Clear entire line */
  clearLine: `${CSI}2K`,
} as const;

/**
 * Text styling
 */
export const STYLE = {
  /** Reset all attributes */
  reset: `${CSI}0m`,
} as const;

/**
 * SGR (Select Graphic Rendition) parameters
 */
export const SGR = {
  RESET: 0,
  BOLD: 1,
  INVERSE: 7,
  CONCEAL: 8,
  FORE: 30,
  BACK: 40,
  FORE_HI: 90,
  BACK_HI: 100,
} as const;
