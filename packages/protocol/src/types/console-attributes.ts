import { COLOR_FLAG, toConsoleColor, type Cell, type ConsoleColor, type WideRole } from './render.js';

// Windows console CHAR_INFO attribute bits
export const FOREGROUND_BLUE = 0x0001;
export const FOREGROUND_GREEN = 0x0002;
export const FOREGROUND_RED = 0x0004;
export const FOREGROUND_INTENSITY = 0x0008;
export const BACKGROUND_BLUE = 0x0010;
export const BACKGROUND_GREEN = 0x0020;
export const BACKGROUND_RED = 0x0040;
export const BACKGROUND_INTENSITY = 0x0080;
export const COMMON_LVB_LEADING_BYTE = 0x0100;
export const COMMON_LVB_TRAILING_BYTE = 0x0200;

/**
 * Default console attribute (light gray on black)
 */
export const DEFAULT_CONSOLE_ATTRIBUTES = FOREGROUND_RED | FOREGROUND_GREEN | FOREGROUND_BLUE;

export interface DecodedAttributes {
  fg: ConsoleColor;
  bg: ConsoleColor;
  wide: WideRole;
}

/**
 * Translate the console's BGR nibble into an RGB ConsoleColor
 */
function nibbleToColor(nibble: number): ConsoleColor {
  let color = 0;
  if (nibble & FOREGROUND_RED) color |= COLOR_FLAG.RED;
  if (nibble & FOREGROUND_GREEN) color |= COLOR_FLAG.GREEN;
  if (nibble & FOREGROUND_BLUE) color |= COLOR_FLAG.BLUE;
  if (nibble & FOREGROUND_INTENSITY) color |= COLOR_FLAG.BRIGHT;
  return toConsoleColor(color);
}

/**
 * Decode a packed console attribute word. Bits other than the color nibbles
 * and the leading/trailing byte flags are ignored.
 */
export function decodeConsoleAttributes(attributes: number): DecodedAttributes {
  let wide: WideRole = 'normal';
  if (attributes & COMMON_LVB_TRAILING_BYTE) {
    wide = 'trailing';
  } else if (attributes & COMMON_LVB_LEADING_BYTE) {
    wide = 'leading';
  }

  return {
    fg: nibbleToColor(attributes & 0x0f),
    bg: nibbleToColor((attributes >> 4) & 0x0f),
    wide,
  };
}

/**
 * Build a cell from a console character and its attribute word
 */
export function cellFromConsole(codePoint: number, attributes: number): Cell {
  return { codePoint, ...decodeConsoleAttributes(attributes) };
}
