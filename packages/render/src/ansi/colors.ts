import { CSI, SGR } from './codes.js';
import {
  BLACK,
  COLOR_FLAG,
  DARK_GRAY,
  LIGHT_GRAY,
  WHITE,
  type ConsoleColor,
} from '@gridrelay/protocol';

/**
 * SGR parameters for one explicit color channel.
 *
 * Bright colors send the 3X/4X code before the 9X/10X code. Terminals without
 * the high-intensity range ignore the second code and keep the first; the
 * others let the second override it.
 */
export function colorParams(isFore: boolean, color: ConsoleColor): number[] {
  const base = isFore ? SGR.FORE : SGR.BACK;
  if (color & COLOR_FLAG.BRIGHT) {
    const index = color & ~COLOR_FLAG.BRIGHT;
    return [base + index, base + (SGR.FORE_HI - SGR.FORE) + index];
  }
  return [base + color];
}

/**
 * SGR parameter list for a console fore/back pair, starting with a reset.
 *
 * The terminal's color scheme is unknown. Common defaults are light gray on
 * black (xterm, putty, mintty, Konsole) or black on white (rxvt, JetBrains).
 * A console black background maps to the terminal default background, and a
 * console white background maps to the inverted default, so that grayscale
 * text stays readable under either scheme:
 *
 *   light-on-dark: White => LtGray(fore), Black => Black(back)
 *   dark-on-light: White => Black(fore),  Black => White(back)
 */
export function sgrParamsForColors(fg: ConsoleColor, bg: ConsoleColor): number[] {
  const params: number[] = [SGR.RESET];

  if (bg === BLACK) {
    if (fg === LIGHT_GRAY) {
      // terminal default foreground
    } else if (fg === WHITE) {
      // Literal white is invisible on a dark-on-light terminal; bold is
      // distinct under both schemes.
      params.push(SGR.BOLD);
    } else if (fg === DARK_GRAY) {
      // LtGray(37) fallback for terminals without the 9X range
      params.push(SGR.FORE + LIGHT_GRAY, SGR.FORE_HI + BLACK);
    } else {
      params.push(...colorParams(true, fg));
    }
  } else if (bg === WHITE) {
    params.push(SGR.INVERSE);
    // Under inversion LtGray and Black land on the terminal's own background,
    // so sending them would make the text invisible.
    if (fg !== LIGHT_GRAY && fg !== BLACK) {
      params.push(...colorParams(false, fg));
    }
  } else {
    params.push(...colorParams(true, fg), ...colorParams(false, bg));
  }

  if (fg === bg) {
    // Best effort; terminals without conceal still show contrasting text.
    params.push(SGR.CONCEAL);
  }

  return params;
}

/**
 * Escape fragment selecting the given console colors
 */
export function sgrForColors(fg: ConsoleColor, bg: ConsoleColor): string {
  return `${CSI}${sgrParamsForColors(fg, bg).join(';')}m`;
}

/**
 * Pack a fore/back pair into a single comparable key
 */
export function colorKey(fg: ConsoleColor, bg: ConsoleColor): number {
  return ((bg & 0x0f) << 4) | (fg & 0x0f);
}
