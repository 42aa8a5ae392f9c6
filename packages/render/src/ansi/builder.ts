import { CR, CRLF, CURSOR, SCREEN, STYLE } from './codes.js';
import { sgrForColors } from './colors.js';
import type { ConsoleColor } from '@gridrelay/protocol';

/**
 * Fluent ANSI escape sequence builder.
 *
 * Tracks a "significant" length: output past that mark is dropped by
 * buildSignificant(). Callers mark after anything that must reach the terminal.
 */
export class ANSIBuilder {
  private output: string = '';
  private significant: number = 0;

  // Cursor movement
  carriageReturn(): this {
    this.output += CR;
    return this;
  }

  newLine(): this {
    this.output += CRLF;
    return this;
  }

  moveUp(n: number = 1): this {
    this.output += CURSOR.up(n);
    return this;
  }

  /** Move to a 0-indexed column on the current row */
  moveToColumn(x: number): this {
    this.output += CURSOR.toColumn(x + 1);
    return this;
  }

  hideCursor(): this {
    this.output += CURSOR.hide;
    return this;
  }

  showCursor(): this {
    this.output += CURSOR.show;
    return this;
  }

  // Screen control
  /** Reset attributes, home the cursor and clear the display */
  resetScreen(): this {
    this.output += STYLE.reset + CURSOR.home + SCREEN.clear;
    return this;
  }

  clearLine(): this {
    this.output += SCREEN.clearLine;
    return this;
  }

  // Colors
  setColors(fg: ConsoleColor, bg: ConsoleColor): this {
    this.output += sgrForColors(fg, bg);
    return this;
  }

  // Text output
  write(text: string): this {
    this.output += text;
    return this;
  }

  /** Mark everything written so far as significant */
  markSignificant(): this {
    this.significant = this.output.length;
    return this;
  }

  // Build and clear
  build(): string {
    const result = this.output;
    this.clear();
    return result;
  }

  /** Build only up to the significant mark, then clear */
  buildSignificant(): string {
    const result = this.output.slice(0, this.significant);
    this.clear();
    return result;
  }

  // Clear without building
  clear(): this {
    this.output = '';
    this.significant = 0;
    return this;
  }
}
