import { BLACK, type Cell, type CursorPosition } from '@gridrelay/protocol';
import { ANSIBuilder } from '../ansi/builder.js';
import { colorKey } from '../ansi/colors.js';
import { encodeGlyph } from '../glyph/glyph-encoder.js';
import type { ByteSink } from '../transport/byte-sink.js';
import { CursorTracker } from './cursor-tracker.js';

/**
 * A space only shows when it paints a non-default background, which never
 * happens in bypass mode
 */
function isVisible(glyph: string, cell: Cell, bypassMode: boolean): boolean {
  if (glyph === '') return false;
  if (glyph === ' ') return !bypassMode && cell.bg !== BLACK;
  return true;
}

export interface TerminalEncoderOptions {
  /** Send raw text only, with no escape sequences */
  bypassMode?: boolean;
}

/**
 * Snapshot of what the encoder believes about the terminal
 */
export interface EncoderState {
  believedRow: number;
  cursorHidden: boolean;
  cursorPosition: CursorPosition;
  bypassMode: boolean;
}

/**
 * Encodes console screen rows into a cursor-relative ANSI stream.
 *
 * One instance per output session. A redraw cycle is reset() (at session start
 * or for a full redraw), renderRow() for each changed row, then finish() with
 * the desired cursor position. Cycles must not interleave.
 */
export class TerminalEncoder {
  private sink: ByteSink;
  private bypassMode: boolean;
  private tracker: CursorTracker;
  private out: ANSIBuilder = new ANSIBuilder();
  private lastSentColor: number | null = null;

  constructor(sink: ByteSink, options?: TerminalEncoderOptions) {
    this.sink = sink;
    this.bypassMode = options?.bypassMode ?? false;
    this.tracker = new CursorTracker(() => this.bypassMode);
  }

  /**
   * Bypass mode is for consumers that are themselves a console host. Toggling
   * it emits nothing.
   */
  setBypassMode(enabled: boolean): void {
    this.bypassMode = enabled;
  }

  /**
   * Integer form of setBypassMode: 1 enables bypass, anything else disables it
   */
  setConsoleMode(mode: number): void {
    this.setBypassMode(mode === 1);
  }

  isBypassMode(): boolean {
    return this.bypassMode;
  }

  /**
   * Start a session or a full redraw. With clearFirst the terminal is reset to
   * a blank screen with the cursor at the top-left.
   */
  reset(clearFirst: boolean, startRow: number): void {
    if (clearFirst && !this.bypassMode) {
      this.out.resetScreen();
    }
    this.tracker.reset(startRow);
    this.lastSentColor = null;
    this.flush();
  }

  /**
   * Erase and redraw one row. Trailing blanks on the default background are
   * not sent, nor is a color fragment with nothing visible after it; the erase
   * already blanked those cells.
   */
  renderRow(row: number, cells: readonly Cell[]): void {
    const out = this.out;
    this.tracker.hideCursor(out);
    this.tracker.moveToRow(row, out);
    if (!this.bypassMode) {
      out.clearLine();
    }
    out.markSignificant();

    this.lastSentColor = null;
    for (const cell of cells) {
      const color = colorKey(cell.fg, cell.bg);
      if (color !== this.lastSentColor && !this.bypassMode) {
        out.setColors(cell.fg, cell.bg);
      }
      this.lastSentColor = color;

      const glyph = encodeGlyph(cell);
      out.write(glyph);
      if (isVisible(glyph, cell, this.bypassMode)) {
        out.markSignificant();
      }
    }

    this.write(out.buildSignificant());
  }

  hideCursor(): void {
    this.tracker.hideCursor(this.out);
    this.flush();
  }

  moveToRow(row: number): void {
    this.tracker.moveToRow(row, this.out);
    this.flush();
  }

  /**
   * End a redraw cycle: move to the requested [column, row] and show the
   * cursor. Repeating the same position emits nothing.
   */
  finish(position: CursorPosition): void {
    this.tracker.finish(position, this.out);
    this.flush();
  }

  getState(): EncoderState {
    return {
      believedRow: this.tracker.row,
      cursorHidden: this.tracker.hidden,
      cursorPosition: this.tracker.position,
      bypassMode: this.bypassMode,
    };
  }

  private flush(): void {
    this.write(this.out.build());
  }

  private write(chunk: string): void {
    if (chunk.length > 0) {
      this.sink.write(chunk);
    }
  }
}
