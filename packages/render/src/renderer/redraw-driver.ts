import type { CursorPosition } from '@gridrelay/protocol';
import type { ScreenBuffer } from '../buffer/screen-buffer.js';
import type { TerminalEncoder } from '../terminal/terminal-encoder.js';

export interface RedrawOptions {
  /** Clear the terminal and send every row */
  full?: boolean;
}

export interface RedrawResult {
  full: boolean;
  rowsSent: number;
}

/**
 * Runs redraw cycles of a ScreenBuffer through one TerminalEncoder
 */
export class RedrawDriver {
  private encoder: TerminalEncoder;
  private forceFullRedraw: boolean = true;

  constructor(encoder: TerminalEncoder) {
    this.encoder = encoder;
  }

  /**
   * Force a full redraw on the next cycle
   */
  invalidate(): void {
    this.forceFullRedraw = true;
  }

  /**
   * Send changed rows (or all rows on a full redraw), then park the cursor
   */
  redraw(buffer: ScreenBuffer, cursor: CursorPosition, options?: RedrawOptions): RedrawResult {
    const full = this.forceFullRedraw || (options?.full ?? false);
    this.forceFullRedraw = false;

    if (full) {
      this.encoder.reset(true, 0);
      buffer.markAllDirty();
    }

    const rows = buffer.getDirtyRows();
    for (const y of rows) {
      this.encoder.renderRow(y, buffer.getRow(y));
    }

    this.encoder.finish(cursor);
    buffer.clearDirty();

    return { full, rowsSent: rows.length };
  }
}
