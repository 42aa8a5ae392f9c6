import type { CursorPosition } from '@gridrelay/protocol';
import type { ANSIBuilder } from '../ansi/builder.js';

/**
 * Tracks where the terminal's cursor is believed to be and emits the movement
 * needed to reconcile that belief with a target row.
 *
 * Only rows are tracked. Every row render starts with a carriage return, so the
 * column is known to be 0 whenever a movement is emitted.
 */
export class CursorTracker {
  private believedRow: number = 0;
  private cursorHidden: boolean = false;
  private cursorPos: CursorPosition = [0, 0];
  private isBypass: () => boolean;

  constructor(isBypass: () => boolean) {
    this.isBypass = isBypass;
  }

  reset(startRow: number): void {
    this.believedRow = startRow;
    this.cursorHidden = false;
    this.cursorPos = [0, startRow];
  }

  get row(): number {
    return this.believedRow;
  }

  get hidden(): boolean {
    return this.cursorHidden;
  }

  get position(): CursorPosition {
    return this.cursorPos;
  }

  hideCursor(out: ANSIBuilder): void {
    if (this.cursorHidden) return;
    if (!this.isBypass()) {
      out.hideCursor();
    }
    this.cursorHidden = true;
  }

  /**
   * Move to column 0 of the target row.
   *
   * Downward movement is one CRLF per row: Cursor Next Line does nothing on the
   * last row, which would desynchronize the belief. Cursor Previous Line is
   * not used either (Konsole rejects it), so upward movement is CR + CUU.
   */
  moveToRow(target: number, out: ANSIBuilder): void {
    if (!Number.isInteger(target) || target < 0) {
      throw new RangeError(`Invalid target row: ${target}`);
    }

    const bypass = this.isBypass();
    if (target < this.believedRow) {
      if (!bypass) {
        out.carriageReturn().moveUp(this.believedRow - target);
      }
      this.believedRow = target;
    } else if (target > this.believedRow) {
      while (target > this.believedRow) {
        if (!bypass) {
          out.newLine();
        }
        this.believedRow++;
      }
    } else if (!bypass) {
      // Bypass sends raw text only, so even this bare \r is withheld there.
      out.carriageReturn();
    }
  }

  /**
   * Park the cursor at its final position and reveal it.
   *
   * A changed position hides the cursor first, so that a move without new
   * content still goes through the reveal path.
   */
  finish(position: CursorPosition, out: ANSIBuilder): void {
    const [column, row] = position;
    if (column !== this.cursorPos[0] || row !== this.cursorPos[1]) {
      this.hideCursor(out);
    }
    if (this.cursorHidden) {
      this.moveToRow(row, out);
      if (!this.isBypass()) {
        out.moveToColumn(column).showCursor();
      }
      this.cursorHidden = false;
    }
    this.cursorPos = [column, row];
  }
}
