import type { Cell, ConsoleColor, Rect } from '@gridrelay/protocol';
import { createCell, cellsEqual, cellsFromText, cloneCell } from './cell.js';

/**
 * Console screen grid with per-row damage tracking
 */
export class ScreenBuffer {
  private cells: Cell[][];
  private dirty: boolean[];
  private _width: number;
  private _height: number;

  constructor(width: number, height: number) {
    this._width = width;
    this._height = height;
    this.cells = this.createGrid(width, height);
    this.dirty = Array.from({ length: height }, () => true);
  }

  get width(): number {
    return this._width;
  }

  get height(): number {
    return this._height;
  }

  private createGrid(width: number, height: number): Cell[][] {
    return Array.from({ length: height }, () =>
      Array.from({ length: width }, () => createCell())
    );
  }

  private inBounds(x: number, y: number): boolean {
    return x >= 0 && x < this._width && y >= 0 && y < this._height;
  }

  /**
   * Get cell at position (returns null if out of bounds)
   */
  getCell(x: number, y: number): Cell | null {
    if (!this.inBounds(x, y)) {
      return null;
    }
    return this.cells[y]?.[x] ?? null;
  }

  /**
   * Set cell at position (no-op if out of bounds)
   */
  setCell(x: number, y: number, cell: Partial<Cell>): void {
    const row = this.cells[y];
    const current = row?.[x];
    if (!row || !current || !this.inBounds(x, y)) {
      return;
    }

    const newCell = createCell({ ...current, ...cell });

    // Only mark dirty if actually changed
    if (!cellsEqual(current, newCell)) {
      row[x] = newCell;
      this.dirty[y] = true;
    }
  }

  /**
   * Write text starting at position, one cell per code point
   */
  writeText(x: number, y: number, text: string, fg?: ConsoleColor, bg?: ConsoleColor): void {
    const cells = cellsFromText(text);
    for (let i = 0; i < cells.length && x + i < this._width; i++) {
      const cell = cells[i];
      if (cell) {
        this.setCell(x + i, y, {
          codePoint: cell.codePoint,
          wide: 'normal',
          ...(fg !== undefined && { fg }),
          ...(bg !== undefined && { bg }),
        });
      }
    }
  }

  /**
   * Fill a rectangle with a cell
   */
  fillRect(rect: Rect, cell: Partial<Cell>): void {
    for (let y = rect.y; y < rect.y + rect.height; y++) {
      for (let x = rect.x; x < rect.x + rect.width; x++) {
        this.setCell(x, y, cell);
      }
    }
  }

  /**
   * Clear the buffer (fill with default cells)
   */
  clear(): void {
    this.fillRect({ x: 0, y: 0, width: this._width, height: this._height }, createCell());
  }

  /**
   * Copy of one row, or an empty array when out of bounds
   */
  getRow(y: number): Cell[] {
    return (this.cells[y] ?? []).map(cloneCell);
  }

  isRowDirty(y: number): boolean {
    return this.dirty[y] ?? false;
  }

  /**
   * Indices of rows changed since the last clearDirty(), ascending
   */
  getDirtyRows(): number[] {
    const rows: number[] = [];
    for (let y = 0; y < this._height; y++) {
      if (this.dirty[y]) {
        rows.push(y);
      }
    }
    return rows;
  }

  /**
   * Mark all rows as dirty (forces full redraw)
   */
  markAllDirty(): void {
    this.dirty.fill(true);
  }

  clearDirty(): void {
    this.dirty.fill(false);
  }

  /**
   * Change dimensions, keeping the overlapping region
   */
  resize(width: number, height: number): void {
    const next = this.createGrid(width, height);
    for (let y = 0; y < Math.min(height, this._height); y++) {
      for (let x = 0; x < Math.min(width, this._width); x++) {
        const cell = this.cells[y]?.[x];
        const target = next[y];
        if (cell && target) {
          target[x] = cell;
        }
      }
    }
    this.cells = next;
    this._width = width;
    this._height = height;
    this.dirty = Array.from({ length: height }, () => true);
  }

  /**
   * Copy another buffer onto this one at an offset
   */
  blit(source: ScreenBuffer, destX: number, destY: number): void {
    for (let y = 0; y < source.height; y++) {
      for (let x = 0; x < source.width; x++) {
        const cell = source.getCell(x, y);
        if (cell) {
          this.setCell(destX + x, destY + y, cell);
        }
      }
    }
  }

  /**
   * Clone this buffer
   */
  clone(): ScreenBuffer {
    const buffer = new ScreenBuffer(this._width, this._height);
    buffer.cells = this.cells.map(row => row.map(cloneCell));
    buffer.dirty = [...this.dirty];
    return buffer;
  }
}
