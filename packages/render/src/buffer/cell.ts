import type { Cell } from '@gridrelay/protocol';
import { DEFAULT_CELL } from '@gridrelay/protocol';

/**
 * Create a new cell with default values
 */
export function createCell(partial?: Partial<Cell>): Cell {
  return {
    codePoint: partial?.codePoint ?? DEFAULT_CELL.codePoint,
    fg: partial?.fg ?? DEFAULT_CELL.fg,
    bg: partial?.bg ?? DEFAULT_CELL.bg,
    wide: partial?.wide ?? DEFAULT_CELL.wide,
  };
}

/**
 * Clone a cell
 */
export function cloneCell(cell: Cell): Cell {
  return { ...cell };
}

/**
 * Compare two cells for equality
 */
export function cellsEqual(a: Cell, b: Cell): boolean {
  return (
    a.codePoint === b.codePoint &&
    a.fg === b.fg &&
    a.bg === b.bg &&
    a.wide === b.wide
  );
}

/**
 * Split text into cells, one per code point
 */
export function cellsFromText(text: string, partial?: Omit<Partial<Cell>, 'codePoint'>): Cell[] {
  const cells: Cell[] = [];
  for (const char of text) {
    const codePoint = char.codePointAt(0);
    if (codePoint !== undefined) {
      cells.push(createCell({ ...partial, codePoint }));
    }
  }
  return cells;
}
