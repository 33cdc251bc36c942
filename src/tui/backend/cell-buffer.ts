import { DrawOutOfBoundsError } from '../../errors.js';
import type { BorderChars, Rect, TextAttributes } from '../types.js';

export interface Cell {
  ch: string;
  color: number;
  bold: boolean;
  reverse: boolean;
}

const blankCell = (): Cell => ({ ch: ' ', color: 0, bold: false, reverse: false });

function sameCell(a: Cell, b: Cell): boolean {
  return a.ch === b.ch && a.color === b.color && a.bold === b.bold && a.reverse === b.reverse;
}

/**
 * Character cell grid used as a terminal back buffer.
 * Characters are addressed by code point, so astral symbols take one cell.
 */
export class CellBuffer {
  private cells: Cell[][] = [];

  constructor(private rowCount: number, private colCount: number) {
    this.reset();
  }

  get rows(): number { return this.rowCount; }
  get cols(): number { return this.colCount; }

  resize(rows: number, cols: number): void {
    this.rowCount = rows;
    this.colCount = cols;
    this.reset();
  }

  reset(): void {
    this.cells = Array.from({ length: this.rowCount }, () =>
      Array.from({ length: this.colCount }, blankCell)
    );
  }

  write(x: number, y: number, text: string, attrs: TextAttributes): void {
    if (y < 0 || y >= this.rowCount || x < 0 || x >= this.colCount) {
      throw new DrawOutOfBoundsError(
        `Cannot draw at (${x}, ${y}) on a ${this.colCount}x${this.rowCount} terminal`
      );
    }
    const row = this.cells[y];
    let col = x;
    for (const ch of Array.from(text)) {
      if (col >= this.colCount) break;
      row[col] = { ch, color: attrs.color, bold: !!attrs.bold, reverse: !!attrs.reverse };
      col++;
    }
  }

  drawBorder(rect: Rect, chars: BorderChars, attrs: TextAttributes): void {
    if (rect.width < 2 || rect.height < 2) return;
    const inner = Math.max(0, rect.width - 2);
    const bottom = rect.y + rect.height - 1;
    const right = rect.x + rect.width - 1;
    this.write(rect.x, rect.y, chars.topLeft + chars.horizontal.repeat(inner) + chars.topRight, attrs);
    for (let y = rect.y + 1; y < bottom; y++) {
      this.write(rect.x, y, chars.vertical, attrs);
      this.write(right, y, chars.vertical, attrs);
    }
    this.write(rect.x, bottom, chars.bottomLeft + chars.horizontal.repeat(inner) + chars.bottomRight, attrs);
  }

  cell(x: number, y: number): Cell | undefined {
    return this.cells[y]?.[x];
  }

  row(y: number): readonly Cell[] {
    return this.cells[y] ?? [];
  }

  rowText(y: number): string {
    return this.row(y).map(c => c.ch).join('');
  }

  /** Indexes of rows that differ from `other` (all rows when sizes differ). */
  changedRows(other: CellBuffer): number[] {
    const changed: number[] = [];
    const sizeChanged = other.rows !== this.rowCount || other.cols !== this.colCount;
    for (let y = 0; y < this.rowCount; y++) {
      if (sizeChanged || this.cells[y].some((cell, x) => !sameCell(cell, other.cells[y][x]))) {
        changed.push(y);
      }
    }
    return changed;
  }

  copyFrom(other: CellBuffer): void {
    this.rowCount = other.rows;
    this.colCount = other.cols;
    this.cells = other.cells.map(row => row.map(cell => ({ ...cell })));
  }
}
