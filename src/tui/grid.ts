import { TerminalTooSmallError } from '../errors.js';
import type { Rect } from './types.js';

/**
 * Grid geometry.
 *
 * Splits a `height x width` character area into `numRows x numCols` cells.
 * Integer division leaves remainder characters (`offsetX`, `offsetY`); those
 * are handed to cells touching the last column or row so the cells always
 * tile the whole area.
 */
export class Grid {
  private rows: number;
  private cols: number;
  private areaHeight = 0;
  private areaWidth = 0;
  private cellHeight = 0;
  private cellWidth = 0;
  private remainderX = 0;
  private remainderY = 0;
  private titleOffset: number;

  constructor(numRows: number, numCols: number, height: number, width: number, titleBarOffset = 0) {
    Grid.assertFits(numRows, numCols, height, width);
    this.rows = numRows;
    this.cols = numCols;
    this.titleOffset = titleBarOffset;
    this.apply(height, width);
  }

  static assertFits(numRows: number, numCols: number, height: number, width: number): void {
    if (!Number.isInteger(numRows) || !Number.isInteger(numCols) || numRows < 1 || numCols < 1) {
      throw new TerminalTooSmallError(`Grid needs at least one row and column, got ${numRows}x${numCols}`);
    }
    if (3 * numRows >= height || 3 * numCols >= width) {
      throw new TerminalTooSmallError(
        `Terminal area ${width}x${height} is too small for a ${numRows}x${numCols} grid`
      );
    }
  }

  get numRows(): number { return this.rows; }
  get numCols(): number { return this.cols; }
  get height(): number { return this.areaHeight; }
  get width(): number { return this.areaWidth; }
  get rowHeight(): number { return this.cellHeight; }
  get columnWidth(): number { return this.cellWidth; }
  get offsetX(): number { return this.remainderX; }
  get offsetY(): number { return this.remainderY; }
  get titleBarOffset(): number { return this.titleOffset; }

  /** `[rowHeight, columnWidth]` */
  getCellDimensions(): [number, number] {
    return [this.cellHeight, this.cellWidth];
  }

  setTitleBarOffset(offset: number): void {
    this.titleOffset = offset;
  }

  /**
   * Recompute cell sizes for a new area. Throws without touching the current
   * dimensions when the new area is too small.
   */
  resize(height: number, width: number): void {
    Grid.assertFits(this.rows, this.cols, height, width);
    this.apply(height, width);
  }

  /** Absolute rectangle covered by a cell span, including remainder characters on the far edges. */
  cellRect(row: number, column: number, rowSpan = 1, columnSpan = 1): Rect {
    const x = column * this.cellWidth;
    const y = row * this.cellHeight + this.titleOffset;
    let width = columnSpan * this.cellWidth;
    let height = rowSpan * this.cellHeight;
    if (column + columnSpan === this.cols) width += this.remainderX;
    if (row + rowSpan === this.rows) height += this.remainderY;
    return { x, y, width, height };
  }

  private apply(height: number, width: number): void {
    this.areaHeight = height;
    this.areaWidth = width;
    this.cellHeight = Math.floor(height / this.rows);
    this.cellWidth = Math.floor(width / this.cols);
    this.remainderY = height % this.rows;
    this.remainderX = width % this.cols;
  }
}
