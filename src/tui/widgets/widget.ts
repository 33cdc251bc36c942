import { MissingParentError, OutOfBoundsError } from '../../errors.js';
import { UIElement, type ElementOptions } from '../element.js';
import type { Grid } from '../grid.js';
import type { Point } from '../types.js';

export type KeyCommand = () => void;

/**
 * Element bound to a span of grid cells.
 *
 * Widgets touching the last row or column absorb the grid's remainder
 * characters, so the widgets of a full grid tile the terminal area.
 */
export abstract class Widget extends UIElement {
  readonly grid: Grid;
  readonly row: number;
  readonly column: number;
  readonly rowSpan: number;
  readonly columnSpan: number;
  private readonly keyCommands = new Map<string, KeyCommand>();

  constructor(
    id: number,
    title: string,
    grid: Grid | null | undefined,
    row: number,
    column: number,
    rowSpan = 1,
    columnSpan = 1,
    options: ElementOptions = {}
  ) {
    super(id, title, options);
    if (!grid) {
      throw new MissingParentError(`Widget '${title}' was created without a grid`);
    }
    if (row < 0 || column < 0 || rowSpan < 1 || columnSpan < 1) {
      throw new OutOfBoundsError(
        `Invalid placement for '${title}': row ${row}, column ${column}, span ${rowSpan}x${columnSpan}`
      );
    }
    if (row + rowSpan > grid.numRows || column + columnSpan > grid.numCols) {
      throw new OutOfBoundsError(
        `Widget '${title}' at (${row}, ${column}) spanning ${rowSpan}x${columnSpan} does not fit a ${grid.numRows}x${grid.numCols} grid`
      );
    }
    this.grid = grid;
    this.row = row;
    this.column = column;
    this.rowSpan = rowSpan;
    this.columnSpan = columnSpan;
    this.applyGeometry();
  }

  get isButton(): boolean {
    return this.kind === 'button';
  }

  protected computeStartPosition(): Point {
    const rect = this.grid.cellRect(this.row, this.column, this.rowSpan, this.columnSpan);
    return { x: rect.x, y: rect.y };
  }

  protected computeStopPosition(): Point {
    const rect = this.grid.cellRect(this.row, this.column, this.rowSpan, this.columnSpan);
    return { x: rect.x + rect.width, y: rect.y + rect.height };
  }

  /** Action run when the widget is entered with auto-press enabled; buttons press themselves. */
  activate(): void {}

  getGridCell(): [number, number] {
    return [this.row, this.column];
  }

  getGridSpan(): [number, number] {
    return [this.rowSpan, this.columnSpan];
  }

  /** Run `command` when `key` is pressed while this widget is focused. */
  addKeyCommand(key: string, command: KeyCommand): void {
    this.keyCommands.set(key, command);
  }

  removeKeyCommand(key: string): void {
    this.keyCommands.delete(key);
  }

  getKeyCommands(): ReadonlyMap<string, KeyCommand> {
    return this.keyCommands;
  }

  /** Whether the widget consumes `key` itself, so global cycling must leave it alone. */
  claimsKey(key: string): boolean {
    return this.keyCommands.has(key);
  }

  override handleKey(key: string): void {
    const command = this.keyCommands.get(key);
    if (command) {
      command();
      return;
    }
    this.onKey(key);
  }

  protected onKey(_key: string): void {}

  /** Whether grid cell `(row, column)` lies inside this widget's span. */
  coversCell(row: number, column: number): boolean {
    return (
      row >= this.row && row < this.row + this.rowSpan &&
      column >= this.column && column < this.column + this.columnSpan
    );
  }
}
