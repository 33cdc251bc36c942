import type { ElementOptions } from '../element.js';
import type { Grid } from '../grid.js';
import { Widget } from './widget.js';

/**
 * Static text centered in its cell. Labels never take focus.
 */
export class Label extends Widget {
  readonly kind = 'label';
  private drawBorderEnabled = false;

  constructor(
    id: number,
    title: string,
    grid: Grid,
    row: number,
    column: number,
    rowSpan = 1,
    columnSpan = 1,
    options: ElementOptions = {}
  ) {
    super(id, title, grid, row, column, rowSpan, columnSpan, { ...options, selectable: false });
  }

  toggleBorder(): void {
    this.drawBorderEnabled = !this.drawBorderEnabled;
  }

  draw(): void {
    const renderer = this.requireRenderer();
    if (this.drawBorderEnabled) renderer.drawBorder(this, { withTitle: false });
    const y = this.startY + Math.floor(this.height / 2);
    renderer.drawText(this, this.title, y, { centered: true, bordered: this.drawBorderEnabled });
  }
}

/**
 * Multi-line static text (ASCII art and the like), vertically centered.
 * Lines come from splitting the title on newlines.
 */
export class BlockLabel extends Widget {
  readonly kind = 'block-label';
  private readonly lines: string[];
  private centered: boolean;
  private drawBorderEnabled = false;

  constructor(
    id: number,
    title: string,
    grid: Grid,
    row: number,
    column: number,
    rowSpan = 1,
    columnSpan = 1,
    options: ElementOptions & { center?: boolean } = {}
  ) {
    super(id, title, grid, row, column, rowSpan, columnSpan, { ...options, selectable: false });
    this.lines = title.split('\n');
    this.centered = options.center ?? true;
  }

  getLines(): readonly string[] {
    return this.lines;
  }

  toggleBorder(): void {
    this.drawBorderEnabled = !this.drawBorderEnabled;
  }

  setCentered(centered: boolean): void {
    this.centered = centered;
  }

  draw(): void {
    const renderer = this.requireRenderer();
    if (this.drawBorderEnabled) renderer.drawBorder(this, { withTitle: false });
    const inset = this.drawBorderEnabled ? this.padY + 1 : this.padY;
    const rows = this.height - 2 * inset;
    const shown = this.lines.slice(0, Math.max(0, rows));
    const top = this.startY + inset + Math.max(0, Math.floor((rows - shown.length) / 2));
    shown.forEach((line, offset) => {
      renderer.drawText(this, line, top + offset, {
        centered: this.centered,
        bordered: this.drawBorderEnabled,
      });
    });
  }
}
