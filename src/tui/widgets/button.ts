import { KEY_ENTER } from '../constants.js';
import type { ElementOptions } from '../element.js';
import type { Grid } from '../grid.js';
import type { MouseAction } from '../types.js';
import { Widget } from './widget.js';

export type ButtonCommand = () => void;

/**
 * Push button. The controller presses buttons directly when they are entered
 * from overview mode or clicked, without giving them focus.
 */
export class Button extends Widget {
  readonly kind = 'button';
  private command: ButtonCommand | null;

  constructor(
    id: number,
    title: string,
    grid: Grid,
    row: number,
    column: number,
    rowSpan = 1,
    columnSpan = 1,
    options: ElementOptions = {},
    command: ButtonCommand | null = null
  ) {
    super(id, title, grid, row, column, rowSpan, columnSpan, options);
    this.command = command;
    this.helpText = 'Focus mode on Button. Press Enter to press button.';
    this.afterResize();
  }

  protected override afterResize(): void {
    this.padY = Math.max(0, Math.floor((this.height - 3) / 2));
  }

  getCommand(): ButtonCommand | null {
    return this.command;
  }

  setCommand(command: ButtonCommand | null): void {
    this.command = command;
  }

  press(): void {
    this.command?.();
  }

  override activate(): void {
    this.press();
  }

  protected override onKey(key: string): void {
    if (key === KEY_ENTER) this.press();
  }

  override handleMouse(x: number, y: number, action: MouseAction): void {
    super.handleMouse(x, y, action);
    if (action === 'left-click') this.press();
  }

  draw(): void {
    const renderer = this.requireRenderer();
    renderer.drawBorder(this, { withTitle: false });
    const y = this.startY + this.padY + 1;
    renderer.drawText(this, this.title, y, { centered: true, selected: this.selected });
  }
}
