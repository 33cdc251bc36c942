import { InvalidValueError } from '../../errors.js';
import { KEY_LEFT, KEY_RIGHT, SLIDER_HELP_TEXT } from '../constants.js';
import type { ElementOptions } from '../element.js';
import type { Grid } from '../grid.js';
import { SliderModel } from '../implementations/slider.js';
import type { Alignment } from '../types.js';
import { Widget } from './widget.js';

export interface SliderOptions extends ElementOptions {
  min?: number;
  max?: number;
  step?: number;
  initial?: number;
}

/**
 * Horizontal slider over a bounded value. Left/Right move one step.
 */
export class SliderWidget extends Widget {
  readonly kind = 'slider';
  private readonly model: SliderModel;
  private titleEnabled = true;
  private borderEnabled = true;
  private displayValue = true;
  private alignment: Alignment = 'middle';
  private barChar = '#';

  constructor(
    id: number,
    title: string,
    grid: Grid,
    row: number,
    column: number,
    rowSpan = 1,
    columnSpan = 1,
    options: SliderOptions = {}
  ) {
    super(id, title, grid, row, column, rowSpan, columnSpan, options);
    this.model = new SliderModel(options.min ?? 0, options.max ?? 100, options.step ?? 1, options.initial ?? options.min ?? 0);
    this.helpText = SLIDER_HELP_TEXT;
  }

  getSliderValue(): number {
    return this.model.getValue();
  }

  updateSliderValue(offset: number): number {
    return this.model.update(offset);
  }

  setSliderStep(step: number): void {
    this.model.setStep(step);
  }

  getModel(): SliderModel {
    return this.model;
  }

  setBarChar(ch: string): void {
    if (Array.from(ch).length !== 1) {
      throw new InvalidValueError(`Bar character must be a single character, got '${ch}'`);
    }
    this.barChar = ch;
  }

  toggleTitle(): void { this.titleEnabled = !this.titleEnabled; }
  toggleBorder(): void { this.borderEnabled = !this.borderEnabled; }
  toggleValue(): void { this.displayValue = !this.displayValue; }
  alignToTop(): void { this.alignment = 'top'; }
  alignToMiddle(): void { this.alignment = 'middle'; }
  alignToBottom(): void { this.alignment = 'bottom'; }

  protected override onKey(key: string): void {
    if (key === KEY_LEFT) this.model.update(-1);
    else if (key === KEY_RIGHT) this.model.update(1);
  }

  /** Bar text for `width` columns: filled share of the range, then the value. */
  generateBar(width: number): string {
    const value = this.model.getValue();
    const suffix = this.displayValue ? ` ${value}` : '';
    const barWidth = Math.max(0, width - suffix.length);
    const range = this.model.getMax() - this.model.getMin();
    const ratio = range === 0 ? 1 : (value - this.model.getMin()) / range;
    return this.barChar.repeat(Math.round(ratio * barWidth)) + suffix;
  }

  draw(): void {
    const renderer = this.requireRenderer();
    const titleRow = this.titleEnabled && !this.borderEnabled ? 1 : 0;
    const visualHeight = (this.borderEnabled ? 3 : 1) + titleRow;
    const inner = this.height - 2 * this.padY;
    let top = this.startY + this.padY;
    if (this.alignment === 'middle') top += Math.max(0, Math.floor((inner - visualHeight) / 2));
    else if (this.alignment === 'bottom') top += Math.max(0, inner - visualHeight);

    if (titleRow) {
      renderer.drawText(this, this.title, top, { bordered: false });
    }
    const barRow = top + titleRow + (this.borderEnabled ? 1 : 0);
    if (this.borderEnabled) {
      renderer.drawBox(
        { x: this.startX + this.padX, y: top, width: this.width - 2 * this.padX, height: 3 },
        renderer.borderAttributes(this),
        this.titleEnabled ? this.title : ''
      );
    }
    const available = this.width - 2 * this.padX - (this.borderEnabled ? 4 : 0);
    renderer.drawText(this, this.generateBar(available), barRow, { bordered: this.borderEnabled });
  }
}
