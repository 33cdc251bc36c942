import { BLACK_ON_WHITE } from './colors.js';
import { fitText, type Renderer } from './renderer.js';

/**
 * One-row bar across the full terminal width. The controller keeps one for
 * the title (centered, top row) and one for help and status text (bottom row).
 */
export class StatusBar {
  private text: string;
  private color: number;
  private readonly centered: boolean;

  constructor(text: string, options: { color?: number; centered?: boolean } = {}) {
    this.text = text;
    this.color = options.color ?? BLACK_ON_WHITE;
    this.centered = options.centered ?? false;
  }

  getText(): string {
    return this.text;
  }

  setText(text: string): void {
    this.text = text;
  }

  getColor(): number {
    return this.color;
  }

  setColor(color: number): void {
    this.color = color;
  }

  /** Draw `text` (or the bar's own text) on `row`, leaving the last column blank. */
  draw(renderer: Renderer, row: number, width: number, text: string = this.text): void {
    if (width < 2) return;
    renderer.drawRaw(0, row, fitText(width, text, this.centered), { color: this.color });
  }
}
