import { applyColorRules, type TextFragment } from './colors.js';
import { ASCII_BORDERS } from './constants.js';
import type { UIElement } from './element.js';
import type { TerminalBackend } from './backend/types.js';
import type { BorderChars, Rect, TextAttributes } from './types.js';

export interface BorderOptions {
  withTitle?: boolean;
  /** Blank the interior, for elements drawn over others */
  fill?: boolean;
}

export interface DrawTextOptions {
  centered?: boolean;
  bordered?: boolean;
  selected?: boolean;
  startPos?: number;
  bold?: boolean;
}

const length = (text: string): number => Array.from(text).length;

const slice = (text: string, start: number, end?: number): string =>
  Array.from(text).slice(start, end).join('');

export function centerText(text: string, width: number): string {
  const diff = width - length(text);
  if (diff <= 0) return slice(text, 0, width);
  const left = Math.floor(diff / 2);
  return ' '.repeat(left) + text + ' '.repeat(diff - left);
}

/**
 * Fit text into a bar of `width` columns, leaving the final column free.
 * Long text is cut and marked with `...`.
 */
export function fitText(width: number, text: string, center = false): string {
  const size = length(text);
  if (size >= width - 1) {
    return slice(text, 0, Math.max(0, width - 5)) + '...';
  }
  const diff = width - 1 - size;
  if (!center) return text + ' '.repeat(diff);
  const left = Math.floor(diff / 2);
  return ' '.repeat(left) + text + ' '.repeat(diff - left);
}

/**
 * Text to draw for one line in `width` columns: padded (or centered) when
 * short, otherwise the `width` characters starting at `startPos`.
 */
export function getRenderText(line: string, width: number, centered = false, startPos = 0): string {
  if (width <= 0) return '';
  const rest = slice(line, startPos);
  const diff = width - length(rest);
  if (diff > 0) {
    return centered ? centerText(rest, width) : rest + ' '.repeat(diff);
  }
  return slice(rest, 0, width);
}

/**
 * Draws elements onto a terminal backend: borders, text lines with color
 * rules applied, and the text cursor.
 */
export class Renderer {
  private borders: BorderChars;

  constructor(private readonly backend: TerminalBackend, borders: BorderChars = ASCII_BORDERS) {
    this.borders = borders;
  }

  getBackend(): TerminalBackend {
    return this.backend;
  }

  getBorderChars(): BorderChars {
    return this.borders;
  }

  setBorderChars(borders: BorderChars): void {
    this.borders = borders;
  }

  /** Rectangle inside the element's padding. */
  borderRect(element: UIElement): Rect {
    const start = element.getStartPosition();
    const { height, width } = element.getAbsoluteDimensions();
    const { padX, padY } = element.getPadding();
    return {
      x: start.x + padX,
      y: start.y + padY,
      width: width - 2 * padX,
      height: height - 2 * padY,
    };
  }

  drawBorder(element: UIElement, options: BorderOptions = {}): void {
    const rect = this.borderRect(element);
    if (options.fill && rect.width > 2) {
      const blank = ' '.repeat(rect.width - 2);
      for (let y = rect.y + 1; y < rect.y + rect.height - 1; y++) {
        this.backend.drawText(rect.x + 1, y, blank, { color: element.getColor() });
      }
    }
    this.drawBox(rect, this.borderAttributes(element), options.withTitle === false ? '' : element.getTitle());
  }

  borderAttributes(element: UIElement): TextAttributes {
    return {
      color: element.isSelected() ? element.getFocusBorderColor() : element.getBorderColor(),
      bold: element.isSelected() || element.isHovered(),
    };
  }

  /** Box with an optional title set into the top edge. */
  drawBox(rect: Rect, attrs: TextAttributes, title = ''): void {
    if (rect.width < 2 || rect.height < 2) return;
    this.backend.drawBorder(rect, this.borders, attrs);
    if (title && rect.width > 6) {
      const shown = slice(title, 0, rect.width - 6);
      this.backend.drawText(rect.x + 2, rect.y, ` ${shown} `, attrs);
    }
  }

  /** Draw one line of text inside the element at absolute row `y`. */
  drawText(element: UIElement, line: string, y: number, options: DrawTextOptions = {}): void {
    const bordered = options.bordered ?? true;
    const start = element.getStartPosition();
    const { width } = element.getAbsoluteDimensions();
    const { padX } = element.getPadding();
    const available = width - 2 * padX - (bordered ? 4 : 0);
    const x = start.x + padX + (bordered ? 2 : 0);
    const renderText = getRenderText(line, available, options.centered, options.startPos ?? 0);
    const baseColor = options.selected ? element.getSelectedColor() : element.getColor();
    const fragments = applyColorRules(element.getColorRules(), line, renderText, baseColor);
    this.drawFragments(x, y, fragments, options.bold ?? false);
  }

  drawFragments(x: number, y: number, fragments: readonly TextFragment[], bold = false): void {
    let col = x;
    for (const fragment of fragments) {
      this.backend.drawText(col, y, fragment.text, { color: fragment.color, bold });
      col += length(fragment.text);
    }
  }

  drawRaw(x: number, y: number, text: string, attrs: TextAttributes): void {
    this.backend.drawText(x, y, text, attrs);
  }

  drawCursor(x: number, y: number): void {
    this.backend.moveCursor(x, y);
  }

  resetCursor(): void {
    this.backend.hideCursor();
  }
}
