import { TAB_SPACES } from '../constants.js';

/**
 * Multi-line text editing state.
 *
 * The cursor addresses `(x, y)` = (character index in line, line index).
 * The visible window is `viewportWidth x viewportHeight`; its offsets only
 * move when the cursor would leave it. The cursor column may sit one past
 * the last visible character (`viewportX <= x <= viewportX + width`).
 */
export class TextBlockEditor {
  private lines: string[][];
  private cursorX = 0;
  private cursorY = 0;
  private viewportX = 0;
  private viewportY = 0;
  private viewportWidth: number;
  private viewportHeight: number;

  constructor(initialText = '', viewportWidth = 0, viewportHeight = 1) {
    this.lines = TextBlockEditor.split(initialText);
    this.viewportWidth = Math.max(0, viewportWidth);
    this.viewportHeight = Math.max(1, viewportHeight);
  }

  private static split(text: string): string[][] {
    return text.split('\n').map(line => Array.from(line));
  }

  get(): string {
    return this.getLines().join('\n');
  }

  getLines(): string[] {
    return this.lines.map(line => line.join(''));
  }

  setText(text: string): void {
    this.lines = TextBlockEditor.split(text);
    this.cursorY = Math.min(this.cursorY, this.lines.length - 1);
    this.cursorX = Math.min(this.cursorX, this.currentLine().length);
    this.scrollIntoView();
  }

  clear(): void {
    this.lines = [[]];
    this.cursorX = 0;
    this.cursorY = 0;
    this.viewportX = 0;
    this.viewportY = 0;
  }

  getCurrentLine(): string {
    return this.currentLine().join('');
  }

  setCurrentLine(text: string): void {
    this.lines[this.cursorY] = Array.from(text);
    this.cursorX = Math.min(this.cursorX, this.currentLine().length);
    this.scrollIntoView();
  }

  getCursor(): { x: number; y: number } {
    return { x: this.cursorX, y: this.cursorY };
  }

  setCursor(x: number, y: number): void {
    this.cursorY = Math.min(Math.max(0, y), this.lines.length - 1);
    this.cursorX = Math.min(Math.max(0, x), this.currentLine().length);
    this.scrollIntoView();
  }

  getViewportOffsets(): { x: number; y: number } {
    return { x: this.viewportX, y: this.viewportY };
  }

  setViewportSize(width: number, height: number): void {
    this.viewportWidth = Math.max(0, width);
    this.viewportHeight = Math.max(1, height);
    this.scrollIntoView();
  }

  /** Lines in the visible window, each cut to the visible columns. */
  getVisibleLines(): string[] {
    return this.lines
      .slice(this.viewportY, this.viewportY + this.viewportHeight)
      .map(line => line.slice(this.viewportX, this.viewportX + this.viewportWidth).join(''));
  }

  /** Cursor position relative to the visible window. */
  getCursorScreenOffset(): { x: number; y: number } {
    return { x: this.cursorX - this.viewportX, y: this.cursorY - this.viewportY };
  }

  moveLeft(): void {
    if (this.cursorX > 0) this.cursorX--;
    this.scrollIntoView();
  }

  moveRight(): void {
    if (this.cursorX < this.currentLine().length) this.cursorX++;
    this.scrollIntoView();
  }

  moveUp(): void {
    if (this.cursorY > 0) {
      this.cursorY--;
      this.cursorX = Math.min(this.cursorX, this.currentLine().length);
    }
    this.scrollIntoView();
  }

  moveDown(): void {
    if (this.cursorY < this.lines.length - 1) {
      this.cursorY++;
      this.cursorX = Math.min(this.cursorX, this.currentLine().length);
    }
    this.scrollIntoView();
  }

  home(): void {
    this.cursorX = 0;
    this.viewportX = 0;
  }

  end(): void {
    const length = this.currentLine().length;
    this.cursorX = length;
    this.viewportX = Math.max(0, length - this.viewportWidth);
  }

  /** Split the current line at the cursor. */
  newline(): void {
    const line = this.currentLine();
    const tail = line.splice(this.cursorX);
    this.lines.splice(this.cursorY + 1, 0, tail);
    this.cursorY++;
    this.cursorX = 0;
    this.viewportX = 0;
    this.scrollIntoView();
  }

  /** Backspace; at column 0 joins the current line onto the previous one. */
  backspace(): void {
    if (this.cursorX > 0) {
      this.currentLine().splice(this.cursorX - 1, 1);
      this.cursorX--;
    } else if (this.cursorY > 0) {
      const removed = this.lines.splice(this.cursorY, 1)[0];
      this.cursorY--;
      const previous = this.currentLine();
      this.cursorX = previous.length;
      previous.push(...removed);
    }
    this.scrollIntoView();
  }

  /** Delete; at the end of a line joins the next line onto it. */
  delete(): void {
    const line = this.currentLine();
    if (this.cursorX < line.length) {
      line.splice(this.cursorX, 1);
    } else if (this.cursorY < this.lines.length - 1) {
      const next = this.lines.splice(this.cursorY + 1, 1)[0];
      line.push(...next);
    }
    this.scrollIntoView();
  }

  insertChar(ch: string): void {
    const inserted = Array.from(ch);
    this.currentLine().splice(this.cursorX, 0, ...inserted);
    this.cursorX += inserted.length;
    this.scrollIntoView();
  }

  insertTab(): void {
    this.insertChar(' '.repeat(TAB_SPACES));
  }

  private currentLine(): string[] {
    return this.lines[this.cursorY];
  }

  private scrollIntoView(): void {
    if (this.cursorX < this.viewportX) {
      this.viewportX = this.cursorX;
    } else if (this.cursorX > this.viewportX + this.viewportWidth) {
      this.viewportX = this.cursorX - this.viewportWidth;
    }
    if (this.cursorY < this.viewportY) {
      this.viewportY = this.cursorY;
    } else if (this.cursorY >= this.viewportY + this.viewportHeight) {
      this.viewportY = this.cursorY - this.viewportHeight + 1;
    }
  }
}
