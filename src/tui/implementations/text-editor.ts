/**
 * Single-line text editing state.
 *
 * `cursor` is an index into the text, `0 <= cursor <= text length`. The
 * visible window is `viewportWidth` columns wide; once the cursor passes the
 * window's right edge the text scrolls and the cursor stays pinned at the
 * edge (`viewportOffset = cursor - viewportWidth`).
 */
export class TextEditor {
  private chars: string[];
  private cursor: number;
  private viewportWidth: number;
  private password: boolean;

  constructor(initialText = '', viewportWidth = 0, password = false) {
    this.chars = Array.from(initialText);
    this.cursor = this.chars.length;
    this.viewportWidth = Math.max(0, viewportWidth);
    this.password = password;
  }

  get(): string {
    return this.chars.join('');
  }

  setText(text: string): void {
    this.chars = Array.from(text);
    if (this.cursor > this.chars.length) this.cursor = this.chars.length;
  }

  clear(): void {
    this.chars = [];
    this.cursor = 0;
  }

  isPassword(): boolean {
    return this.password;
  }

  setPassword(password: boolean): void {
    this.password = password;
  }

  getCursorIndex(): number {
    return this.cursor;
  }

  setCursorIndex(index: number): void {
    this.cursor = Math.min(Math.max(0, index), this.chars.length);
  }

  getViewportWidth(): number {
    return this.viewportWidth;
  }

  setViewportWidth(width: number): void {
    this.viewportWidth = Math.max(0, width);
  }

  /** Index of the first visible character. */
  getViewportOffset(): number {
    return Math.max(0, this.cursor - this.viewportWidth);
  }

  /** Cursor column relative to the start of the visible window, at most `viewportWidth`. */
  getCursorColumn(): number {
    return this.cursor - this.getViewportOffset();
  }

  /** Visible slice of the text, masked in password mode. */
  getVisibleText(): string {
    const offset = this.getViewportOffset();
    const visible = this.chars.slice(offset, offset + this.viewportWidth);
    return this.password ? '*'.repeat(visible.length) : visible.join('');
  }

  insertChar(ch: string): void {
    const inserted = Array.from(ch);
    this.chars.splice(this.cursor, 0, ...inserted);
    this.cursor += inserted.length;
  }

  /** Backspace: remove the character left of the cursor. */
  eraseChar(): void {
    if (this.cursor === 0) return;
    this.chars.splice(this.cursor - 1, 1);
    this.cursor--;
  }

  /** Delete: remove the character under the cursor. */
  deleteChar(): void {
    if (this.cursor >= this.chars.length) return;
    this.chars.splice(this.cursor, 1);
  }

  moveLeft(): void {
    if (this.cursor > 0) this.cursor--;
  }

  moveRight(): void {
    if (this.cursor < this.chars.length) this.cursor++;
  }

  jumpToStart(): void {
    this.cursor = 0;
  }

  jumpToEnd(): void {
    this.cursor = this.chars.length;
  }
}
