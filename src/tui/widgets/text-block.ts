import {
  KEY_BACKSPACE,
  KEY_DELETE,
  KEY_DOWN,
  KEY_END,
  KEY_ENTER,
  KEY_HOME,
  KEY_LEFT,
  KEY_RIGHT,
  KEY_TAB,
  KEY_UP,
  TEXT_BLOCK_HELP_TEXT,
} from '../constants.js';
import type { ElementOptions } from '../element.js';
import type { Grid } from '../grid.js';
import { TextBlockEditor } from '../implementations/text-block-editor.js';
import { insertableChar } from '../keys.js';
import { Widget } from './widget.js';

export interface TextBlockOptions extends ElementOptions {
  initialText?: string;
}

/**
 * Multi-line text editor. Tab inserts spaces, so the widget keeps the Tab
 * key while focused.
 */
export class ScrollTextBlock extends Widget {
  readonly kind = 'text-block';
  private readonly editor: TextBlockEditor;

  constructor(
    id: number,
    title: string,
    grid: Grid,
    row: number,
    column: number,
    rowSpan = 1,
    columnSpan = 1,
    options: TextBlockOptions = {}
  ) {
    super(id, title, grid, row, column, rowSpan, columnSpan, options);
    this.editor = new TextBlockEditor(options.initialText ?? '');
    this.helpText = TEXT_BLOCK_HELP_TEXT;
    this.afterResize();
  }

  protected override afterResize(): void {
    this.editor.setViewportSize(this.getViewportWidth(), this.getViewportHeight());
  }

  getEditor(): TextBlockEditor {
    return this.editor;
  }

  get(): string {
    return this.editor.get();
  }

  setText(text: string): void {
    this.editor.setText(text);
  }

  clear(): void {
    this.editor.clear();
  }

  override claimsKey(key: string): boolean {
    return key === KEY_TAB || super.claimsKey(key);
  }

  protected override onKey(key: string): void {
    switch (key) {
      case KEY_LEFT: this.editor.moveLeft(); return;
      case KEY_RIGHT: this.editor.moveRight(); return;
      case KEY_UP: this.editor.moveUp(); return;
      case KEY_DOWN: this.editor.moveDown(); return;
      case KEY_HOME: this.editor.home(); return;
      case KEY_END: this.editor.end(); return;
      case KEY_ENTER: this.editor.newline(); return;
      case KEY_BACKSPACE: this.editor.backspace(); return;
      case KEY_DELETE: this.editor.delete(); return;
      case KEY_TAB: this.editor.insertTab(); return;
    }
    const ch = insertableChar(key);
    if (ch !== null) this.editor.insertChar(ch);
  }

  draw(): void {
    const renderer = this.requireRenderer();
    renderer.drawBorder(this);
    const firstRow = this.startY + this.padY + 1;
    this.editor.getVisibleLines().forEach((line, offset) => {
      renderer.drawText(this, line, firstRow + offset);
    });
    if (this.selected) {
      const cursor = this.editor.getCursorScreenOffset();
      renderer.drawCursor(this.startX + this.padX + 2 + cursor.x, firstRow + cursor.y);
    }
  }
}
