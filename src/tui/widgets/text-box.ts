import {
  KEY_BACKSPACE,
  KEY_DELETE,
  KEY_END,
  KEY_HOME,
  KEY_LEFT,
  KEY_RIGHT,
  TEXT_BOX_HELP_TEXT,
} from '../constants.js';
import type { ElementOptions } from '../element.js';
import type { Grid } from '../grid.js';
import { TextEditor } from '../implementations/text-editor.js';
import { insertableChar } from '../keys.js';
import { Widget } from './widget.js';

export interface TextBoxOptions extends ElementOptions {
  initialText?: string;
  password?: boolean;
}

/**
 * Single-line text input drawn as a three-row box centered in its cell.
 */
export class TextBox extends Widget {
  readonly kind = 'text-box';
  private readonly editor: TextEditor;

  constructor(
    id: number,
    title: string,
    grid: Grid,
    row: number,
    column: number,
    rowSpan = 1,
    columnSpan = 1,
    options: TextBoxOptions = {}
  ) {
    super(id, title, grid, row, column, rowSpan, columnSpan, options);
    this.editor = new TextEditor(options.initialText ?? '', 0, options.password ?? false);
    this.helpText = TEXT_BOX_HELP_TEXT;
    this.afterResize();
  }

  protected override afterResize(): void {
    this.padY = Math.max(0, Math.floor((this.height - 3) / 2));
    this.editor.setViewportWidth(this.getViewportWidth());
  }

  getEditor(): TextEditor {
    return this.editor;
  }

  getText(): string {
    return this.editor.get();
  }

  setText(text: string): void {
    this.editor.setText(text);
  }

  clear(): void {
    this.editor.clear();
  }

  protected override onKey(key: string): void {
    switch (key) {
      case KEY_LEFT:
        this.editor.moveLeft();
        return;
      case KEY_RIGHT:
        this.editor.moveRight();
        return;
      case KEY_HOME:
        this.editor.jumpToStart();
        return;
      case KEY_END:
        this.editor.jumpToEnd();
        return;
      case KEY_BACKSPACE:
        this.editor.eraseChar();
        return;
      case KEY_DELETE:
        this.editor.deleteChar();
        return;
    }
    const ch = insertableChar(key);
    if (ch !== null) this.editor.insertChar(ch);
  }

  draw(): void {
    const renderer = this.requireRenderer();
    renderer.drawBorder(this);
    const y = this.startY + this.padY + 1;
    renderer.drawText(this, this.editor.getVisibleText(), y);
    if (this.selected) {
      renderer.drawCursor(this.startX + this.padX + 2 + this.editor.getCursorColumn(), y);
    }
  }
}
