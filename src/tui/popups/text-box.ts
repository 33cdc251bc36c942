import {
  KEY_BACKSPACE,
  KEY_DELETE,
  KEY_END,
  KEY_ENTER,
  KEY_ESCAPE,
  KEY_HOME,
  KEY_LEFT,
  KEY_RIGHT,
} from '../constants.js';
import { TextEditor } from '../implementations/text-editor.js';
import { insertableChar } from '../keys.js';
import { Popup, type PopupHost, type PopupOptions } from './popup.js';

export type TextCommand = (text: string) => void;

/**
 * Single-line prompt. Enter submits the text, Escape discards it.
 */
export class TextBoxPopup extends Popup {
  readonly popupKind = 'text-box';
  private readonly editor: TextEditor;
  private readonly command: TextCommand | null;

  constructor(
    host: PopupHost,
    title: string,
    command: TextCommand | null,
    options: PopupOptions & { initialText?: string; password?: boolean } = {}
  ) {
    super(host, title, '', options);
    this.command = command;
    this.editor = new TextEditor(options.initialText ?? '', this.getViewportWidth(), options.password ?? false);
    this.helpText = 'Type text and press Enter to submit, Esc to cancel.';
  }

  protected override afterResize(): void {
    this.editor.setViewportWidth(this.getViewportWidth());
  }

  getEditor(): TextEditor {
    return this.editor;
  }

  protected override onKey(key: string): void {
    switch (key) {
      case KEY_ENTER:
        this.close();
        if (this.command) this.command(this.editor.get());
        else this.logger.warn(`Text box popup '${this.title}' has no command`);
        return;
      case KEY_ESCAPE:
        this.close();
        return;
      case KEY_LEFT: this.editor.moveLeft(); return;
      case KEY_RIGHT: this.editor.moveRight(); return;
      case KEY_HOME: this.editor.jumpToStart(); return;
      case KEY_END: this.editor.jumpToEnd(); return;
      case KEY_BACKSPACE: this.editor.eraseChar(); return;
      case KEY_DELETE: this.editor.deleteChar(); return;
    }
    const ch = insertableChar(key);
    if (ch !== null) this.editor.insertChar(ch);
  }

  protected drawPopup(): void {
    const renderer = this.requireRenderer();
    this.drawFrame();
    const y = this.startY + Math.floor(this.height / 2);
    renderer.drawText(this, this.editor.getVisibleText(), y);
    renderer.drawCursor(this.startX + this.padX + 2 + this.editor.getCursorColumn(), y);
  }
}
