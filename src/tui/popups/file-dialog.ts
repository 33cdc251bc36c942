import * as path from 'path';
import {
  FILE_DIALOG_HELP_TEXT,
  KEY_BACKSPACE,
  KEY_DELETE,
  KEY_DOWN,
  KEY_END,
  KEY_ENTER,
  KEY_ESCAPE,
  KEY_HOME,
  KEY_LEFT,
  KEY_PAGE_DOWN,
  KEY_PAGE_UP,
  KEY_RIGHT,
  KEY_SHIFT_TAB,
  KEY_TAB,
  KEY_UP,
  PAGE_SCROLL_LENGTH,
} from '../constants.js';
import { UIElement } from '../element.js';
import {
  FileSelectModel,
  type FileActionResult,
  type FileDialogType,
  type FileSelectOptions,
} from '../implementations/file-select.js';
import { TextEditor } from '../implementations/text-editor.js';
import { insertableChar } from '../keys.js';
import type { Renderer } from '../renderer.js';
import type { MouseAction, Point } from '../types.js';
import { Popup, type PopupHost, type PopupOptions } from './popup.js';

export type FileDialogCommand = (selectedPath: string) => void;

const DIALOG_TITLES: Record<FileDialogType, string> = {
  openfile: 'Open File',
  opendir: 'Open Directory',
  saveas: 'Save As',
};

const INPUT_TITLES: Record<FileDialogType, string> = {
  openfile: 'New File',
  opendir: 'New Dir',
  saveas: 'New Name',
};

type ItemSlot = 'list' | 'input' | 'ok' | 'cancel';

const SLOTS: readonly ItemSlot[] = ['list', 'input', 'ok', 'cancel'];

/**
 * Sub-element of the file dialog laid out relative to it: the directory
 * listing, the name input, and the two buttons.
 */
export class FileDialogItem extends UIElement {
  readonly kind = 'dialog-item';

  constructor(
    private readonly dialog: FileDialogPopup,
    readonly slot: ItemSlot,
    title: string
  ) {
    super(SLOTS.indexOf(slot), title, { padX: 0, padY: 0 });
    this.applyGeometry();
  }

  protected computeStartPosition(): Point {
    return this.rect().start;
  }

  protected computeStopPosition(): Point {
    return this.rect().stop;
  }

  private rect(): { start: Point; stop: Point } {
    const start = this.dialog.getStartPosition();
    const stop = this.dialog.getStopPosition();
    const left = start.x + 2;
    const right = stop.x - 2;
    const middle = left + Math.floor((right - left) / 2);
    switch (this.slot) {
      case 'list':
        return { start: { x: left, y: start.y + 1 }, stop: { x: right, y: Math.max(start.y + 3, stop.y - 7) } };
      case 'input':
        return { start: { x: left, y: stop.y - 7 }, stop: { x: right, y: stop.y - 4 } };
      case 'ok':
        return { start: { x: left, y: stop.y - 4 }, stop: { x: middle, y: stop.y - 1 } };
      case 'cancel':
        return { start: { x: middle, y: stop.y - 4 }, stop: { x: right, y: stop.y - 1 } };
    }
  }

  draw(): void {
    this.dialog.drawItem(this);
  }
}

export interface FileDialogOptions extends PopupOptions, Omit<FileSelectOptions, 'dialogType'> {}

/**
 * File and directory picker. Tab cycles between the listing, the name input
 * and the OK/Cancel buttons. Invalid choices open a warning over the dialog.
 */
export class FileDialogPopup extends Popup {
  readonly popupKind = 'file-dialog';
  readonly dialogType: FileDialogType;
  private readonly model: FileSelectModel;
  private readonly input = new TextEditor();
  private readonly items: FileDialogItem[];
  private focusIndex = 0;
  private readonly command: FileDialogCommand | null;

  constructor(
    host: PopupHost,
    initialDir: string,
    dialogType: FileDialogType,
    command: FileDialogCommand | null,
    options: FileDialogOptions = {}
  ) {
    super(host, DIALOG_TITLES[dialogType], '', options);
    this.dialogType = dialogType;
    this.command = command;
    this.model = new FileSelectModel(initialDir, {
      ...options,
      dialogType,
      debugLog: options.debugLog ?? (message => this.logger.debug(message)),
    });
    this.items = [
      new FileDialogItem(this, 'list', this.model.getCurrentDir()),
      new FileDialogItem(this, 'input', INPUT_TITLES[dialogType]),
      new FileDialogItem(this, 'ok', 'OK'),
      new FileDialogItem(this, 'cancel', 'Cancel'),
    ];
    this.helpText = FILE_DIALOG_HELP_TEXT;
    this.afterResize();
    this.syncFocus();
  }

  protected override computeStartPosition(): Point {
    const { rows, cols } = this.host.getScreenSize();
    return { x: Math.floor(cols / 8), y: Math.floor(rows / 9) };
  }

  protected override computeStopPosition(): Point {
    const { rows, cols } = this.host.getScreenSize();
    return { x: Math.floor((7 * cols) / 8), y: Math.floor((8.75 * rows) / 9) };
  }

  protected override afterResize(): void {
    for (const item of this.items) item.updateDimensions();
    this.input.setViewportWidth(this.items[1].getViewportWidth());
    const list = this.model.list;
    list.setSelectedIndex(list.getSelectedIndex(), this.items[0].getViewportHeight());
  }

  override setRenderer(renderer: Renderer): void {
    super.setRenderer(renderer);
    for (const item of this.items) item.setRenderer(renderer);
  }

  getModel(): FileSelectModel {
    return this.model;
  }

  getInput(): TextEditor {
    return this.input;
  }

  getFocusedSlot(): ItemSlot {
    return SLOTS[this.focusIndex];
  }

  private syncFocus(): void {
    this.items.forEach((item, index) => item.setSelected(index === this.focusIndex));
    this.items[0].setTitle(this.model.getCurrentDir());
  }

  private report(result: FileActionResult): result is Extract<FileActionResult, { ok: true }> {
    if (!result.ok) this.showWarning(result.title, result.message);
    return result.ok;
  }

  /** Path the OK button would return for the current state. */
  private outputCandidate(): string | undefined {
    switch (this.dialogType) {
      case 'saveas':
        return this.input.get() || undefined;
      case 'opendir': {
        const selected = this.model.getSelected();
        return selected && selected.isDir && selected.name !== '..' ? selected.path : this.model.getCurrentDir();
      }
      case 'openfile': {
        const selected = this.model.getSelected();
        return selected && !selected.isDir ? selected.path : undefined;
      }
    }
  }

  submit(candidate = this.outputCandidate()): void {
    const result = this.model.validateOutput(candidate);
    if (!this.report(result)) return;
    this.close();
    if (this.command) this.command(result.path);
    else this.logger.warn(`File dialog '${this.title}' has no command`);
  }

  private openSelected(): void {
    const selected = this.model.getSelected();
    if (!selected) return;
    if (selected.isDir) {
      this.report(this.model.changeDirectory(selected.path));
      this.syncFocus();
      return;
    }
    if (this.dialogType === 'saveas') {
      this.input.setText(selected.name);
      this.input.jumpToEnd();
      return;
    }
    this.submit(selected.path);
  }

  private inputEntered(): void {
    const name = this.input.get();
    if (this.dialogType === 'saveas') {
      this.submit(name ? path.resolve(this.model.getCurrentDir(), name) : undefined);
      return;
    }
    const result = this.dialogType === 'opendir' ? this.model.createDirectory(name) : this.model.createFile(name);
    if (this.report(result)) this.input.clear();
  }

  protected override onKey(key: string): void {
    if (key === KEY_ESCAPE) {
      this.close();
      return;
    }
    if (key === KEY_TAB || key === KEY_SHIFT_TAB) {
      const step = key === KEY_TAB ? 1 : SLOTS.length - 1;
      this.focusIndex = (this.focusIndex + step) % SLOTS.length;
      this.syncFocus();
      return;
    }
    switch (this.getFocusedSlot()) {
      case 'list':
        this.listKey(key);
        return;
      case 'input':
        this.inputKey(key);
        return;
      case 'ok':
        if (key === KEY_ENTER) this.submit();
        return;
      case 'cancel':
        if (key === KEY_ENTER) this.close();
        return;
    }
  }

  private listKey(key: string): void {
    const list = this.model.list;
    const viewportHeight = this.items[0].getViewportHeight();
    switch (key) {
      case KEY_UP: list.scrollUp(); return;
      case KEY_DOWN: list.scrollDown(viewportHeight); return;
      case KEY_PAGE_UP: list.jumpUp(PAGE_SCROLL_LENGTH); return;
      case KEY_PAGE_DOWN: list.jumpDown(PAGE_SCROLL_LENGTH, viewportHeight); return;
      case KEY_HOME: list.jumpToTop(); return;
      case KEY_END: list.jumpToBottom(viewportHeight); return;
      case KEY_ENTER: this.openSelected(); return;
    }
  }

  private inputKey(key: string): void {
    switch (key) {
      case KEY_ENTER: this.inputEntered(); return;
      case KEY_LEFT: this.input.moveLeft(); return;
      case KEY_RIGHT: this.input.moveRight(); return;
      case KEY_HOME: this.input.jumpToStart(); return;
      case KEY_END: this.input.jumpToEnd(); return;
      case KEY_BACKSPACE: this.input.eraseChar(); return;
      case KEY_DELETE: this.input.deleteChar(); return;
    }
    const ch = insertableChar(key);
    if (ch !== null) this.input.insertChar(ch);
  }

  protected override onMouse(x: number, y: number, action: MouseAction): void {
    const index = this.items.findIndex(item => item.containsPosition(x, y));
    if (index < 0) return;
    this.focusIndex = index;
    this.syncFocus();
    const slot = SLOTS[index];
    if (slot === 'list') {
      const list = this.model.list;
      const viewportHeight = this.items[0].getViewportHeight();
      if (action === 'scroll-up') list.scrollUp();
      else if (action === 'scroll-down') list.scrollDown(viewportHeight);
      else {
        const offset = y - (this.items[0].getStartPosition().y + 1);
        const target = list.getTopViewIndex() + offset;
        if (offset >= 0 && offset < viewportHeight && target < list.length) {
          list.setSelectedIndex(target, viewportHeight);
          if (action === 'left-double-click') this.openSelected();
        }
      }
    } else if (action === 'left-click' && slot === 'ok') {
      this.submit();
    } else if (action === 'left-click' && slot === 'cancel') {
      this.close();
    }
  }

  /** Paint one sub-element; called from `FileDialogItem.draw`. */
  drawItem(item: FileDialogItem): void {
    const renderer = this.requireRenderer();
    const firstRow = item.getStartPosition().y + 1;
    switch (item.slot) {
      case 'list': {
        renderer.drawBorder(item);
        const list = this.model.list;
        const top = list.getTopViewIndex();
        for (const { index, item: entry } of list.getVisibleItems(item.getViewportHeight())) {
          renderer.drawText(item, this.model.label(entry), firstRow + index - top, {
            selected: index === list.getSelectedIndex(),
          });
        }
        return;
      }
      case 'input':
        renderer.drawBorder(item);
        renderer.drawText(item, this.input.getVisibleText(), firstRow);
        if (item.isSelected()) {
          renderer.drawCursor(item.getStartPosition().x + 2 + this.input.getCursorColumn(), firstRow);
        }
        return;
      case 'ok':
      case 'cancel':
        renderer.drawBorder(item, { withTitle: false });
        renderer.drawText(item, item.getTitle(), firstRow, { centered: true, selected: item.isSelected() });
        return;
    }
  }

  protected drawPopup(): void {
    this.drawFrame();
    for (const item of this.items) item.draw();
  }
}
