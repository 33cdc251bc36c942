import {
  KEY_DOWN,
  KEY_END,
  KEY_ENTER,
  KEY_ESCAPE,
  KEY_HOME,
  KEY_PAGE_DOWN,
  KEY_PAGE_UP,
  KEY_UP,
  PAGE_SCROLL_LENGTH,
} from '../constants.js';
import { SelectableList } from '../implementations/selectable-list.js';
import type { MouseAction } from '../types.js';
import { Popup, type PopupHost, type PopupOptions } from './popup.js';

export type MenuCommand<T> = (item: T | undefined) => void;

export interface MenuPopupOptions<T> extends PopupOptions {
  formatItem?: (item: T) => string;
  /** Call the command with undefined when Enter is pressed on an empty menu */
  runCommandIfNone?: boolean;
}

/**
 * Pick one item from a list. Enter submits the selection, Escape cancels.
 */
export class MenuPopup<T = string> extends Popup {
  readonly popupKind = 'menu';
  private readonly list: SelectableList<T>;
  private readonly command: MenuCommand<T> | null;
  private readonly formatItem: (item: T) => string;
  private readonly runCommandIfNone: boolean;

  constructor(
    host: PopupHost,
    items: readonly T[],
    title: string,
    command: MenuCommand<T> | null,
    options: MenuPopupOptions<T> = {}
  ) {
    super(host, title, '', options);
    this.list = new SelectableList(items);
    this.command = command;
    this.formatItem = options.formatItem ?? (item => String(item));
    this.runCommandIfNone = options.runCommandIfNone ?? false;
    this.helpText = 'Use Up/Down to select, Enter to choose, Esc to cancel.';
  }

  protected override afterResize(): void {
    this.list.setSelectedIndex(this.list.getSelectedIndex(), this.getViewportHeight());
  }

  getList(): SelectableList<T> {
    return this.list;
  }

  private submit(): void {
    const item = this.list.get();
    this.close();
    if (item === undefined && !this.runCommandIfNone) return;
    if (this.command) this.command(item);
    else this.logger.warn(`Menu popup '${this.title}' has no command`);
  }

  protected override onKey(key: string): void {
    const viewportHeight = this.getViewportHeight();
    switch (key) {
      case KEY_ENTER: this.submit(); break;
      case KEY_ESCAPE: this.close(); break;
      case KEY_UP: this.list.scrollUp(); break;
      case KEY_DOWN: this.list.scrollDown(viewportHeight); break;
      case KEY_PAGE_UP: this.list.jumpUp(PAGE_SCROLL_LENGTH); break;
      case KEY_PAGE_DOWN: this.list.jumpDown(PAGE_SCROLL_LENGTH, viewportHeight); break;
      case KEY_HOME: this.list.jumpToTop(); break;
      case KEY_END: this.list.jumpToBottom(viewportHeight); break;
    }
  }

  protected override onMouse(_x: number, y: number, action: MouseAction): void {
    const viewportHeight = this.getViewportHeight();
    if (action === 'scroll-up') {
      this.list.scrollUp();
      return;
    }
    if (action === 'scroll-down') {
      this.list.scrollDown(viewportHeight);
      return;
    }
    const offset = y - (this.startY + this.padY + 1);
    const index = this.list.getTopViewIndex() + offset;
    if (offset < 0 || offset >= viewportHeight || index >= this.list.length) return;
    this.list.setSelectedIndex(index, viewportHeight);
    if (action === 'left-double-click') this.submit();
  }

  protected drawPopup(): void {
    const renderer = this.requireRenderer();
    this.drawFrame();
    const firstRow = this.startY + this.padY + 1;
    const top = this.list.getTopViewIndex();
    for (const { index, item } of this.list.getVisibleItems(this.getViewportHeight())) {
      renderer.drawText(this, this.formatItem(item), firstRow + index - top, {
        selected: index === this.list.getSelectedIndex(),
      });
    }
  }
}
