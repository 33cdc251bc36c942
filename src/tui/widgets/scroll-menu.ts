import {
  KEY_DOWN,
  KEY_END,
  KEY_HOME,
  KEY_PAGE_DOWN,
  KEY_PAGE_UP,
  KEY_UP,
  PAGE_SCROLL_LENGTH,
  SCROLL_MENU_HELP_TEXT,
} from '../constants.js';
import type { ElementOptions } from '../element.js';
import type { Grid } from '../grid.js';
import { SelectableList } from '../implementations/selectable-list.js';
import type { MouseAction } from '../types.js';
import { Widget } from './widget.js';

export type ItemFormatter<T> = (item: T) => string;

export interface ScrollMenuOptions<T> extends ElementOptions {
  formatItem?: ItemFormatter<T>;
}

/**
 * Scrollable menu of items. Up/Down move the selection, PageUp/PageDown
 * jump by five, Home/End go to the ends.
 */
export class ScrollMenu<T = string> extends Widget {
  readonly kind: 'scroll-menu' | 'checkbox-menu' = 'scroll-menu';
  protected readonly list: SelectableList<T>;
  private formatItem: ItemFormatter<T>;
  private selectionChangeHandler: ((item: T | undefined) => void) | null = null;

  constructor(
    id: number,
    title: string,
    grid: Grid,
    row: number,
    column: number,
    rowSpan = 1,
    columnSpan = 1,
    options: ScrollMenuOptions<T> = {},
    list: SelectableList<T> = new SelectableList<T>()
  ) {
    super(id, title, grid, row, column, rowSpan, columnSpan, options);
    this.list = list;
    this.formatItem = options.formatItem ?? (item => String(item));
    this.helpText = SCROLL_MENU_HELP_TEXT;
  }

  // A shorter viewport must still show the selected item
  protected override afterResize(): void {
    this.list.setSelectedIndex(this.list.getSelectedIndex(), this.getViewportHeight());
  }

  setItemFormatter(formatItem: ItemFormatter<T>): void {
    this.formatItem = formatItem;
  }

  /** Called with the newly selected item whenever the selection moves. */
  setOnSelectionChange(handler: (item: T | undefined) => void): void {
    this.selectionChangeHandler = handler;
  }

  addItem(item: T): void { this.list.addItem(item); }
  addItemList(items: readonly T[]): void { this.list.addItemList(items); }
  clear(): void { this.list.clear(); }
  getItemList(): T[] { return this.list.getItemList(); }
  get(): T | undefined { return this.list.get(); }
  getSelectedItemIndex(): number { return this.list.getSelectedIndex(); }
  getTopViewIndex(): number { return this.list.getTopViewIndex(); }
  removeItem(item: T): boolean { return this.list.removeItem(item); }
  removeSelectedItem(): T | undefined { return this.list.removeSelectedItem(); }

  setSelectedItemIndex(index: number): void {
    this.trackSelection(() => this.list.setSelectedIndex(index, this.getViewportHeight()));
  }

  setSelectedItem(item: T): boolean {
    let found = false;
    this.trackSelection(() => {
      found = this.list.setSelectedItem(item, this.getViewportHeight());
    });
    return found;
  }

  protected label(item: T): string {
    return this.formatItem(item);
  }

  protected override onKey(key: string): void {
    const viewportHeight = this.getViewportHeight();
    this.trackSelection(() => {
      switch (key) {
        case KEY_UP:
          this.list.scrollUp();
          break;
        case KEY_DOWN:
          this.list.scrollDown(viewportHeight);
          break;
        case KEY_PAGE_UP:
          this.list.jumpUp(PAGE_SCROLL_LENGTH);
          break;
        case KEY_PAGE_DOWN:
          this.list.jumpDown(PAGE_SCROLL_LENGTH, viewportHeight);
          break;
        case KEY_HOME:
          this.list.jumpToTop();
          break;
        case KEY_END:
          this.list.jumpToBottom(viewportHeight);
          break;
      }
    });
  }

  /** Index of the item drawn at row `y`, if any. */
  protected itemIndexAt(y: number): number | undefined {
    const offset = y - (this.startY + this.padY + 1);
    if (offset < 0 || offset >= this.getViewportHeight()) return undefined;
    const index = this.list.getTopViewIndex() + offset;
    return index < this.list.length ? index : undefined;
  }

  override handleMouse(x: number, y: number, action: MouseAction): void {
    const viewportHeight = this.getViewportHeight();
    this.trackSelection(() => {
      if (action === 'scroll-up') {
        this.list.scrollUp();
      } else if (action === 'scroll-down') {
        this.list.scrollDown(viewportHeight);
      } else if (action === 'left-click' || action === 'left-double-click') {
        const index = this.itemIndexAt(y);
        if (index !== undefined) this.list.setSelectedIndex(index, viewportHeight);
      }
    });
    super.handleMouse(x, y, action);
  }

  protected trackSelection(change: () => void): void {
    const before = this.list.getSelectedIndex();
    const beforeLength = this.list.length;
    change();
    if (before !== this.list.getSelectedIndex() || beforeLength !== this.list.length) {
      this.selectionChangeHandler?.(this.list.get());
    }
  }

  draw(): void {
    const renderer = this.requireRenderer();
    renderer.drawBorder(this);
    const firstRow = this.startY + this.padY + 1;
    const selectedIndex = this.list.getSelectedIndex();
    for (const { index, item } of this.list.getVisibleItems(this.getViewportHeight())) {
      renderer.drawText(this, this.label(item), firstRow + index - this.list.getTopViewIndex(), {
        selected: index === selectedIndex,
        bold: index === selectedIndex && this.selected,
      });
    }
  }
}
