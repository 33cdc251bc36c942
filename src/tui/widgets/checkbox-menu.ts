import { CHECKBOX_MENU_HELP_TEXT, KEY_ENTER } from '../constants.js';
import type { Grid } from '../grid.js';
import { CheckboxList } from '../implementations/checkbox-list.js';
import type { MouseAction } from '../types.js';
import { ScrollMenu, type ScrollMenuOptions } from './scroll-menu.js';

export interface CheckboxMenuOptions<T> extends ScrollMenuOptions<T> {
  checkedChar?: string;
}

/**
 * Scroll menu where Enter (or a click) toggles a check mark on the selected item.
 */
export class CheckboxMenu<T = string> extends ScrollMenu<T> {
  override readonly kind = 'checkbox-menu';
  private readonly checkboxes: CheckboxList<T>;
  private readonly checkedChar: string;
  private toggleHandler: ((item: T, checked: boolean) => void) | null = null;

  constructor(
    id: number,
    title: string,
    grid: Grid,
    row: number,
    column: number,
    rowSpan = 1,
    columnSpan = 1,
    options: CheckboxMenuOptions<T> = {}
  ) {
    const checkboxes = new CheckboxList<T>();
    super(id, title, grid, row, column, rowSpan, columnSpan, options, checkboxes);
    this.checkboxes = checkboxes;
    this.checkedChar = options.checkedChar ?? 'X';
    this.helpText = CHECKBOX_MENU_HELP_TEXT;
  }

  setOnToggle(handler: (item: T, checked: boolean) => void): void {
    this.toggleHandler = handler;
  }

  getChecked(): T[] {
    return this.checkboxes.getChecked();
  }

  isChecked(item: T): boolean {
    return this.checkboxes.isChecked(item);
  }

  markItemAsChecked(item: T): void {
    this.checkboxes.markItemAsChecked(item);
  }

  markItemAsUnchecked(item: T): void {
    this.checkboxes.markItemAsUnchecked(item);
  }

  toggleSelected(): void {
    const item = this.checkboxes.get();
    const checked = this.checkboxes.toggleSelected();
    if (item !== undefined && checked !== undefined) this.toggleHandler?.(item, checked);
  }

  protected override label(item: T): string {
    const mark = this.checkboxes.isChecked(item) ? this.checkedChar : ' ';
    return `[${mark}] ${super.label(item)}`;
  }

  protected override onKey(key: string): void {
    if (key === KEY_ENTER) {
      this.toggleSelected();
      return;
    }
    super.onKey(key);
  }

  override handleMouse(x: number, y: number, action: MouseAction): void {
    const clickedIndex = action === 'left-click' ? this.itemIndexAt(y) : undefined;
    super.handleMouse(x, y, action);
    if (clickedIndex !== undefined) this.toggleSelected();
  }
}
