import { SelectableList } from './selectable-list.js';

/**
 * Selectable list whose items can be checked and unchecked.
 */
export class CheckboxList<T> extends SelectableList<T> {
  private readonly checked = new Set<T>();

  /** Toggle the selected item. Returns its new state, or undefined on an empty list. */
  toggleSelected(): boolean | undefined {
    const item = this.get();
    if (item === undefined) return undefined;
    if (this.checked.has(item)) {
      this.checked.delete(item);
      return false;
    }
    this.checked.add(item);
    return true;
  }

  isChecked(item: T): boolean {
    return this.checked.has(item);
  }

  markItemAsChecked(item: T): void {
    if (this.getItemList().includes(item)) this.checked.add(item);
  }

  markItemAsUnchecked(item: T): void {
    this.checked.delete(item);
  }

  /** Checked items in list order. */
  getChecked(): T[] {
    return this.getItemList().filter(item => this.checked.has(item));
  }

  override clear(): void {
    super.clear();
    this.checked.clear();
  }

  override removeSelectedItem(): T | undefined {
    const removed = super.removeSelectedItem();
    if (removed !== undefined && !this.getItemList().includes(removed)) this.checked.delete(removed);
    return removed;
  }

  override removeItem(item: T): boolean {
    const removed = super.removeItem(item);
    if (removed && !this.getItemList().includes(item)) this.checked.delete(item);
    return removed;
  }
}
