/**
 * Scrollable list state: items, the selected index and the index of the
 * first visible item.
 *
 * `selectedIndex` stays in `[0, length)` while the list is non-empty and
 * `topViewIndex <= selectedIndex` always holds. Scrolling down moves the
 * window once the selection would fall past its last row
 * (`selectedIndex >= topViewIndex + viewportHeight`).
 */
export class SelectableList<T> {
  private items: T[] = [];
  private selectedIndex = 0;
  private topViewIndex = 0;

  constructor(items: readonly T[] = []) {
    this.items = items.slice();
  }

  get length(): number {
    return this.items.length;
  }

  clear(): void {
    this.items = [];
    this.selectedIndex = 0;
    this.topViewIndex = 0;
  }

  addItem(item: T): void {
    this.items.push(item);
  }

  addItemList(items: readonly T[]): void {
    this.items.push(...items);
  }

  getItemList(): T[] {
    return this.items.slice();
  }

  /** Selected item, or undefined on an empty list. */
  get(): T | undefined {
    return this.items.length > 0 ? this.items[this.selectedIndex] : undefined;
  }

  getSelectedIndex(): number {
    return this.selectedIndex;
  }

  setSelectedIndex(index: number, viewportHeight?: number): void {
    if (this.items.length === 0) return;
    this.selectedIndex = Math.min(Math.max(0, index), this.items.length - 1);
    if (this.topViewIndex > this.selectedIndex) {
      this.topViewIndex = this.selectedIndex;
    } else if (viewportHeight !== undefined && this.selectedIndex >= this.topViewIndex + viewportHeight) {
      this.topViewIndex = this.selectedIndex - viewportHeight + 1;
    }
  }

  /** Select the first item equal to `item`. Returns whether it was found. */
  setSelectedItem(item: T, viewportHeight?: number): boolean {
    const index = this.items.indexOf(item);
    if (index < 0) return false;
    this.setSelectedIndex(index, viewportHeight);
    return true;
  }

  getTopViewIndex(): number {
    return this.topViewIndex;
  }

  setTopViewIndex(index: number): void {
    this.topViewIndex = Math.min(Math.max(0, index), this.selectedIndex);
  }

  removeSelectedItem(): T | undefined {
    if (this.items.length === 0) return undefined;
    const [removed] = this.items.splice(this.selectedIndex, 1);
    this.clampAfterRemoval();
    return removed;
  }

  /** Remove the first item equal to `item`. Returns whether it was found. */
  removeItem(item: T): boolean {
    const index = this.items.indexOf(item);
    if (index < 0) return false;
    this.items.splice(index, 1);
    if (index < this.selectedIndex) this.selectedIndex--;
    this.clampAfterRemoval();
    return true;
  }

  scrollUp(): void {
    if (this.selectedIndex === 0) return;
    if (this.selectedIndex === this.topViewIndex) this.topViewIndex--;
    this.selectedIndex--;
  }

  scrollDown(viewportHeight: number): void {
    if (this.selectedIndex >= this.items.length - 1) return;
    this.selectedIndex++;
    if (this.selectedIndex >= this.topViewIndex + viewportHeight) this.topViewIndex++;
  }

  jumpUp(count: number): void {
    for (let i = 0; i < count; i++) this.scrollUp();
  }

  jumpDown(count: number, viewportHeight: number): void {
    for (let i = 0; i < count; i++) this.scrollDown(viewportHeight);
  }

  jumpToTop(): void {
    this.selectedIndex = 0;
    this.topViewIndex = 0;
  }

  jumpToBottom(viewportHeight: number): void {
    if (this.items.length === 0) return;
    this.selectedIndex = this.items.length - 1;
    this.topViewIndex = Math.max(0, this.items.length - viewportHeight);
  }

  /** Items in the visible window paired with their list index. */
  getVisibleItems(viewportHeight: number): Array<{ index: number; item: T }> {
    return this.items
      .slice(this.topViewIndex, this.topViewIndex + viewportHeight)
      .map((item, offset) => ({ index: this.topViewIndex + offset, item }));
  }

  private clampAfterRemoval(): void {
    if (this.selectedIndex >= this.items.length) this.selectedIndex = Math.max(0, this.items.length - 1);
    if (this.topViewIndex > this.selectedIndex) this.topViewIndex = this.selectedIndex;
  }
}
