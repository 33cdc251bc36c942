import { describe, it, expect } from 'vitest';
import { SelectableList } from '../../src/tui/implementations/selectable-list.js';
import { CheckboxList } from '../../src/tui/implementations/checkbox-list.js';

const ELEMENTS = ['Elem0', 'Elem1', 'Elem2', 'Elem3', 'Elem4'];

describe('SelectableList', () => {
  it('moves the window once the selection passes its last row', () => {
    const list = new SelectableList(ELEMENTS);
    for (let i = 0; i < 4; i++) list.scrollDown(3);
    expect(list.getSelectedIndex()).toBe(4);
    expect(list.getTopViewIndex()).toBe(2);
    expect(list.get()).toBe('Elem4');
  });

  it('keeps the selection within the list while scrolling', () => {
    const list = new SelectableList(ELEMENTS);
    let previous = list.getSelectedIndex();
    for (let i = 0; i < 10; i++) {
      list.scrollDown(2);
      expect(list.getSelectedIndex()).toBeGreaterThanOrEqual(previous);
      expect(list.getSelectedIndex()).toBeLessThanOrEqual(4);
      previous = list.getSelectedIndex();
    }
    for (let i = 0; i < 10; i++) {
      list.scrollUp();
      expect(list.getSelectedIndex()).toBeLessThanOrEqual(previous);
      expect(list.getSelectedIndex()).toBeGreaterThanOrEqual(0);
      previous = list.getSelectedIndex();
    }
    expect(list.getTopViewIndex()).toBe(0);
  });

  it('moves the window up only from the top visible item', () => {
    const list = new SelectableList(ELEMENTS);
    list.jumpToBottom(3);
    expect(list.getTopViewIndex()).toBe(2);
    list.scrollUp();
    list.scrollUp();
    expect(list.getSelectedIndex()).toBe(2);
    expect(list.getTopViewIndex()).toBe(2);
    list.scrollUp();
    expect(list.getSelectedIndex()).toBe(1);
    expect(list.getTopViewIndex()).toBe(1);
  });

  it('returns the items added after a clear in order', () => {
    const list = new SelectableList(['stale']);
    list.clear();
    list.addItemList(['a', 'b', 'c']);
    list.addItem('d');
    expect(list.getItemList()).toEqual(['a', 'b', 'c', 'd']);
  });

  it('treats an empty list as a no-op', () => {
    const list = new SelectableList<string>();
    expect(list.get()).toBeUndefined();
    expect(list.removeSelectedItem()).toBeUndefined();
    list.scrollDown(3);
    list.scrollUp();
    list.jumpToBottom(3);
    expect(list.getSelectedIndex()).toBe(0);
  });

  it('clamps the selection after removing the last item', () => {
    const list = new SelectableList(ELEMENTS);
    list.jumpToBottom(3);
    expect(list.removeSelectedItem()).toBe('Elem4');
    expect(list.getSelectedIndex()).toBe(3);
    expect(list.get()).toBe('Elem3');
  });

  it('keeps the selected item when an earlier one is removed', () => {
    const list = new SelectableList(ELEMENTS);
    list.setSelectedIndex(3);
    expect(list.removeItem('Elem0')).toBe(true);
    expect(list.get()).toBe('Elem3');
    expect(list.removeItem('missing')).toBe(false);
  });

  it('jumps by pages and scrolls the window into view', () => {
    const list = new SelectableList(ELEMENTS);
    list.jumpDown(5, 2);
    expect(list.getSelectedIndex()).toBe(4);
    expect(list.getTopViewIndex()).toBe(3);
    expect(list.getVisibleItems(2)).toEqual([
      { index: 3, item: 'Elem3' },
      { index: 4, item: 'Elem4' },
    ]);
    list.jumpUp(2);
    expect(list.getSelectedIndex()).toBe(2);
    expect(list.getTopViewIndex()).toBe(2);
  });

  it('selects items by value', () => {
    const list = new SelectableList(ELEMENTS);
    expect(list.setSelectedItem('Elem4', 3)).toBe(true);
    expect(list.getTopViewIndex()).toBe(2);
    expect(list.setSelectedItem('nope', 3)).toBe(false);
    expect(list.getSelectedIndex()).toBe(4);
  });
});

describe('CheckboxList', () => {
  it('toggles the selected item', () => {
    const list = new CheckboxList(['milk', 'eggs', 'bread']);
    list.scrollDown(3);
    expect(list.toggleSelected()).toBe(true);
    expect(list.getChecked()).toEqual(['eggs']);
    expect(list.toggleSelected()).toBe(false);
    expect(list.getChecked()).toEqual([]);
  });

  it('reports checked items in list order', () => {
    const list = new CheckboxList(['milk', 'eggs', 'bread']);
    list.markItemAsChecked('bread');
    list.markItemAsChecked('milk');
    list.markItemAsChecked('butter');
    expect(list.getChecked()).toEqual(['milk', 'bread']);
    list.markItemAsUnchecked('milk');
    expect(list.isChecked('milk')).toBe(false);
  });

  it('forgets the checked state of removed items', () => {
    const list = new CheckboxList(['milk', 'eggs']);
    list.toggleSelected();
    list.removeSelectedItem();
    list.addItem('milk');
    expect(list.isChecked('milk')).toBe(false);
  });
});
