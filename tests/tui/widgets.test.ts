import { beforeEach, describe, it, expect, vi } from 'vitest';
import { MemoryBackend } from '../../src/tui/backend/memory-backend.js';
import { BLACK_ON_GREEN, WHITE_ON_BLACK } from '../../src/tui/colors.js';
import { Renderer } from '../../src/tui/renderer.js';
import { WidgetSet } from '../../src/tui/widget-set.js';
import { InvalidValueError, OutOfBoundsError } from '../../src/errors.js';

// 3x3 grid over 15x60: cells are 5 rows by 20 columns
let backend: MemoryBackend;
let set: WidgetSet;

beforeEach(() => {
  backend = new MemoryBackend({ rows: 15, cols: 60 });
  set = new WidgetSet(3, 3, 15, 60, { renderer: new Renderer(backend) });
});

describe('widget placement', () => {
  it('rejects widgets outside the grid', () => {
    expect(() => set.addLabel('x', 3, 0)).toThrow(OutOfBoundsError);
    expect(() => set.addLabel('x', 1, 1, 1, 3)).toThrow(
      "Widget 'x' at (1, 1) spanning 1x3 does not fit a 3x3 grid"
    );
    expect(() => set.addButton('x', 0, 0, 0, 1)).toThrow("Invalid placement for 'x': row 0, column 0, span 0x1");
    expect(set.getWidgets().size).toBe(0);
  });

  it('computes positions from the grid', () => {
    const menu = set.addScrollMenu('Menu', 1, 1, 2, 2);
    expect(menu.getStartPosition()).toEqual({ x: 20, y: 5 });
    expect(menu.getStopPosition()).toEqual({ x: 60, y: 15 });
    expect(menu.getViewportHeight()).toBe(8);
    expect(menu.getViewportWidth()).toBe(34);
    expect(menu.containsPosition(20, 5)).toBe(true);
    expect(menu.containsPosition(60, 5)).toBe(false);
  });
});

describe('ScrollMenu', () => {
  it('scrolls the window once the selection passes the last visible row', () => {
    const menu = set.addScrollMenu('Menu', 0, 0);
    menu.addItemList(['a', 'b', 'c', 'd', 'e']);
    expect(menu.getViewportHeight()).toBe(3);
    menu.handleKey('down');
    menu.handleKey('down');
    expect(menu.getTopViewIndex()).toBe(0);
    menu.handleKey('down');
    expect(menu.getSelectedItemIndex()).toBe(3);
    expect(menu.getTopViewIndex()).toBe(1);
    menu.handleKey('end');
    expect([menu.getSelectedItemIndex(), menu.getTopViewIndex()]).toEqual([4, 2]);
    menu.handleKey('home');
    expect([menu.getSelectedItemIndex(), menu.getTopViewIndex()]).toEqual([0, 0]);
    menu.handleKey('pagedown');
    expect([menu.getSelectedItemIndex(), menu.getTopViewIndex()]).toEqual([4, 2]);
    menu.handleKey('pageup');
    expect([menu.getSelectedItemIndex(), menu.getTopViewIndex()]).toEqual([0, 0]);
  });

  it('keeps the selection visible when the grid shrinks', () => {
    const menu = set.addScrollMenu('Menu', 0, 0, 3, 1);
    menu.addItemList(Array.from({ length: 30 }, (_, i) => `item ${i}`));
    expect(menu.getViewportHeight()).toBe(13);
    menu.setSelectedItemIndex(25);
    expect(menu.getTopViewIndex()).toBe(13);

    set.resize(12, 60);
    expect(menu.getViewportHeight()).toBe(10);
    expect(menu.getSelectedItemIndex()).toBe(25);
    expect(menu.getTopViewIndex()).toBe(16);
  });

  it('reports selection changes', () => {
    const menu = set.addScrollMenu('Menu', 0, 0);
    menu.addItemList(['a', 'b']);
    const onChange = vi.fn();
    menu.setOnSelectionChange(onChange);
    menu.handleKey('up');
    menu.handleKey('down');
    menu.handleKey('down');
    expect(onChange).toHaveBeenCalledTimes(1);
    expect(onChange).toHaveBeenCalledWith('b');
  });

  it('selects the clicked item and scrolls with the wheel', () => {
    const menu = set.addScrollMenu('Menu', 0, 0);
    menu.addItemList(['a', 'b', 'c', 'd']);
    menu.handleMouse(5, 3, 'left-click');
    expect(menu.get()).toBe('c');
    menu.handleMouse(5, 4, 'left-click');
    expect(menu.get()).toBe('c');
    menu.handleMouse(5, 2, 'scroll-down');
    expect(menu.get()).toBe('d');
    expect(menu.getTopViewIndex()).toBe(1);
  });

  it('formats items with a custom formatter', () => {
    const menu = set.addScrollMenu<{ name: string }>('People', 0, 0, 1, 1, { formatItem: item => item.name });
    menu.addItem({ name: 'Ada' });
    menu.draw();
    backend.flush();
    expect(backend.getLine(1).slice(0, 20)).toBe(` | Ada${' '.repeat(11)} | `);
  });

  it('draws the border, the items and the selection color', () => {
    const menu = set.addScrollMenu('Menu', 0, 0);
    menu.addItemList(['a', 'b']);
    menu.draw();
    backend.flush();
    expect(backend.getLine(0).slice(0, 20)).toBe(' +- Menu ---------+ ');
    expect(backend.getLine(1).slice(0, 20)).toBe(` | a${' '.repeat(13)} | `);
    expect(backend.getLine(2).slice(0, 20)).toBe(` | b${' '.repeat(13)} | `);
    expect(backend.getCell(3, 1)?.color).toBe(BLACK_ON_GREEN);
    expect(backend.getCell(3, 2)?.color).toBe(WHITE_ON_BLACK);
  });
});

describe('CheckboxMenu', () => {
  it('toggles the selected item with Enter and on click', () => {
    const menu = set.addCheckboxMenu('Tasks', 0, 0);
    menu.addItemList(['x', 'y']);
    const onToggle = vi.fn();
    menu.setOnToggle(onToggle);

    menu.handleKey('enter');
    expect(menu.getChecked()).toEqual(['x']);
    expect(onToggle).toHaveBeenLastCalledWith('x', true);

    menu.handleMouse(5, 2, 'left-click');
    expect(menu.getChecked()).toEqual(['x', 'y']);

    menu.handleKey('enter');
    expect(menu.getChecked()).toEqual(['x']);
    expect(onToggle).toHaveBeenLastCalledWith('y', false);
  });

  it('shows a check mark in front of checked items', () => {
    const menu = set.addCheckboxMenu('Tasks', 0, 0, 1, 1, { checkedChar: '*' });
    menu.addItemList(['x', 'y']);
    menu.markItemAsChecked('y');
    menu.markItemAsChecked('z');
    menu.draw();
    backend.flush();
    expect(backend.getLine(1).slice(3, 8)).toBe('[ ] x');
    expect(backend.getLine(2).slice(3, 8)).toBe('[*] y');
    expect(menu.getChecked()).toEqual(['y']);
  });
});

describe('TextBox', () => {
  it('edits text from keys', () => {
    const box = set.addTextBox('Name', 0, 1);
    box.handleKey('h');
    box.handleKey('i');
    expect(box.getText()).toBe('hi');
    box.handleKey('left');
    box.handleKey('backspace');
    expect(box.getText()).toBe('i');
    box.handleKey('delete');
    expect(box.getText()).toBe('');
    box.handleKey('enter');
    expect(box.getText()).toBe('');
  });

  it('draws its text and places the cursor while focused', () => {
    const box = set.addTextBox('Name', 0, 1, 1, 1, { initialText: 'abc' });
    box.setSelected(true);
    box.draw();
    backend.flush();
    expect(backend.getLine(2).slice(20, 40)).toBe(` | abc${' '.repeat(11)} | `);
    expect(backend.getCursor()).toEqual({ x: 26, y: 2 });
  });

  it('masks password text', () => {
    const box = set.addTextBox('Secret', 0, 1, 1, 1, { initialText: 'test-secret', password: true });
    box.draw();
    backend.flush();
    expect(backend.getLine(2).slice(23, 37)).toBe(`${'*'.repeat(11)}   `);
    expect(box.getText()).toBe('test-secret');
  });

  it('runs key commands before editing', () => {
    const box = set.addTextBox('Name', 0, 1);
    const save = vi.fn();
    box.addKeyCommand('C-s', save);
    box.handleKey('C-s');
    expect(save).toHaveBeenCalledOnce();
    expect(box.claimsKey('C-s')).toBe(true);
    expect(box.claimsKey('tab')).toBe(false);
  });
});

describe('ScrollTextBlock', () => {
  it('edits multiple lines and keeps Tab for itself', () => {
    const block = set.addTextBlock('Notes', 0, 0, 2, 2);
    for (const key of ['a', 'enter', 'tab', 'b']) block.handleKey(key);
    expect(block.get()).toBe('a\n    b');
    expect(block.claimsKey('tab')).toBe(true);
  });
});

describe('Button', () => {
  it('presses on Enter, left click and activation', () => {
    const command = vi.fn();
    const button = set.addButton('Go', 2, 2, 1, 1, command);
    button.handleKey('enter');
    button.handleMouse(45, 11, 'left-click');
    button.handleMouse(45, 11, 'right-click');
    button.activate();
    expect(command).toHaveBeenCalledTimes(3);
    expect(button.isButton).toBe(true);
  });

  it('draws a three-row box centered in its cell', () => {
    const button = set.addButton('OK', 0, 0);
    button.draw();
    backend.flush();
    expect(backend.getLine(0).slice(0, 20)).toBe(' '.repeat(20));
    expect(backend.getLine(1).slice(0, 20)).toBe(` +${'-'.repeat(16)}+ `);
    expect(backend.getLine(2).slice(0, 20)).toBe(` |${' '.repeat(7)}OK${' '.repeat(7)}| `);
    expect(backend.getLine(3).slice(0, 20)).toBe(` +${'-'.repeat(16)}+ `);
  });
});

describe('SliderWidget', () => {
  it('moves one step per arrow key within its bounds', () => {
    const slider = set.addSlider('Volume', 1, 0, 1, 1, { min: 10, max: 100, step: 4, initial: 65 });
    for (let i = 0; i < 3; i++) slider.handleKey('left');
    expect(slider.getSliderValue()).toBe(53);
    for (let i = 0; i < 20; i++) slider.handleKey('left');
    expect(slider.getSliderValue()).toBe(10);
    slider.handleKey('right');
    expect(slider.getSliderValue()).toBe(14);
  });

  it('renders the filled share of the range and the value', () => {
    const slider = set.addSlider('Volume', 1, 0, 1, 1, { initial: 50 });
    expect(slider.generateBar(13)).toBe('##### 50');
    slider.toggleValue();
    expect(slider.generateBar(10)).toBe('#####');
    slider.setBarChar('=');
    expect(slider.generateBar(4)).toBe('==');
  });

  it('rejects invalid settings', () => {
    const slider = set.addSlider('Volume', 1, 0);
    expect(() => slider.setBarChar('ab')).toThrow(InvalidValueError);
    expect(() => set.addSlider('Bad', 1, 1, 1, 1, { min: 10, max: 5, initial: 10 })).toThrow(
      'min value 10 is greater than max value 5'
    );
    expect(() => set.addSlider('Bad', 1, 1, 1, 1, { initial: 200 })).toThrow('initial value must be between 0 and 100');
  });
});

describe('labels', () => {
  it('are not selectable', () => {
    const label = set.addLabel('Title', 0, 0);
    const block = set.addBlockLabel('one\ntwo', 0, 1);
    expect(label.isSelectable()).toBe(false);
    expect(block.getLines()).toEqual(['one', 'two']);
    expect(set.selectableWidgets()).toEqual([]);
    expect(set.getSelectedWidgetId()).toBeNull();
  });

  it('centers block label lines vertically', () => {
    const block = set.addBlockLabel('one\ntwo', 0, 1, 1, 1, { center: false });
    block.draw();
    backend.flush();
    expect(backend.getLine(1).slice(20, 40)).toBe(` one${' '.repeat(16)}`);
    expect(backend.getLine(2).slice(20, 40)).toBe(` two${' '.repeat(16)}`);
  });
});
