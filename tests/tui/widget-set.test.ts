import { describe, it, expect, vi } from 'vitest';
import { MemoryBackend } from '../../src/tui/backend/memory-backend.js';
import { Renderer } from '../../src/tui/renderer.js';
import { WidgetSet } from '../../src/tui/widget-set.js';
import { TerminalTooSmallError } from '../../src/errors.js';

describe('WidgetSet', () => {
  it('hands out sequential ids and selects the first selectable widget', () => {
    const set = new WidgetSet(3, 3, 30, 60);
    const label = set.addLabel('Title', 0, 0);
    const menu = set.addScrollMenu('Menu', 1, 0);
    const box = set.addTextBox('Box', 1, 1);
    expect([label.id, menu.id, box.id]).toEqual([0, 1, 2]);
    expect(set.getSelectedWidgetId()).toBe(1);
    expect(set.getWidget(2)).toBe(box);
    expect(set.getWidget(7)).toBeUndefined();
  });

  it('only selects known, selectable widgets', () => {
    const set = new WidgetSet(3, 3, 30, 60);
    const label = set.addLabel('Title', 0, 0);
    const box = set.addTextBox('Box', 1, 1);
    expect(set.setSelectedWidget(label.id)).toBe(false);
    expect(set.setSelectedWidget(42)).toBe(false);
    expect(set.getSelectedWidget()).toBe(box);
    set.clearSelectedWidget();
    expect(set.getSelectedWidget()).toBeUndefined();
  });

  it('never reuses the ids of removed widgets', () => {
    const set = new WidgetSet(3, 3, 30, 60);
    const first = set.addScrollMenu('First', 0, 0);
    const second = set.addScrollMenu('Second', 0, 1);
    expect(set.forgetWidget(first)).toBe(true);
    expect(set.getSelectedWidget()).toBe(second);
    expect(set.forgetWidget(first.id)).toBe(false);
    expect(set.setSelectedWidget(first.id)).toBe(false);
    expect(set.addScrollMenu('Third', 0, 0).id).toBe(2);
  });

  it('does not remove a different widget that shares the id', () => {
    const set = new WidgetSet(3, 3, 30, 60);
    const other = new WidgetSet(3, 3, 30, 60);
    set.addScrollMenu('Mine', 0, 0);
    const foreign = other.addScrollMenu('Theirs', 0, 0);
    expect(set.forgetWidget(foreign)).toBe(false);
    expect(set.getWidgets().size).toBe(1);
  });

  it('clears the selection when no selectable widget is left', () => {
    const set = new WidgetSet(3, 3, 30, 60);
    const menu = set.addScrollMenu('Menu', 0, 0);
    set.addLabel('Label', 0, 1);
    set.forgetWidget(menu.id);
    expect(set.getSelectedWidgetId()).toBeNull();
  });

  it('resizes every widget or nothing', () => {
    const set = new WidgetSet(3, 3, 30, 60);
    const menu = set.addScrollMenu('Menu', 2, 2);
    set.resize(33, 90);
    expect(menu.getStartPosition()).toEqual({ x: 60, y: 22 });
    expect(menu.getAbsoluteDimensions()).toEqual({ height: 11, width: 30 });
    expect(() => set.resize(9, 90)).toThrow(TerminalTooSmallError);
    expect(menu.getStartPosition()).toEqual({ x: 60, y: 22 });
  });

  it('keeps overview keybindings', () => {
    const set = new WidgetSet(3, 3, 30, 60);
    const command = vi.fn();
    set.addKeyCommand('r', command);
    set.getKeybindings().get('r')?.();
    expect(command).toHaveBeenCalledOnce();
    set.removeKeyCommand('r');
    expect(set.getKeybindings().has('r')).toBe(false);
  });

  it('hands its renderer to widgets added before and after', () => {
    const set = new WidgetSet(3, 3, 30, 60);
    const before = set.addScrollMenu('Before', 0, 0);
    expect(before.hasRenderer()).toBe(false);
    set.setRenderer(new Renderer(new MemoryBackend()));
    const after = set.addScrollMenu('After', 0, 1);
    expect(before.hasRenderer()).toBe(true);
    expect(after.hasRenderer()).toBe(true);
  });
});
