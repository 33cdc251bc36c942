import { describe, it, expect } from 'vitest';
import { TextEditor } from '../../src/tui/implementations/text-editor.js';

describe('TextEditor', () => {
  it('returns the text it was given', () => {
    const editor = new TextEditor('', 10);
    for (const text of ['', 'hello', 'with spaces  ', 'ünïcödé ✓']) {
      editor.setText(text);
      expect(editor.get()).toBe(text);
    }
  });

  it('starts with the cursor at the end of the initial text', () => {
    const editor = new TextEditor('abc', 10);
    expect(editor.getCursorIndex()).toBe(3);
  });

  it('clamps the cursor when shorter text replaces longer text', () => {
    const editor = new TextEditor('a long line', 20);
    expect(editor.getCursorIndex()).toBe(11);
    editor.setText('tiny');
    expect(editor.getCursorIndex()).toBe(4);
  });

  it('restores text and cursor after inserting then erasing a character', () => {
    const editor = new TextEditor('helo', 10);
    editor.moveLeft();
    editor.insertChar('l');
    expect(editor.get()).toBe('hello');
    expect(editor.getCursorIndex()).toBe(4);
    editor.eraseChar();
    expect(editor.get()).toBe('helo');
    expect(editor.getCursorIndex()).toBe(3);
  });

  it('deletes the character under the cursor', () => {
    const editor = new TextEditor('abc', 10);
    editor.jumpToStart();
    editor.deleteChar();
    expect(editor.get()).toBe('bc');
    expect(editor.getCursorIndex()).toBe(0);
    editor.jumpToEnd();
    editor.deleteChar();
    expect(editor.get()).toBe('bc');
  });

  it('ignores backspace at the start and moves within bounds', () => {
    const editor = new TextEditor('ab', 10);
    editor.jumpToStart();
    editor.eraseChar();
    editor.moveLeft();
    expect(editor.get()).toBe('ab');
    expect(editor.getCursorIndex()).toBe(0);
    editor.moveRight();
    editor.moveRight();
    editor.moveRight();
    expect(editor.getCursorIndex()).toBe(2);
  });

  it('pins the cursor at the viewport edge and scrolls the text', () => {
    const editor = new TextEditor('', 5);
    for (const ch of 'abcde') editor.insertChar(ch);
    expect(editor.getCursorColumn()).toBe(5);
    expect(editor.getVisibleText()).toBe('abcde');

    editor.insertChar('f');
    editor.insertChar('g');
    expect(editor.getViewportOffset()).toBe(2);
    expect(editor.getCursorColumn()).toBe(5);
    expect(editor.getVisibleText()).toBe('cdefg');

    editor.jumpToStart();
    expect(editor.getViewportOffset()).toBe(0);
    expect(editor.getVisibleText()).toBe('abcde');
  });

  it('masks the visible text in password mode', () => {
    const editor = new TextEditor('secret', 4, true);
    expect(editor.getVisibleText()).toBe('****');
    expect(editor.get()).toBe('secret');
  });
});
