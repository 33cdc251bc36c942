import { describe, it, expect } from 'vitest';
import { insertableChar, isPrintable, normalizeKey } from '../../src/tui/keys.js';

describe('normalizeKey', () => {
  it('keeps printable characters as they are', () => {
    expect(normalizeKey('a', { name: 'a', full: 'a' })).toBe('a');
    expect(normalizeKey('A', { name: 'a', full: 'S-a', shift: true })).toBe('A');
    expect(normalizeKey(' ', { name: 'space', full: 'space' })).toBe(' ');
  });

  it('maps terminal key names to the toolkit names', () => {
    expect(normalizeKey('\r', { name: 'return', full: 'return' })).toBe('enter');
    expect(normalizeKey('\x1b', { name: 'escape', full: 'escape' })).toBe('escape');
    expect(normalizeKey(undefined, { name: 'up', full: 'up' })).toBe('up');
    expect(normalizeKey(undefined, { name: 'space' })).toBe(' ');
  });

  it('prefixes modifiers', () => {
    expect(normalizeKey(undefined, { name: 'tab', full: 'S-tab', shift: true })).toBe('S-tab');
    expect(normalizeKey('\x17', { name: 'w', full: 'C-w', ctrl: true })).toBe('C-w');
    expect(normalizeKey(undefined, { name: 'x', ctrl: true, meta: true })).toBe('C-M-x');
  });

  it('returns an empty name for unknown input', () => {
    expect(normalizeKey(undefined, {})).toBe('');
  });
});

describe('printable keys', () => {
  it('accepts single visible characters only', () => {
    expect(isPrintable('x')).toBe(true);
    expect(isPrintable('é')).toBe(true);
    expect(isPrintable('ab')).toBe(false);
    expect(isPrintable('\x7f')).toBe(false);
    expect(isPrintable('\t')).toBe(false);
  });

  it('inserts characters but not named keys', () => {
    expect(insertableChar('q')).toBe('q');
    expect(insertableChar('enter')).toBeNull();
    expect(insertableChar('C-w')).toBeNull();
  });
});
