/**
 * Key normalization.
 *
 * Printable characters map to themselves (`'a'`, `'A'`, `' '`). Everything
 * else uses the terminal's key name with modifier prefixes, the same shape
 * blessed reports in `key.full` (`'C-w'`, `'M-x'`, `'S-tab'`, `'enter'`).
 */

export type KeyInfo = {
  name?: string;
  full?: string;
  ctrl?: boolean;
  meta?: boolean;
  shift?: boolean;
  sequence?: string;
};

const NAME_ALIASES: Record<string, string> = {
  return: 'enter',
  esc: 'escape',
  space: ' ',
  del: 'delete',
};

export function isPrintable(ch: string): boolean {
  if (Array.from(ch).length !== 1) return false;
  const code = ch.codePointAt(0) ?? 0;
  return code >= 0x20 && code !== 0x7f;
}

function withModifiers(name: string, info: KeyInfo): string {
  const parts: string[] = [];
  if (info.ctrl) parts.push('C');
  if (info.meta) parts.push('M');
  if (info.shift) parts.push('S');
  parts.push(name);
  return parts.join('-');
}

export function normalizeKey(ch: string | undefined, info: KeyInfo = {}): string {
  if (ch !== undefined && isPrintable(ch) && !info.ctrl && !info.meta) {
    return ch;
  }
  const rawName = info.name ?? '';
  const name = NAME_ALIASES[rawName] ?? rawName;
  if (name === ' ') return name;
  if (info.full && NAME_ALIASES[info.full] === undefined) return info.full;
  if (name) return withModifiers(name, info);
  return ch ?? '';
}

/** Single character that a text widget should insert for this key, if any. */
export function insertableChar(key: string): string | null {
  return isPrintable(key) ? key : null;
}
