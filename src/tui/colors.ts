/**
 * Color pairs and text color rules.
 *
 * Pair ids are small integers. Ids 1..56 are the base palette (every
 * foreground/background combination of the 8 terminal colors with fg != bg),
 * 0 is reserved, and custom pairs are registered from 57 up to the pair limit.
 */

import { GridTuiError } from '../errors.js';
import { COLOR_PAIR_LIMIT } from './constants.js';

export const TERM_COLORS = ['black', 'red', 'green', 'yellow', 'blue', 'magenta', 'cyan', 'white'] as const;

export type TermColor = (typeof TERM_COLORS)[number];

/** A named color or a 256-color palette index. */
export type ColorValue = TermColor | number;

export interface ColorPairDefinition {
  fg: ColorValue;
  bg: ColorValue;
}

export function isTermColor(value: unknown): value is TermColor {
  return TERM_COLORS.some(color => color === value);
}

/** Id of a base-palette pair. Throws when fg and bg are the same color. */
export function colorPair(fg: TermColor, bg: TermColor): number {
  const f = TERM_COLORS.indexOf(fg);
  const b = TERM_COLORS.indexOf(bg);
  if (f === b) {
    throw new GridTuiError(`No base color pair for ${fg} on ${bg}`);
  }
  return f * (TERM_COLORS.length - 1) + (b < f ? b : b - 1) + 1;
}

export const BASE_PAIR_COUNT = TERM_COLORS.length * (TERM_COLORS.length - 1);

export const WHITE_ON_BLACK = colorPair('white', 'black');
export const BLACK_ON_WHITE = colorPair('black', 'white');
export const RED_ON_BLACK = colorPair('red', 'black');
export const GREEN_ON_BLACK = colorPair('green', 'black');
export const YELLOW_ON_BLACK = colorPair('yellow', 'black');
export const BLUE_ON_BLACK = colorPair('blue', 'black');
export const MAGENTA_ON_BLACK = colorPair('magenta', 'black');
export const CYAN_ON_BLACK = colorPair('cyan', 'black');
export const BLACK_ON_GREEN = colorPair('black', 'green');
export const BLACK_ON_YELLOW = colorPair('black', 'yellow');
export const BLACK_ON_CYAN = colorPair('black', 'cyan');
export const WHITE_ON_RED = colorPair('white', 'red');
export const WHITE_ON_BLUE = colorPair('white', 'blue');
export const YELLOW_ON_BLUE = colorPair('yellow', 'blue');

/**
 * Registry of every color pair known to a controller. Backends are told about
 * each pair through `setColorPair`.
 */
export class ColorRegistry {
  private readonly pairs = new Map<number, ColorPairDefinition>();
  private nextCustomId = BASE_PAIR_COUNT + 1;

  constructor(private readonly limit = COLOR_PAIR_LIMIT) {
    for (const fg of TERM_COLORS) {
      for (const bg of TERM_COLORS) {
        if (fg !== bg) this.pairs.set(colorPair(fg, bg), { fg, bg });
      }
    }
  }

  register(fg: ColorValue, bg: ColorValue): number {
    for (const [id, pair] of this.pairs) {
      if (pair.fg === fg && pair.bg === bg) return id;
    }
    if (this.nextCustomId >= this.limit) {
      throw new GridTuiError(`Color pair limit of ${this.limit} reached`);
    }
    const id = this.nextCustomId++;
    this.pairs.set(id, { fg, bg });
    return id;
  }

  get(id: number): ColorPairDefinition | undefined {
    return this.pairs.get(id);
  }

  entries(): Array<[number, ColorPairDefinition]> {
    return Array.from(this.pairs.entries());
  }
}

export type RuleType = 'startswith' | 'endswith' | 'notstartswith' | 'notendswith' | 'contains';
export type MatchType = 'line' | 'regex' | 'region';

export interface ColorRuleOptions {
  pattern: string;
  color: number;
  ruleType: RuleType;
  matchType: MatchType;
  /** `[start, end)` columns of the rendered text, for `region` rules */
  region?: [number, number];
  includeWhitespace?: boolean;
}

export interface TextFragment {
  text: string;
  color: number;
}

export class ColorRule {
  readonly color: number;
  private readonly pattern: string;
  private readonly ruleType: RuleType;
  private readonly matchType: MatchType;
  private readonly region: [number, number];
  private readonly includeWhitespace: boolean;

  constructor(options: ColorRuleOptions) {
    this.pattern = options.pattern;
    this.color = options.color;
    this.ruleType = options.ruleType;
    this.matchType = options.matchType;
    this.region = options.region ?? [0, 0];
    this.includeWhitespace = options.includeWhitespace ?? false;
  }

  matches(line: string): boolean {
    const target = this.includeWhitespace ? line : line.trim();
    switch (this.ruleType) {
      case 'startswith':
        return target.startsWith(this.pattern);
      case 'endswith':
        return target.endsWith(this.pattern);
      case 'notstartswith':
        return !target.startsWith(this.pattern);
      case 'notendswith':
        return !target.endsWith(this.pattern);
      case 'contains':
        return new RegExp(this.pattern).test(target);
    }
  }

  /** Split already-rendered text into colored fragments. */
  fragments(renderText: string, baseColor: number): TextFragment[] {
    if (this.matchType === 'line') {
      return [{ text: renderText, color: this.color }];
    }
    if (this.matchType === 'region') {
      const [start, end] = this.region;
      return compact([
        { text: renderText.slice(0, start), color: baseColor },
        { text: renderText.slice(start, end), color: this.color },
        { text: renderText.slice(end), color: baseColor },
      ]);
    }
    const out: TextFragment[] = [];
    let last = 0;
    for (const match of renderText.matchAll(new RegExp(this.pattern, 'g'))) {
      const index = match.index ?? 0;
      if (match[0].length === 0) continue;
      out.push({ text: renderText.slice(last, index), color: baseColor });
      out.push({ text: match[0], color: this.color });
      last = index + match[0].length;
    }
    out.push({ text: renderText.slice(last), color: baseColor });
    return compact(out);
  }
}

function compact(fragments: TextFragment[]): TextFragment[] {
  return fragments.filter(f => f.text.length > 0);
}

/** Fragments for a line using the first rule that matches, or the base color. */
export function applyColorRules(
  rules: readonly ColorRule[],
  line: string,
  renderText: string,
  baseColor: number
): TextFragment[] {
  for (const rule of rules) {
    if (rule.matches(line)) return rule.fragments(renderText, baseColor);
  }
  return renderText.length > 0 ? [{ text: renderText, color: baseColor }] : [];
}
