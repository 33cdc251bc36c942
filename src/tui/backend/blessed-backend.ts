import blessed from 'blessed';
import chalk, { Chalk, type BackgroundColorName, type ChalkInstance, type ColorSupportLevel } from 'chalk';
import { GridTuiError } from '../../errors.js';
import type { ColorPairDefinition, ColorValue, TermColor } from '../colors.js';
import { normalizeKey, type KeyInfo } from '../keys.js';
import type { InputEvent, MouseAction } from '../types.js';
import { BufferedBackend } from './buffered-backend.js';
import type { Cell } from './cell-buffer.js';

/**
 * The slice of blessed's low-level `program` this backend drives. Tests pass
 * a mock with the same shape.
 */
export interface ProgramLike {
  cols: number;
  rows: number;
  alternateBuffer(): unknown;
  normalBuffer(): unknown;
  hideCursor(): unknown;
  showCursor(): unknown;
  enableMouse(): unknown;
  disableMouse(): unknown;
  clear(): unknown;
  move(x: number, y: number): unknown;
  write(text: string): unknown;
  flush(): unknown;
  destroy(): unknown;
  on(event: string, listener: (...args: unknown[]) => void): unknown;
  removeListener(event: string, listener: (...args: unknown[]) => void): unknown;
}

export interface BlessedBackendOptions {
  mouse?: boolean;
  createProgram?: () => ProgramLike;
  chalk?: ChalkInstance;
}

const BG_NAMES: Record<TermColor, BackgroundColorName> = {
  black: 'bgBlack',
  red: 'bgRed',
  green: 'bgGreen',
  yellow: 'bgYellow',
  blue: 'bgBlue',
  magenta: 'bgMagenta',
  cyan: 'bgCyan',
  white: 'bgWhite',
};

const DOUBLE_CLICK_MS = 400;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function toKeyInfo(value: unknown): KeyInfo {
  if (!isRecord(value)) return {};
  return {
    name: optionalString(value.name),
    full: optionalString(value.full),
    sequence: optionalString(value.sequence),
    ctrl: value.ctrl === true,
    meta: value.meta === true,
    shift: value.shift === true,
  };
}

function defaultChalk(): ChalkInstance {
  const level: ColorSupportLevel = chalk.level === 0 ? 1 : chalk.level;
  return new Chalk({ level });
}

/**
 * Terminal backend on top of blessed's `program`: raw keyboard and mouse
 * input, cursor addressing and the alternate screen. Frames are written as
 * SGR-styled rows built with chalk, only for rows that changed.
 */
export class BlessedBackend extends BufferedBackend {
  private readonly program: ProgramLike;
  private readonly chalk: ChalkInstance;
  private readonly mouse: boolean;
  private running = false;
  private destroyed = false;
  private fullRepaint = true;
  private lastClick: { x: number; y: number; at: number } | null = null;
  private readonly listeners: Array<[string, (...args: unknown[]) => void]> = [];

  constructor(options: BlessedBackendOptions = {}) {
    const program = options.createProgram
      ? options.createProgram()
      : blessed.program({ buffer: true, zero: true });
    super({ rows: program.rows, cols: program.cols });
    this.program = program;
    this.chalk = options.chalk ?? defaultChalk();
    this.mouse = options.mouse ?? true;
  }

  start(): void {
    if (this.running) return;
    if (this.destroyed) throw new GridTuiError('Terminal backend was already stopped');
    this.running = true;
    this.program.alternateBuffer();
    this.program.hideCursor();
    if (this.mouse) this.program.enableMouse();
    this.program.clear();
    this.listen('keypress', (ch, key) => this.onKeypress(ch, key));
    this.listen('mouse', data => this.onMouse(data));
    this.listen('resize', () => this.onResize());
    this.fullRepaint = true;
  }

  /** Also releases a program that was never started. */
  stop(): void {
    if (this.destroyed) return;
    if (this.running) {
      this.running = false;
      for (const [event, listener] of this.listeners) this.program.removeListener(event, listener);
      this.listeners.length = 0;
      if (this.mouse) this.program.disableMouse();
      this.program.clear();
      this.program.showCursor();
      this.program.normalBuffer();
      this.program.flush();
    }
    this.destroyed = true;
    this.program.destroy();
    this.events.release();
  }

  protected present(changedRows: number[]): void {
    const lastRow = this.front.rows - 1;
    // The screen was cleared, so every row is written once
    const rows = this.fullRepaint ? Array.from({ length: this.front.rows }, (_, y) => y) : changedRows;
    this.fullRepaint = false;
    for (const y of rows) {
      const row = this.front.row(y);
      // Writing the bottom-right cell scrolls some terminals
      const cells = y === lastRow ? row.slice(0, -1) : row;
      this.program.move(0, y);
      this.program.write(this.renderRow(cells));
    }
    if (this.cursor) {
      this.program.move(this.cursor.x, this.cursor.y);
      this.program.showCursor();
    } else {
      this.program.hideCursor();
    }
    this.program.flush();
  }

  /** SGR text for a row of cells, grouped into runs of equal attributes. */
  renderRow(cells: readonly Cell[]): string {
    let out = '';
    let run = '';
    let runCell: Cell | null = null;
    for (const cell of cells) {
      if (runCell && cell.color === runCell.color && cell.bold === runCell.bold && cell.reverse === runCell.reverse) {
        run += cell.ch;
        continue;
      }
      if (runCell) out += this.style(runCell)(run);
      runCell = cell;
      run = cell.ch;
    }
    if (runCell) out += this.style(runCell)(run);
    return out;
  }

  private style(cell: Cell): ChalkInstance {
    let style = this.chalk;
    const pair: ColorPairDefinition | undefined = this.colorPairs.get(cell.color);
    if (pair) {
      style = this.foreground(style, pair.fg);
      style = this.background(style, pair.bg);
    }
    if (cell.bold) style = style.bold;
    if (cell.reverse) style = style.inverse;
    return style;
  }

  private foreground(style: ChalkInstance, color: ColorValue): ChalkInstance {
    return typeof color === 'number' ? style.ansi256(color) : style[color];
  }

  private background(style: ChalkInstance, color: ColorValue): ChalkInstance {
    return typeof color === 'number' ? style.bgAnsi256(color) : style[BG_NAMES[color]];
  }

  private listen(event: string, listener: (...args: unknown[]) => void): void {
    this.listeners.push([event, listener]);
    this.program.on(event, listener);
  }

  private onKeypress(ch: unknown, key: unknown): void {
    const info = toKeyInfo(key);
    // blessed reports a carriage return once as 'return' and once as 'enter'
    if (info.name === 'enter' && info.sequence === '\r') return;
    const name = normalizeKey(optionalString(ch), info);
    if (name) this.events.push({ type: 'key', key: name });
  }

  private onMouse(data: unknown): void {
    if (!isRecord(data)) return;
    const { x, y, action, button } = data;
    if (typeof x !== 'number' || typeof y !== 'number') return;
    const mapped = this.mouseAction(x, y, optionalString(action), optionalString(button));
    if (mapped) this.events.push({ type: 'mouse', x, y, action: mapped } satisfies InputEvent);
  }

  private mouseAction(x: number, y: number, action?: string, button?: string): MouseAction | null {
    if (action === 'wheelup') return 'scroll-up';
    if (action === 'wheeldown') return 'scroll-down';
    if (action !== 'mousedown') return null;
    if (button === 'right') return 'right-click';
    if (button === 'middle') return 'middle-click';
    const now = Date.now();
    const last = this.lastClick;
    this.lastClick = { x, y, at: now };
    if (last && last.x === x && last.y === y && now - last.at <= DOUBLE_CLICK_MS) {
      this.lastClick = null;
      return 'left-double-click';
    }
    return 'left-click';
  }

  private onResize(): void {
    const size = { rows: this.program.rows, cols: this.program.cols };
    this.resizeBuffers(size);
    this.fullRepaint = true;
    this.events.push({ type: 'resize', ...size });
  }
}
