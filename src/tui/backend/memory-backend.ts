import type { MouseAction, Point, TerminalSize } from '../types.js';
import { BufferedBackend } from './buffered-backend.js';
import type { Cell } from './cell-buffer.js';

/**
 * Backend without a terminal. Input is scripted by the caller and the last
 * presented frame can be read back as text, which is how headless runs and
 * the test suite drive the toolkit.
 */
export class MemoryBackend extends BufferedBackend {
  started = false;
  flushCount = 0;
  private presentedCursor: Point | null = null;

  constructor(size: TerminalSize = { rows: 30, cols: 100 }) {
    super(size);
  }

  start(): void {
    this.started = true;
  }

  stop(): void {
    this.started = false;
    this.events.release();
  }

  protected present(): void {
    this.flushCount++;
    this.presentedCursor = this.cursor;
  }

  pressKey(...keys: string[]): this {
    for (const key of keys) this.events.push({ type: 'key', key });
    return this;
  }

  click(x: number, y: number, action: MouseAction = 'left-click'): this {
    this.events.push({ type: 'mouse', x, y, action });
    return this;
  }

  /** Change the terminal size and queue the matching resize event. */
  resizeTo(rows: number, cols: number): this {
    this.resizeBuffers({ rows, cols });
    this.events.push({ type: 'resize', rows, cols });
    return this;
  }

  get pendingEvents(): number {
    return this.events.size;
  }

  getLine(y: number): string {
    return this.front.rowText(y);
  }

  getScreenText(): string[] {
    return Array.from({ length: this.front.rows }, (_, y) => this.front.rowText(y));
  }

  getCell(x: number, y: number): Cell | undefined {
    return this.front.cell(x, y);
  }

  getCursor(): Point | null {
    return this.presentedCursor;
  }

  getColorPair(id: number) {
    return this.colorPairs.get(id);
  }
}
