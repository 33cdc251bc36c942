import type { ColorPairDefinition, ColorValue } from '../colors.js';
import type { BorderChars, InputEvent, Point, Rect, TerminalSize, TextAttributes } from '../types.js';
import { CellBuffer } from './cell-buffer.js';
import { EventQueue } from './event-queue.js';
import type { TerminalBackend } from './types.js';

/**
 * Shared part of the shipped backends: a back buffer that draw calls write
 * into, a front buffer holding the last presented frame, and an event queue.
 * Subclasses present changed rows in `present`.
 */
export abstract class BufferedBackend implements TerminalBackend {
  protected back: CellBuffer;
  protected front: CellBuffer;
  protected readonly events = new EventQueue();
  protected readonly colorPairs = new Map<number, ColorPairDefinition>();
  protected cursor: Point | null = null;

  constructor(size: TerminalSize) {
    this.back = new CellBuffer(size.rows, size.cols);
    this.front = new CellBuffer(size.rows, size.cols);
  }

  abstract start(): void;
  abstract stop(): void;
  protected abstract present(changedRows: number[]): void;

  getSize(): TerminalSize {
    return { rows: this.back.rows, cols: this.back.cols };
  }

  drawText(x: number, y: number, text: string, attrs: TextAttributes): void {
    this.back.write(x, y, text, attrs);
  }

  drawBorder(rect: Rect, chars: BorderChars, attrs: TextAttributes): void {
    this.back.drawBorder(rect, chars, attrs);
  }

  setColorPair(id: number, fg: ColorValue, bg: ColorValue): void {
    this.colorPairs.set(id, { fg, bg });
  }

  moveCursor(x: number, y: number): void {
    this.cursor = { x, y };
  }

  hideCursor(): void {
    this.cursor = null;
  }

  clear(): void {
    this.back.reset();
    this.cursor = null;
  }

  flush(): void {
    const changed = this.back.changedRows(this.front);
    this.front.copyFrom(this.back);
    this.present(changed);
  }

  pollEvent(timeoutMs: number | null): Promise<InputEvent | null> {
    return this.events.next(timeoutMs);
  }

  wake(): void {
    this.events.release();
  }

  protected resizeBuffers(size: TerminalSize): void {
    this.back.resize(size.rows, size.cols);
    this.front.resize(size.rows, size.cols);
  }
}
