import type { ColorValue } from '../colors.js';
import type { BorderChars, InputEvent, Rect, TerminalSize, TextAttributes } from '../types.js';

/**
 * Terminal drawing and input surface consumed by the renderer and controller.
 *
 * Draw calls go to a back buffer; `flush()` presents the frame.
 */
export interface TerminalBackend {
  start(): void;
  /** Give the terminal back. Also valid on a backend that never started. */
  stop(): void;
  getSize(): TerminalSize;
  /** Text past the right edge is clipped. A start point off screen throws `DrawOutOfBoundsError`. */
  drawText(x: number, y: number, text: string, attrs: TextAttributes): void;
  drawBorder(rect: Rect, chars: BorderChars, attrs: TextAttributes): void;
  setColorPair(id: number, fg: ColorValue, bg: ColorValue): void;
  moveCursor(x: number, y: number): void;
  hideCursor(): void;
  clear(): void;
  flush(): void;
  /** Next input event, or null once `timeoutMs` elapses. `null` waits indefinitely. */
  pollEvent(timeoutMs: number | null): Promise<InputEvent | null>;
  /** Resolve a pending `pollEvent` with null. */
  wake(): void;
}
