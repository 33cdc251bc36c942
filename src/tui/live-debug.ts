import type { Logger, LogLevel, LogRecord } from '../logger.js';
import { WHITE_ON_BLACK, RED_ON_BLACK, YELLOW_ON_BLACK } from './colors.js';
import { KEY_DOWN, KEY_ESCAPE, KEY_PAGE_DOWN, KEY_PAGE_UP, KEY_UP, LIVE_DEBUG_BUFFER_SIZE, LIVE_DEBUG_HELP_TEXT, PAGE_SCROLL_LENGTH } from './constants.js';
import { UIElement } from './element.js';
import { getRenderText } from './renderer.js';
import type { Point, TerminalSize } from './types.js';

/**
 * In-terminal view of recent log records, newest first. Toggled by the
 * controller's live debug key; while shown it takes all input.
 */
export class LiveDebugElement extends UIElement {
  readonly kind = 'live-debug';
  private readonly records: LogRecord[] = [];
  private topView = 0;
  private unsubscribe: (() => void) | null = null;

  constructor(
    private readonly screenSize: () => TerminalSize,
    logger: Logger,
    private readonly bufferSize = LIVE_DEBUG_BUFFER_SIZE
  ) {
    super(-1, 'Live Debug', { logger, padX: 1, padY: 0 });
    this.selected = true;
    this.helpText = LIVE_DEBUG_HELP_TEXT;
    this.applyGeometry();
  }

  protected computeStartPosition(): Point {
    const { rows, cols } = this.screenSize();
    return { x: Math.floor(cols / 7) + 2, y: Math.floor(rows / 7) + 2 };
  }

  protected computeStopPosition(): Point {
    const { rows, cols } = this.screenSize();
    return { x: 6 * Math.floor(cols / 7) - 2, y: 6 * Math.floor(rows / 7) - 2 };
  }

  /** Start collecting records from the logger's hub. */
  attach(): void {
    if (this.unsubscribe) return;
    this.unsubscribe = this.logger.subscribe(record => this.push(record));
  }

  detach(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
  }

  push(record: LogRecord): void {
    this.records.unshift(record);
    if (this.records.length > this.bufferSize) this.records.length = this.bufferSize;
  }

  getRecords(): readonly LogRecord[] {
    return this.records;
  }

  getTopView(): number {
    return this.topView;
  }

  /** Return true when the panel should close. */
  handleDebugKey(key: string): boolean {
    const visible = this.getViewportHeight();
    const maxTop = Math.max(0, this.records.length - visible);
    if (key === KEY_ESCAPE) return true;
    if (key === KEY_UP) this.topView = Math.max(0, this.topView - 1);
    else if (key === KEY_DOWN) this.topView = Math.min(maxTop, this.topView + 1);
    else if (key === KEY_PAGE_UP) this.topView = Math.max(0, this.topView - PAGE_SCROLL_LENGTH);
    else if (key === KEY_PAGE_DOWN) this.topView = Math.min(maxTop, this.topView + PAGE_SCROLL_LENGTH);
    return false;
  }

  override handleKey(key: string): void {
    this.handleDebugKey(key);
  }

  draw(): void {
    const renderer = this.requireRenderer();
    renderer.drawBorder(this, { fill: true });
    const x = this.startX + this.padX + 2;
    const visible = this.records.slice(this.topView, this.topView + this.getViewportHeight());
    visible.forEach((record, index) => {
      const line = `${record.level.toUpperCase()} ${record.name}: ${record.message}`;
      const text = getRenderText(line, this.getViewportWidth());
      renderer.drawRaw(x, this.startY + this.padY + 1 + index, text, { color: levelColor(record.level) });
    });
  }
}

function levelColor(level: LogLevel): number {
  if (level === 'error') return RED_ON_BLACK;
  if (level === 'warn') return YELLOW_ON_BLACK;
  return WHITE_ON_BLACK;
}
