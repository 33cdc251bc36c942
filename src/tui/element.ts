import { RendererError } from '../errors.js';
import { createSilentLogger, type Logger } from '../logger.js';
import {
  BLACK_ON_GREEN,
  ColorRule,
  WHITE_ON_BLACK,
  type MatchType,
  type RuleType,
} from './colors.js';
import { WIDGET_HELP_TEXT } from './constants.js';
import type { Renderer } from './renderer.js';
import type { MouseAction, Point } from './types.js';

/**
 * Closed set of element kinds. Dispatch decisions that depend on the kind of
 * element (auto-pressing buttons, cycling, status text) read this tag.
 */
export type ElementKind =
  | 'scroll-menu'
  | 'checkbox-menu'
  | 'text-box'
  | 'text-block'
  | 'label'
  | 'block-label'
  | 'button'
  | 'slider'
  | 'popup'
  | 'form-field'
  | 'dialog-item'
  | 'live-debug';

export type MousePressHandler = (x: number, y: number, action: MouseAction) => void;

export interface ElementOptions {
  padX?: number;
  padY?: number;
  logger?: Logger;
  selectable?: boolean;
}

/**
 * Base contract of everything drawn on screen: widgets, popups and the
 * sub-elements of forms and dialogs.
 *
 * Absolute position is computed by the concrete type and cached by
 * `updateDimensions()`; call it after resizes and widget-set swaps.
 */
export abstract class UIElement {
  abstract readonly kind: ElementKind;

  readonly id: number;
  protected title: string;
  protected padX: number;
  protected padY: number;
  protected logger: Logger;
  protected renderer: Renderer | null = null;

  protected startX = 0;
  protected startY = 0;
  protected stopX = 0;
  protected stopY = 0;
  protected height = 0;
  protected width = 0;

  protected color = WHITE_ON_BLACK;
  protected borderColor = WHITE_ON_BLACK;
  protected focusBorderColor = WHITE_ON_BLACK;
  protected selectedColor = BLACK_ON_GREEN;

  protected selected = false;
  protected hovered = false;
  protected readonly selectable: boolean;
  protected helpText = WIDGET_HELP_TEXT;
  protected readonly colorRules: ColorRule[] = [];
  private mousePressHandler: MousePressHandler | null = null;

  constructor(id: number, title: string, options: ElementOptions = {}) {
    this.id = id;
    this.title = title;
    this.padX = options.padX ?? 1;
    this.padY = options.padY ?? 0;
    this.logger = options.logger ?? createSilentLogger();
    this.selectable = options.selectable ?? true;
  }

  protected abstract computeStartPosition(): Point;
  protected abstract computeStopPosition(): Point;

  /** Paint the element. Only the backend is mutated (animation counters aside). */
  abstract draw(): void;

  updateDimensions(): void {
    this.applyGeometry();
    this.afterResize();
  }

  /**
   * Recompute the cached position. Constructors call this directly since
   * `afterResize` overrides may read fields that are not initialized yet.
   */
  protected applyGeometry(): void {
    const start = this.computeStartPosition();
    const stop = this.computeStopPosition();
    this.startX = start.x;
    this.startY = start.y;
    this.stopX = stop.x;
    this.stopY = stop.y;
    this.width = stop.x - start.x;
    this.height = stop.y - start.y;
  }

  /** Hook for state derived from the element's size (viewports, centering). */
  protected afterResize(): void {}

  getStartPosition(): Point {
    return { x: this.startX, y: this.startY };
  }

  /** Exclusive bottom-right corner. */
  getStopPosition(): Point {
    return { x: this.stopX, y: this.stopY };
  }

  getAbsoluteDimensions(): { height: number; width: number } {
    return { height: this.height, width: this.width };
  }

  getPadding(): { padX: number; padY: number } {
    return { padX: this.padX, padY: this.padY };
  }

  /** Rows visible inside the border. */
  getViewportHeight(): number {
    return Math.max(0, this.height - 2 * this.padY - 2);
  }

  /** Columns of text visible inside the border (`'| ' + text + ' |'`). */
  getViewportWidth(): number {
    return Math.max(0, this.width - 2 * this.padX - 4);
  }

  containsPosition(x: number, y: number): boolean {
    return x >= this.startX && x < this.stopX && y >= this.startY && y < this.stopY;
  }

  getTitle(): string {
    return this.title;
  }

  setTitle(title: string): void {
    this.title = title;
  }

  isSelectable(): boolean {
    return this.selectable;
  }

  isSelected(): boolean {
    return this.selected;
  }

  setSelected(selected: boolean): void {
    this.selected = selected;
  }

  isHovered(): boolean {
    return this.hovered;
  }

  setHovered(hovered: boolean): void {
    this.hovered = hovered;
  }

  getHelpText(): string {
    return this.helpText;
  }

  setHelpText(text: string): void {
    this.helpText = text;
  }

  getColor(): number { return this.color; }
  setColor(color: number): void { this.color = color; }
  getBorderColor(): number { return this.borderColor; }
  setBorderColor(color: number): void { this.borderColor = color; }
  getFocusBorderColor(): number { return this.focusBorderColor; }
  setFocusBorderColor(color: number): void { this.focusBorderColor = color; }
  getSelectedColor(): number { return this.selectedColor; }
  setSelectedColor(color: number): void { this.selectedColor = color; }

  getColorRules(): readonly ColorRule[] {
    return this.colorRules;
  }

  addTextColorRule(
    pattern: string,
    color: number,
    ruleType: RuleType,
    matchType: MatchType = 'line',
    region?: [number, number],
    includeWhitespace = false
  ): void {
    this.colorRules.push(new ColorRule({ pattern, color, ruleType, matchType, region, includeWhitespace }));
  }

  clearTextColorRules(): void {
    this.colorRules.length = 0;
  }

  setLogger(logger: Logger): void {
    this.logger = logger;
  }

  setRenderer(renderer: Renderer): void {
    this.renderer = renderer;
  }

  hasRenderer(): boolean {
    return this.renderer !== null;
  }

  protected requireRenderer(): Renderer {
    if (!this.renderer) {
      throw new RendererError(`Element '${this.title}' has no renderer assigned`);
    }
    return this.renderer;
  }

  addMousePressHandler(handler: MousePressHandler): void {
    this.mousePressHandler = handler;
  }

  handleKey(_key: string): void {}

  handleMouse(x: number, y: number, action: MouseAction): void {
    this.mousePressHandler?.(x, y, action);
  }
}
