import { createSilentLogger, type Logger } from '../../logger.js';
import { WHITE_ON_BLACK } from '../colors.js';
import { KEY_ENTER, KEY_ESCAPE, KEY_SPACE, POPUP_HELP_TEXT } from '../constants.js';
import { UIElement } from '../element.js';
import type { MouseAction, Point, TerminalSize } from '../types.js';

export type PopupKind =
  | 'message'
  | 'yes-no'
  | 'text-box'
  | 'menu'
  | 'loading-icon'
  | 'loading-bar'
  | 'form'
  | 'file-dialog';

/**
 * Owner of a popup: the controller for top-level popups, or another popup
 * for the warnings a form or file dialog layers over itself.
 */
export interface PopupHost {
  getScreenSize(): TerminalSize;
  closePopup(popup: Popup): void;
  /** False once the host has been told the background work finished. */
  isLoading(): boolean;
}

export interface PopupOptions {
  color?: number;
  padX?: number;
  padY?: number;
  logger?: Logger;
}

/**
 * Modal element centered over the screen. While open it receives all input.
 * A popup may hold one nested popup, which then takes input and draws on top.
 */
export abstract class Popup extends UIElement implements PopupHost {
  readonly kind = 'popup';
  abstract readonly popupKind: PopupKind;
  protected readonly host: PopupHost;
  protected text: string;
  private nested: Popup | null = null;

  constructor(host: PopupHost, title: string, text: string, options: PopupOptions = {}) {
    super(-1, title, { padX: options.padX ?? 1, padY: options.padY ?? 0, logger: options.logger ?? createSilentLogger() });
    this.host = host;
    this.text = text;
    this.color = options.color ?? WHITE_ON_BLACK;
    this.borderColor = this.color;
    this.focusBorderColor = this.color;
    this.selected = true;
    this.helpText = POPUP_HELP_TEXT;
    this.applyGeometry();
  }

  protected computeStartPosition(): Point {
    const { rows, cols } = this.host.getScreenSize();
    return { x: Math.floor(cols / 4), y: Math.floor(rows / 3) };
  }

  protected computeStopPosition(): Point {
    const { rows, cols } = this.host.getScreenSize();
    return { x: Math.floor((3 * cols) / 4), y: Math.floor((2 * rows) / 3) };
  }

  getText(): string {
    return this.text;
  }

  setText(text: string): void {
    this.text = text;
  }

  /** Loading popups ignore keys and close themselves when their work completes. */
  isLoadingPopup(): boolean {
    return false;
  }

  close(): void {
    this.host.closePopup(this);
  }

  getNestedPopup(): Popup | null {
    return this.nested;
  }

  /** Layer a popup (usually a warning) over this one. */
  showNestedPopup(popup: Popup): void {
    if (this.renderer) popup.setRenderer(this.renderer);
    this.nested = popup;
  }

  showWarning(title: string, text: string, color?: number): void {
    const warning = new MessagePopup(this, title, text, { color: color ?? this.color, logger: this.logger });
    this.showNestedPopup(warning);
  }

  // PopupHost, for nested popups
  getScreenSize(): TerminalSize {
    return this.host.getScreenSize();
  }

  closePopup(popup: Popup): void {
    if (this.nested === popup) this.nested = null;
  }

  isLoading(): boolean {
    return this.host.isLoading();
  }

  override updateDimensions(): void {
    super.updateDimensions();
    this.nested?.updateDimensions();
  }

  override getHelpText(): string {
    return this.nested ? this.nested.getHelpText() : this.helpText;
  }

  override handleKey(key: string): void {
    if (this.nested) {
      this.nested.handleKey(key);
      return;
    }
    this.onKey(key);
  }

  override handleMouse(x: number, y: number, action: MouseAction): void {
    if (this.nested) {
      if (this.nested.containsPosition(x, y)) this.nested.handleMouse(x, y, action);
      return;
    }
    this.onMouse(x, y, action);
    super.handleMouse(x, y, action);
  }

  protected onKey(_key: string): void {}

  protected onMouse(_x: number, _y: number, _action: MouseAction): void {}

  draw(): void {
    this.drawPopup();
    this.nested?.draw();
  }

  protected abstract drawPopup(): void;

  /** Border over a blanked interior. */
  protected drawFrame(): void {
    const renderer = this.requireRenderer();
    renderer.drawBorder(this, { fill: true });
  }

  protected drawCenteredText(text: string, rowOffset = 0): void {
    const renderer = this.requireRenderer();
    const y = this.startY + Math.floor(this.height / 2) + rowOffset;
    renderer.drawText(this, text, y, { centered: true });
  }
}

/**
 * Message box. Enter, Space or Escape closes it.
 */
export class MessagePopup extends Popup {
  readonly popupKind = 'message';

  protected override onKey(key: string): void {
    if (key === KEY_ENTER || key === KEY_SPACE || key === KEY_ESCAPE) this.close();
  }

  protected override onMouse(_x: number, _y: number, action: MouseAction): void {
    if (action === 'left-double-click') this.close();
  }

  protected drawPopup(): void {
    this.drawFrame();
    this.drawCenteredText(this.text);
  }
}
