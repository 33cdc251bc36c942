/**
 * TUI controller: owns the active widget set, the popup stack slot, focus
 * state and the input/render loop.
 */

import type { BorderStyle } from '../config.js';
import { GridTuiError, TerminalTooSmallError } from '../errors.js';
import { createSilentLogger, type Logger } from '../logger.js';
import { BlessedBackend } from './backend/blessed-backend.js';
import type { TerminalBackend } from './backend/types.js';
import {
  ColorRegistry,
  RED_ON_BLACK,
  WHITE_ON_BLACK,
  YELLOW_ON_BLACK,
  type ColorValue,
} from './colors.js';
import {
  ASCII_BORDERS,
  KEY_DOWN,
  KEY_ENTER,
  KEY_ESCAPE,
  KEY_LEFT,
  KEY_QUIT,
  KEY_RIGHT,
  KEY_SHIFT_TAB,
  KEY_TAB,
  KEY_UP,
  LOADING_POLL_MS,
  OVERVIEW_HELP_TEXT,
  TOO_SMALL_HINT,
  UNICODE_BORDERS,
} from './constants.js';
import type { UIElement } from './element.js';
import { LiveDebugElement } from './live-debug.js';
import { type FileDialogType } from './implementations/file-select.js';
import { FileDialogPopup, type FileDialogCommand, type FileDialogOptions } from './popups/file-dialog.js';
import { FormPopup, type FormCommand } from './popups/form.js';
import { LoadingBarPopup, LoadingIconPopup } from './popups/loading.js';
import { MenuPopup, type MenuCommand, type MenuPopupOptions } from './popups/menu.js';
import { MessagePopup, type Popup, type PopupHost } from './popups/popup.js';
import { TextBoxPopup, type TextCommand } from './popups/text-box.js';
import { YesNoPopup, type YesNoCommand } from './popups/yes-no.js';
import type { FormFieldOptions } from './implementations/form.js';
import { fitText, Renderer } from './renderer.js';
import { StatusBar } from './status-bar.js';
import type { InputEvent, MouseAction, TerminalSize } from './types.js';
import { WidgetSet, type Keybinding } from './widget-set.js';
import type { Button, ButtonCommand } from './widgets/button.js';
import type { CheckboxMenu, CheckboxMenuOptions } from './widgets/checkbox-menu.js';
import type { BlockLabel, Label } from './widgets/label.js';
import type { ScrollMenu, ScrollMenuOptions } from './widgets/scroll-menu.js';
import type { SliderOptions, SliderWidget } from './widgets/slider.js';
import type { ScrollTextBlock, TextBlockOptions } from './widgets/text-block.js';
import type { TextBox, TextBoxOptions } from './widgets/text-box.js';
import type { Widget } from './widgets/widget.js';
import type { ElementOptions } from './element.js';

export type Direction = 'up' | 'down' | 'left' | 'right';

export interface CycleKeys {
  forward: string;
  reverse: string;
}

export interface ControllerOptions {
  title?: string;
  exitKey?: string;
  cycleKeys?: CycleKeys;
  autoFocusButtons?: boolean;
  /** Fixed poll timeout in milliseconds; null waits for input indefinitely */
  refreshTimeoutMs?: number | null;
  borders?: BorderStyle;
  mouse?: boolean;
  liveDebugKey?: string | null;
  showTitleBar?: boolean;
  showStatusBar?: boolean;
  logger?: Logger;
}

export interface TuiControllerDeps {
  backend?: TerminalBackend;
  createBackend?: (options: { mouse: boolean }) => TerminalBackend;
}

type PostLoadingCallback = () => void;

const DIRECTION_KEYS: Record<string, Direction> = {
  [KEY_UP]: 'up',
  [KEY_DOWN]: 'down',
  [KEY_LEFT]: 'left',
  [KEY_RIGHT]: 'right',
};

function errorName(err: unknown): string {
  return err instanceof Error ? err.name : 'Error';
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class TuiController implements PopupHost {
  readonly backend: TerminalBackend;
  readonly renderer: Renderer;
  readonly colors = new ColorRegistry();
  private readonly logger: Logger;

  private widgetSet: WidgetSet;
  private popup: Popup | null = null;
  private focused = false;
  private liveDebug: LiveDebugElement;
  private liveDebugMode = false;
  private loading = false;
  private stopped = false;
  private running = false;
  private postLoadingCallback: PostLoadingCallback | null = null;
  private tooSmall: TerminalTooSmallError | null = null;
  private readonly exitCallbacks: Array<() => void> = [];

  private exitKey: string;
  private cycleKeys: CycleKeys;
  private autoFocusButtons: boolean;
  private refreshTimeoutMs: number | null;
  private liveDebugKey: string | null;
  private readonly titleBar: StatusBar | null;
  private readonly statusBar: StatusBar | null;
  private statusBarText = OVERVIEW_HELP_TEXT;
  private size: TerminalSize;

  constructor(
    numRows: number,
    numCols: number,
    options: ControllerOptions = {},
    deps: TuiControllerDeps = {}
  ) {
    this.logger = options.logger ?? createSilentLogger();
    const mouse = options.mouse ?? true;
    this.backend = deps.backend ?? (deps.createBackend ?? (opts => new BlessedBackend(opts)))({ mouse });
    this.renderer = new Renderer(this.backend, options.borders === 'unicode' ? UNICODE_BORDERS : ASCII_BORDERS);
    for (const [id, pair] of this.colors.entries()) {
      this.backend.setColorPair(id, pair.fg, pair.bg);
    }

    this.exitKey = options.exitKey ?? KEY_QUIT;
    this.cycleKeys = options.cycleKeys ?? { forward: KEY_TAB, reverse: KEY_SHIFT_TAB };
    this.autoFocusButtons = options.autoFocusButtons ?? true;
    this.refreshTimeoutMs = options.refreshTimeoutMs ?? null;
    this.liveDebugKey = options.liveDebugKey ?? null;
    this.titleBar = options.showTitleBar === false ? null : new StatusBar(options.title ?? 'gridtui', { centered: true });
    this.statusBar = options.showStatusBar === false ? null : new StatusBar(OVERVIEW_HELP_TEXT);

    this.size = this.backend.getSize();
    const area = this.gridArea();
    try {
      // Fails with TerminalTooSmallError when the terminal cannot hold the grid
      this.widgetSet = new WidgetSet(numRows, numCols, area.height, area.width, {
        logger: this.logger,
        titleBarOffset: this.titleBar ? 1 : 0,
        renderer: this.renderer,
      });
    } catch (error) {
      // An injected backend belongs to the caller
      if (!deps.backend) this.backend.stop();
      throw error;
    }
    this.liveDebug = new LiveDebugElement(() => this.size, this.logger);
    this.liveDebug.setRenderer(this.renderer);
    this.liveDebug.attach();
    this.logger.debug(`Controller created with a ${numRows}x${numCols} grid on ${this.size.rows}x${this.size.cols}`);
  }

  private gridArea(): { height: number; width: number } {
    const bars = (this.titleBar ? 1 : 0) + (this.statusBar ? 1 : 0);
    return { height: this.size.rows - bars, width: this.size.cols };
  }

  // ---------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------

  /**
   * Take over the terminal and run the loop until the exit key is pressed in
   * overview mode or `stop()` is called.
   */
  async start(): Promise<void> {
    if (this.running) throw new GridTuiError('Controller is already running');
    this.running = true;
    this.stopped = false;
    this.liveDebug.attach();
    this.backend.start();
    this.logger.info('Starting main loop');
    try {
      this.tick(null);
      while (!this.stopped) {
        const event = await this.backend.pollEvent(this.pollTimeout());
        if (this.stopped) break;
        this.tick(event);
      }
    } finally {
      this.running = false;
      this.liveDebug.detach();
      this.backend.stop();
      this.logger.info('Main loop stopped');
      for (const callback of this.exitCallbacks) callback();
    }
  }

  /** Give the terminal back without running the loop, e.g. after building the UI failed. */
  close(): void {
    if (this.running) throw new GridTuiError('Controller is running; call stop() instead');
    this.liveDebug.detach();
    this.backend.stop();
  }

  /** Ask the loop to exit after the current iteration. */
  stop(): void {
    this.logger.debug('Stop requested');
    this.stopped = true;
    this.backend.wake();
  }

  isStopped(): boolean {
    return this.stopped;
  }

  runOnExit(callback: () => void): void {
    this.exitCallbacks.push(callback);
  }

  /** Fixed poll timeout; null restores indefinite waits. */
  setRefreshTimeout(timeoutMs: number | null): void {
    this.refreshTimeoutMs = timeoutMs;
  }

  pollTimeout(): number | null {
    const animating = this.loading || this.postLoadingCallback !== null || (this.popup?.isLoadingPopup() ?? false);
    if (animating) return LOADING_POLL_MS;
    return this.refreshTimeoutMs;
  }

  /**
   * One loop iteration: apply `event` (null for a plain redraw) and render.
   */
  tick(event: InputEvent | null): void {
    if (event?.type === 'resize') this.handleResize(event.rows, event.cols);
    if (event?.type === 'mouse') this.safely(() => this.handleMouseEvent(event.x, event.y, event.action));
    this.runPostLoadingCallback();
    if (event?.type === 'key') this.safely(() => this.handleKeyEvent(event.key));
    this.render();
  }

  /** Run a dispatch step; errors from user callbacks are logged and shown in an error popup. */
  private safely(step: () => void): void {
    try {
      step();
    } catch (err) {
      this.logger.error(`${errorName(err)} during input dispatch: ${errorMessage(err)}`);
      this.showErrorPopup(errorName(err), errorMessage(err));
    }
  }

  // ---------------------------------------------------------------------
  // Resize
  // ---------------------------------------------------------------------

  private handleResize(rows: number, cols: number): void {
    this.size = { rows, cols };
    const area = this.gridArea();
    try {
      this.widgetSet.resize(area.height, area.width);
      if (this.tooSmall) this.logger.info(`Terminal resized to ${rows}x${cols}, resuming`);
      this.tooSmall = null;
    } catch (err) {
      if (!(err instanceof TerminalTooSmallError)) throw err;
      this.tooSmall = err;
      this.logger.warn(`Terminal resized to ${rows}x${cols}: ${err.message}`);
      return;
    }
    this.popup?.updateDimensions();
    this.liveDebug.updateDimensions();
  }

  isTerminalTooSmall(): boolean {
    return this.tooSmall !== null;
  }

  getScreenSize(): TerminalSize {
    return this.size;
  }

  // ---------------------------------------------------------------------
  // Mouse
  // ---------------------------------------------------------------------

  /** Topmost element at a screen position: popup, live debug panel, then widgets. */
  getElementAtPosition(x: number, y: number): UIElement | null {
    if (this.popup?.containsPosition(x, y)) return this.popup;
    if (this.liveDebugMode && this.liveDebug.containsPosition(x, y)) return this.liveDebug;
    return this.widgetAtPosition(x, y) ?? null;
  }

  private widgetAtPosition(x: number, y: number): Widget | undefined {
    for (const widget of this.widgetSet.getWidgets().values()) {
      if (widget.containsPosition(x, y)) return widget;
    }
    return undefined;
  }

  private handleMouseEvent(x: number, y: number, action: MouseAction): void {
    if (this.tooSmall) return;
    if (this.popup) {
      if (this.popup.containsPosition(x, y)) this.popup.handleMouse(x, y, action);
      return;
    }
    if (this.liveDebugMode) {
      if (this.liveDebug.containsPosition(x, y)) this.liveDebug.handleMouse(x, y, action);
      return;
    }
    const widget = this.widgetAtPosition(x, y);
    if (!widget || !widget.isSelectable()) return;

    const current = this.widgetSet.getSelectedWidget();
    if (!(this.focused && current === widget)) {
      if (widget.isButton && this.autoFocusButtons) {
        this.moveFocus(widget, true);
        return;
      }
      this.moveFocus(widget, false);
    }
    widget.handleMouse(x, y, action);
  }

  // ---------------------------------------------------------------------
  // Keys
  // ---------------------------------------------------------------------

  private handleKeyEvent(key: string): void {
    if (this.tooSmall) {
      if (key === this.exitKey && !this.focused && !this.popup) this.stop();
      return;
    }
    if (this.handleCycleKey(key)) return;

    if (this.popup) {
      if (this.popup.isLoadingPopup()) return;
      this.popup.handleKey(key);
      return;
    }
    if (this.liveDebugMode) {
      if (this.liveDebug.handleDebugKey(key)) this.liveDebugMode = false;
      return;
    }
    if (this.liveDebugKey !== null && key === this.liveDebugKey && !this.focused) {
      this.toggleLiveDebugMode();
      return;
    }

    const selected = this.widgetSet.getSelectedWidget();
    if (this.focused && selected) {
      if (key === KEY_ESCAPE) {
        this.loseFocus();
        return;
      }
      selected.handleKey(key);
      return;
    }
    this.handleOverviewKey(key, selected);
  }

  private handleCycleKey(key: string): boolean {
    const { forward, reverse } = this.cycleKeys;
    if (key !== forward && key !== reverse) return false;
    if (this.popup || this.liveDebugMode) return false;
    const selected = this.widgetSet.getSelectedWidget();
    if (this.focused && selected?.claimsKey(key)) return false;

    const next = this.cycleTarget(key === forward ? 1 : -1);
    if (!next) return true;
    if (this.focused) {
      this.loseFocus();
      this.moveFocus(next, false);
    } else {
      this.widgetSet.setSelectedWidget(next.id);
    }
    return true;
  }

  private cycleTarget(step: 1 | -1): Widget | undefined {
    const widgets = this.widgetSet.selectableWidgets();
    if (widgets.length === 0) return undefined;
    const currentId = this.widgetSet.getSelectedWidgetId();
    const index = widgets.findIndex(widget => widget.id === currentId);
    if (index < 0) return widgets[0];
    return widgets[(index + step + widgets.length) % widgets.length];
  }

  private handleOverviewKey(key: string, selected: Widget | undefined): void {
    if (key === this.exitKey) {
      this.stop();
      return;
    }
    if (key === KEY_ENTER) {
      if (selected) this.moveFocus(selected);
      return;
    }
    const binding = this.widgetSet.getKeybindings().get(key);
    if (binding) {
      binding();
      return;
    }
    const direction = DIRECTION_KEYS[key];
    if (direction && selected) {
      const neighbor = this.findNeighbor(selected, direction);
      if (neighbor) this.widgetSet.setSelectedWidget(neighbor.id);
    }
  }

  /**
   * Nearest selectable widget past `widget`'s edge in `direction`. Cells are
   * scanned outward along the rows (or columns) the widget covers; for left
   * and up the scan runs from the grid edge inward, so the candidates are
   * reversed to put the closest first.
   */
  findNeighbor(widget: Widget, direction: Direction): Widget | undefined {
    const grid = this.widgetSet.grid;
    const [row, column] = widget.getGridCell();
    const [rowSpan, columnSpan] = widget.getGridSpan();
    const cells: Array<[number, number]> = [];

    if (direction === 'left' || direction === 'right') {
      const [from, to] = direction === 'right' ? [column + columnSpan, grid.numCols] : [0, column];
      for (let c = from; c < to; c++) {
        for (let r = row; r < row + rowSpan; r++) cells.push([r, c]);
      }
    } else {
      const [from, to] = direction === 'down' ? [row + rowSpan, grid.numRows] : [0, row];
      for (let r = from; r < to; r++) {
        for (let c = column; c < column + columnSpan; c++) cells.push([r, c]);
      }
    }

    const candidates: Widget[] = [];
    for (const [r, c] of cells) {
      for (const candidate of this.widgetSet.getWidgets().values()) {
        if (candidate === widget || !candidate.isSelectable()) continue;
        if (candidate.coversCell(r, c) && !candidates.includes(candidate)) candidates.push(candidate);
      }
    }
    if (direction === 'left' || direction === 'up') candidates.reverse();
    return candidates[0];
  }

  // ---------------------------------------------------------------------
  // Focus
  // ---------------------------------------------------------------------

  /**
   * Select `widget` and enter focus mode on it. Buttons are pressed instead
   * when `autoPressButtons` and the controller's button auto-focus are on.
   */
  moveFocus(widget: Widget, autoPressButtons = true): void {
    this.loseFocus();
    if (!this.widgetSet.setSelectedWidget(widget.id)) return;
    if (widget.isButton && autoPressButtons && this.autoFocusButtons) {
      this.logger.debug(`Pressing button ${widget.id} '${widget.getTitle()}'`);
      widget.activate();
      return;
    }
    this.focused = true;
    widget.setSelected(true);
    this.logger.debug(`Focused widget ${widget.id} '${widget.getTitle()}'`);
  }

  /** Leave focus mode; the widget stays selected for overview navigation. */
  loseFocus(): void {
    if (!this.focused) return;
    this.focused = false;
    this.widgetSet.getSelectedWidget()?.setSelected(false);
    this.renderer.resetCursor();
  }

  isFocused(): boolean {
    return this.focused;
  }

  getSelectedWidget(): Widget | undefined {
    return this.widgetSet.getSelectedWidget();
  }

  setSelectedWidget(id: number): boolean {
    if (this.focused) this.loseFocus();
    return this.widgetSet.setSelectedWidget(id);
  }

  forgetWidget(widget: Widget | number): boolean {
    const id = typeof widget === 'number' ? widget : widget.id;
    if (this.focused && this.widgetSet.getSelectedWidgetId() === id) this.loseFocus();
    return this.widgetSet.forgetWidget(widget);
  }

  // ---------------------------------------------------------------------
  // Widget sets
  // ---------------------------------------------------------------------

  getWidgetSet(): WidgetSet {
    return this.widgetSet;
  }

  /** A set sized to the current grid area, ready for `applyWidgetSet`. */
  createNewWidgetSet(numRows: number, numCols: number): WidgetSet {
    const area = this.gridArea();
    return new WidgetSet(numRows, numCols, area.height, area.width, {
      logger: this.logger,
      titleBarOffset: this.titleBar ? 1 : 0,
      renderer: this.renderer,
    });
  }

  /** Swap in another screen. Focus returns to overview mode. */
  applyWidgetSet(widgetSet: WidgetSet): void {
    this.loseFocus();
    const area = this.gridArea();
    widgetSet.setRenderer(this.renderer);
    widgetSet.setLogger(this.logger);
    widgetSet.grid.setTitleBarOffset(this.titleBar ? 1 : 0);
    try {
      widgetSet.resize(area.height, area.width);
      this.tooSmall = null;
    } catch (err) {
      if (!(err instanceof TerminalTooSmallError)) throw err;
      this.tooSmall = err;
    }
    this.widgetSet = widgetSet;
    this.logger.debug(`Applied widget set with ${widgetSet.getWidgets().size} widgets`);
  }

  addKeyCommand(key: string, command: Keybinding): void {
    this.widgetSet.addKeyCommand(key, command);
  }

  addScrollMenu<T = string>(
    title: string, row: number, column: number, rowSpan = 1, columnSpan = 1, options?: ScrollMenuOptions<T>
  ): ScrollMenu<T> {
    return this.widgetSet.addScrollMenu<T>(title, row, column, rowSpan, columnSpan, options);
  }

  addCheckboxMenu<T = string>(
    title: string, row: number, column: number, rowSpan = 1, columnSpan = 1, options?: CheckboxMenuOptions<T>
  ): CheckboxMenu<T> {
    return this.widgetSet.addCheckboxMenu<T>(title, row, column, rowSpan, columnSpan, options);
  }

  addTextBox(title: string, row: number, column: number, rowSpan = 1, columnSpan = 1, options?: TextBoxOptions): TextBox {
    return this.widgetSet.addTextBox(title, row, column, rowSpan, columnSpan, options);
  }

  addTextBlock(
    title: string, row: number, column: number, rowSpan = 1, columnSpan = 1, options?: TextBlockOptions
  ): ScrollTextBlock {
    return this.widgetSet.addTextBlock(title, row, column, rowSpan, columnSpan, options);
  }

  addLabel(title: string, row: number, column: number, rowSpan = 1, columnSpan = 1, options?: ElementOptions): Label {
    return this.widgetSet.addLabel(title, row, column, rowSpan, columnSpan, options);
  }

  addBlockLabel(
    title: string, row: number, column: number, rowSpan = 1, columnSpan = 1,
    options?: ElementOptions & { center?: boolean }
  ): BlockLabel {
    return this.widgetSet.addBlockLabel(title, row, column, rowSpan, columnSpan, options);
  }

  addButton(
    title: string, row: number, column: number, rowSpan = 1, columnSpan = 1,
    command: ButtonCommand | null = null, options?: ElementOptions
  ): Button {
    return this.widgetSet.addButton(title, row, column, rowSpan, columnSpan, command, options);
  }

  addSlider(
    title: string, row: number, column: number, rowSpan = 1, columnSpan = 1, options?: SliderOptions
  ): SliderWidget {
    return this.widgetSet.addSlider(title, row, column, rowSpan, columnSpan, options);
  }

  // ---------------------------------------------------------------------
  // Popups
  // ---------------------------------------------------------------------

  getPopup(): Popup | null {
    return this.popup;
  }

  /** Open `popup`, replacing any popup already shown. Focus state is kept underneath. */
  showPopup<P extends Popup>(popup: P): P {
    if (this.popup) this.logger.debug(`Replacing popup '${this.popup.getTitle()}'`);
    popup.setRenderer(this.renderer);
    this.popup = popup;
    return popup;
  }

  closePopup(popup?: Popup): void {
    if (popup && popup !== this.popup) return;
    if (this.popup?.isLoadingPopup()) this.loading = false;
    this.popup = null;
  }

  isLoading(): boolean {
    return this.loading;
  }

  showMessagePopup(title: string, text: string, color = WHITE_ON_BLACK): MessagePopup {
    return this.showPopup(new MessagePopup(this, title, text, { color, logger: this.logger }));
  }

  showWarningPopup(title: string, text: string): MessagePopup {
    return this.showMessagePopup(`WARNING - ${title}`, text, YELLOW_ON_BLACK);
  }

  showErrorPopup(title: string, text: string): MessagePopup {
    return this.showMessagePopup(`ERROR - ${title}`, text, RED_ON_BLACK);
  }

  showYesNoPopup(title: string, text: string, command: YesNoCommand): YesNoPopup {
    return this.showPopup(new YesNoPopup(this, title, text, command, {
      color: YELLOW_ON_BLACK,
      logger: this.logger,
    }));
  }

  showTextBoxPopup(
    title: string,
    command: TextCommand,
    options: { initialText?: string; password?: boolean } = {}
  ): TextBoxPopup {
    return this.showPopup(new TextBoxPopup(this, title, command, { ...options, logger: this.logger }));
  }

  showMenuPopup<T = string>(
    title: string,
    items: readonly T[],
    command: MenuCommand<T>,
    options: MenuPopupOptions<T> = {}
  ): MenuPopup<T> {
    return this.showPopup(new MenuPopup<T>(this, items, title, command, { logger: this.logger, ...options }));
  }

  showFormPopup(
    title: string,
    fieldNames: readonly string[],
    command: FormCommand,
    options: FormFieldOptions = {}
  ): FormPopup {
    return this.showPopup(new FormPopup(this, fieldNames, title, command, { ...options, logger: this.logger }));
  }

  showFileDialogPopup(
    dialogType: FileDialogType,
    initialDir: string,
    command: FileDialogCommand,
    options: FileDialogOptions = {}
  ): FileDialogPopup {
    return this.showPopup(new FileDialogPopup(this, initialDir, dialogType, command, { logger: this.logger, ...options }));
  }

  /**
   * Spinner shown until `markComplete()`. `callback` runs once, on the first
   * iteration after loading ends.
   */
  showLoadingIconPopup(title: string, message: string, callback: PostLoadingCallback | null = null): LoadingIconPopup {
    this.loading = true;
    this.postLoadingCallback = callback;
    return this.showPopup(new LoadingIconPopup(this, title, message, { color: YELLOW_ON_BLACK, logger: this.logger }));
  }

  /** Progress bar over `total` steps, advanced by `incrementProgress()`. */
  showLoadingBarPopup(title: string, total: number, callback: PostLoadingCallback | null = null): LoadingBarPopup {
    this.loading = true;
    this.postLoadingCallback = callback;
    return this.showPopup(new LoadingBarPopup(this, title, total, { color: YELLOW_ON_BLACK, logger: this.logger }));
  }

  /** Advance the loading bar by one step; safe to call from timers and promise callbacks. */
  incrementProgress(): void {
    if (this.popup instanceof LoadingBarPopup) this.popup.increment();
  }

  /** Signal that the background work behind a loading popup finished. */
  markComplete(): void {
    this.loading = false;
  }

  private runPostLoadingCallback(): void {
    if (this.loading || this.popup?.isLoadingPopup() || !this.postLoadingCallback) return;
    const callback = this.postLoadingCallback;
    this.postLoadingCallback = null;
    this.safely(callback);
  }

  // ---------------------------------------------------------------------
  // Live debug
  // ---------------------------------------------------------------------

  toggleLiveDebugMode(): void {
    this.liveDebugMode = !this.liveDebugMode;
    if (this.liveDebugMode) {
      this.liveDebug.attach();
      this.liveDebug.updateDimensions();
    }
  }

  isLiveDebugMode(): boolean {
    return this.liveDebugMode;
  }

  getLiveDebugElement(): LiveDebugElement {
    return this.liveDebug;
  }

  // ---------------------------------------------------------------------
  // Appearance
  // ---------------------------------------------------------------------

  setTitle(title: string): void {
    this.titleBar?.setText(title);
  }

  getTitle(): string {
    return this.titleBar?.getText() ?? '';
  }

  setStatusBarText(text: string): void {
    this.statusBarText = text;
  }

  /** Status text for the current state: popup help, focused widget help, or the overview text. */
  getStatusBarText(): string {
    if (this.popup) return this.popup.getHelpText();
    if (this.liveDebugMode) return this.liveDebug.getHelpText();
    const selected = this.widgetSet.getSelectedWidget();
    if (this.focused && selected) return selected.getHelpText();
    return this.statusBarText;
  }

  setTitleBarColor(color: number): void {
    this.titleBar?.setColor(color);
  }

  setStatusBarColor(color: number): void {
    this.statusBar?.setColor(color);
  }

  toggleUnicodeBorders(): void {
    const current = this.renderer.getBorderChars();
    this.renderer.setBorderChars(current === UNICODE_BORDERS ? ASCII_BORDERS : UNICODE_BORDERS);
  }

  setAutoFocusButtons(enabled: boolean): void {
    this.autoFocusButtons = enabled;
  }

  setWidgetCycleKeys(cycleKeys: CycleKeys): void {
    this.cycleKeys = cycleKeys;
  }

  /** Register a custom color pair and return its id. */
  registerColorPair(fg: ColorValue, bg: ColorValue): number {
    const id = this.colors.register(fg, bg);
    this.backend.setColorPair(id, fg, bg);
    return id;
  }

  // ---------------------------------------------------------------------
  // Render
  // ---------------------------------------------------------------------

  render(): void {
    this.backend.clear();
    if (this.tooSmall) {
      this.drawBanner(`${this.tooSmall.name}: ${this.tooSmall.message}`, TOO_SMALL_HINT);
      this.backend.flush();
      return;
    }
    try {
      this.drawScene();
    } catch (err) {
      this.logger.error(`${errorName(err)} while rendering: ${errorMessage(err)}`);
      this.backend.clear();
      this.drawBanner(`${errorName(err)}: ${errorMessage(err)}`, 'See the log for details.');
    }
    this.backend.flush();
  }

  private drawScene(): void {
    const { rows, cols } = this.size;
    this.titleBar?.draw(this.renderer, 0, cols);
    this.statusBar?.draw(this.renderer, rows - 1, cols, this.getStatusBarText());

    const selected = this.widgetSet.getSelectedWidget();
    for (const widget of this.widgetSet.getWidgets().values()) {
      widget.setHovered(!this.focused && widget === selected);
      if (widget !== selected) widget.draw();
    }
    if (!this.focused) this.renderer.resetCursor();
    selected?.draw();

    if (this.popup) {
      this.renderer.resetCursor();
      this.popup.draw();
    }
    if (this.liveDebugMode) this.liveDebug.draw();
  }

  /** Red error text near the top of the screen; drawing failures here are dropped to the log. */
  private drawBanner(message: string, hint: string): void {
    const { rows, cols } = this.size;
    const lines = [message, hint].filter((_, index) => index < rows);
    lines.forEach((line, index) => {
      try {
        this.backend.drawText(0, index, fitText(Math.max(2, cols), line), { color: RED_ON_BLACK, bold: true });
      } catch (err) {
        this.logger.warn(`Could not draw error banner: ${errorMessage(err)}`);
      }
    });
  }
}
