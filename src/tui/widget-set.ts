import { createSilentLogger, type Logger } from '../logger.js';
import { Grid } from './grid.js';
import type { Renderer } from './renderer.js';
import { Button, type ButtonCommand } from './widgets/button.js';
import { CheckboxMenu, type CheckboxMenuOptions } from './widgets/checkbox-menu.js';
import { BlockLabel, Label } from './widgets/label.js';
import { ScrollMenu, type ScrollMenuOptions } from './widgets/scroll-menu.js';
import { SliderWidget, type SliderOptions } from './widgets/slider.js';
import { ScrollTextBlock, type TextBlockOptions } from './widgets/text-block.js';
import { TextBox, type TextBoxOptions } from './widgets/text-box.js';
import type { Widget } from './widgets/widget.js';
import type { ElementOptions } from './element.js';

export type Keybinding = () => void;

export interface WidgetSetOptions {
  logger?: Logger;
  titleBarOffset?: number;
  renderer?: Renderer | null;
}

/**
 * A screen: a grid, the widgets placed on it and the keybindings active in
 * overview mode. Widget ids are handed out sequentially and never reused, so
 * a removed widget's id stays invalid.
 */
export class WidgetSet {
  readonly grid: Grid;
  private readonly widgets = new Map<number, Widget>();
  private readonly keybindings = new Map<string, Keybinding>();
  private nextId = 0;
  private selectedWidgetId: number | null = null;
  private renderer: Renderer | null;
  private logger: Logger;

  constructor(numRows: number, numCols: number, height: number, width: number, options: WidgetSetOptions = {}) {
    this.grid = new Grid(numRows, numCols, height, width, options.titleBarOffset ?? 0);
    this.logger = options.logger ?? createSilentLogger();
    this.renderer = options.renderer ?? null;
  }

  getWidgets(): ReadonlyMap<number, Widget> {
    return this.widgets;
  }

  /** Widget with this id, or undefined for unknown and removed ids. */
  getWidget(id: number): Widget | undefined {
    return this.widgets.get(id);
  }

  getSelectedWidgetId(): number | null {
    return this.selectedWidgetId;
  }

  getSelectedWidget(): Widget | undefined {
    return this.selectedWidgetId === null ? undefined : this.widgets.get(this.selectedWidgetId);
  }

  /** Select a widget for overview navigation. Unknown or unselectable ids are rejected. */
  setSelectedWidget(id: number): boolean {
    const widget = this.widgets.get(id);
    if (!widget || !widget.isSelectable()) return false;
    this.selectedWidgetId = id;
    return true;
  }

  clearSelectedWidget(): void {
    this.selectedWidgetId = null;
  }

  forgetWidget(widget: Widget | number): boolean {
    const id = typeof widget === 'number' ? widget : widget.id;
    const existing = this.widgets.get(id);
    if (!existing || (typeof widget !== 'number' && existing !== widget)) return false;
    this.widgets.delete(id);
    if (this.selectedWidgetId === id) {
      this.selectedWidgetId = null;
      const next = this.selectableWidgets()[0];
      if (next) this.selectedWidgetId = next.id;
    }
    this.logger.debug(`Removed widget ${id} '${existing.getTitle()}'`);
    return true;
  }

  selectableWidgets(): Widget[] {
    return Array.from(this.widgets.values()).filter(widget => widget.isSelectable());
  }

  addKeyCommand(key: string, command: Keybinding): void {
    this.keybindings.set(key, command);
  }

  removeKeyCommand(key: string): void {
    this.keybindings.delete(key);
  }

  getKeybindings(): ReadonlyMap<string, Keybinding> {
    return this.keybindings;
  }

  setLogger(logger: Logger): void {
    this.logger = logger;
    for (const widget of this.widgets.values()) widget.setLogger(logger);
  }

  setRenderer(renderer: Renderer): void {
    this.renderer = renderer;
    for (const widget of this.widgets.values()) widget.setRenderer(renderer);
  }

  /** Resize the grid, then every widget. Throws `TerminalTooSmallError` without changing anything. */
  resize(height: number, width: number): void {
    this.grid.resize(height, width);
    this.updateDimensions();
  }

  updateDimensions(): void {
    for (const widget of this.widgets.values()) widget.updateDimensions();
  }

  /** Register a widget built by `create` with the next id. */
  addWidget<W extends Widget>(create: (id: number, grid: Grid) => W): W {
    const widget = create(this.nextId, this.grid);
    this.nextId++;
    this.widgets.set(widget.id, widget);
    if (this.renderer) widget.setRenderer(this.renderer);
    if (this.selectedWidgetId === null && widget.isSelectable()) this.selectedWidgetId = widget.id;
    this.logger.debug(`Added ${widget.kind} ${widget.id} '${widget.getTitle()}'`);
    return widget;
  }

  addScrollMenu<T = string>(
    title: string, row: number, column: number, rowSpan = 1, columnSpan = 1, options?: ScrollMenuOptions<T>
  ): ScrollMenu<T> {
    return this.addWidget((id, grid) =>
      new ScrollMenu<T>(id, title, grid, row, column, rowSpan, columnSpan, { logger: this.logger, ...options }));
  }

  addCheckboxMenu<T = string>(
    title: string, row: number, column: number, rowSpan = 1, columnSpan = 1, options?: CheckboxMenuOptions<T>
  ): CheckboxMenu<T> {
    return this.addWidget((id, grid) =>
      new CheckboxMenu<T>(id, title, grid, row, column, rowSpan, columnSpan, { logger: this.logger, ...options }));
  }

  addTextBox(
    title: string, row: number, column: number, rowSpan = 1, columnSpan = 1, options?: TextBoxOptions
  ): TextBox {
    return this.addWidget((id, grid) =>
      new TextBox(id, title, grid, row, column, rowSpan, columnSpan, { logger: this.logger, ...options }));
  }

  addTextBlock(
    title: string, row: number, column: number, rowSpan = 1, columnSpan = 1, options?: TextBlockOptions
  ): ScrollTextBlock {
    return this.addWidget((id, grid) =>
      new ScrollTextBlock(id, title, grid, row, column, rowSpan, columnSpan, { logger: this.logger, ...options }));
  }

  addLabel(title: string, row: number, column: number, rowSpan = 1, columnSpan = 1, options?: ElementOptions): Label {
    return this.addWidget((id, grid) =>
      new Label(id, title, grid, row, column, rowSpan, columnSpan, { logger: this.logger, ...options }));
  }

  addBlockLabel(
    title: string, row: number, column: number, rowSpan = 1, columnSpan = 1,
    options?: ElementOptions & { center?: boolean }
  ): BlockLabel {
    return this.addWidget((id, grid) =>
      new BlockLabel(id, title, grid, row, column, rowSpan, columnSpan, { logger: this.logger, ...options }));
  }

  addButton(
    title: string, row: number, column: number, rowSpan = 1, columnSpan = 1,
    command: ButtonCommand | null = null, options?: ElementOptions
  ): Button {
    return this.addWidget((id, grid) =>
      new Button(id, title, grid, row, column, rowSpan, columnSpan, { logger: this.logger, ...options }, command));
  }

  addSlider(
    title: string, row: number, column: number, rowSpan = 1, columnSpan = 1, options?: SliderOptions
  ): SliderWidget {
    return this.addWidget((id, grid) =>
      new SliderWidget(id, title, grid, row, column, rowSpan, columnSpan, { logger: this.logger, ...options }));
  }
}
