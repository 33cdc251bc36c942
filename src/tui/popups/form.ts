import {
  FORM_HELP_TEXT,
  KEY_BACKSPACE,
  KEY_DELETE,
  KEY_END,
  KEY_ENTER,
  KEY_ESCAPE,
  KEY_HOME,
  KEY_LEFT,
  KEY_RIGHT,
  KEY_SHIFT_TAB,
  KEY_TAB,
} from '../constants.js';
import { UIElement } from '../element.js';
import { FormModel, type FormField, type FormFieldOptions } from '../implementations/form.js';
import { insertableChar } from '../keys.js';
import type { Renderer } from '../renderer.js';
import type { MouseAction, Point } from '../types.js';
import { Popup, type PopupHost, type PopupOptions } from './popup.js';

export type FormCommand = (values: Record<string, string>) => void;

const FIELD_SPACING = 5;
const MAX_FORM_WIDTH = 80;

/**
 * One input row of a form, positioned relative to the form.
 */
export class FormFieldElement extends UIElement {
  readonly kind = 'form-field';

  constructor(
    private readonly form: FormPopup,
    readonly field: FormField,
    private readonly index: number
  ) {
    super(index, field.required ? `${field.name} *` : field.name, { padX: 0, padY: 0 });
    this.applyGeometry();
    this.afterResize();
  }

  protected computeStartPosition(): Point {
    const form = this.form.getStartPosition();
    const { padX, padY } = this.form.getPadding();
    return { x: form.x + padX + 2, y: form.y + padY + 2 + this.index * FIELD_SPACING };
  }

  protected computeStopPosition(): Point {
    const start = this.computeStartPosition();
    const stop = this.form.getStopPosition();
    const { padX } = this.form.getPadding();
    return { x: stop.x - padX - 2, y: start.y + 3 };
  }

  protected override afterResize(): void {
    this.field.editor.setViewportWidth(this.getViewportWidth());
  }

  override handleKey(key: string): void {
    const editor = this.field.editor;
    switch (key) {
      case KEY_LEFT: editor.moveLeft(); return;
      case KEY_RIGHT: editor.moveRight(); return;
      case KEY_HOME: editor.jumpToStart(); return;
      case KEY_END: editor.jumpToEnd(); return;
      case KEY_BACKSPACE: editor.eraseChar(); return;
      case KEY_DELETE: editor.deleteChar(); return;
    }
    const ch = insertableChar(key);
    if (ch !== null) editor.insertChar(ch);
  }

  draw(): void {
    const renderer = this.requireRenderer();
    renderer.drawBorder(this);
    const y = this.startY + 1;
    renderer.drawText(this, this.field.editor.getVisibleText(), y);
    if (this.selected) {
      renderer.drawCursor(this.startX + this.padX + 2 + this.field.editor.getCursorColumn(), y);
    }
  }
}

/**
 * Form with one text field per name. Tab moves between fields, Enter
 * validates and submits the values, Escape cancels. A failed validation
 * keeps the popup and its text and shows a warning over it.
 */
export class FormPopup extends Popup {
  readonly popupKind = 'form';
  private readonly model: FormModel;
  private readonly fieldElements: FormFieldElement[];
  private readonly command: FormCommand | null;

  constructor(
    host: PopupHost,
    fieldNames: readonly string[],
    title: string,
    command: FormCommand | null,
    options: PopupOptions & FormFieldOptions = {}
  ) {
    const model = new FormModel(fieldNames, options);
    super(host, title, '', options);
    this.model = model;
    this.command = command;
    this.helpText = FORM_HELP_TEXT;
    // Geometry depends on the field count, which the base constructor could not see
    this.applyGeometry();
    this.fieldElements = model.getFields().map((field, index) => new FormFieldElement(this, field, index));
    this.syncSelection();
  }

  private formSize(): { width: number; height: number } {
    const { rows, cols } = this.host.getScreenSize();
    const fields = this.model ? this.model.numFields : 0;
    const width = cols > MAX_FORM_WIDTH + 6 ? MAX_FORM_WIDTH : cols - 6;
    const height = Math.min(rows - 2, 4 + 2 * this.padY + FIELD_SPACING * fields);
    return { width, height };
  }

  protected override computeStartPosition(): Point {
    const { rows, cols } = this.host.getScreenSize();
    const { width, height } = this.formSize();
    return { x: Math.floor((cols - width) / 2), y: Math.floor((rows - height) / 2) };
  }

  protected override computeStopPosition(): Point {
    const start = this.computeStartPosition();
    const { width, height } = this.formSize();
    return { x: start.x + width, y: start.y + height };
  }

  override setRenderer(renderer: Renderer): void {
    super.setRenderer(renderer);
    for (const element of this.fieldElements) element.setRenderer(renderer);
  }

  protected override afterResize(): void {
    for (const element of this.fieldElements) element.updateDimensions();
  }

  getModel(): FormModel {
    return this.model;
  }

  getFieldElements(): readonly FormFieldElement[] {
    return this.fieldElements;
  }

  private syncSelection(): void {
    const selected = this.model.getSelectedIndex();
    this.fieldElements.forEach((element, index) => element.setSelected(index === selected));
  }

  private submit(): void {
    const result = this.model.validate();
    if (!result.valid) {
      this.showWarning(result.message, `Required fields: ${result.missing.join(', ')}`);
      return;
    }
    this.close();
    if (this.command) this.command(this.model.getValues());
    else this.logger.warn(`Form '${this.title}' has no command`);
  }

  protected override onKey(key: string): void {
    switch (key) {
      case KEY_TAB:
        this.model.nextField();
        this.syncSelection();
        return;
      case KEY_SHIFT_TAB:
        this.model.previousField();
        this.syncSelection();
        return;
      case KEY_ENTER:
        this.submit();
        return;
      case KEY_ESCAPE:
        this.close();
        return;
    }
    this.fieldElements[this.model.getSelectedIndex()]?.handleKey(key);
  }

  protected override onMouse(x: number, y: number, _action: MouseAction): void {
    const index = this.fieldElements.findIndex(element => element.containsPosition(x, y));
    if (index < 0) return;
    this.model.setSelectedIndex(index);
    this.syncSelection();
  }

  protected drawPopup(): void {
    this.drawFrame();
    for (const element of this.fieldElements) element.draw();
  }
}
