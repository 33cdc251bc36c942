import { DuplicateFormKeyError } from '../../errors.js';
import { TextEditor } from './text-editor.js';

export interface FormFieldOptions {
  passwordFields?: readonly string[];
  requiredFields?: readonly string[];
  initialValues?: Readonly<Record<string, string>>;
}

export interface FormField {
  name: string;
  editor: TextEditor;
  required: boolean;
}

export type FormValidation = { valid: true } | { valid: false; message: string; missing: string[] };

/**
 * Field list of a form: one single-line editor per field, the index of the
 * field being edited, and required-field validation.
 */
export class FormModel {
  private readonly fields: FormField[];
  private selectedIndex = 0;

  constructor(fieldNames: readonly string[], options: FormFieldOptions = {}) {
    const seen = new Set<string>();
    for (const name of fieldNames) {
      if (seen.has(name)) throw new DuplicateFormKeyError(`Form field '${name}' is defined more than once`);
      seen.add(name);
    }
    const passwords = new Set(options.passwordFields ?? []);
    const required = new Set(options.requiredFields ?? []);
    this.fields = fieldNames.map(name => ({
      name,
      editor: new TextEditor(options.initialValues?.[name] ?? '', 0, passwords.has(name)),
      required: required.has(name),
    }));
  }

  getFieldNames(): string[] {
    return this.fields.map(field => field.name);
  }

  getFields(): readonly FormField[] {
    return this.fields;
  }

  get numFields(): number {
    return this.fields.length;
  }

  getField(name: string): FormField | undefined {
    return this.fields.find(field => field.name === name);
  }

  getSelectedIndex(): number {
    return this.selectedIndex;
  }

  setSelectedIndex(index: number): void {
    if (this.fields.length === 0) return;
    this.selectedIndex = Math.min(Math.max(0, index), this.fields.length - 1);
  }

  getSelectedField(): FormField | undefined {
    return this.fields[this.selectedIndex];
  }

  /** Move to the next field, wrapping to the first. */
  nextField(): void {
    if (this.fields.length === 0) return;
    this.selectedIndex = (this.selectedIndex + 1) % this.fields.length;
  }

  previousField(): void {
    if (this.fields.length === 0) return;
    this.selectedIndex = (this.selectedIndex - 1 + this.fields.length) % this.fields.length;
  }

  validate(): FormValidation {
    const missing = this.fields.filter(field => field.required && field.editor.get() === '').map(field => field.name);
    if (missing.length === 0) return { valid: true };
    return { valid: false, message: `Field ${missing[0]} cannot be empty!`, missing };
  }

  getValues(): Record<string, string> {
    const values: Record<string, string> = {};
    for (const field of this.fields) values[field.name] = field.editor.get();
    return values;
  }
}
