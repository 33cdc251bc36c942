/**
 * Public entry point of the gridtui library
 */

export * from './errors.js';
export { Logger, createSilentLogger, formatLogLine, isLogLevel, LOG_LEVELS, type LogLevel, type LogRecord, type LoggerOptions } from './logger.js';
export { createLogFileWriter, rotateLogFile, LOG_ROTATE_BYTES, type LogWriterOptions } from './logging.js';
export { loadConfig, validateConfig, getConfigPath, dumpConfig, DEFAULT_CONFIG, type TuiConfig, type BorderStyle } from './config.js';

export { Grid } from './tui/grid.js';
export * from './tui/colors.js';
export * from './tui/constants.js';
export * from './tui/types.js';
export { normalizeKey, insertableChar, isPrintable, type KeyInfo } from './tui/keys.js';
export { UIElement, type ElementKind, type ElementOptions, type MousePressHandler } from './tui/element.js';
export { Renderer, centerText, fitText, getRenderText, type BorderOptions, type DrawTextOptions } from './tui/renderer.js';
export { StatusBar } from './tui/status-bar.js';
export { LiveDebugElement } from './tui/live-debug.js';
export { WidgetSet, type Keybinding, type WidgetSetOptions } from './tui/widget-set.js';
export { TuiController, type ControllerOptions, type CycleKeys, type Direction, type TuiControllerDeps } from './tui/controller.js';

export type { TerminalBackend } from './tui/backend/types.js';
export { BufferedBackend } from './tui/backend/buffered-backend.js';
export { MemoryBackend } from './tui/backend/memory-backend.js';
export { BlessedBackend, type BlessedBackendOptions, type ProgramLike } from './tui/backend/blessed-backend.js';
export { CellBuffer, type Cell } from './tui/backend/cell-buffer.js';
export { EventQueue } from './tui/backend/event-queue.js';

export { TextEditor } from './tui/implementations/text-editor.js';
export { TextBlockEditor } from './tui/implementations/text-block-editor.js';
export { SelectableList } from './tui/implementations/selectable-list.js';
export { CheckboxList } from './tui/implementations/checkbox-list.js';
export { SliderModel } from './tui/implementations/slider.js';
export { FormModel, type FormField, type FormFieldOptions, type FormValidation } from './tui/implementations/form.js';
export {
  FileSelectModel,
  type DirFs,
  type FileActionResult,
  type FileDialogType,
  type FileEntry,
  type FileSelectOptions,
} from './tui/implementations/file-select.js';

export * from './tui/widgets/index.js';
export * from './tui/popups/index.js';
