import type { TuiController } from '../tui/controller.js';
import { buildFormDemo } from './form.js';
import { buildHelloDemo } from './hello.js';
import { buildTodoDemo } from './todo.js';

export interface Demo {
  rows: number;
  cols: number;
  description: string;
  /** `startDir` is where file dialogs open */
  build: (root: TuiController, startDir: string) => void;
}

export const DEMOS: Record<string, Demo> = {
  hello: { rows: 3, cols: 3, description: 'menus, text box, buttons, slider and popups', build: root => buildHelloDemo(root) },
  todo: { rows: 7, cols: 6, description: 'three-column todo board', build: root => buildTodoDemo(root) },
  form: { rows: 3, cols: 3, description: 'form popup and file dialogs', build: buildFormDemo },
};

export { buildFormDemo, buildHelloDemo, buildTodoDemo };
