import { GREEN_ON_BLACK, RED_ON_BLACK, YELLOW_ON_BLACK } from '../tui/colors.js';
import type { TuiController } from '../tui/controller.js';
import type { ScrollMenu } from '../tui/widgets/scroll-menu.js';

/**
 * Three-column todo board. New items go to the TODO column; Enter in a
 * column moves the selected item one column to the right, Backspace removes it.
 */
export function buildTodoDemo(root: TuiController): void {
  root.setTitle('gridtui todo');

  const todo = root.addScrollMenu('TODO', 0, 0, 6, 2);
  const inProgress = root.addScrollMenu('In Progress', 0, 2, 6, 2);
  const done = root.addScrollMenu('Done', 0, 4, 6, 2);
  todo.setBorderColor(RED_ON_BLACK);
  inProgress.setBorderColor(YELLOW_ON_BLACK);
  done.setBorderColor(GREEN_ON_BLACK);

  const input = root.addTextBox('New item', 6, 0, 1, 6);
  input.addKeyCommand('enter', () => {
    const text = input.getText().trim();
    if (text) todo.addItem(text);
    input.clear();
  });

  const advance = (from: ScrollMenu, to: ScrollMenu | null): void => {
    const item = from.removeSelectedItem();
    if (item !== undefined && to) to.addItem(item);
  };
  todo.addKeyCommand('enter', () => advance(todo, inProgress));
  inProgress.addKeyCommand('enter', () => advance(inProgress, done));
  done.addKeyCommand('enter', () => advance(done, null));
  for (const column of [todo, inProgress, done]) {
    column.addKeyCommand('backspace', () => {
      column.removeSelectedItem();
    });
  }

  root.addKeyCommand('n', () => root.moveFocus(input));
}
