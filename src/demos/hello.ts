import { BLUE_ON_BLACK, CYAN_ON_BLACK, GREEN_ON_BLACK, RED_ON_BLACK } from '../tui/colors.js';
import type { TuiController } from '../tui/controller.js';

const GREETINGS = ['Hello', 'Hola', 'Bonjour', 'Hallo', 'Ciao', 'Ola', 'Hej', 'Ahoj', 'Salut', 'Privet'];

/**
 * Tour of the basic widgets: menus, a text box, buttons, a slider and the
 * common popups.
 */
export function buildHelloDemo(root: TuiController): void {
  root.setTitle('gridtui hello');

  const greetings = root.addScrollMenu('Greetings', 0, 0, 2, 1);
  greetings.addItemList(GREETINGS);
  greetings.addTextColorRule('H', GREEN_ON_BLACK, 'startswith');

  const name = root.addTextBox('Your name', 0, 1, 1, 2);
  const log = root.addScrollMenu('Greeted', 1, 1, 2, 1);
  log.addTextColorRule('!', CYAN_ON_BLACK, 'endswith');

  const volume = root.addSlider('Volume', 1, 2, 1, 1, { min: 0, max: 100, step: 5, initial: 50 });
  volume.setColor(BLUE_ON_BLACK);

  const greet = (): void => {
    const greeting = greetings.get();
    const who = name.getText().trim();
    if (!greeting || !who) {
      root.showWarningPopup('Missing input', 'Pick a greeting and type a name first');
      return;
    }
    log.addItem(`${greeting}, ${who}!`);
    root.showMessagePopup('Greeting', `${greeting}, ${who}! (volume ${volume.getSliderValue()})`);
  };

  greetings.addKeyCommand('enter', greet);
  root.addButton('Greet', 2, 0, 1, 1, greet);
  root.addButton('Clear log', 2, 2, 1, 1, () => {
    root.showYesNoPopup('Clear log', 'Remove every greeting?', answer => {
      if (answer) log.clear();
    });
  }).setColor(RED_ON_BLACK);

  root.addKeyCommand('m', () => {
    root.showMenuPopup('Pick a greeting', GREETINGS, item => {
      if (item !== undefined) greetings.setSelectedItem(item);
    });
  });
  root.addKeyCommand('u', () => root.toggleUnicodeBorders());
}
