import type { TuiController } from '../tui/controller.js';

/**
 * Forms and file dialogs. Submitted values and chosen paths are listed in
 * the results menu.
 */
export function buildFormDemo(root: TuiController, startDir = process.cwd()): void {
  root.setTitle('gridtui forms');

  const results = root.addScrollMenu('Results', 0, 0, 3, 2);

  root.addButton('Sign up', 0, 2, 1, 1, () => {
    root.showFormPopup('Sign up', ['Name', 'Email', 'Password'], values => {
      results.addItem(`Signed up ${values.Name} <${values.Email}>`);
    }, { passwordFields: ['Password'], requiredFields: ['Name', 'Password'] });
  });
  root.addButton('Open file', 1, 2, 1, 1, () => {
    root.showFileDialogPopup('openfile', startDir, selected => results.addItem(`Opened ${selected}`));
  });
  root.addButton('Save as', 2, 2, 1, 1, () => {
    root.showFileDialogPopup('saveas', startDir, selected => results.addItem(`Saving to ${selected}`));
  });
  root.addKeyCommand('d', () => {
    root.showFileDialogPopup('opendir', startDir, selected => results.addItem(`Directory ${selected}`));
  });
}
