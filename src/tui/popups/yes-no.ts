import { KEY_ESCAPE, KEY_NO, KEY_YES } from '../constants.js';
import { Popup, type PopupHost, type PopupOptions } from './popup.js';

export type YesNoCommand = (answer: boolean) => void;

/**
 * Confirmation popup: `y` answers true, `n` or Escape answer false.
 */
export class YesNoPopup extends Popup {
  readonly popupKind = 'yes-no';
  private readonly command: YesNoCommand | null;

  constructor(host: PopupHost, title: string, text: string, command: YesNoCommand | null, options: PopupOptions = {}) {
    super(host, title, text, options);
    this.command = command;
    this.helpText = 'Press y for yes, n for no.';
  }

  protected override onKey(key: string): void {
    if (key === KEY_YES) this.answer(true);
    else if (key === KEY_NO || key === KEY_ESCAPE) this.answer(false);
  }

  private answer(value: boolean): void {
    this.close();
    if (this.command) {
      this.command(value);
    } else {
      this.logger.warn(`Yes/No popup '${this.title}' has no command; answer ${value} ignored`);
    }
  }

  protected drawPopup(): void {
    this.drawFrame();
    this.drawCenteredText(this.text, -1);
    this.drawCenteredText('(y/n)', 1);
  }
}
