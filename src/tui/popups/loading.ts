import { SPINNER_FRAMES } from '../constants.js';
import { Popup, type PopupHost, type PopupOptions } from './popup.js';

/**
 * Spinner shown while background work runs. Keys are ignored; the popup
 * closes itself on the first draw after the host stops loading.
 */
export class LoadingIconPopup extends Popup {
  readonly popupKind = 'loading-icon';
  private frame = 0;

  constructor(host: PopupHost, title: string, message: string, options: PopupOptions = {}) {
    super(host, title, message, options);
    this.helpText = 'Loading, please wait...';
  }

  override isLoadingPopup(): boolean {
    return true;
  }

  isComplete(): boolean {
    return !this.host.isLoading();
  }

  currentIcon(): string {
    return SPINNER_FRAMES[this.frame % SPINNER_FRAMES.length];
  }

  protected drawPopup(): void {
    if (this.isComplete()) {
      this.close();
      return;
    }
    this.drawFrame();
    this.drawCenteredText(`${this.text} ... ${this.currentIcon()}`);
    this.frame++;
  }
}

/**
 * Progress bar over a known number of steps, advanced by the host's
 * `incrementProgress()`. Closes itself once every step is done.
 */
export class LoadingBarPopup extends Popup {
  readonly popupKind = 'loading-bar';
  private completed = 0;
  private frame = 0;

  constructor(host: PopupHost, title: string, private readonly total: number, options: PopupOptions = {}) {
    super(host, title, '', options);
    this.helpText = 'Loading, please wait...';
  }

  override isLoadingPopup(): boolean {
    return true;
  }

  increment(): void {
    if (this.completed < this.total) this.completed++;
  }

  getProgress(): { completed: number; total: number } {
    return { completed: this.completed, total: this.total };
  }

  isComplete(): boolean {
    return this.completed >= this.total || !this.host.isLoading();
  }

  /** Bar for `width` columns: `#` for done steps, `-` for the rest, then `(done/total)`. */
  generateBar(width: number): string {
    const suffix = ` (${this.completed}/${this.total})`;
    const barWidth = Math.max(0, width - suffix.length);
    const done = this.total > 0 ? Math.floor((barWidth * this.completed) / this.total) : barWidth;
    return '#'.repeat(done) + '-'.repeat(barWidth - done) + suffix;
  }

  protected drawPopup(): void {
    if (this.isComplete()) {
      this.close();
      return;
    }
    this.drawFrame();
    this.drawCenteredText(`${SPINNER_FRAMES[this.frame % SPINNER_FRAMES.length]} ${this.title}`, -1);
    this.drawCenteredText(this.generateBar(this.getViewportWidth()), 1);
    this.frame++;
  }
}
