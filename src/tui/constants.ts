/**
 * Centralized TUI constants: key names, timings, border sets and the help
 * texts shown in the status bar.
 *
 * Key names are the normalized names produced by keys.ts (`normalizeKey`).
 */

import type { BorderChars } from './types.js';

// Keys
export const KEY_ENTER = 'enter';
export const KEY_ESCAPE = 'escape';
export const KEY_TAB = 'tab';
export const KEY_SHIFT_TAB = 'S-tab';
export const KEY_BACKSPACE = 'backspace';
export const KEY_DELETE = 'delete';
export const KEY_SPACE = ' ';
export const KEY_UP = 'up';
export const KEY_DOWN = 'down';
export const KEY_LEFT = 'left';
export const KEY_RIGHT = 'right';
export const KEY_HOME = 'home';
export const KEY_END = 'end';
export const KEY_PAGE_UP = 'pageup';
export const KEY_PAGE_DOWN = 'pagedown';
export const KEY_YES = 'y';
export const KEY_NO = 'n';
export const KEY_QUIT = 'q';

export const ARROW_KEYS = [KEY_UP, KEY_DOWN, KEY_LEFT, KEY_RIGHT] as const;

// Timing and sizes
export const LOADING_POLL_MS = 250;
export const LIVE_DEBUG_BUFFER_SIZE = 100;
export const PAGE_SCROLL_LENGTH = 5;
export const TAB_SPACES = 4;
export const COLOR_PAIR_LIMIT = 256;

export const SPINNER_FRAMES = ['\\', '|', '/', '-'] as const;

export const ASCII_BORDERS: BorderChars = {
  topLeft: '+',
  topRight: '+',
  bottomLeft: '+',
  bottomRight: '+',
  horizontal: '-',
  vertical: '|',
};

export const UNICODE_BORDERS: BorderChars = {
  topLeft: '╭',
  topRight: '╮',
  bottomLeft: '╰',
  bottomRight: '╯',
  horizontal: '─',
  vertical: '│',
};

// Status bar / help texts
export const OVERVIEW_HELP_TEXT =
  'Press - q - to exit. Navigate with arrows. Press Enter to focus a widget.';
export const WIDGET_HELP_TEXT = 'No help text entered for this widget.';
export const SCROLL_MENU_HELP_TEXT =
  'Focus mode on ScrollMenu. Use Up/Down/PgUp/PgDown/Home/End to scroll, Esc to exit.';
export const CHECKBOX_MENU_HELP_TEXT =
  'Focus mode on CheckboxMenu. Use up/down to scroll, Enter to toggle set, unset, Esc to exit.';
export const TEXT_BOX_HELP_TEXT =
  'Focus mode on TextBox. Press Esc to exit focus mode.';
export const TEXT_BLOCK_HELP_TEXT =
  'Focus mode on TextBlock. Press Esc to exit focus mode.';
export const SLIDER_HELP_TEXT =
  'Focus mode on Slider. Use left/right to adjust value. Esc to exit.';
export const POPUP_HELP_TEXT = 'Press Esc to close the popup.';
export const LIVE_DEBUG_HELP_TEXT =
  'Live debug log. Use Up/Down to scroll, Esc to hide.';
export const FORM_HELP_TEXT =
  'Use Tab to move between fields, Enter to submit, Esc to cancel.';
export const FILE_DIALOG_HELP_TEXT =
  'Use Tab to move between the list, the name input and the buttons, Esc to cancel.';

export const TOO_SMALL_HINT = 'Terminal too small. Resize the window to continue.';
