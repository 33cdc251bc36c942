import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { MemoryBackend } from '../../src/tui/backend/memory-backend.js';
import { POPUP_HELP_TEXT } from '../../src/tui/constants.js';
import { Renderer } from '../../src/tui/renderer.js';
import type { TerminalSize } from '../../src/tui/types.js';
import {
  FileDialogPopup,
  FormPopup,
  LoadingBarPopup,
  LoadingIconPopup,
  MenuPopup,
  MessagePopup,
  TextBoxPopup,
  YesNoPopup,
  type Popup,
  type PopupHost,
} from '../../src/tui/popups/index.js';
import { Logger } from '../../src/logger.js';
import { DuplicateFormKeyError } from '../../src/errors.js';

class TestHost implements PopupHost {
  readonly closed: Popup[] = [];
  loading = true;

  constructor(private readonly size: TerminalSize = { rows: 30, cols: 80 }) {}

  getScreenSize(): TerminalSize {
    return this.size;
  }

  closePopup(popup: Popup): void {
    this.closed.push(popup);
  }

  isLoading(): boolean {
    return this.loading;
  }
}

let host: TestHost;

beforeEach(() => {
  host = new TestHost();
});

describe('MessagePopup', () => {
  it('covers the middle of the screen', () => {
    const popup = new MessagePopup(host, 'Note', 'Saved');
    expect(popup.getStartPosition()).toEqual({ x: 20, y: 10 });
    expect(popup.getStopPosition()).toEqual({ x: 60, y: 20 });
  });

  it('closes on Enter, Space, Escape and double click', () => {
    for (const key of ['enter', ' ', 'escape']) {
      const popup = new MessagePopup(host, 'Note', 'Saved');
      popup.handleKey('x');
      popup.handleKey(key);
      expect(host.closed.at(-1)).toBe(popup);
    }
    const popup = new MessagePopup(host, 'Note', 'Saved');
    popup.handleMouse(30, 15, 'left-click');
    expect(host.closed).not.toContain(popup);
    popup.handleMouse(30, 15, 'left-double-click');
    expect(host.closed.at(-1)).toBe(popup);
    expect(host.closed).toHaveLength(4);
  });

  it('draws a framed box with the message centered', () => {
    const backend = new MemoryBackend({ rows: 30, cols: 80 });
    const popup = new MessagePopup(host, 'Note', 'Saved');
    popup.setRenderer(new Renderer(backend));
    popup.draw();
    backend.flush();
    expect(backend.getLine(10).slice(21, 59)).toBe(`+- Note ${'-'.repeat(29)}+`);
    expect(backend.getLine(15).slice(23, 57)).toBe(`${' '.repeat(14)}Saved${' '.repeat(15)}`);
    expect(backend.getLine(19).slice(21, 59)).toBe(`+${'-'.repeat(36)}+`);
  });
});

describe('YesNoPopup', () => {
  it('answers y with true and n or Escape with false', () => {
    const answers: boolean[] = [];
    for (const key of ['y', 'n', 'escape']) {
      new YesNoPopup(host, 'Quit', 'Really quit?', answer => answers.push(answer)).handleKey(key);
    }
    expect(answers).toEqual([true, false, false]);
    expect(host.closed).toHaveLength(3);
  });

  it('ignores other keys', () => {
    const command = vi.fn();
    const popup = new YesNoPopup(host, 'Quit', 'Really quit?', command);
    popup.handleKey('enter');
    expect(command).not.toHaveBeenCalled();
    expect(host.closed).toEqual([]);
  });

  it('logs answers nobody listens for', () => {
    const lines: string[] = [];
    const logger = new Logger({ sink: line => lines.push(line), clock: () => new Date(0) });
    new YesNoPopup(host, 'Quit', 'Really quit?', null, { logger }).handleKey('y');
    expect(lines).toEqual([
      "1970-01-01T00:00:00.000Z - gridtui - WARN | Yes/No popup 'Quit' has no command; answer true ignored",
    ]);
  });
});

describe('TextBoxPopup', () => {
  it('submits the typed text on Enter', () => {
    const command = vi.fn();
    const popup = new TextBoxPopup(host, 'Name', command);
    for (const key of ['a', 'b', 'c', 'backspace', 'left', 'x']) popup.handleKey(key);
    popup.handleKey('enter');
    expect(command).toHaveBeenCalledWith('axb');
    expect(host.closed).toEqual([popup]);
  });

  it('discards the text on Escape', () => {
    const command = vi.fn();
    const popup = new TextBoxPopup(host, 'Name', command, { initialText: 'keep' });
    popup.handleKey('escape');
    expect(command).not.toHaveBeenCalled();
    expect(host.closed).toEqual([popup]);
  });

  it('masks passwords and places the cursor after the text', () => {
    const backend = new MemoryBackend({ rows: 30, cols: 80 });
    const popup = new TextBoxPopup(host, 'Password', null, { initialText: 'pwd', password: true });
    popup.setRenderer(new Renderer(backend));
    expect(popup.getEditor().getViewportWidth()).toBe(34);
    popup.draw();
    backend.flush();
    expect(backend.getLine(15).slice(23, 26)).toBe('***');
    expect(backend.getCursor()).toEqual({ x: 26, y: 15 });
  });
});

describe('MenuPopup', () => {
  it('returns the chosen item', () => {
    const command = vi.fn();
    const popup = new MenuPopup(host, ['one', 'two', 'three'], 'Pick', command);
    popup.handleKey('down');
    popup.handleKey('enter');
    expect(command).toHaveBeenCalledWith('two');
    expect(host.closed).toEqual([popup]);
  });

  it('does nothing on Escape', () => {
    const command = vi.fn();
    new MenuPopup(host, ['one'], 'Pick', command).handleKey('escape');
    expect(command).not.toHaveBeenCalled();
    expect(host.closed).toHaveLength(1);
  });

  it('only reports an empty choice when asked to', () => {
    const command = vi.fn();
    new MenuPopup<string>(host, [], 'Pick', command).handleKey('enter');
    expect(command).not.toHaveBeenCalled();
    new MenuPopup<string>(host, [], 'Pick', command, { runCommandIfNone: true }).handleKey('enter');
    expect(command).toHaveBeenCalledWith(undefined);
  });

  it('keeps the selection visible when the screen shrinks', () => {
    const size = { rows: 30, cols: 80 };
    const items = Array.from({ length: 20 }, (_, i) => `item ${i}`);
    const popup = new MenuPopup(new TestHost(size), items, 'Pick', null);
    popup.handleKey('end');
    expect(popup.getList().getTopViewIndex()).toBe(12);

    size.rows = 15;
    popup.updateDimensions();
    expect(popup.getViewportHeight()).toBe(3);
    expect(popup.getList().getSelectedIndex()).toBe(19);
    expect(popup.getList().getTopViewIndex()).toBe(17);
  });

  it('selects on click and submits on double click', () => {
    const command = vi.fn();
    const popup = new MenuPopup(host, ['one', 'two', 'three'], 'Pick', command);
    popup.handleMouse(30, 13, 'left-click');
    expect(popup.getList().get()).toBe('three');
    expect(command).not.toHaveBeenCalled();
    popup.handleMouse(30, 11, 'left-double-click');
    expect(command).toHaveBeenCalledWith('one');
  });
});

describe('loading popups', () => {
  it('spins until the host stops loading', () => {
    const backend = new MemoryBackend({ rows: 30, cols: 80 });
    const popup = new LoadingIconPopup(host, 'Fetching', 'Reading data');
    popup.setRenderer(new Renderer(backend));
    expect(popup.isLoadingPopup()).toBe(true);
    expect(popup.currentIcon()).toBe('\\');
    popup.draw();
    backend.flush();
    expect(backend.getLine(15).slice(23, 57).trim()).toBe('Reading data ... \\');
    expect(popup.currentIcon()).toBe('|');

    host.loading = false;
    popup.draw();
    expect(host.closed).toEqual([popup]);
  });

  it('fills the bar as steps complete', () => {
    const popup = new LoadingBarPopup(host, 'Copying', 4);
    expect(popup.generateBar(20)).toBe(`${'-'.repeat(14)} (0/4)`);
    popup.increment();
    popup.increment();
    expect(popup.generateBar(20)).toBe(`${'#'.repeat(7)}${'-'.repeat(7)} (2/4)`);
    for (let i = 0; i < 3; i++) popup.increment();
    expect(popup.getProgress()).toEqual({ completed: 4, total: 4 });
    expect(popup.isComplete()).toBe(true);
    popup.draw();
    expect(host.closed).toEqual([popup]);
  });

  it('treats an empty job as complete', () => {
    const popup = new LoadingBarPopup(host, 'Nothing', 0);
    expect(popup.generateBar(10)).toBe('#### (0/0)');
    expect(popup.isComplete()).toBe(true);
  });
});

describe('FormPopup', () => {
  it('lays out one field every five rows', () => {
    const form = new FormPopup(host, ['name', 'email'], 'Sign up', null, { requiredFields: ['name'] });
    expect(form.getStartPosition()).toEqual({ x: 3, y: 8 });
    expect(form.getStopPosition()).toEqual({ x: 77, y: 22 });
    const [name, email] = form.getFieldElements();
    expect(name.getTitle()).toBe('name *');
    expect(email.getTitle()).toBe('email');
    expect(email.getStartPosition()).toEqual({ x: 6, y: 15 });
    expect(email.getStopPosition()).toEqual({ x: 74, y: 18 });
  });

  it('moves between fields and submits every value', () => {
    const command = vi.fn();
    const form = new FormPopup(host, ['name', 'email'], 'Sign up', command);
    for (const key of ['a', 'b', 'tab', 'c', 'S-tab', 'd']) form.handleKey(key);
    expect(form.getFieldElements()[0].isSelected()).toBe(true);
    form.handleKey('enter');
    expect(command).toHaveBeenCalledWith({ name: 'abd', email: 'c' });
    expect(host.closed).toEqual([form]);
  });

  it('keeps the form open with a warning when a required field is empty', () => {
    const command = vi.fn();
    const form = new FormPopup(host, ['name', 'email'], 'Sign up', command, {
      requiredFields: ['email'],
      initialValues: { name: 'Ada' },
    });
    form.handleKey('enter');
    const warning = form.getNestedPopup();
    expect(warning?.getTitle()).toBe('Field email cannot be empty!');
    expect(warning?.getText()).toBe('Required fields: email');
    expect(form.getHelpText()).toBe(POPUP_HELP_TEXT);
    expect(command).not.toHaveBeenCalled();

    form.handleKey('enter');
    expect(form.getNestedPopup()).toBeNull();
    expect(host.closed).toEqual([]);
    expect(form.getModel().getValues()).toEqual({ name: 'Ada', email: '' });
  });

  it('selects the clicked field', () => {
    const form = new FormPopup(host, ['name', 'email'], 'Sign up', null);
    form.handleMouse(10, 16, 'left-click');
    expect(form.getModel().getSelectedIndex()).toBe(1);
    expect(form.getFieldElements()[1].isSelected()).toBe(true);
    expect(form.getFieldElements()[0].isSelected()).toBe(false);
  });

  it('rejects duplicate field names', () => {
    expect(() => new FormPopup(host, ['a', 'a'], 'Bad', null)).toThrow(DuplicateFormKeyError);
  });
});

describe('FileDialogPopup', () => {
  let root: string;
  const dialogHost = () => new TestHost({ rows: 40, cols: 100 });

  beforeEach(() => {
    root = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), 'gridtui-dialog-')));
    fs.mkdirSync(path.join(root, 'docs'));
    fs.writeFileSync(path.join(root, 'notes.txt'), 'n');
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('opens the selected file', () => {
    const command = vi.fn();
    const dialog = new FileDialogPopup(dialogHost(), root, 'openfile', command);
    expect(dialog.getTitle()).toBe('Open File');
    dialog.handleKey('down');
    dialog.handleKey('down');
    dialog.handleKey('enter');
    expect(command).toHaveBeenCalledWith(path.join(root, 'notes.txt'));
  });

  it('enters directories from the listing', () => {
    const dialog = new FileDialogPopup(dialogHost(), root, 'openfile', null);
    dialog.handleKey('down');
    dialog.handleKey('enter');
    expect(dialog.getModel().getCurrentDir()).toBe(path.join(root, 'docs'));
    expect(dialog.getModel().list.getItemList().map(entry => entry.name)).toEqual(['..']);
  });

  it('keeps the selected entry visible when the screen shrinks', () => {
    for (let i = 0; i < 30; i++) fs.writeFileSync(path.join(root, `file${String(i).padStart(2, '0')}.txt`), '');
    const size = { rows: 40, cols: 100 };
    const dialog = new FileDialogPopup(new TestHost(size), root, 'openfile', null);
    const list = dialog.getModel().list;
    dialog.handleKey('end');
    expect(list.getSelectedIndex()).toBe(list.length - 1);
    expect(list.getTopViewIndex()).toBe(list.length - 24);

    size.rows = 20;
    dialog.updateDimensions();
    expect(list.getSelectedIndex()).toBe(list.length - 1);
    expect(list.getTopViewIndex()).toBe(list.length - 7);
  });

  it('cycles focus between the listing, the input and the buttons', () => {
    const dialog = new FileDialogPopup(dialogHost(), root, 'openfile', null);
    expect(dialog.getFocusedSlot()).toBe('list');
    dialog.handleKey('tab');
    expect(dialog.getFocusedSlot()).toBe('input');
    dialog.handleKey('tab');
    dialog.handleKey('tab');
    expect(dialog.getFocusedSlot()).toBe('cancel');
    dialog.handleKey('tab');
    expect(dialog.getFocusedSlot()).toBe('list');
    dialog.handleKey('S-tab');
    expect(dialog.getFocusedSlot()).toBe('cancel');
  });

  it('warns when OK is pressed without a file', () => {
    const command = vi.fn();
    const dialog = new FileDialogPopup(dialogHost(), root, 'openfile', command);
    dialog.handleKey('tab');
    dialog.handleKey('tab');
    dialog.handleKey('enter');
    expect(dialog.getNestedPopup()?.getTitle()).toBe('Error');
    expect(dialog.getNestedPopup()?.getText()).toBe('No path is selected!');
    expect(command).not.toHaveBeenCalled();
  });

  it('saves under the typed name', () => {
    const command = vi.fn();
    const dialog = new FileDialogPopup(dialogHost(), root, 'saveas', command);
    dialog.handleKey('tab');
    for (const key of Array.from('out.txt')) dialog.handleKey(key);
    dialog.handleKey('enter');
    expect(command).toHaveBeenCalledWith(path.join(root, 'out.txt'));
    expect(fs.existsSync(path.join(root, 'out.txt'))).toBe(false);
  });

  it('creates directories and returns the current one', () => {
    const command = vi.fn();
    const dialog = new FileDialogPopup(dialogHost(), root, 'opendir', command);
    dialog.handleKey('tab');
    for (const key of Array.from('made')) dialog.handleKey(key);
    dialog.handleKey('enter');
    expect(fs.statSync(path.join(root, 'made')).isDirectory()).toBe(true);
    expect(dialog.getInput().get()).toBe('');
    dialog.handleKey('tab');
    dialog.handleKey('enter');
    expect(command).toHaveBeenCalledWith(root);
  });

  it('closes from the Cancel button', () => {
    const testHost = dialogHost();
    const dialog = new FileDialogPopup(testHost, root, 'openfile', null);
    dialog.handleMouse(60, 35, 'left-click');
    expect(testHost.closed).toEqual([dialog]);
  });
});
