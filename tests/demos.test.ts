import { Chalk } from 'chalk';
import { describe, it, expect } from 'vitest';
import { runDemo } from '../src/commands/demo.js';
import { buildFormDemo, buildHelloDemo, buildTodoDemo, DEMOS } from '../src/demos/index.js';
import { BlessedBackend } from '../src/tui/backend/blessed-backend.js';
import { MemoryBackend } from '../src/tui/backend/memory-backend.js';
import { TuiController } from '../src/tui/controller.js';
import { ScrollMenu } from '../src/tui/widgets/scroll-menu.js';
import type { InputEvent } from '../src/tui/types.js';
import { FakeProgram } from './tui/fake-program.js';

const key = (name: string): InputEvent => ({ type: 'key', key: name });

function controllerFor(name: string): TuiController {
  const demo = DEMOS[name];
  if (!demo) throw new Error(`no demo ${name}`);
  return new TuiController(demo.rows, demo.cols, {}, { backend: new MemoryBackend() });
}

function menuAt(root: TuiController, id: number): ScrollMenu {
  const widget = root.getWidgetSet().getWidget(id);
  if (!(widget instanceof ScrollMenu)) throw new Error(`widget ${id} is not a menu`);
  return widget;
}

describe('hello demo', () => {
  it('asks for a name before greeting', () => {
    const root = controllerFor('hello');
    buildHelloDemo(root);
    root.tick(key('enter'));
    root.tick(key('enter'));
    expect(root.getPopup()?.getTitle()).toBe('WARNING - Missing input');
  });

  it('greets the typed name', () => {
    const root = controllerFor('hello');
    buildHelloDemo(root);
    root.tick(key('right'));
    root.tick(key('enter'));
    for (const ch of 'Ada') root.tick(key(ch));
    root.tick(key('escape'));
    root.setSelectedWidget(4);
    root.tick(key('enter'));

    expect(root.getPopup()?.getTitle()).toBe('Greeting');
    expect(root.getPopup()?.getText()).toBe('Hello, Ada! (volume 50)');
    expect(menuAt(root, 2).getItemList()).toEqual(['Hello, Ada!']);
  });
});

describe('todo demo', () => {
  it('adds items and moves them across the board', () => {
    const root = controllerFor('todo');
    buildTodoDemo(root);
    root.tick(key('n'));
    for (const k of ['x', 'enter', 'escape']) root.tick(key(k));
    expect(menuAt(root, 0).getItemList()).toEqual(['x']);

    root.setSelectedWidget(0);
    root.tick(key('enter'));
    root.tick(key('enter'));
    expect(menuAt(root, 0).getItemList()).toEqual([]);
    expect(menuAt(root, 1).getItemList()).toEqual(['x']);
  });
});

describe('form demo', () => {
  it('opens the sign-up form from its button', () => {
    const root = controllerFor('form');
    buildFormDemo(root, process.cwd());
    root.setSelectedWidget(1);
    root.tick(key('enter'));
    expect(root.getPopup()?.popupKind).toBe('form');
    expect(root.getPopup()?.getTitle()).toBe('Sign up');
  });
});

describe('running a demo', () => {
  it('gives the terminal back when building the layout fails', async () => {
    const program = new FakeProgram(30, 100);
    const backend = new BlessedBackend({ createProgram: () => program, chalk: new Chalk({ level: 0 }) });
    const root = new TuiController(3, 3, {}, { backend });
    const demo = {
      rows: 3,
      cols: 3,
      description: 'broken',
      build: () => {
        throw new Error('bad layout');
      },
    };

    await expect(runDemo(root, demo, process.cwd())).rejects.toThrow('bad layout');
    expect(program.calls).toEqual(['destroy']);
  });
});
