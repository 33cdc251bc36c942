/**
 * Demo command - run one of the bundled example applications
 */

import type { CommandContext, DemoOptions } from '../cli-types.js';
import { DEMOS, type Demo } from '../demos/index.js';
import { TuiController } from '../tui/controller.js';

/** Build the demo into `root` and run it. The terminal is released if building fails. */
export async function runDemo(root: TuiController, demo: Demo, startDir: string): Promise<void> {
  try {
    demo.build(root, startDir);
  } catch (error) {
    root.close();
    throw error;
  }
  await root.start();
}

export default function register(ctx: CommandContext): void {
  const { program, output } = ctx;

  program
    .command('demo')
    .description('Run a bundled demo application')
    .argument('[name]', `Demo to run (${Object.keys(DEMOS).join(', ')})`, 'hello')
    .option('--ascii', 'Draw borders with ASCII characters')
    .option('--unicode', 'Draw borders with rounded Unicode characters')
    .option('--dir <path>', 'Starting directory for file dialogs', process.cwd())
    .action(async (name: string, options: DemoOptions) => {
      const demo = DEMOS[name];
      if (!demo) {
        output.error(`Unknown demo "${name}". Available: ${Object.keys(DEMOS).join(', ')}`);
        process.exitCode = 1;
        return;
      }
      const config = ctx.getConfig();
      const logger = ctx.getLogger();
      const borders = options.unicode ? 'unicode' : options.ascii ? 'ascii' : config.borders;

      const root = new TuiController(demo.rows, demo.cols, {
        title: config.title,
        exitKey: config.exitKey,
        cycleKeys: config.cycleKeys,
        autoFocusButtons: config.autoFocusButtons,
        refreshTimeoutMs: config.refreshTimeoutMs,
        borders,
        mouse: config.mouse,
        liveDebugKey: config.liveDebugKey,
        logger: logger.child(name),
      });
      root.runOnExit(() => logger.info(`Demo ${name} exited`));
      await runDemo(root, demo, options.dir ?? process.cwd());
    });

  program
    .command('demos')
    .description('List the bundled demo applications')
    .action(() => {
      for (const [name, demo] of Object.entries(DEMOS)) {
        output.info(`${name.padEnd(8)} ${demo.description}`);
      }
    });
}
