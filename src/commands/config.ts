/**
 * Config command - print the effective configuration as YAML
 */

import type { CommandContext, ConfigShowOptions } from '../cli-types.js';
import { DEFAULT_CONFIG, dumpConfig } from '../config.js';

export default function register(ctx: CommandContext): void {
  const { program, output } = ctx;

  program
    .command('config')
    .description('Print the effective configuration')
    .option('--defaults', 'Print the built-in defaults instead, as a starting point for gridtui.yaml')
    .action((options: ConfigShowOptions) => {
      const config = options.defaults ? DEFAULT_CONFIG : ctx.getConfig();
      output.info(dumpConfig(config).trimEnd());
    });
}
