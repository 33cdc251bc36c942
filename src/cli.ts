#!/usr/bin/env node
/**
 * Command-line interface for gridtui
 */

import { Command } from 'commander';
import chalk from 'chalk';
import * as fs from 'fs';
import { pathToFileURL } from 'url';
import type { CommandContext, CommandRegisterFn, GlobalOptions } from './cli-types.js';
import registerConfig from './commands/config.js';
import registerDemo from './commands/demo.js';
import { loadConfig, type TuiConfig } from './config.js';
import { GridTuiError } from './errors.js';
import { Logger } from './logger.js';
import { createLogFileWriter } from './logging.js';

export const GRIDTUI_VERSION = '0.1.0';

const COMMANDS: CommandRegisterFn[] = [registerDemo, registerConfig];

export interface ProgramIo {
  info: (message: string) => void;
  error: (message: string) => void;
}

const consoleIo: ProgramIo = {
  info: message => console.log(message),
  error: message => console.error(chalk.red(message)),
};

/**
 * Build the commander program. Config and logger are created lazily, once
 * global options have been parsed.
 */
export function createProgram(io: ProgramIo = consoleIo): Command {
  const program = new Command();
  program
    .name('gridtui')
    .description('Character-grid terminal UI toolkit')
    .version(GRIDTUI_VERSION)
    .option('-c, --config <path>', 'Path to a gridtui.yaml config file')
    .option('--log-file <path>', 'Append log lines to this file')
    .option('-v, --verbose', 'Log at debug level');

  let config: TuiConfig | null = null;
  let logger: Logger | null = null;

  const getConfig = (): TuiConfig => {
    if (!config) {
      const opts = program.opts<GlobalOptions>();
      config = loadConfig(opts.config);
    }
    return config;
  };

  const getLogger = (): Logger => {
    if (!logger) {
      const opts = program.opts<GlobalOptions>();
      const cfg = getConfig();
      const file = opts.logFile ?? cfg.logging.file;
      let reported = false;
      const sink = file
        ? createLogFileWriter(file, {
            onError: error => {
              if (reported) return;
              reported = true;
              // Shown after the terminal is released
              process.once('exit', () => io.error(`Could not write log file ${file}: ${String(error)}`));
            },
          })
        : undefined;
      logger = new Logger({ name: 'gridtui', level: cfg.logging.level, verbose: opts.verbose, sink });
    }
    return logger;
  };

  const ctx: CommandContext = { program, version: GRIDTUI_VERSION, getConfig, getLogger, output: io };
  for (const register of COMMANDS) register(ctx);
  return program;
}

export async function main(argv: string[] = process.argv, io: ProgramIo = consoleIo): Promise<number> {
  const program = createProgram(io);
  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof GridTuiError) {
      io.error(`${error.name}: ${error.message}`);
      return 1;
    }
    throw error;
  }
  return typeof process.exitCode === 'number' ? process.exitCode : 0;
}

function isEntryPoint(): boolean {
  const script = process.argv[1];
  if (!script) return false;
  try {
    return import.meta.url === pathToFileURL(fs.realpathSync(script)).href;
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  main().then(
    code => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(error);
      process.exitCode = 1;
    }
  );
}
