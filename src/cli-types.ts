// CLI option interfaces and the context shared by command modules
import type { Command } from 'commander';
import type { TuiConfig } from './config.js';
import type { Logger } from './logger.js';

export interface GlobalOptions {
  config?: string;
  logFile?: string;
  verbose?: boolean;
}

export interface DemoOptions {
  ascii?: boolean;
  unicode?: boolean;
  dir?: string;
}

export interface ConfigShowOptions {
  defaults?: boolean;
}

/**
 * Passed to every command's register function
 */
export interface CommandContext {
  program: Command;
  version: string;
  /** Effective configuration after global options are applied */
  getConfig: () => TuiConfig;
  /** Logger writing to the configured log file, if any */
  getLogger: () => Logger;
  output: {
    info: (message: string) => void;
    error: (message: string) => void;
  };
}

export type CommandRegisterFn = (ctx: CommandContext) => void;
