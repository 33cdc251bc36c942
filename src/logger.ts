/**
 * Small logger shared by the controller and every element.
 *
 * While the UI owns the terminal nothing may be written to stdout/stderr, so
 * records go to an optional line sink (usually a rotating log file from
 * logging.ts) and to subscribers such as the live debug panel. Child loggers
 * share level, sink and subscribers with their parent.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export type LogRecord = {
  time: Date;
  name: string;
  level: LogLevel;
  message: string;
  line: string;
};

export type LoggerOptions = {
  name?: string;
  level?: LogLevel;
  verbose?: boolean; // shorthand for level 'debug'
  sink?: (line: string) => void;
  clock?: () => Date;
};

type LogHub = {
  level: LogLevel;
  sink: ((line: string) => void) | null;
  listeners: Set<(record: LogRecord) => void>;
  clock: () => Date;
};

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

export function formatLogLine(time: Date, name: string, level: LogLevel, message: string): string {
  return `${time.toISOString()} - ${name} - ${level.toUpperCase()} | ${message}`;
}

export class Logger {
  readonly name: string;
  private readonly hub: LogHub;

  constructor(opts: LoggerOptions = {}, hub?: LogHub) {
    this.name = opts.name ?? 'gridtui';
    this.hub = hub ?? {
      level: opts.verbose ? 'debug' : opts.level ?? 'info',
      sink: opts.sink ?? null,
      listeners: new Set(),
      clock: opts.clock ?? (() => new Date()),
    };
  }

  child(name: string): Logger {
    return new Logger({ name: `${this.name}.${name}` }, this.hub);
  }

  get level(): LogLevel {
    return this.hub.level;
  }

  setLevel(level: LogLevel): void {
    this.hub.level = level;
  }

  setSink(sink: ((line: string) => void) | null): void {
    this.hub.sink = sink;
  }

  isEnabled(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.hub.level);
  }

  /** Receive every record that passes the level filter. Returns an unsubscribe function. */
  subscribe(listener: (record: LogRecord) => void): () => void {
    this.hub.listeners.add(listener);
    return () => {
      this.hub.listeners.delete(listener);
    };
  }

  debug(message: string): void {
    this.log('debug', message);
  }

  info(message: string): void {
    this.log('info', message);
  }

  warn(message: string): void {
    this.log('warn', message);
  }

  error(message: string): void {
    this.log('error', message);
  }

  log(level: LogLevel, message: string): void {
    if (!this.isEnabled(level)) return;
    const time = this.hub.clock();
    const line = formatLogLine(time, this.name, level, message);
    this.hub.sink?.(line);
    const record: LogRecord = { time, name: this.name, level, message, line };
    for (const listener of this.hub.listeners) listener(record);
  }
}

/** Logger that drops everything, for elements created outside a controller. */
export function createSilentLogger(): Logger {
  return new Logger({ level: 'error', sink: () => {} });
}

export default Logger;
