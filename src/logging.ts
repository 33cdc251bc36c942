/**
 * Simple log file helpers with rotation.
 */

import * as fs from 'fs';
import * as path from 'path';

export const LOG_ROTATE_BYTES = 100 * 1024 * 1024;

export type LogFileFs = Pick<
  typeof fs,
  'existsSync' | 'statSync' | 'rmSync' | 'renameSync' | 'appendFileSync' | 'mkdirSync'
>;

export type LogWriterOptions = {
  fs?: LogFileFs;
  rotateBytes?: number;
  /** Called once when writing fails; later failures are dropped until a write succeeds. */
  onError?: (error: unknown) => void;
};

/**
 * Shift `file` to `file.1` and `file.1` to `file.2` once it reaches the
 * rotation size. Returns whether a rotation happened.
 */
export function rotateLogFile(logPath: string, opts: LogWriterOptions = {}): boolean {
  const fsImpl = opts.fs ?? fs;
  const limit = opts.rotateBytes ?? LOG_ROTATE_BYTES;
  if (!fsImpl.existsSync(logPath)) return false;
  const stats = fsImpl.statSync(logPath);
  if (stats.size < limit) return false;

  const first = `${logPath}.1`;
  const second = `${logPath}.2`;

  if (fsImpl.existsSync(second)) {
    fsImpl.rmSync(second, { force: true });
  }
  if (fsImpl.existsSync(first)) {
    fsImpl.renameSync(first, second);
  }
  fsImpl.renameSync(logPath, first);
  return true;
}

export function createLogFileWriter(logPath: string, opts: LogWriterOptions = {}): (line: string) => void {
  const fsImpl = opts.fs ?? fs;
  fsImpl.mkdirSync(path.dirname(logPath), { recursive: true });
  rotateLogFile(logPath, opts);
  let failing = false;
  return (line: string) => {
    try {
      fsImpl.appendFileSync(logPath, `${line}\n`, 'utf8');
      failing = false;
    } catch (error) {
      // The terminal belongs to the UI, so a broken log file is reported once and then skipped
      if (!failing) opts.onError?.(error);
      failing = true;
    }
  };
}
