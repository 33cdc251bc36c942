import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { createLogFileWriter, rotateLogFile, type LogFileFs } from '../src/logging.js';
import { createTempDir, cleanupTempDir } from './test-utils.js';

describe('log files', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = createTempDir();
  });

  afterEach(() => {
    cleanupTempDir(tempDir);
  });

  it('appends one line per record and creates missing directories', () => {
    const logPath = path.join(tempDir, 'logs', 'app.log');
    const write = createLogFileWriter(logPath);
    write('first');
    write('second');
    expect(fs.readFileSync(logPath, 'utf8')).toBe('first\nsecond\n');
  });

  it('rotates a full file and keeps two old generations', () => {
    const logPath = path.join(tempDir, 'app.log');
    fs.writeFileSync(logPath, 'current');
    fs.writeFileSync(`${logPath}.1`, 'older');
    fs.writeFileSync(`${logPath}.2`, 'oldest');

    expect(rotateLogFile(logPath, { rotateBytes: 4 })).toBe(true);
    expect(fs.existsSync(logPath)).toBe(false);
    expect(fs.readFileSync(`${logPath}.1`, 'utf8')).toBe('current');
    expect(fs.readFileSync(`${logPath}.2`, 'utf8')).toBe('older');
  });

  it('leaves small or missing files alone', () => {
    const logPath = path.join(tempDir, 'app.log');
    expect(rotateLogFile(logPath)).toBe(false);
    fs.writeFileSync(logPath, 'abc');
    expect(rotateLogFile(logPath, { rotateBytes: 4 })).toBe(false);
    expect(fs.readFileSync(logPath, 'utf8')).toBe('abc');
  });

  it('reports a failing log file once until a write succeeds again', () => {
    let broken = true;
    const appended: string[] = [];
    const fakeFs: LogFileFs = {
      ...fs,
      mkdirSync: () => undefined,
      existsSync: () => false,
      appendFileSync: (_file, data) => {
        if (broken) throw new Error('disk full');
        appended.push(String(data));
      },
    };
    const onError = vi.fn();
    const write = createLogFileWriter('/var/log/app.log', { fs: fakeFs, onError });

    write('a');
    write('b');
    broken = false;
    write('c');
    broken = true;
    write('d');

    expect(onError).toHaveBeenCalledTimes(2);
    expect(appended).toEqual(['c\n']);
  });
});
