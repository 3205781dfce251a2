/**
 * Unit tests for logging
 *
 * @see src/utils/logger.ts
 */

import fs from 'node:fs';
import path from 'node:path';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  configureLogging,
  createLogFilePath,
  enforceMaxFolderSize,
  formatRecord,
  formatTimestamp,
  getLogger,
  setupLogging,
} from '../../../src/utils/logger';
import { createTempDir, removeDir } from '../helpers';

const date = new Date(2026, 9, 18, 14, 5, 9, 7);

function fakeOutput() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe('formatting', () => {
  it('should format timestamps with milliseconds', () => {
    expect(formatTimestamp(date)).toBe('2026-10-18 14:05:09.007');
  });

  it('should format a record with level and scope', () => {
    expect(formatRecord(date, 'warn', 'scenes', 'hello')).toBe('2026-10-18 14:05:09.007 WARN [scenes]: hello');
  });

  it('should name log files after the run', () => {
    expect(createLogFilePath('/logs', 'scene-chunk', 'studio-pc', date))
      .toBe(path.join('/logs', 'scene-chunk', '2026-10-18_14-05-09_scene-chunk_studio-pc.log'));
  });
});

describe('Logger', () => {
  let dir: string;

  beforeEach(() => {
    dir = createTempDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  it('should drop records below the console level', () => {
    const output = fakeOutput();
    configureLogging({ consoleLevel: 'warn', output, colors: false });
    const log = getLogger('test');

    log.info('ignored');
    log.warn('careful');

    expect(output.info).not.toHaveBeenCalled();
    expect(output.warn).toHaveBeenCalledTimes(1);
    expect(output.warn.mock.calls[0][0]).toMatch(/ WARN \[test\]: careful$/);
  });

  it('should append records to the log file', () => {
    const logFile = path.join(dir, 'nested', 'run.log');
    configureLogging({ consoleLevel: 'silent', fileLevel: 'info', logFile, output: fakeOutput() });
    const log = getLogger('test');

    log.debug('hidden');
    log.info('kept %d', 3);

    const lines = fs.readFileSync(logFile, 'utf-8').trimEnd().split('\n');
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/ INFO \[test\]: kept 3$/);
  });
});

describe('enforceMaxFolderSize', () => {
  let dir: string;

  beforeEach(() => {
    dir = createTempDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  function writeLog(name: string, ageSeconds: number): string {
    const file = path.join(dir, name);
    fs.writeFileSync(file, '0123456789');
    const time = new Date(Date.now() - ageSeconds * 1000);
    fs.utimesSync(file, time, time);
    return file;
  }

  it('should delete the oldest logs until the folder fits', async () => {
    const oldest = writeLog('a.log', 300);
    const older = writeLog('b.log', 200);
    const newest = writeLog('c.log', 100);
    fs.writeFileSync(path.join(dir, 'keep.txt'), 'x'.repeat(100));

    const deleted = await enforceMaxFolderSize(dir, 15);

    expect(deleted).toEqual([oldest, older]);
    expect(fs.existsSync(newest)).toBe(true);
    expect(fs.existsSync(path.join(dir, 'keep.txt'))).toBe(true);
  });

  it('should keep everything under the limit', async () => {
    writeLog('a.log', 10);
    await expect(enforceMaxFolderSize(dir, 100)).resolves.toEqual([]);
  });
});

describe('setupLogging', () => {
  let dir: string;

  beforeEach(() => {
    dir = createTempDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  it('should leave file logging off without a folder', async () => {
    await expect(setupLogging({
      scriptName: 'scene-chunk',
      host: 'studio-pc',
      consoleLevel: 'silent',
      fileLevel: 'debug',
    })).resolves.toBeUndefined();
  });

  it('should create the run log inside the script folder', async () => {
    const logFile = await setupLogging({
      scriptName: 'scene-chunk',
      host: 'studio-pc',
      consoleLevel: 'silent',
      fileLevel: 'debug',
      logDir: dir,
      maxFolderBytes: 1_000_000,
      now: date,
    });
    expect(logFile).toBe(path.join(dir, 'scene-chunk', '2026-10-18_14-05-09_scene-chunk_studio-pc.log'));

    getLogger('test').info('first line');
    expect(fs.existsSync(path.join(dir, 'scene-chunk'))).toBe(true);
    expect(logFile && fs.readFileSync(logFile, 'utf-8')).toMatch(/INFO \[test\]: first line\n$/);
  });
});
