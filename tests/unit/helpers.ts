/**
 * Shared helpers for unit tests
 */

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { DEFAULT_CHUNK_DATA_QUERY } from '../../src/tools/chunkDataTools';
import type { AppEnv } from '../../src/utils/envHandler';

export const FIXTURES_DIR = path.resolve(__dirname, '..', 'fixtures', 'scenes');

export function createTempDir(prefix = 'scene-chunk-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function testEnv(overrides: Partial<AppEnv> = {}): AppEnv {
  return {
    scenesDir: FIXTURES_DIR,
    ...DEFAULT_CHUNK_DATA_QUERY,
    copy: true,
    print: false,
    host: '127.0.0.1',
    port: 3000,
    logLevel: 'silent',
    fileLogLevel: 'debug',
    ...overrides,
  };
}

/** `levels` arrays nested inside each other around a string leaf. */
export function nestedSequences(levels: number): unknown {
  let node: unknown = 'leaf';
  for (let i = 0; i < levels; i++) {
    node = [node];
  }
  return node;
}
