/**
 * Unit tests for configuration resolution
 *
 * @see src/utils/envHandler.ts
 */

import fs from 'node:fs';
import path from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { EnvHandler } from '../../../src/utils/envHandler';
import { defaultScenesDir } from '../../../src/scenes/sceneFiles';
import { createTempDir, removeDir } from '../helpers';

const noArgs = { _: [], $0: 'scene-chunk' };

describe('EnvHandler.resolveAppEnv', () => {
  let dir: string;

  beforeEach(() => {
    dir = createTempDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  it('should fall back to defaults', () => {
    const env = EnvHandler.resolveAppEnv(noArgs, {});
    expect(env).toEqual({
      scenesDir: defaultScenesDir(process.platform, {}),
      pluginField: 'plugin_path',
      pluginSignature: 'reafir_standalone.dll',
      match: 'endsWith',
      payloadKey: 'chunk_data',
      maxDepth: 1000,
      copy: true,
      print: false,
      host: '127.0.0.1',
      port: 3000,
      logLevel: 'info',
      fileLogLevel: 'debug',
    });
  });

  it('should read environment variables', () => {
    const env = EnvHandler.resolveAppEnv(noArgs, {
      OBS_SCENES_DIR: '/srv/obs/scenes',
      PORT: '4000',
      PLUGIN_MATCH: 'equals',
      LOG_LEVEL: 'DEBUG',
      LOG_MAX_FOLDER_BYTES: '1048576',
    });
    expect(env.scenesDir).toBe('/srv/obs/scenes');
    expect(env.port).toBe(4000);
    expect(env.match).toBe('equals');
    expect(env.logLevel).toBe('debug');
    expect(env.logMaxFolderBytes).toBe(1048576);
  });

  it('should prefer arguments over environment variables', () => {
    const env = EnvHandler.resolveAppEnv(
      { ...noArgs, port: 5000, copy: false, scenesDir: '/args/scenes' },
      { PORT: '4000', OBS_SCENES_DIR: '/env/scenes' },
    );
    expect(env.port).toBe(5000);
    expect(env.copy).toBe(false);
    expect(env.scenesDir).toBe('/args/scenes');
  });

  it('should load an env file below the process environment', () => {
    const envFile = path.join(dir, 'test.env');
    fs.writeFileSync(envFile, 'PAYLOAD_KEY=state\nMAX_DEPTH=50\nHOST=0.0.0.0\n');
    const env = EnvHandler.resolveAppEnv({ ...noArgs, env: envFile }, { MAX_DEPTH: '60' });
    expect(env.payloadKey).toBe('state');
    expect(env.maxDepth).toBe(60);
    expect(env.host).toBe('0.0.0.0');
  });

  it('should fail on a missing env file', () => {
    const envFile = path.join(dir, 'missing.env');
    expect(() => EnvHandler.resolveAppEnv({ ...noArgs, env: envFile }, {}))
      .toThrow(`Failed to load env file ${envFile}`);
  });

  it('should reject values that do not parse', () => {
    expect(() => EnvHandler.resolveAppEnv(noArgs, { PORT: 'abc' }))
      .toThrow('Invalid PORT: abc (expected an integer >= 0)');
    expect(() => EnvHandler.resolveAppEnv(noArgs, { PLUGIN_MATCH: 'contains' }))
      .toThrow('Invalid PLUGIN_MATCH: contains (expected equals or endsWith)');
    expect(() => EnvHandler.resolveAppEnv({ ...noArgs, maxDepth: 0 }, {}))
      .toThrow('Invalid --max-depth: 0 (expected an integer >= 1)');
    expect(() => EnvHandler.resolveAppEnv(noArgs, { LOG_LEVEL: 'verbose' }))
      .toThrow('Invalid LOG_LEVEL: verbose');
  });
});
