import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { validateConfig, isValidConfig } from '../../src/config/schema.js';
import { getDefaultConfig, DEFAULT_CORS_ORIGINS } from '../../src/config/defaults.js';
import { loadConfig } from '../../src/config/loader.js';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';

describe('Config Schema Validation', () => {
  it('should validate a valid config', () => {
    const config = {
      host: '0.0.0.0',
      port: 8000,
      logLevel: 'info' as const,
      logJson: false,
      corsOrigins: ['http://localhost'],
    };

    expect(validateConfig(config)).toEqual([]);
    expect(isValidConfig(config)).toBe(true);
  });

  it('should reject invalid logLevel', () => {
    expect(validateConfig({ logLevel: 'trace' })).toEqual([
      { path: 'logLevel', message: 'Must be one of: debug, info, warn, error, silent' },
    ]);
  });

  it('should reject ports out of range', () => {
    for (const port of [-1, 65536, 80.5, '8000']) {
      expect(validateConfig({ port }).map(e => e.path)).toEqual(['port']);
    }
    expect(validateConfig({ port: 0 })).toEqual([]);
  });

  it('should reject an empty host', () => {
    expect(validateConfig({ host: '  ' }).map(e => e.path)).toEqual(['host']);
  });

  it('should reject non-boolean logJson', () => {
    expect(validateConfig({ logJson: 'yes' }).map(e => e.path)).toEqual(['logJson']);
  });

  it('should reject corsOrigins with non-strings', () => {
    expect(validateConfig({ corsOrigins: ['http://localhost', 1] }).map(e => e.path)).toEqual(['corsOrigins']);
    expect(validateConfig({ corsOrigins: 'http://localhost' }).map(e => e.path)).toEqual(['corsOrigins']);
  });

  it('should reject non-object config', () => {
    expect(validateConfig(null)).toEqual([{ path: 'root', message: 'Config must be an object' }]);
    expect(validateConfig([])).toEqual([{ path: 'root', message: 'Config must be an object' }]);
  });

  it('should reject unknown keys', () => {
    expect(validateConfig({ thresholds: {} })).toEqual([
      { path: 'thresholds', message: 'Unknown configuration key' },
    ]);
  });
});

describe('Default Config', () => {
  it('should listen locally on port 8000', () => {
    expect(getDefaultConfig()).toEqual({
      host: '127.0.0.1',
      port: 8000,
      logLevel: 'info',
      logJson: false,
      corsOrigins: [...DEFAULT_CORS_ORIGINS],
    });
  });

  it('should allow the local front-end origins', () => {
    expect(getDefaultConfig().corsOrigins).toContain('null');
    expect(getDefaultConfig().corsOrigins).toContain('http://127.0.0.1:5500');
  });
});

describe('Config Loader', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'posture-config-test-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should load defaults when nothing is configured', async () => {
    const config = await loadConfig({ cwd: tempDir, env: {} });
    expect(config).toEqual(getDefaultConfig());
  });

  it('should load .posturerc.json', async () => {
    fs.writeFileSync(path.join(tempDir, '.posturerc.json'), JSON.stringify({ port: 9000, logJson: true }));

    const config = await loadConfig({ cwd: tempDir, env: {} });
    expect(config.port).toBe(9000);
    expect(config.logJson).toBe(true);
    expect(config.host).toBe('127.0.0.1');
  });

  it('should load the posture key of package.json', async () => {
    fs.writeFileSync(
      path.join(tempDir, 'package.json'),
      JSON.stringify({ name: 'desk-app', posture: { logLevel: 'debug' } })
    );

    const config = await loadConfig({ cwd: tempDir, env: {} });
    expect(config.logLevel).toBe('debug');
  });

  it('should load an explicit config path relative to cwd', async () => {
    fs.writeFileSync(path.join(tempDir, 'custom.json'), JSON.stringify({ host: '0.0.0.0' }));

    const config = await loadConfig({ cwd: tempDir, configPath: 'custom.json', env: {} });
    expect(config.host).toBe('0.0.0.0');
  });

  it('should let env vars override the config file', async () => {
    fs.writeFileSync(path.join(tempDir, '.posturerc'), JSON.stringify({ port: 9000 }));

    const config = await loadConfig({
      cwd: tempDir,
      env: {
        POSTURE_PORT: '9100',
        POSTURE_LOG_LEVEL: 'warn',
        POSTURE_LOG_JSON: 'true',
        POSTURE_CORS_ORIGINS: 'http://a.test, http://b.test,',
      },
    });

    expect(config.port).toBe(9100);
    expect(config.logLevel).toBe('warn');
    expect(config.logJson).toBe(true);
    expect(config.corsOrigins).toEqual(['http://a.test', 'http://b.test']);
  });

  it('should let CLI flags override env vars', async () => {
    const config = await loadConfig({
      cwd: tempDir,
      env: { POSTURE_LOG_LEVEL: 'warn' },
      cliFlags: { logLevel: 'error' },
    });
    expect(config.logLevel).toBe('error');
  });

  it('should reject invalid values from any source', async () => {
    await expect(loadConfig({ cwd: tempDir, env: { POSTURE_PORT: 'eighty' } })).rejects.toThrow(
      'Invalid configuration: port: Must be an integer between 0 and 65535'
    );

    fs.writeFileSync(path.join(tempDir, '.posturerc.json'), JSON.stringify({ verbose: true }));
    await expect(loadConfig({ cwd: tempDir, env: {} })).rejects.toThrow(
      'Invalid configuration: verbose: Unknown configuration key'
    );
  });

  it('should reject a config file that is not an object', async () => {
    fs.writeFileSync(path.join(tempDir, '.posturerc'), '[1, 2]');
    await expect(loadConfig({ cwd: tempDir, env: {} })).rejects.toThrow('must export an object');
  });
});
