import { isCompleteConfig, isRecord, validateConfig, type PartialConfig, type PostureConfig } from './schema.js';
import { getDefaultConfig } from './defaults.js';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { pathToFileURL } from 'node:url';

// Search order: CLI flags > env vars > config file > defaults
export interface LoadConfigOptions {
  cliFlags?: PartialConfig;
  configPath?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

type RawConfig = Record<string, unknown>;

export async function loadConfig(options: LoadConfigOptions = {}): Promise<PostureConfig> {
  const defaults = getDefaultConfig();
  const envConfig = loadEnvConfig(options.env ?? process.env);
  const fileConfig = await loadFileConfig(options.configPath, options.cwd);

  const merged: RawConfig = {
    ...defaults,
    ...fileConfig,
    ...envConfig,
    ...options.cliFlags,
  };

  const errors = validateConfig(merged);
  if (errors.length > 0 || !isCompleteConfig(merged)) {
    throw new Error(`Invalid configuration: ${errors.map(e => `${e.path}: ${e.message}`).join(', ')}`);
  }

  return merged;
}

// Values are passed through as-is where they cannot be converted, so that
// validation reports them against the right key.
function loadEnvConfig(env: NodeJS.ProcessEnv): RawConfig {
  const config: RawConfig = {};

  if (env['POSTURE_HOST']) {
    config['host'] = env['POSTURE_HOST'];
  }
  if (env['POSTURE_PORT']) {
    const port = Number(env['POSTURE_PORT']);
    config['port'] = Number.isNaN(port) ? env['POSTURE_PORT'] : port;
  }
  if (env['POSTURE_LOG_LEVEL']) {
    config['logLevel'] = env['POSTURE_LOG_LEVEL'];
  }
  if (env['POSTURE_LOG_JSON']) {
    config['logJson'] = env['POSTURE_LOG_JSON'] === 'true';
  }
  if (env['POSTURE_CORS_ORIGINS']) {
    config['corsOrigins'] = env['POSTURE_CORS_ORIGINS']
      .split(',')
      .map(origin => origin.trim())
      .filter(origin => origin.length > 0);
  }

  return config;
}

// Search: posture.config.js, posture.config.mjs, .posturerc, .posturerc.json, package.json#posture
async function loadFileConfig(configPath?: string, cwd?: string): Promise<RawConfig> {
  const searchDir = cwd ?? process.cwd();

  if (configPath) {
    return loadConfigFile(path.resolve(searchDir, configPath));
  }

  const candidates = [
    'posture.config.js',
    'posture.config.mjs',
    '.posturerc',
    '.posturerc.json',
  ];

  for (const candidate of candidates) {
    const fullPath = path.join(searchDir, candidate);
    if (fs.existsSync(fullPath)) {
      return loadConfigFile(fullPath);
    }
  }

  const pkgPath = path.join(searchDir, 'package.json');
  if (fs.existsSync(pkgPath)) {
    const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf-8'));
    if (isRecord(pkg) && isRecord(pkg['posture'])) {
      return pkg['posture'];
    }
  }

  return {};
}

async function loadConfigFile(filePath: string): Promise<RawConfig> {
  const ext = path.extname(filePath);
  let loaded: unknown;

  if (ext === '.js' || ext === '.mjs') {
    const module: unknown = await import(pathToFileURL(filePath).href);
    loaded = isRecord(module) && 'default' in module ? module['default'] : module;
  } else {
    // JSON or .posturerc (treat as JSON)
    loaded = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  }

  if (!isRecord(loaded)) {
    throw new Error(`Invalid configuration: ${filePath} must export an object`);
  }
  return loaded;
}
