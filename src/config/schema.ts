import { isLogLevel, LOG_LEVELS, type LogLevel } from '../observability/logger.js';

export interface PostureConfig {
  host: string;
  port: number; // 0 picks a free port
  logLevel: LogLevel;
  logJson: boolean;
  corsOrigins: string[];
}

export type PartialConfig = Partial<PostureConfig>;

export interface ValidationError {
  path: string;
  message: string;
}

const KNOWN_KEYS: readonly string[] = ['host', 'port', 'logLevel', 'logJson', 'corsOrigins'];

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Validate and return errors (empty array if valid)
export function validateConfig(config: unknown): ValidationError[] {
  const errors: ValidationError[] = [];

  if (!isRecord(config)) {
    errors.push({ path: 'root', message: 'Config must be an object' });
    return errors;
  }

  if ('host' in config) {
    const host = config['host'];
    if (typeof host !== 'string' || host.trim() === '') {
      errors.push({ path: 'host', message: 'Must be a non-empty string' });
    }
  }

  if ('port' in config) {
    const port = config['port'];
    if (typeof port !== 'number' || !Number.isInteger(port) || port < 0 || port > 65535) {
      errors.push({ path: 'port', message: 'Must be an integer between 0 and 65535' });
    }
  }

  if ('logLevel' in config && !isLogLevel(config['logLevel'])) {
    errors.push({ path: 'logLevel', message: `Must be one of: ${LOG_LEVELS.join(', ')}` });
  }

  if ('logJson' in config && typeof config['logJson'] !== 'boolean') {
    errors.push({ path: 'logJson', message: 'Must be a boolean' });
  }

  if ('corsOrigins' in config) {
    const origins = config['corsOrigins'];
    if (!Array.isArray(origins) || !origins.every(origin => typeof origin === 'string')) {
      errors.push({ path: 'corsOrigins', message: 'Must be an array of strings' });
    }
  }

  for (const key of Object.keys(config)) {
    if (!KNOWN_KEYS.includes(key)) {
      errors.push({ path: key, message: 'Unknown configuration key' });
    }
  }

  return errors;
}

export function isValidConfig(config: unknown): config is PartialConfig {
  return validateConfig(config).length === 0;
}

export function isCompleteConfig(config: unknown): config is PostureConfig {
  return isValidConfig(config) && KNOWN_KEYS.every(key => key in config);
}
