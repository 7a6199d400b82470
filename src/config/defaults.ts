import type { PostureConfig } from './schema.js';

// Local front ends the browser client is usually served from.
export const DEFAULT_CORS_ORIGINS: readonly string[] = [
  'null',
  'http://localhost',
  'http://localhost:8080',
  'http://127.0.0.1',
  'http://127.0.0.1:8080',
  'http://127.0.0.1:5500',
  'http://127.0.0.1:5501',
];

export function getDefaultConfig(): PostureConfig {
  return {
    host: '127.0.0.1',
    port: 8000,
    logLevel: 'info',
    logJson: false,
    corsOrigins: [...DEFAULT_CORS_ORIGINS],
  };
}
