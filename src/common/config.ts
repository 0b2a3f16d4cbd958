import { DEFAULT_HOST, DEFAULT_PORT } from './consts.js';
import { LOG_LEVELS, type LogLevel } from './logger.js';

export interface WebUtilsConfig {
  host: string;

  port: number;

  /**
   * Path prefix the application is mounted under. Used as the default cookie path.
   */
  contextPath: string;

  logLevel: LogLevel;
}

export class ConfigError extends Error {
  readonly key: string;

  constructor(key: string, message: string) {
    super(`Invalid ${key}: ${message}`);
    this.name = 'ConfigError';
    this.key = key;
  }
}

function parsePort(raw: string | undefined): number {
  if (raw === undefined || raw.trim().length === 0) {
    return DEFAULT_PORT;
  }

  const port = Number(raw.trim());
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigError('PORT', `expected an integer between 0 and 65535, got "${raw}"`);
  }

  return port;
}

function parseLogLevel(raw: string | undefined): LogLevel {
  if (raw === undefined || raw.trim().length === 0) {
    return 'INFO';
  }

  const normalized = raw.trim().toUpperCase();
  const level = LOG_LEVELS.find((candidate) => candidate === normalized);
  if (level === undefined) {
    throw new ConfigError('LOG_LEVEL', `expected one of ${LOG_LEVELS.join(', ')}, got "${raw}"`);
  }

  return level;
}

/**
 * Reads configuration from environment variables, falling back to defaults for unset ones.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): WebUtilsConfig {
  return {
    host: env.HOST?.trim() || DEFAULT_HOST,
    port: parsePort(env.PORT),
    contextPath: env.CONTEXT_PATH ?? '',
    logLevel: parseLogLevel(env.LOG_LEVEL),
  };
}
