import path from 'path';
import { ConfigError } from './utils/errors';
import { log, isLogLevel, LogLevel } from './utils/logger';
import { parseAppTarget } from './core/ApplicationLoader';

export type Environment = 'development' | 'production' | 'test';

export interface ServiceConfig {
  port: number;
  host: string;
  appTarget: string;
  appDir: string;
  environment: Environment;
  logLevel: LogLevel;
  gracefulShutdownTimeout: number;
  maxBodyBytes: number;
}

export const DEFAULT_PORT = 8000;
export const DEFAULT_HOST = '0.0.0.0';
export const DEFAULT_APP_TARGET = 'app:app';
export const DEFAULT_MAX_BODY_BYTES = 10 * 1024 * 1024;

// 各环境的优雅关闭超时
export const GRACEFUL_SHUTDOWN_TIMEOUTS: Record<Environment, number> = {
  production: 30000,
  development: 10000,
  test: 5000
};

const DECIMAL = /^\d+$/;

// setTimeout 的最大延迟，超过后会被当作 1ms
export const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

// 空字符串视为未设置
function present(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Strict port parser. Throws a ConfigError unless the value is a decimal
 * integer between 1 and 65535.
 */
export function parsePort(value: string): number {
  const trimmed = value.trim();
  if (!DECIMAL.test(trimmed)) {
    throw new ConfigError(`Invalid PORT: '${value}'. Expected an integer.`, 'PORT');
  }
  const port = Number.parseInt(trimmed, 10);
  if (port < 1 || port > 65535) {
    throw new ConfigError(`Invalid PORT: '${value}'. Expected integer in range 1-65535.`, 'PORT');
  }
  return port;
}

/**
 * Port to bind: the parsed PORT value, or DEFAULT_PORT when PORT is unset
 * or malformed. A malformed value is logged, never fatal.
 */
export function resolvePort(value: string | undefined): number {
  const raw = present(value);
  if (raw === undefined) {
    return DEFAULT_PORT;
  }
  try {
    return parsePort(raw);
  } catch (error) {
    if (!(error instanceof ConfigError)) {
      throw error;
    }
    log.warn(`${error.message} Falling back to ${DEFAULT_PORT}.`, { key: error.key });
    return DEFAULT_PORT;
  }
}

function parseEnvironment(value: string | undefined): Environment {
  if (value === 'production' || value === 'test' || value === 'development') {
    return value;
  }
  return 'development';
}

function parseLogLevel(value: string | undefined): LogLevel {
  const raw = present(value);
  if (raw === undefined) {
    return 'info';
  }
  const normalized = raw.toLowerCase();
  if (isLogLevel(normalized)) {
    return normalized;
  }
  log.warn(`Invalid LOG_LEVEL: '${value}'. Falling back to 'info'.`);
  return 'info';
}

function parseCount(
  key: string,
  value: string | undefined,
  fallback: number,
  minimum: number,
  maximum: number = Number.MAX_SAFE_INTEGER
): number {
  const raw = present(value);
  if (raw === undefined) {
    return fallback;
  }
  const parsed = DECIMAL.test(raw) ? Number.parseInt(raw, 10) : Number.NaN;
  if (!Number.isSafeInteger(parsed) || parsed < minimum || parsed > maximum) {
    log.warn(`Invalid ${key}: '${value}'. Falling back to ${fallback}.`);
    return fallback;
  }
  return parsed;
}

function parseTarget(value: string | undefined): string {
  const target = present(value) ?? DEFAULT_APP_TARGET;
  // 格式错误的目标无法回退，直接失败
  parseAppTarget(target);
  return target;
}

/**
 * Builds the process configuration from an environment map. Read once at
 * start-up; the result is frozen.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Readonly<ServiceConfig> {
  const environment = parseEnvironment(env.NODE_ENV);

  return Object.freeze({
    port: resolvePort(env.PORT),
    host: present(env.HOST) ?? DEFAULT_HOST,
    appTarget: parseTarget(env.APP_TARGET),
    appDir: path.resolve(present(env.APP_DIR) ?? __dirname),
    environment,
    logLevel: parseLogLevel(env.LOG_LEVEL),
    gracefulShutdownTimeout: parseCount(
      'SHUTDOWN_TIMEOUT_MS',
      env.SHUTDOWN_TIMEOUT_MS,
      GRACEFUL_SHUTDOWN_TIMEOUTS[environment],
      0,
      MAX_TIMER_DELAY_MS
    ),
    maxBodyBytes: parseCount('MAX_BODY_BYTES', env.MAX_BODY_BYTES, DEFAULT_MAX_BODY_BYTES, 1)
  });
}
