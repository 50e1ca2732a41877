import { ConfigError } from '../utils/errors';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface AppConfig {
  logLevel: LogLevel;
  /** Port for the /metrics endpoint; the server is not started when undefined */
  metricsPort: number | undefined;
}

type Env = Record<string, string | undefined>;

export function isTestEnv(env: Env = process.env): boolean {
  return env.NODE_ENV === 'test' || env.JEST_WORKER_ID !== undefined;
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

// Default log levels per environment
export function resolveLogLevel(env: Env = process.env): LogLevel {
  const raw = env.LOG_LEVEL?.trim().toLowerCase();
  if (raw) {
    if (!isLogLevel(raw)) {
      throw new ConfigError('LOG_LEVEL', `expected one of ${LOG_LEVELS.join(', ')}, got '${env.LOG_LEVEL}'`);
    }
    return raw;
  }
  return isTestEnv(env) ? 'warn' : 'info';
}

function parsePort(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === '') return undefined;

  const port = Number(raw);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ConfigError('METRICS_PORT', `expected an integer between 1 and 65535, got '${raw}'`);
  }
  return port;
}

export function loadConfig(env: Env = process.env): AppConfig {
  return {
    logLevel: resolveLogLevel(env),
    metricsPort: parsePort(env.METRICS_PORT),
  };
}
