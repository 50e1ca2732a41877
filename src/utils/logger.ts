// src/utils/logger.ts
import pino from 'pino';
import type { Command } from '../console/Command';
import { isTestEnv, type LogLevel } from '../config/env';

// Detect environment
const isDevelopment = process.env.NODE_ENV === 'development';
const isTest = isTestEnv();
const isProduction = process.env.NODE_ENV === 'production';

// stdout carries command output, so every log line goes to stderr
const STDERR = 2;

// Pretty printing in development only
const transportConfig = isDevelopment ? pino.transport({
  target: 'pino-pretty',
  options: {
    destination: STDERR,
    colorize: true,
    translateTime: 'SYS:standard',
    ignore: 'pid,hostname,service,component',
    messageFormat: '{msg}',
    errorLikeObjectKeys: ['err', 'error'],
  }
}) : pino.destination({ dest: STDERR, sync: true });

// Custom serializers for store objects
const serializers = {
  err: pino.stdSerializers.err,
  error: pino.stdSerializers.err,
  command: (command: Command) => {
    // Values may be anything the user typed; keep them out of production logs
    if (isProduction && command.type === 'SET') {
      return { type: command.type, key: command.key, valueSize: command.value.length };
    }
    return command;
  },
};

const loggerOptions: pino.LoggerOptions = {
  level: isTest ? 'warn' : 'info',
  base: {
    pid: process.pid,
    service: 'nestkv',
    environment: process.env.NODE_ENV || 'development'
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  serializers,
  formatters: {
    level: (label) => ({ level: label.toUpperCase() })
  }
};

const baseLogger = pino(loggerOptions, transportConfig);

// Create child loggers for different components
export const logger = baseLogger.child({ component: 'app' });
export const engineLogger = baseLogger.child({ component: 'engine' });
export const transactionLogger = baseLogger.child({ component: 'transaction' });
export const consoleLogger = baseLogger.child({ component: 'console' });

// Helper for logs scoped to one nesting level of the transaction stack
export const createLayerLogger = (depth: number): pino.Logger => {
  return transactionLogger.child({ depth });
};

// Children read their level from the parent only when created, so keep them in step
const componentLoggers = [logger, engineLogger, transactionLogger, consoleLogger];

export const setLogLevel = (level: LogLevel): void => {
  baseLogger.level = level;
  for (const child of componentLoggers) {
    child.level = level;
  }
};

export const getLogLevel = (): string => baseLogger.level;

// Test utilities
export const enableTestLogging = (level: LogLevel = 'info'): void => {
  setLogLevel(level);
};

export const disableTestLogging = (): void => {
  setLogLevel('silent');
};
