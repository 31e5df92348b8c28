import chalk from 'chalk';
import { icons } from './output.js';

export const LOG_LEVELS = ['off', 'error', 'warn', 'info', 'debug', 'trace'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

let currentLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export function isLevelEnabled(level: Exclude<LogLevel, 'off'>): boolean {
  return LOG_LEVELS.indexOf(level) <= LOG_LEVELS.indexOf(currentLevel);
}

const LEVEL_TAGS = {
  error: chalk.red('ERROR'),
  warn: chalk.yellow('WARN'),
  info: chalk.blue('INFO'),
  debug: chalk.cyan('DEBUG'),
  trace: chalk.magenta('TRACE'),
};

function timestamp(): string {
  return chalk.dim(new Date().toISOString());
}

// All log lines go to stderr; stdout is reserved for command results.
export const log = {
  error(message: string): void {
    if (isLevelEnabled('error')) {
      console.error(`${timestamp()} ${LEVEL_TAGS.error} ${icons.error} ${message}`);
    }
  },
  warn(message: string): void {
    if (isLevelEnabled('warn')) {
      console.error(`${timestamp()} ${LEVEL_TAGS.warn} ${icons.warning} ${message}`);
    }
  },
  info(message: string): void {
    if (isLevelEnabled('info')) {
      console.error(`${timestamp()} ${LEVEL_TAGS.info} ${icons.info} ${message}`);
    }
  },
  success(message: string): void {
    if (isLevelEnabled('info')) {
      console.error(`${timestamp()} ${LEVEL_TAGS.info} ${icons.success} ${message}`);
    }
  },
  debug(message: string): void {
    if (isLevelEnabled('debug')) {
      console.error(`${timestamp()} ${LEVEL_TAGS.debug} ${chalk.blue(message)}`);
    }
  },
  trace(message: string): void {
    if (isLevelEnabled('trace')) {
      console.error(`${timestamp()} ${LEVEL_TAGS.trace} ${chalk.magenta(message)}`);
    }
  },
};
