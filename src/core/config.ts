import { isLogLevel } from '../utils/logger.js';
import type { LogLevel } from '../utils/logger.js';

export const DEFAULT_SOURCE_FILE = 'pinsmith.lock';
export const DEFAULT_LOG_LEVEL: LogLevel = 'info';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export interface GlobalOptions {
  sourceFile?: string;
  logLevel?: string;
}

export interface ToolBinaries {
  git: string;
  nix: string;
}

export function resolveSourceFile(
  options?: GlobalOptions,
  env: NodeJS.ProcessEnv = process.env,
): string {
  return options?.sourceFile ?? env.PINSMITH_SOURCE_FILE ?? DEFAULT_SOURCE_FILE;
}

export function resolveLogLevel(
  options?: GlobalOptions,
  env: NodeJS.ProcessEnv = process.env,
): LogLevel {
  const raw = (options?.logLevel ?? env.PINSMITH_LOG_LEVEL ?? DEFAULT_LOG_LEVEL)
    .trim()
    .toLowerCase();
  if (!isLogLevel(raw)) {
    throw new ConfigError(
      `Invalid log level "${raw}" (expected one of off, error, warn, info, debug, trace)`,
    );
  }
  return raw;
}

export function resolveToolBinaries(env: NodeJS.ProcessEnv = process.env): ToolBinaries {
  return {
    git: env.PINSMITH_GIT || 'git',
    nix: env.PINSMITH_NIX || 'nix',
  };
}
