import { isAbsolute, join } from 'node:path';

import type { Logger } from '@core/app';
import {
  createPinoLogger,
  DEFAULT_LOG_FILE_PREFIX,
  type CreatePinoLoggerOptions,
} from '@core/infra';
import { parseBooleanFlagValue } from '@/server/config/envFile';

type Env = Record<string, string | undefined>;

const resolveEnv = (env: Env, key: string): string | undefined => {
  const value = env[key];
  if (typeof value !== 'string') {
    return undefined;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
};

const resolveLogDirectory = (env: Env): string => {
  const override = resolveEnv(env, 'LOG_DIR');
  if (!override) {
    return join(process.cwd(), '_logs');
  }

  return isAbsolute(override) ? override : join(process.cwd(), override);
};

const resolveFlag = (env: Env, key: string): boolean => {
  const raw = resolveEnv(env, key);
  return raw ? (parseBooleanFlagValue(raw) ?? false) : false;
};

// The prefix becomes a file name inside LOG_DIR, so path separators are not accepted.
const resolveFileNamePrefix = (env: Env): string => {
  const prefix = resolveEnv(env, 'LOG_FILE_PREFIX');
  return prefix && !/[\\/]/u.test(prefix) ? prefix : DEFAULT_LOG_FILE_PREFIX;
};

// Development deployments get debug output unless LOG_LEVEL says otherwise.
const resolveLogLevel = (env: Env): string => {
  const explicit = resolveEnv(env, 'LOG_LEVEL');
  if (explicit) {
    return explicit;
  }

  return resolveEnv(env, 'CURRENT_ENV') === 'development' ? 'debug' : 'info';
};

export const resolveLoggerEnvironmentConfig = (env: Env): CreatePinoLoggerOptions => ({
  logDirectory: resolveLogDirectory(env),
  fileNamePrefix: resolveFileNamePrefix(env),
  disableFileLogs: resolveFlag(env, 'DISABLE_FILE_LOGS'),
  disableConsoleLogs: resolveFlag(env, 'DISABLE_CONSOLE_LOGS'),
  level: resolveLogLevel(env),
});

export const createApplicationLogger = (env: Env): Logger =>
  createPinoLogger(resolveLoggerEnvironmentConfig(env));
