/**
 * Project: Mail Dispatch Worker
 * File: src/core/infra/logger/pinoLogger.ts
 * Summary: pino-backed `Logger` writing JSON lines to stdout and to two log files, one with
 * every entry and one with warn-and-above.
 */

import { mkdirSync } from 'node:fs';
import { join } from 'node:path';

import pino, {
  type DestinationStream,
  type Logger as PinoInstance,
  type LoggerOptions,
} from 'pino';

import type { Logger, LoggerContext, LogLevel } from '@core/app/ports/logger';

const DEFAULT_LOG_LEVEL: LogLevel = 'info';
const DEFAULT_LOG_DIRECTORY = join(process.cwd(), 'logs');
export const DEFAULT_LOG_FILE_PREFIX = 'mail-worker';

export const REDACTED = '[redacted]';

// Request fields that identify a person or grant access. Callers log `emailHash` instead.
const REDACTED_PATHS = [
  'recipient',
  'verification_code',
  'password',
  'request.recipient',
  'request.verification_code',
];

// Written explicitly by `serializeError`; everything else the error owns is copied as-is.
const ERROR_CORE_KEYS = new Set(['name', 'message', 'stack', 'cause']);

export type CreatePinoLoggerOptions = {
  level?: string;
  disableFileLogs?: boolean;
  disableConsoleLogs?: boolean;
  logDirectory?: string;
  /** Files are `<prefix>.log` and `<prefix>-error.log`. */
  fileNamePrefix?: string;
};

type LogStream = { stream: DestinationStream; level?: LogLevel };

/**
 * Errors are flattened with their `cause` chain and any own fields the error classes add,
 * such as `reason` on transport failures or `issues` on rejected requests.
 */
const serializeError = (value: unknown): Record<string, unknown> | undefined => {
  if (value === undefined || value === null) {
    return undefined;
  }

  if (!(value instanceof Error)) {
    return typeof value === 'object'
      ? Object.fromEntries(Object.entries(value))
      : { value: String(value) };
  }

  const serialised: Record<string, unknown> = { name: value.name, message: value.message };

  for (const [key, field] of Object.entries(value)) {
    if (!ERROR_CORE_KEYS.has(key) && field !== undefined) {
      serialised[key] = field;
    }
  }

  if (value.stack) {
    serialised.stack = value.stack;
  }

  const cause = serializeError(value.cause);
  if (cause) {
    serialised.cause = cause;
  }

  return serialised;
};

const serializeContext = (context?: LoggerContext): Record<string, unknown> | undefined => {
  if (!context) {
    return undefined;
  }

  const entries = Object.entries(context)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]): [string, unknown] =>
      key === 'error' ? [key, serializeError(value)] : [key, value],
    )
    .filter(([, value]) => value !== undefined);

  return entries.length > 0 ? Object.fromEntries(entries) : undefined;
};

class PinoLoggerAdapter implements Logger {
  constructor(private readonly instance: PinoInstance) {}

  debug(message: string, context?: LoggerContext): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: LoggerContext): void {
    this.write('info', message, context);
  }

  warn(message: string, context?: LoggerContext): void {
    this.write('warn', message, context);
  }

  error(message: string, context?: LoggerContext): void {
    this.write('error', message, context);
  }

  withContext(context: LoggerContext): Logger {
    return new PinoLoggerAdapter(this.instance.child(serializeContext(context) ?? {}));
  }

  private write(level: LogLevel, message: string, context?: LoggerContext) {
    const serialised = serializeContext(context);
    if (serialised) {
      this.instance[level](serialised, message);
    } else {
      this.instance[level](message);
    }
  }
}

type PinoExport = {
  (options?: LoggerOptions, destination?: DestinationStream): PinoInstance;
  destination: (options: {
    dest: string | number;
    mkdir?: boolean;
    append?: boolean;
    sync?: boolean;
  }) => DestinationStream;
  multistream: (streams: LogStream[]) => DestinationStream;
};

const pinoExport = pino as unknown as PinoExport;

const fileStreams = (directory: string, prefix: string): LogStream[] => {
  mkdirSync(directory, { recursive: true });

  const open = (fileName: string) =>
    pinoExport.destination({
      dest: join(directory, fileName),
      mkdir: true,
      append: true,
      sync: false,
    });

  return [
    { stream: open(`${prefix}.log`) },
    { stream: open(`${prefix}-error.log`), level: 'warn' },
  ];
};

export const createPinoLogger = (options: CreatePinoLoggerOptions = {}): Logger => {
  const level = options.level ?? DEFAULT_LOG_LEVEL;
  const streams: LogStream[] = [];

  if (!options.disableConsoleLogs) {
    streams.push({ stream: pinoExport.destination({ dest: 1, sync: false }) });
  }

  if (!options.disableFileLogs) {
    streams.push(
      ...fileStreams(
        options.logDirectory ?? DEFAULT_LOG_DIRECTORY,
        options.fileNamePrefix ?? DEFAULT_LOG_FILE_PREFIX,
      ),
    );
  }

  // Both sinks switched off: keep the Logger contract but write nothing.
  if (streams.length === 0) {
    return new PinoLoggerAdapter(pinoExport({ level, enabled: false }));
  }

  const instance = pinoExport(
    {
      level,
      base: undefined,
      redact: { paths: REDACTED_PATHS, censor: REDACTED },
      timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,
    },
    pinoExport.multistream(streams),
  );

  return new PinoLoggerAdapter(instance);
};
