import type { LoggerContext } from '@core/app';

import { ensureError } from '@/lib/errors/ensureError';

export type LoggableError = {
  name: string;
  message: string;
  stack?: string;
  issues?: unknown;
};

export const toLoggableError = (error: unknown): LoggableError => {
  const normalised = ensureError(error);
  const loggable: LoggableError = {
    name: error instanceof Error ? normalised.name : 'UnknownError',
    message: normalised.message,
  };

  if (error instanceof Error && error.stack) {
    loggable.stack = error.stack;
  }

  // Validation errors carry the list of offending keys or fields.
  if (error instanceof Error && 'issues' in error) {
    loggable.issues = error.issues;
  }

  return loggable;
};

export const createErrorLogContext = (
  base: Omit<LoggerContext, 'error'>,
  error: unknown,
): LoggerContext => ({
  ...base,
  error: toLoggableError(error),
});
