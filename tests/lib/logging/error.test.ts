/**
 * Filename: tests/lib/logging/error.test.ts
 * Purpose: Check how thrown values are normalised before they reach the logger.
 * License: MIT
 */

import assert from 'node:assert/strict';
import test from 'node:test';

import { ensureError } from '../../../src/lib/errors/ensureError';
import { createErrorLogContext, toLoggableError } from '../../../src/lib/logging/error';
import { EnvironmentValidationError } from '../../../src/server/config/environment';

test('ensureError keeps errors and wraps everything else', () => {
  const original = new Error('boom');

  assert.equal(ensureError(original), original);
  assert.equal(ensureError('plain').message, 'plain');
  assert.equal(ensureError({ message: 'shaped' }).message, 'shaped');
  assert.equal(ensureError(42).message, 'Unknown error');
  assert.equal(ensureError(42).cause, 42);
});

test('toLoggableError carries validation issues', () => {
  const issues = [{ key: 'APP_NAME', message: 'APP_NAME is required.' }];
  const loggable = toLoggableError(new EnvironmentValidationError(issues));

  assert.equal(loggable.name, 'EnvironmentValidationError');
  assert.equal(loggable.message, 'Environment configuration is invalid: APP_NAME.');
  assert.deepEqual(loggable.issues, issues);
  assert.equal(typeof loggable.stack, 'string');
});

test('toLoggableError names non-error values UnknownError', () => {
  assert.deepEqual(toLoggableError('boom'), { name: 'UnknownError', message: 'boom' });
});

test('createErrorLogContext merges the base context', () => {
  const context = createErrorLogContext({ event: 'worker.fatal', outcome: 'failure' }, 'boom');

  assert.deepEqual(context, {
    event: 'worker.fatal',
    outcome: 'failure',
    error: { name: 'UnknownError', message: 'boom' },
  });
});
