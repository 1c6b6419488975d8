/**
 * Filename: tests/core/templates/mergeVariables.test.ts
 * Purpose: Check ordered-override merging and value stringification for template variables.
 * License: MIT
 */

import assert from 'node:assert/strict';
import test from 'node:test';

import {
  mergeVariables,
  omitVariables,
  stringifyTemplateValue,
  type TemplateVariables,
} from '../../../src/core/domain';

test('mergeVariables lets later sources override earlier ones', () => {
  const merged = mergeVariables({ a: '1', b: '2' }, { b: '3' }, { c: '4' });

  assert.deepEqual(merged, { a: '1', b: '3', c: '4' });
});

test('mergeVariables never mutates its sources', () => {
  const first: TemplateVariables = { a: '1' };
  const second: TemplateVariables = { a: '2' };

  mergeVariables(first, second);

  assert.deepEqual(first, { a: '1' });
  assert.deepEqual(second, { a: '2' });
});

test('mergeVariables with no sources returns an empty mapping', () => {
  assert.deepEqual(mergeVariables(), {});
});

test('omitVariables drops the listed keys only', () => {
  assert.deepEqual(omitVariables({ app_name: 'x', greeting: 'hi' }, ['app_name']), {
    greeting: 'hi',
  });
});

test('stringifyTemplateValue renders scalars and mappings', () => {
  assert.equal(stringifyTemplateValue('text'), 'text');
  assert.equal(stringifyTemplateValue(42), '42');
  assert.equal(stringifyTemplateValue(true), 'true');
  assert.equal(stringifyTemplateValue(null), 'null');
  assert.equal(stringifyTemplateValue({ a: 1, b: 'two' }), '{"a":1,"b":"two"}');
});
