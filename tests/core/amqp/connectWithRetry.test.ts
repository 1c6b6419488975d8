/**
 * Filename: tests/core/amqp/connectWithRetry.test.ts
 * Purpose: Cover the bounded, fixed-delay broker connection retry.
 * License: MIT
 */

import assert from 'node:assert/strict';
import test from 'node:test';

import {
  BrokerConnectionError,
  DEFAULT_CONNECT_RETRY_DELAY_MS,
  connectWithRetry,
} from '../../../src/core/app';
import { ConnectionRefusedError, InMemoryBroker } from '../__fixtures__/inMemoryBroker';
import { InMemoryLogger } from '../__fixtures__/inMemoryMailAdapters';

const connection = {
  host: 'broker.internal',
  port: 5672,
  username: 'guest',
  password: 'test-secret',
  heartbeatSeconds: 0,
};

const recordSleeps = () => {
  const sleeps: number[] = [];
  const sleep = async (delayMs: number) => {
    sleeps.push(delayMs);
  };
  return { sleeps, sleep };
};

test('retries until the broker accepts the connection', async () => {
  const broker = new InMemoryBroker();
  broker.refuseConnections = 2;
  const logger = new InMemoryLogger();
  const { sleeps, sleep } = recordSleeps();

  const result = await connectWithRetry(broker.connect, connection, {
    retryDelayMs: 100,
    logger,
    sleep,
  });

  assert.equal(result, broker.connections[0]);
  assert.equal(broker.connectAttempts, 3);
  assert.deepEqual(sleeps, [100, 100]);
  assert.deepEqual(logger.events(), [
    'consumer.connection.attempt',
    'consumer.connection.retry',
    'consumer.connection.attempt',
    'consumer.connection.retry',
    'consumer.connection.attempt',
    'consumer.connection.established',
  ]);
});

test('gives up after maxAttempts and keeps the last error as the cause', async () => {
  const broker = new InMemoryBroker();
  broker.refuseConnections = Number.POSITIVE_INFINITY;
  const logger = new InMemoryLogger();
  const { sleeps, sleep } = recordSleeps();

  await assert.rejects(
    connectWithRetry(broker.connect, connection, { maxAttempts: 3, logger, sleep }),
    (error: unknown) => {
      assert.ok(error instanceof BrokerConnectionError);
      assert.equal(
        error.message,
        'Could not connect to broker at broker.internal:5672 after 3 attempts.',
      );
      assert.equal(error.attempts, 3);
      assert.ok(error.cause instanceof ConnectionRefusedError);
      return true;
    },
  );

  assert.deepEqual(sleeps, [DEFAULT_CONNECT_RETRY_DELAY_MS, DEFAULT_CONNECT_RETRY_DELAY_MS]);
  assert.equal(logger.find('consumer.connection.exhausted')?.level, 'error');
});

test('always makes at least one attempt', async () => {
  const broker = new InMemoryBroker();
  broker.refuseConnections = 1;
  const { sleeps, sleep } = recordSleeps();

  await assert.rejects(
    connectWithRetry(broker.connect, connection, {
      maxAttempts: 0,
      logger: new InMemoryLogger(),
      sleep,
    }),
    BrokerConnectionError,
  );

  assert.equal(broker.connectAttempts, 1);
  assert.deepEqual(sleeps, []);
});
