/**
 * Project: Mail Dispatch Worker
 * File: src/core/app/queue/connectWithRetry.ts
 * Summary: Bounded, fixed-delay retry around opening the broker connection.
 */

import type { Logger } from '@core/app/ports/logger';
import type {
  BrokerConnection,
  BrokerConnectionOptions,
  BrokerConnector,
} from '@core/app/ports/messageBroker';
import { BrokerConnectionError } from '@core/app/errors/brokerConnectionError';

export const DEFAULT_CONNECT_MAX_ATTEMPTS = 10;
export const DEFAULT_CONNECT_RETRY_DELAY_MS = 5_000;

export type ConnectWithRetryOptions = {
  maxAttempts?: number;
  retryDelayMs?: number;
  logger: Pick<Logger, 'info' | 'warn' | 'error'>;
  sleep?: (delayMs: number) => Promise<void>;
};

const waitFor = (delayMs: number) =>
  new Promise<void>((resolve) => {
    setTimeout(resolve, delayMs);
  });

export const connectWithRetry = async (
  connect: BrokerConnector,
  connectionOptions: BrokerConnectionOptions,
  options: ConnectWithRetryOptions,
): Promise<BrokerConnection> => {
  const maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_CONNECT_MAX_ATTEMPTS);
  const retryDelayMs = options.retryDelayMs ?? DEFAULT_CONNECT_RETRY_DELAY_MS;
  const sleep = options.sleep ?? waitFor;
  const target = `${connectionOptions.host}:${connectionOptions.port}`;

  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
    options.logger.info(`Attempting to connect to broker at ${target}.`, {
      event: 'consumer.connection.attempt',
      attempt,
      maxAttempts,
    });

    try {
      const connection = await connect(connectionOptions);
      options.logger.info('Connected to broker.', {
        event: 'consumer.connection.established',
        outcome: 'success',
        attempt,
      });
      return connection;
    } catch (error) {
      lastError = error;

      if (attempt < maxAttempts) {
        options.logger.warn(`Broker connection failed. Retrying in ${retryDelayMs} ms.`, {
          event: 'consumer.connection.retry',
          outcome: 'retry',
          attempt,
          maxAttempts,
          error,
        });
        await sleep(retryDelayMs);
      }
    }
  }

  options.logger.error(`Failed to connect to broker after ${maxAttempts} attempts.`, {
    event: 'consumer.connection.exhausted',
    outcome: 'failure',
    maxAttempts,
    error: lastError,
  });

  throw new BrokerConnectionError(
    `Could not connect to broker at ${target} after ${maxAttempts} attempts.`,
    maxAttempts,
    { cause: lastError },
  );
};
