/**
 * Filename: src/worker.ts
 * Purpose: Process entry point; loads configuration, runs the mail queue consumer until a
 * termination signal arrives, and maps failures to the exit code.
 * License: MIT
 */

import { createApplicationLogger } from '@/dependencies/logger';
import { createWorker } from '@/dependencies/worker';
import { ensureError } from '@/lib/errors/ensureError';
import { createErrorLogContext } from '@/lib/logging/error';
import { applyEnvFile, loadEnvFile } from '@/server/config/envFile';
import { parseEnvironment, type EnvironmentConfig } from '@/server/config/environment';

const EXIT_SUCCESS = 0;
const EXIT_FAILURE = 1;

const main = async (): Promise<number> => {
  const appliedKeys = applyEnvFile(process.env, await loadEnvFile('.env'));
  const logger = createApplicationLogger(process.env).withContext({ component: 'worker' });

  if (appliedKeys.length > 0) {
    logger.debug('Loaded settings from .env file.', {
      event: 'worker.env_file.loaded',
      keys: appliedKeys,
    });
  }

  let config: EnvironmentConfig;
  try {
    config = parseEnvironment(process.env);
  } catch (error) {
    logger.error(
      'Configuration is invalid; refusing to start.',
      createErrorLogContext({ event: 'worker.config.invalid', outcome: 'failure' }, error),
    );
    return EXIT_FAILURE;
  }

  const { consumer } = createWorker(config, logger);

  const onSignal = (signal: NodeJS.Signals) => {
    logger.info(`Received ${signal}; stopping consumer.`, {
      event: 'worker.signal',
      signal,
    });
    void consumer.stop();
  };

  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  try {
    await consumer.connect();
    await consumer.start();
    logger.info('Worker stopped.', { event: 'worker.stopped', outcome: 'success' });
    return EXIT_SUCCESS;
  } catch (error) {
    logger.error(
      'Worker stopped with an error.',
      createErrorLogContext({ event: 'worker.fatal', outcome: 'failure' }, error),
    );
    return EXIT_FAILURE;
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  }
};

main().then(
  (exitCode) => {
    process.exitCode = exitCode;
  },
  (error: unknown) => {
    console.error(ensureError(error));
    process.exitCode = EXIT_FAILURE;
  },
);
