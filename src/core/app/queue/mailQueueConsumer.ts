/**
 * Project: Mail Dispatch Worker
 * File: src/core/app/queue/mailQueueConsumer.ts
 * Summary: Consume mail requests one at a time, acknowledging successes and dead-lettering
 * every failure.
 */

import type { MailRequest } from '@core/domain';
import type { Logger } from '@core/app/ports/logger';
import type {
  BrokerChannel,
  BrokerConnection,
  BrokerConnectionOptions,
  BrokerConnector,
  BrokerMessage,
} from '@core/app/ports/messageBroker';
import { MailTransportError } from '@core/app/errors/mailTransportError';
import { TopologyDeclarationError } from '@core/app/errors/topologyDeclarationError';
import { decodeMailRequest } from '@core/app/services/mail/decodeMailRequest';
import { hashEmail } from '@core/app/services/mail/emailFingerprint';

import { connectWithRetry } from './connectWithRetry';
import { deadLetterNames, type DeadLetterNames } from './deadLetterNames';

export const DEFAULT_BLOCKED_CONNECTION_TIMEOUT_MS = 300_000;

const PREFETCH_COUNT = 1;
const DEAD_LETTER_EXCHANGE_ARGUMENT = 'x-dead-letter-exchange';

export type MailQueueConsumerState =
  | 'disconnected'
  | 'connecting'
  | 'declaring'
  | 'consuming'
  | 'stopped';

export type MailQueueConsumerDependencies = {
  connect: BrokerConnector;
  dispatcher: { dispatch(request: MailRequest): Promise<void> };
  logger: Logger;
  sleep?: (delayMs: number) => Promise<void>;
};

export type MailQueueConsumerOptions = {
  connection: BrokerConnectionOptions;
  queueName: string;
  connectMaxAttempts?: number;
  connectRetryDelayMs?: number;
  blockedConnectionTimeoutMs?: number;
};

type Completion = {
  promise: Promise<void>;
  resolve: () => void;
  reject: (error: Error) => void;
};

const createCompletion = (): Completion => {
  let resolve: () => void = () => {};
  let reject: (error: Error) => void = () => {};
  const promise = new Promise<void>((onResolve, onReject) => {
    resolve = onResolve;
    reject = onReject;
  });

  return { promise, resolve, reject };
};

const isNotFoundError = (error: unknown): boolean =>
  typeof error === 'object' && error !== null && 'code' in error && error.code === 404;

export class MailQueueConsumer {
  private readonly logger: Logger;

  private readonly deadLetter: DeadLetterNames;

  private currentState: MailQueueConsumerState = 'disconnected';

  private connection: BrokerConnection | null = null;

  private channel: BrokerChannel | null = null;

  private consumerTag: string | null = null;

  // Chains message handling so a delivery is never processed while another is outstanding.
  private inFlight: Promise<void> = Promise.resolve();

  private completion: Completion | null = null;

  private failure: Error | null = null;

  private stopping: Promise<void> | null = null;

  private blockedTimer: NodeJS.Timeout | null = null;

  constructor(
    private readonly dependencies: MailQueueConsumerDependencies,
    private readonly options: MailQueueConsumerOptions,
  ) {
    this.logger = dependencies.logger.withContext({ component: 'consumer' });
    this.deadLetter = deadLetterNames(options.queueName);
  }

  get state(): MailQueueConsumerState {
    return this.currentState;
  }

  get queueName(): string {
    return this.options.queueName;
  }

  get deadLetterQueueName(): string {
    return this.deadLetter.queue;
  }

  async connect(): Promise<void> {
    if (this.currentState !== 'disconnected') {
      throw new Error(`Cannot connect a consumer in state '${this.currentState}'.`);
    }

    this.currentState = 'connecting';

    let connection: BrokerConnection;
    try {
      connection = await connectWithRetry(this.dependencies.connect, this.options.connection, {
        maxAttempts: this.options.connectMaxAttempts,
        retryDelayMs: this.options.connectRetryDelayMs,
        logger: this.logger,
        sleep: this.dependencies.sleep,
      });
    } catch (error) {
      this.currentState = 'stopped';
      throw error;
    }

    this.connection = connection;
    this.watchConnection(connection);

    if (this.stopping) {
      await this.closeQuietly();
      return;
    }

    this.currentState = 'declaring';
    try {
      this.channel = await this.declareTopology(connection);
    } catch (error) {
      this.currentState = 'stopped';
      await this.closeQuietly();

      // stop() closed the connection under the declare; that is not a topology failure.
      if (this.stopping) {
        this.logger.info('Stopped while declaring the topology.', {
          event: 'consumer.topology.interrupted',
          outcome: 'skipped',
        });
        return;
      }

      throw error;
    }

    if (this.stopping) {
      await this.closeQuietly();
    }
  }

  /**
   * Consumes until `stop()` is called or the broker ends the session. Resolves after a
   * graceful stop and rejects when the connection or the consume channel is lost.
   */
  async start(): Promise<void> {
    if (this.failure) {
      throw this.failure;
    }

    if (this.stopping || this.currentState === 'stopped') {
      return;
    }

    const channel = this.channel;
    if (!channel || this.currentState !== 'declaring') {
      throw new Error('connect() must complete before start().');
    }

    this.watchChannel(channel);
    const completion = createCompletion();
    this.completion = completion;
    const { consumerTag } = await channel.consume(this.options.queueName, (message) => {
      this.onDelivery(message);
    });
    this.consumerTag = consumerTag;

    // stop() may already have run while the consume request was outstanding.
    if (this.currentState === 'declaring') {
      this.currentState = 'consuming';
      this.logger.info('Waiting for messages.', {
        event: 'consumer.consume.started',
        queue: this.options.queueName,
        consumerTag,
      });
    }

    return completion.promise;
  }

  /**
   * Safe to call at any time and from any callback, e.g. a signal handler. The message being
   * handled when stop is requested is still acknowledged or dead-lettered first.
   */
  stop(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.shutdown();
    }

    return this.stopping;
  }

  private async declareTopology(connection: BrokerConnection): Promise<BrokerChannel> {
    const queueName = this.options.queueName;
    const { exchange, queue: deadLetterQueue } = this.deadLetter;

    let channel = await connection.createChannel();

    try {
      await channel.assertExchange(exchange, 'direct', { durable: true });
    } catch (error) {
      this.logger.warn(`Failed to declare dead-letter exchange '${exchange}'.`, {
        event: 'consumer.topology.exchange_failed',
        outcome: 'skipped',
        exchange,
        error,
      });
      channel = await connection.createChannel();
    }

    try {
      await channel.assertQueue(deadLetterQueue, { durable: true });

      try {
        // Dead-lettered messages keep their original routing key, which is the queue name.
        await channel.bindQueue(deadLetterQueue, exchange, queueName);
      } catch (error) {
        this.logger.warn(`Failed to bind '${deadLetterQueue}' to '${exchange}'.`, {
          event: 'consumer.topology.bind_failed',
          outcome: 'skipped',
          exchange,
          queue: deadLetterQueue,
          error,
        });
        channel = await connection.createChannel();
      }
    } catch (error) {
      this.logger.warn(`Failed to declare dead-letter queue '${deadLetterQueue}'.`, {
        event: 'consumer.topology.dlq_failed',
        outcome: 'skipped',
        queue: deadLetterQueue,
        error,
      });
      channel = await connection.createChannel();
    }

    try {
      await channel.checkQueue(queueName);
      this.logger.info(`Queue '${queueName}' already exists, not modifying arguments.`, {
        event: 'consumer.topology.queue_exists',
        queue: queueName,
      });
    } catch (error) {
      if (!isNotFoundError(error)) {
        this.logger.error(`Unexpected error while checking queue '${queueName}'.`, {
          event: 'consumer.topology.queue_check_failed',
          outcome: 'failure',
          queue: queueName,
          error,
        });
        throw new TopologyDeclarationError(queueName, { cause: error });
      }

      // The failed passive declare closed the channel.
      channel = await connection.createChannel();
      try {
        await channel.assertQueue(queueName, {
          durable: true,
          arguments: { [DEAD_LETTER_EXCHANGE_ARGUMENT]: exchange },
        });
      } catch (declareError) {
        this.logger.error(`Failed to declare queue '${queueName}'.`, {
          event: 'consumer.topology.queue_failed',
          outcome: 'failure',
          queue: queueName,
          error: declareError,
        });
        throw new TopologyDeclarationError(queueName, { cause: declareError });
      }

      this.logger.info(`Queue '${queueName}' created with dead-letter exchange '${exchange}'.`, {
        event: 'consumer.topology.queue_created',
        outcome: 'success',
        queue: queueName,
        exchange,
      });
    }

    await channel.prefetch(PREFETCH_COUNT);

    return channel;
  }

  private watchConnection(connection: BrokerConnection) {
    connection.on('error', (error) => {
      this.logger.error('Broker connection error.', {
        event: 'consumer.connection.error',
        outcome: 'failure',
        error,
      });
    });

    connection.on('close', (error) => {
      this.clearBlockedTimer();
      if (this.stopping) {
        return;
      }

      this.logger.error('Broker connection closed unexpectedly.', {
        event: 'consumer.connection.closed',
        outcome: 'failure',
        error,
      });
      this.connection = null;
      this.channel = null;
      this.currentState = 'stopped';
      this.finish(new Error('Broker connection closed unexpectedly.', { cause: error }));
    });

    connection.on('blocked', (reason) => {
      const timeoutMs =
        this.options.blockedConnectionTimeoutMs ?? DEFAULT_BLOCKED_CONNECTION_TIMEOUT_MS;

      this.logger.warn('Broker blocked the connection.', {
        event: 'consumer.connection.blocked',
        reason,
        timeoutMs,
      });

      this.clearBlockedTimer();
      this.blockedTimer = setTimeout(() => {
        this.blockedTimer = null;
        this.logger.error('Broker connection stayed blocked past the timeout.', {
          event: 'consumer.connection.blocked_timeout',
          outcome: 'failure',
          timeoutMs,
        });
        this.failure = new Error(`Broker connection blocked for more than ${timeoutMs} ms.`);
        void this.stop();
      }, timeoutMs);
    });

    connection.on('unblocked', () => {
      this.clearBlockedTimer();
      this.logger.info('Broker unblocked the connection.', {
        event: 'consumer.connection.unblocked',
      });
    });
  }

  private watchChannel(channel: BrokerChannel) {
    channel.on('error', (error) => {
      this.logger.warn('Broker reported a channel error.', {
        event: 'consumer.channel.error',
        error,
      });
    });

    channel.on('close', (error) => {
      // A lost connection closes its channels before it reports its own close; give that
      // handler the chance to run first.
      setImmediate(() => {
        if (this.stopping || this.currentState === 'stopped' || this.channel !== channel) {
          return;
        }

        this.logger.error('Consume channel closed unexpectedly.', {
          event: 'consumer.channel.closed',
          outcome: 'failure',
          queue: this.options.queueName,
          error,
        });
        this.channel = null;
        this.failure = new Error('Broker closed the consume channel.', { cause: error });
        void this.stop();
      });
    });
  }

  private clearBlockedTimer() {
    if (this.blockedTimer) {
      clearTimeout(this.blockedTimer);
      this.blockedTimer = null;
    }
  }

  private onDelivery(message: BrokerMessage | null) {
    if (message === null) {
      this.logger.warn('Consumer was cancelled by the broker.', {
        event: 'consumer.consume.cancelled',
      });
      void this.stop();
      return;
    }

    this.inFlight = this.inFlight.then(() => this.handleMessage(message));
  }

  private async handleMessage(message: BrokerMessage): Promise<void> {
    const deliveryTag = message.fields.deliveryTag;
    const messageLogger = this.logger.withContext({ deliveryTag });
    const startedAt = Date.now();

    messageLogger.info('Received message.', {
      event: 'consumer.message.received',
      redelivered: message.fields.redelivered,
    });

    try {
      const request = decodeMailRequest(message.content);

      messageLogger.info('Handling mail request.', {
        event: 'consumer.message.handling',
        templateName: request.template_name,
        emailHash: hashEmail(request.recipient),
      });

      await this.dependencies.dispatcher.dispatch(request);
    } catch (error) {
      messageLogger.error('Error processing message.', {
        event: 'consumer.message.failed',
        outcome: 'failure',
        durationMs: Date.now() - startedAt,
        severity: error instanceof MailTransportError ? 'high' : undefined,
        error,
      });

      // Rejecting without requeue hands the message to the dead-letter exchange.
      if (this.settle(message, 'reject', messageLogger)) {
        messageLogger.warn('Message sent to dead-letter queue.', {
          event: 'consumer.message.dead_lettered',
          outcome: 'dead-lettered',
          deadLetterQueue: this.deadLetter.queue,
        });
      }
      return;
    }

    if (this.settle(message, 'ack', messageLogger)) {
      messageLogger.info('Successfully processed message.', {
        event: 'consumer.message.acked',
        outcome: 'success',
        durationMs: Date.now() - startedAt,
      });
    }
  }

  private settle(message: BrokerMessage, action: 'ack' | 'reject', messageLogger: Logger) {
    const channel = this.channel;

    try {
      if (!channel) {
        throw new Error('Channel is no longer open.');
      }

      if (action === 'ack') {
        channel.ack(message);
      } else {
        channel.reject(message, false);
      }

      return true;
    } catch (error) {
      // The broker redelivers unsettled messages once the channel is gone.
      messageLogger.error(`Failed to ${action} message.`, {
        event: 'consumer.message.settle_failed',
        outcome: 'failure',
        error,
      });
      return false;
    }
  }

  private async shutdown(): Promise<void> {
    this.logger.info('Stopping consumer.', { event: 'consumer.stop.requested' });

    const channel = this.channel;
    const consumerTag = this.consumerTag;

    if (channel && consumerTag) {
      try {
        await channel.cancel(consumerTag);
      } catch (error) {
        this.logger.warn('Failed to cancel consumer.', {
          event: 'consumer.stop.cancel_failed',
          error,
        });
      }
    }

    await this.inFlight;
    await this.closeQuietly();

    this.clearBlockedTimer();
    this.currentState = 'stopped';
    this.logger.info('Consumer stopped.', { event: 'consumer.stop.completed', outcome: 'success' });

    this.finish(this.failure ?? undefined);
  }

  private async closeQuietly() {
    const channel = this.channel;
    const connection = this.connection;
    this.channel = null;
    this.connection = null;

    if (channel) {
      try {
        await channel.close();
      } catch (error) {
        this.logger.debug('Channel close failed.', { event: 'consumer.stop.channel_close', error });
      }
    }

    if (connection) {
      try {
        await connection.close();
      } catch (error) {
        this.logger.debug('Connection close failed.', {
          event: 'consumer.stop.connection_close',
          error,
        });
      }
    }
  }

  private finish(error?: Error) {
    if (error) {
      this.failure = error;
    }

    const completion = this.completion;
    if (!completion) {
      return;
    }

    this.completion = null;
    if (error) {
      completion.reject(error);
    } else {
      completion.resolve();
    }
  }
}
