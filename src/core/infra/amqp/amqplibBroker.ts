/**
 * Project: Mail Dispatch Worker
 * File: src/core/infra/amqp/amqplibBroker.ts
 * Summary: amqplib-backed implementation of the broker connection and channel ports.
 */

import { connect, type Channel, type ConsumeMessage } from 'amqplib';

import type {
  AssertQueueOptions,
  BrokerChannel,
  BrokerChannelEvent,
  BrokerConnection,
  BrokerConnectionEvent,
  BrokerConnectionOptions,
  BrokerConnector,
  BrokerMessage,
  ConsumeHandler,
  QueueStatus,
} from '@core/app/ports/messageBroker';
import type { Logger } from '@core/app/ports/logger';

type AmqplibConnection = Awaited<ReturnType<typeof connect>>;

class AmqplibChannel implements BrokerChannel {
  // amqplib needs its own message objects back for ack/reject.
  private readonly deliveries = new WeakMap<BrokerMessage, ConsumeMessage>();

  constructor(
    private readonly channel: Channel,
    logger: Logger,
  ) {
    // A channel closed by the broker emits `error`; without a listener it would crash the process.
    channel.on('error', (error: unknown) => {
      logger.debug('Broker closed the channel.', { event: 'amqp.channel.error', error });
    });
  }

  async assertExchange(
    exchange: string,
    type: 'direct' | 'fanout',
    options: { durable?: boolean } = {},
  ): Promise<unknown> {
    return this.channel.assertExchange(exchange, type, { durable: options.durable });
  }

  async assertQueue(queue: string, options: AssertQueueOptions = {}): Promise<QueueStatus> {
    const reply = await this.channel.assertQueue(queue, {
      durable: options.durable,
      arguments: options.arguments,
    });
    return {
      queue: reply.queue,
      messageCount: reply.messageCount,
      consumerCount: reply.consumerCount,
    };
  }

  async checkQueue(queue: string): Promise<QueueStatus> {
    const reply = await this.channel.checkQueue(queue);
    return {
      queue: reply.queue,
      messageCount: reply.messageCount,
      consumerCount: reply.consumerCount,
    };
  }

  async bindQueue(queue: string, exchange: string, routingKey: string): Promise<unknown> {
    return this.channel.bindQueue(queue, exchange, routingKey);
  }

  async prefetch(count: number): Promise<unknown> {
    return this.channel.prefetch(count);
  }

  async consume(queue: string, handler: ConsumeHandler): Promise<{ consumerTag: string }> {
    const reply = await this.channel.consume(
      queue,
      (message) => {
        if (message === null) {
          handler(null);
          return;
        }

        const delivery: BrokerMessage = {
          content: message.content,
          fields: {
            deliveryTag: message.fields.deliveryTag,
            redelivered: message.fields.redelivered,
            routingKey: message.fields.routingKey,
          },
        };
        this.deliveries.set(delivery, message);
        handler(delivery);
      },
      { noAck: false },
    );

    return { consumerTag: reply.consumerTag };
  }

  async cancel(consumerTag: string): Promise<unknown> {
    return this.channel.cancel(consumerTag);
  }

  ack(message: BrokerMessage): void {
    this.channel.ack(this.lookup(message));
  }

  reject(message: BrokerMessage, requeue: boolean): void {
    this.channel.reject(this.lookup(message), requeue);
  }

  async close(): Promise<void> {
    await this.channel.close();
  }

  on(event: BrokerChannelEvent, listener: (arg?: unknown) => void): this {
    this.channel.on(event, (arg: unknown) => {
      listener(arg);
    });
    return this;
  }

  private lookup(message: BrokerMessage): ConsumeMessage {
    const delivery = this.deliveries.get(message);
    if (!delivery) {
      throw new Error(`Delivery ${message.fields.deliveryTag} does not belong to this channel.`);
    }

    return delivery;
  }
}

class AmqplibConnectionAdapter implements BrokerConnection {
  constructor(
    private readonly connection: AmqplibConnection,
    private readonly logger: Logger,
  ) {}

  async createChannel(): Promise<BrokerChannel> {
    const channel = await this.connection.createChannel();
    return new AmqplibChannel(channel, this.logger);
  }

  async close(): Promise<void> {
    await this.connection.close();
  }

  on(event: BrokerConnectionEvent, listener: (arg?: unknown) => void): this {
    this.connection.on(event, (arg: unknown) => {
      listener(arg);
    });
    return this;
  }
}

export const createAmqplibConnector =
  (logger: Logger): BrokerConnector =>
  async (options: BrokerConnectionOptions): Promise<BrokerConnection> => {
    const connection = await connect({
      protocol: 'amqp',
      hostname: options.host,
      port: options.port,
      username: options.username,
      password: options.password,
      heartbeat: options.heartbeatSeconds,
    });

    return new AmqplibConnectionAdapter(connection, logger.withContext({ component: 'amqp' }));
  };
