/**
 * Project: Mail Dispatch Worker
 * File: src/core/app/ports/messageBroker.ts
 * Summary: The subset of an AMQP 0-9-1 client the mail queue consumer relies on.
 */

export type BrokerConnectionOptions = {
  host: string;
  port: number;
  username: string;
  password: string;
  /** Heartbeat interval in seconds; `0` disables heartbeats. */
  heartbeatSeconds: number;
};

export type BrokerMessage = {
  content: Buffer;
  fields: {
    deliveryTag: number;
    redelivered: boolean;
    routingKey: string;
  };
};

export type QueueStatus = {
  queue: string;
  messageCount: number;
  consumerCount: number;
};

export type AssertQueueOptions = {
  durable?: boolean;
  arguments?: Record<string, unknown>;
};

export type ConsumeHandler = (message: BrokerMessage | null) => void;

/**
 * `close` fires once the channel is gone, whoever closed it: the client, the broker (after an
 * `error`), or a dropped connection.
 */
export type BrokerChannelEvent = 'close' | 'error';

export interface BrokerChannel {
  assertExchange(
    exchange: string,
    type: 'direct' | 'fanout',
    options?: { durable?: boolean },
  ): Promise<unknown>;
  assertQueue(queue: string, options?: AssertQueueOptions): Promise<QueueStatus>;
  /**
   * Passive declare. Rejects when the queue does not exist; the broker closes the channel
   * in that case, so callers must open a new one before continuing.
   */
  checkQueue(queue: string): Promise<QueueStatus>;
  bindQueue(queue: string, exchange: string, routingKey: string): Promise<unknown>;
  prefetch(count: number): Promise<unknown>;
  consume(queue: string, handler: ConsumeHandler): Promise<{ consumerTag: string }>;
  cancel(consumerTag: string): Promise<unknown>;
  ack(message: BrokerMessage): void;
  reject(message: BrokerMessage, requeue: boolean): void;
  close(): Promise<void>;
  on(event: BrokerChannelEvent, listener: (arg?: unknown) => void): unknown;
}

export type BrokerConnectionEvent = 'close' | 'error' | 'blocked' | 'unblocked';

export interface BrokerConnection {
  createChannel(): Promise<BrokerChannel>;
  close(): Promise<void>;
  on(event: BrokerConnectionEvent, listener: (arg?: unknown) => void): unknown;
}

export type BrokerConnector = (options: BrokerConnectionOptions) => Promise<BrokerConnection>;
