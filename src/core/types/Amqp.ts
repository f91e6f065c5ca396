import type * as amqp from 'amqplib';

/**
 * The part of an amqplib channel that subscriptions and requests use
 *
 * Narrowing the channel keeps test doubles small; a real amqplib Channel satisfies it.
 */
export type AmqpChannel = Pick<
  amqp.Channel,
  | 'assertExchange'
  | 'assertQueue'
  | 'bindQueue'
  | 'prefetch'
  | 'consume'
  | 'cancel'
  | 'ack'
  | 'nack'
  | 'publish'
  | 'sendToQueue'
  | 'close'
  | 'on'
>;

/**
 * The part of an amqplib connection (or channel model) this library uses
 */
export interface AmqpConnection {
  createChannel(): Promise<AmqpChannel>;
  close(): Promise<void>;
  on(event: string, listener: (...args: unknown[]) => void): unknown;
}

/**
 * Anything that can hand out a live connection
 *
 * `ConnectionManager` is the production implementation.
 */
export interface ConnectionProvider {
  getConnection(): Promise<AmqpConnection>;
}
