import type { ConsumeMessage } from 'amqplib';
import { EventEmitter } from 'events';
import { vi } from 'vitest';
import type { AmqpConnection, ConnectionProvider } from '../../src/core';

export const createMockChannel = () => {
  const emitter = new EventEmitter();

  return {
    emitter,
    assertExchange: vi.fn().mockImplementation(async (exchange: string) => ({ exchange })),
    assertQueue: vi
      .fn()
      .mockImplementation(async (queue: string) => ({ queue, messageCount: 0, consumerCount: 0 })),
    bindQueue: vi.fn().mockResolvedValue({}),
    prefetch: vi.fn().mockResolvedValue({}),
    consume: vi.fn().mockResolvedValue({ consumerTag: 'ctag-1' }),
    cancel: vi.fn().mockResolvedValue({ consumerTag: 'ctag-1' }),
    ack: vi.fn(),
    nack: vi.fn(),
    publish: vi.fn().mockReturnValue(true),
    sendToQueue: vi.fn().mockReturnValue(true),
    close: vi.fn().mockImplementation(async () => {
      emitter.emit('close');
    }),
    on: vi.fn().mockImplementation((event: string, listener: (...args: unknown[]) => void) => {
      emitter.on(event, listener);
    }),
  };
};

export type MockChannel = ReturnType<typeof createMockChannel>;

export const createMockProvider = (channel: MockChannel) => {
  const connection: AmqpConnection = {
    createChannel: vi.fn().mockResolvedValue(channel),
    close: vi.fn().mockResolvedValue(undefined),
    on: vi.fn(),
  };

  const provider: ConnectionProvider = {
    getConnection: vi.fn().mockResolvedValue(connection),
  };

  return { provider, connection };
};

/**
 * The callback most recently registered with channel.consume
 */
export const consumerOf = (channel: MockChannel): ((msg: ConsumeMessage | null) => void) => {
  const calls = channel.consume.mock.calls;
  return calls[calls.length - 1][1];
};

export const flushPromises = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));
