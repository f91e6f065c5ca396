import type { ConsumeMessage } from 'amqplib';

export interface MockMessageOptions {
  correlationId?: string;
  replyTo?: string;
  routingKey?: string;
  exchange?: string;
}

// Helper to create a mock AMQP delivery
export const createMockMessage = (
  content: string | object,
  options: MockMessageOptions = {}
): ConsumeMessage => {
  const contentStr = typeof content === 'string' ? content : JSON.stringify(content);
  return {
    content: Buffer.from(contentStr),
    fields: {
      deliveryTag: 1,
      redelivered: false,
      exchange: options.exchange ?? 'orders',
      routingKey: options.routingKey ?? '#',
      consumerTag: 'ctag-1',
    },
    properties: {
      contentType: 'application/json',
      contentEncoding: undefined,
      headers: {},
      deliveryMode: undefined,
      priority: undefined,
      correlationId: options.correlationId,
      replyTo: options.replyTo,
      expiration: undefined,
      messageId: undefined,
      timestamp: undefined,
      type: undefined,
      userId: undefined,
      appId: undefined,
      clusterId: undefined,
    },
  };
};

export const decodeBuffer = (buffer: Buffer): unknown => JSON.parse(buffer.toString());
