import type { ConsumeMessage } from 'amqplib';
import {
  type AmqpChannel,
  type ConnectionProvider,
  type Logger,
  type ResponseEnvelope,
  type Serializer,
  type SubscriptionSettings,
  EXCHANGE_TYPE,
  JsonSerializer,
  SilentLogger,
  TIME,
  ValidationError,
  errorCodeOf,
  errorMessageOf,
  isRequestEnvelope,
  openChannel,
  toError,
  resolveBindings,
  resolveQueueName,
  toAssertQueueOptions,
  toConsumeOptions,
} from '../../core';

/**
 * Context passed to a responder's handler alongside the request payload
 */
export interface RequestContext {
  endpoint: string;
  /** Routing key the request was published with */
  topic: string;
  correlationId?: string;
  metadata?: Record<string, unknown>;
  rawMessage: ConsumeMessage;
}

/**
 * Responder handler function type
 */
export type ResponderHandler<TRequest = unknown, TResponse = unknown> = (
  data: TRequest,
  context: RequestContext
) => Promise<TResponse> | TResponse;

/**
 * Responder configuration
 */
export interface ResponderConfig<TRequest = unknown, TResponse = unknown> {
  connection: ConnectionProvider;
  endpoint: string;
  handler: ResponderHandler<TRequest, TResponse>;
  subscription: SubscriptionSettings;
  subscriptionId?: string;
  serializer?: Serializer;
  logger?: Logger;
}

/**
 * Responder answers requests sent to an endpoint
 *
 * Each endpoint owns a topic exchange of the same name. The responder declares its
 * queue from the subscription settings, binds it with the subscription's topics
 * (or `#` when there are none) and replies on the request's reply-to queue.
 *
 * @example
 * ```typescript
 * const subscription = new SubscriptionConfiguration(30).addTopic('orders.eu').setAutoDelete();
 *
 * const responder = new Responder({
 *   connection: ConnectionManager.getInstance({ url: 'amqp://localhost' }),
 *   endpoint: 'orders',
 *   subscriptionId: 'eu-worker',
 *   subscription,
 *   handler: (order) => ({ accepted: true }),
 * });
 *
 * await responder.start();
 * // Later...
 * await responder.stop();
 * ```
 */
export class Responder<TRequest = unknown, TResponse = unknown> {
  private readonly endpoint: string;
  private readonly queueName: string;
  private readonly handler: ResponderHandler<TRequest, TResponse>;
  private readonly subscription: SubscriptionSettings;
  private readonly connection: ConnectionProvider;
  private readonly serializer: Serializer;
  private readonly logger: Logger;
  private channel: AmqpChannel | null = null;
  private consumerTag: string | null = null;
  private running = false;
  private inFlight = 0;

  constructor(config: ResponderConfig<TRequest, TResponse>) {
    if (!config.endpoint) {
      throw new ValidationError('Endpoint is required');
    }

    if (typeof config.handler !== 'function') {
      throw new ValidationError('Handler must be a function');
    }

    this.endpoint = config.endpoint;
    this.queueName = resolveQueueName(config.endpoint, config.subscriptionId);
    this.handler = config.handler;
    this.subscription = config.subscription;
    this.connection = config.connection;
    this.serializer = config.serializer ?? new JsonSerializer();
    this.logger = config.logger ?? new SilentLogger();
  }

  /**
   * Declare the exchange and queue, bind the topics and start consuming
   */
  async start(): Promise<void> {
    if (this.running) {
      this.logger.warn('Responder is already running', { endpoint: this.endpoint });
      return;
    }

    try {
      const channel = await openChannel(this.connection);
      this.channel = channel;

      channel.on('error', (error: unknown) => {
        this.logger.warn('Responder channel error', {
          endpoint: this.endpoint,
          error: errorMessageOf(error),
        });
      });

      channel.on('close', () => {
        this.logger.warn('Responder channel closed', { endpoint: this.endpoint });
        this.channel = null;
        this.running = false;
      });

      await channel.assertExchange(this.endpoint, EXCHANGE_TYPE.TOPIC, { durable: true });
      await channel.assertQueue(this.queueName, toAssertQueueOptions(this.subscription));

      for (const topic of resolveBindings(this.subscription)) {
        await channel.bindQueue(this.queueName, this.endpoint, topic);
        this.logger.debug(`Bound queue ${this.queueName} to ${this.endpoint} with topic: ${topic}`);
      }

      await channel.prefetch(this.subscription.prefetchCount);

      const consumer = await channel.consume(
        this.queueName,
        (msg) => {
          this.handleRequest(channel, msg).catch((error: unknown) => {
            this.logger.error('Unhandled error while responding', toError(error), {
              endpoint: this.endpoint,
            });
          });
        },
        toConsumeOptions(this.subscription)
      );

      this.consumerTag = consumer.consumerTag;
      this.running = true;

      this.logger.info('Responder started', {
        endpoint: this.endpoint,
        queueName: this.queueName,
        prefetch: this.subscription.prefetchCount,
        topics: this.subscription.topics.length,
      });
    } catch (error) {
      this.logger.error('Failed to start Responder', toError(error), { endpoint: this.endpoint });
      throw error;
    }
  }

  /**
   * Stop consuming, wait briefly for in-flight requests and close the channel
   */
  async stop(): Promise<void> {
    const channel = this.channel;
    if (!this.running || !channel) {
      return;
    }

    if (this.consumerTag) {
      try {
        await channel.cancel(this.consumerTag);
      } catch (error) {
        this.logger.warn('Error cancelling consumer', { error: errorMessageOf(error) });
      }
      this.consumerTag = null;
    }

    const startedAt = Date.now();
    while (this.inFlight > 0 && Date.now() - startedAt < TIME.RESPONDER_DRAIN_TIMEOUT_MS) {
      await new Promise((resolve) => setTimeout(resolve, 50));
    }

    if (this.inFlight > 0) {
      this.logger.warn('Stopping with in-flight requests', { count: this.inFlight });
    }

    try {
      await channel.close();
    } catch (error) {
      this.logger.warn('Error closing Responder channel', { error: errorMessageOf(error) });
    }

    this.channel = null;
    this.running = false;
    this.logger.info('Responder stopped', { endpoint: this.endpoint });
  }

  isRunning(): boolean {
    return this.running;
  }

  getQueueName(): string {
    return this.queueName;
  }

  private async handleRequest(channel: AmqpChannel, msg: ConsumeMessage | null): Promise<void> {
    if (!msg) {
      this.logger.warn('Consumer cancelled by broker', { endpoint: this.endpoint });
      return;
    }

    const { correlationId, replyTo } = msg.properties;

    let decoded: unknown;
    try {
      decoded = this.serializer.decode(msg.content);
    } catch (error) {
      this.logger.error('Failed to decode request', toError(error), { correlationId });
      channel.nack(msg, false, false);
      return;
    }

    if (!isRequestEnvelope(decoded)) {
      this.logger.error('Received malformed request', undefined, { correlationId });
      channel.nack(msg, false, false);
      return;
    }

    this.inFlight++;
    let response: ResponseEnvelope;

    try {
      // The payload type is the handler's contract with its requesters
      const data = await this.handler(decoded.data as TRequest, {
        endpoint: this.endpoint,
        topic: msg.fields.routingKey,
        correlationId,
        metadata: decoded.metadata,
        rawMessage: msg,
      });
      response = { id: decoded.id, timestamp: Date.now(), success: true, data };
      this.logger.debug('Request handled', { endpoint: this.endpoint, correlationId });
    } catch (error) {
      this.logger.error('Handler failed', toError(error), { endpoint: this.endpoint, correlationId });
      response = {
        id: decoded.id,
        timestamp: Date.now(),
        success: false,
        error: { code: errorCodeOf(error), message: errorMessageOf(error) },
      };
    } finally {
      this.inFlight--;
    }

    try {
      if (replyTo) {
        this.reply(channel, replyTo, correlationId, response);
      } else {
        this.logger.warn('Request has no reply-to queue; dropping response', { correlationId });
      }
    } finally {
      channel.ack(msg);
    }
  }

  private reply(
    channel: AmqpChannel,
    replyTo: string,
    correlationId: string | undefined,
    response: ResponseEnvelope
  ): void {
    const options = { correlationId, contentType: 'application/json' };

    try {
      channel.sendToQueue(replyTo, this.serializer.encode(response), options);
    } catch (error) {
      this.logger.error('Failed to send response', toError(error), { endpoint: this.endpoint, correlationId });

      const failure: ResponseEnvelope = {
        id: response.id,
        timestamp: Date.now(),
        success: false,
        error: { code: 'ENCODE_ERROR', message: `Failed to encode response: ${errorMessageOf(error)}` },
      };

      try {
        channel.sendToQueue(replyTo, this.serializer.encode(failure), options);
      } catch (sendError) {
        this.logger.error('Failed to send error response', toError(sendError), {
          endpoint: this.endpoint,
          correlationId,
        });
      }
    }
  }
}
