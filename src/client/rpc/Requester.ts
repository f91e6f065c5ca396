import type { ConsumeMessage } from 'amqplib';
import { randomUUID } from 'crypto';
import {
  type AmqpChannel,
  type ConnectionProvider,
  type Logger,
  type RequestEnvelope,
  type Serializer,
  Duration,
  JsonSerializer,
  RemoteError,
  ROUTING,
  SilentLogger,
  TIME,
  TimeoutError,
  ValidationError,
  WarrenError,
  errorMessageOf,
  isResponseEnvelope,
  openChannel,
  toError,
} from '../../core';

/**
 * Requester configuration
 */
export interface RequesterConfig {
  connection: ConnectionProvider;
  /** Default timeout, overridable per request */
  timeoutMs?: number;
  persistent?: boolean;
  serializer?: Serializer;
  logger?: Logger;
}

/**
 * Per-request options
 */
export interface RequestOptions {
  timeout?: Duration | number;
  /** Routing key; only responders bound to a matching topic receive the request */
  topic?: string;
  metadata?: Record<string, unknown>;
}

/**
 * Pending request tracker
 */
interface PendingRequest {
  resolve: (value: unknown) => void;
  reject: (error: Error) => void;
  timeout: NodeJS.Timeout;
}

/**
 * Requester sends requests to endpoints and waits for the matching reply
 *
 * Replies arrive on RabbitMQ's direct reply-to queue and are matched by correlation id.
 *
 * @example
 * ```typescript
 * const requester = new Requester({
 *   connection: ConnectionManager.getInstance({ url: 'amqp://localhost' }),
 * });
 *
 * const result = await requester.request('orders', { id: 42 }, { topic: 'orders.eu' });
 *
 * await requester.close();
 * ```
 */
export class Requester {
  private readonly connection: ConnectionProvider;
  private readonly timeoutMs: number;
  private readonly persistent: boolean;
  private readonly serializer: Serializer;
  private readonly logger: Logger;
  private channel: AmqpChannel | null = null;
  private initializing: Promise<AmqpChannel> | null = null;
  private consumerTag: string | null = null;
  private pendingRequests = new Map<string, PendingRequest>();
  private closed = false;

  constructor(config: RequesterConfig) {
    this.connection = config.connection;
    this.timeoutMs = config.timeoutMs ?? TIME.DEFAULT_REQUEST_TIMEOUT_MS;
    this.persistent = config.persistent ?? false;
    this.serializer = config.serializer ?? new JsonSerializer();
    this.logger = config.logger ?? new SilentLogger();
  }

  private async initialize(): Promise<AmqpChannel> {
    if (this.channel) return this.channel;

    if (!this.initializing) {
      this.initializing = this.setupChannel().finally(() => {
        this.initializing = null;
      });
    }

    return this.initializing;
  }

  private async setupChannel(): Promise<AmqpChannel> {
    try {
      const channel = await openChannel(this.connection);

      channel.on('error', (error: unknown) => {
        this.logger.warn('Requester channel error', { error: errorMessageOf(error) });
      });

      channel.on('close', () => {
        this.logger.warn('Requester channel closed');
        this.channel = null;
        this.consumerTag = null;
      });

      const consumer = await channel.consume(
        ROUTING.REPLY_TO_QUEUE,
        (msg) => this.handleReply(msg),
        { noAck: true }
      );

      this.consumerTag = consumer.consumerTag;
      this.channel = channel;
      this.logger.info('Requester initialized', { replyQueue: ROUTING.REPLY_TO_QUEUE });
      return channel;
    } catch (error) {
      this.logger.error('Failed to initialize Requester', toError(error));
      throw error;
    }
  }

  /**
   * Send a request and wait for the response
   *
   * @throws {ValidationError} When the endpoint is empty
   * @throws {TimeoutError} When no reply arrives in time
   * @throws {RemoteError} When the responder reports a failure
   */
  async request<TRequest = unknown, TResponse = unknown>(
    endpoint: string,
    data: TRequest,
    options: RequestOptions = {}
  ): Promise<TResponse> {
    if (!endpoint) {
      throw new ValidationError('Endpoint is required');
    }

    this.assertOpen();
    const channel = await this.initialize();
    // close() may have run while the channel was being set up
    this.assertOpen();

    const correlationId = randomUUID();
    const timeout = this.resolveTimeout(options.timeout);
    const routingKey = options.topic ?? ROUTING.DEFAULT_TOPIC;

    const envelope: RequestEnvelope<TRequest> = {
      id: correlationId,
      timestamp: Date.now(),
      data,
      metadata: options.metadata,
    };

    const reply = new Promise<unknown>((resolve, reject) => {
      const timeoutHandle = setTimeout(() => {
        this.pendingRequests.delete(correlationId);
        reject(
          new TimeoutError(`Request to "${endpoint}" timed out after ${timeout}ms`, {
            endpoint,
            topic: routingKey,
            timeout,
            correlationId,
          })
        );
      }, timeout);

      this.pendingRequests.set(correlationId, { resolve, reject, timeout: timeoutHandle });

      try {
        channel.publish(endpoint, routingKey, this.serializer.encode(envelope), {
          correlationId,
          replyTo: ROUTING.REPLY_TO_QUEUE,
          persistent: this.persistent,
          contentType: 'application/json',
          messageId: randomUUID(),
          timestamp: envelope.timestamp,
        });

        this.logger.debug('Request sent', { endpoint, topic: routingKey, correlationId });
      } catch (error) {
        clearTimeout(timeoutHandle);
        this.pendingRequests.delete(correlationId);
        reject(toError(error));
      }
    });

    // Response payloads are typed by the caller's contract with the responder
    return (await reply) as TResponse;
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new WarrenError('Requester is closed', 'CLOSED');
    }
  }

  private resolveTimeout(timeout: Duration | number | undefined): number {
    if (timeout === undefined) return this.timeoutMs;
    return timeout instanceof Duration ? Math.trunc(timeout.totalMilliseconds) : timeout;
  }

  private handleReply(msg: ConsumeMessage | null): void {
    if (!msg) return;

    const correlationId: unknown = msg.properties.correlationId;
    if (typeof correlationId !== 'string') {
      this.logger.warn('Received reply without correlationId');
      return;
    }

    const pending = this.pendingRequests.get(correlationId);
    if (!pending) {
      this.logger.warn('Received reply for unknown correlationId', { correlationId });
      return;
    }

    clearTimeout(pending.timeout);
    this.pendingRequests.delete(correlationId);

    let response: unknown;
    try {
      response = this.serializer.decode(msg.content);
    } catch (error) {
      pending.reject(new WarrenError(`Failed to decode response: ${errorMessageOf(error)}`, 'DECODE_ERROR'));
      return;
    }

    if (!isResponseEnvelope(response)) {
      pending.reject(new WarrenError('Received malformed response', 'DECODE_ERROR', { correlationId }));
      return;
    }

    if (response.success) {
      pending.resolve(response.data);
    } else {
      pending.reject(
        new RemoteError(
          response.error?.message ?? 'Unknown error',
          response.error?.code ?? 'RPC_ERROR',
          response.error?.details
        )
      );
    }
  }

  /**
   * Number of requests still waiting for a reply
   */
  getPendingCount(): number {
    return this.pendingRequests.size;
  }

  /**
   * Reject pending requests and close the channel. A closed requester cannot be reused.
   */
  async close(): Promise<void> {
    this.closed = true;

    for (const [, pending] of this.pendingRequests) {
      clearTimeout(pending.timeout);
      pending.reject(new WarrenError('Requester is closing', 'CLOSED'));
    }
    this.pendingRequests.clear();

    if (this.initializing) {
      try {
        await this.initializing;
      } catch (error) {
        this.logger.warn('Requester channel setup failed while closing', { error: errorMessageOf(error) });
      }
    }

    const channel = this.channel;
    this.channel = null;
    if (!channel) return;

    if (this.consumerTag) {
      try {
        await channel.cancel(this.consumerTag);
      } catch (error) {
        this.logger.warn('Error cancelling consumer', { error: errorMessageOf(error) });
      }
      this.consumerTag = null;
    }

    try {
      await channel.close();
    } catch (error) {
      this.logger.warn('Error closing Requester channel', { error: errorMessageOf(error) });
    }

    this.logger.info('Requester closed');
  }
}
