import {
  type BusConfig,
  type BusConfigInput,
  type Logger,
  type Serializer,
  type SubscriptionConfigurer,
  type SubscriptionSettings,
  ConnectionManager,
  Duration,
  JsonSerializer,
  SilentLogger,
  SubscriptionConfiguration,
  ValidationError,
  errorMessageOf,
  resolveBusConfig,
} from '../core';
import { Requester } from '../client';
import { Responder, type ResponderHandler } from '../server';

/**
 * Options shared by everything a bus creates
 */
export interface BusOptions {
  logger?: Logger;
  serializer?: Serializer;
}

/**
 * Options for registering a responder
 */
export interface RespondOptions {
  /**
   * Responders with different subscription ids get queues of their own,
   * so each can bind different topics on the same endpoint.
   */
  subscriptionId?: string;
  configure?: (configuration: SubscriptionConfigurer) => void;
}

export interface BusRequestOptions {
  timeout?: Duration | number;
  topic?: string;
  metadata?: Record<string, unknown>;
}

/**
 * Handle returned by `respond`; disposing stops the responder
 */
export interface ResponderRegistration {
  readonly queueName: string;
  /** Settings the responder was started with */
  readonly subscription: SubscriptionSettings;
  dispose(): Promise<void>;
}

/**
 * Bus ties configuration, responders and a shared requester to one connection
 *
 * @example
 * ```typescript
 * const bus = Bus.create('host=localhost;prefetchcount=30;timeout=20');
 *
 * const registration = await bus.respond(
 *   'pricing',
 *   (request: { sku: string }) => ({ price: 10 }),
 *   { subscriptionId: 'eu', configure: (x) => x.addTopic('pricing.eu').setAutoDelete() }
 * );
 *
 * const quote = await bus.request('pricing', { sku: 'A-1' }, { topic: 'pricing.eu' });
 *
 * await registration.dispose();
 * await bus.dispose();
 * ```
 */
export class Bus {
  private readonly config: BusConfig;
  private readonly connection: ConnectionManager;
  private readonly logger: Logger;
  private readonly serializer: Serializer;
  private readonly responders = new Set<Pick<Responder, 'stop'>>();
  private requester: Requester | null = null;
  private disposed = false;

  private constructor(config: BusConfig, options: BusOptions) {
    this.config = config;
    this.logger = options.logger ?? new SilentLogger();
    this.serializer = options.serializer ?? new JsonSerializer();
    this.connection = ConnectionManager.getInstance({
      url: config.url,
      heartbeat: config.heartbeat,
      logger: this.logger,
    });
  }

  /**
   * Create a bus from a connection string or config object
   *
   * @throws {ValidationError} When the connection string cannot be parsed
   */
  static create(connection: BusConfigInput, options: BusOptions = {}): Bus {
    return new Bus(resolveBusConfig(connection), options);
  }

  getConfig(): Readonly<BusConfig> {
    return this.config;
  }

  /**
   * Start answering requests sent to `endpoint`
   *
   * The subscription starts from the bus's default prefetch count; `configure`
   * runs once, before anything is declared on the broker.
   */
  async respond<TRequest, TResponse>(
    endpoint: string,
    handler: ResponderHandler<TRequest, TResponse>,
    options: RespondOptions = {}
  ): Promise<ResponderRegistration> {
    this.assertNotDisposed();

    const subscription = new SubscriptionConfiguration(this.config.prefetchCount);
    options.configure?.(subscription);
    const settings = subscription.snapshot();

    const responder = new Responder<TRequest, TResponse>({
      connection: this.connection,
      endpoint,
      handler,
      subscription: settings,
      subscriptionId: options.subscriptionId,
      serializer: this.serializer,
      logger: this.logger,
    });

    await responder.start();
    this.responders.add(responder);

    return {
      queueName: responder.getQueueName(),
      subscription: settings,
      dispose: async () => {
        this.responders.delete(responder);
        await responder.stop();
      },
    };
  }

  /**
   * Send a request to `endpoint` and wait for its response
   */
  async request<TRequest = unknown, TResponse = unknown>(
    endpoint: string,
    data: TRequest,
    options: BusRequestOptions = {}
  ): Promise<TResponse> {
    this.assertNotDisposed();
    return this.getRequester().request<TRequest, TResponse>(endpoint, data, options);
  }

  /**
   * Stop every responder, close the requester and the connection
   */
  async dispose(): Promise<void> {
    if (this.disposed) return;
    this.disposed = true;

    const stopping = [...this.responders].map((responder) => responder.stop());
    this.responders.clear();

    const results = await Promise.allSettled(stopping);
    for (const result of results) {
      if (result.status === 'rejected') {
        this.logger.warn('Error stopping responder', { error: errorMessageOf(result.reason) });
      }
    }

    if (this.requester) {
      await this.requester.close();
      this.requester = null;
    }

    await this.connection.close();
    this.logger.info('Bus disposed');
  }

  private getRequester(): Requester {
    if (!this.requester) {
      this.requester = new Requester({
        connection: this.connection,
        timeoutMs: this.config.timeoutMs,
        persistent: this.config.persistentMessages,
        serializer: this.serializer,
        logger: this.logger,
      });
    }
    return this.requester;
  }

  private assertNotDisposed(): void {
    if (this.disposed) {
      throw new ValidationError('Bus has been disposed');
    }
  }
}
