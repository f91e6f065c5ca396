import { LIMITS, TIME } from '../constants';
import { Duration } from '../time/Duration';

/**
 * Fluent surface handed to `configure` callbacks when a responder is registered
 *
 * @example
 * ```typescript
 * bus.respond('orders', handler, {
 *   configure: (x) => x.addTopic('orders.*').setAutoDelete().setExpiresDays(7),
 * });
 * ```
 */
export interface SubscriptionConfigurer {
  /** Add a routing pattern the queue is bound with */
  addTopic(topic: string): this;
  /** Delete the queue once its last consumer goes away */
  setAutoDelete(autoDelete?: boolean): this;
  /** Consumer priority; higher priority consumers receive messages first */
  setPriority(priority: number): this;
  /** Ask the broker to cancel the consumer when a mirrored queue fails over */
  setCancelOnHaFailover(cancelOnHaFailover?: boolean): this;
  setPrefetchCount(prefetchCount: number): this;
  /**
   * How long a message may sit on the queue before the broker discards it.
   * Passing nothing removes a TTL set earlier.
   */
  setMessageTtl(ttl?: Duration | null): this;
  /** Queue expiry at the largest value accepted (24 days) */
  setExpiresToMaximum(): this;
  /**
   * How long the queue may go unused before the broker deletes it, in milliseconds.
   * Unused means no consumers, no redeclaration and no basic.get for the whole period.
   * Values above 24 days are reduced to 24 days.
   */
  setExpiresMs(expires: number): this;
  /** Queue expiry as a duration, at most 24 days */
  setExpiresDuration(expires: Duration): this;
  /** Queue expiry in whole days, at most 24 */
  setExpiresDays(expires: number): this;
  /** Make this the only consumer allowed on the queue */
  setExclusive(): this;
}

/**
 * Read side of a finished subscription configuration
 */
export interface SubscriptionSettings {
  readonly topics: readonly string[];
  readonly autoDelete: boolean;
  readonly priority: number;
  readonly cancelOnHaFailover: boolean;
  readonly prefetchCount: number;
  readonly expiresMs: number | undefined;
  /**
   * `undefined` when never configured, `null` when explicitly cleared.
   * Both mean the queue has no message TTL.
   */
  readonly messageTtlMs: number | null | undefined;
  readonly isExclusive: boolean;
}

const MAX_QUEUE_EXPIRES = Duration.fromMilliseconds(TIME.MAX_QUEUE_EXPIRES_MS);

const clampExpires = (ms: number): number => Math.min(Math.trunc(ms), TIME.MAX_QUEUE_EXPIRES_MS);

/**
 * Per-subscription options, collected fluently and read by the subscription setup
 *
 * Every setter overwrites except `addTopic`, which appends. Nothing is validated:
 * the only normalization is the 24-day ceiling on queue expiry, applied silently
 * whichever setter produced the value.
 */
export class SubscriptionConfiguration implements SubscriptionConfigurer, SubscriptionSettings {
  private readonly topicList: string[] = [];
  private autoDeleteFlag = false;
  private priorityValue = 0;
  private cancelOnHaFailoverFlag = false;
  private prefetch: number;
  private expires: number | undefined;
  private messageTtl: number | null | undefined;
  private exclusive = false;

  constructor(defaultPrefetchCount: number) {
    this.prefetch = defaultPrefetchCount;
  }

  get topics(): readonly string[] {
    return this.topicList;
  }

  get autoDelete(): boolean {
    return this.autoDeleteFlag;
  }

  get priority(): number {
    return this.priorityValue;
  }

  get cancelOnHaFailover(): boolean {
    return this.cancelOnHaFailoverFlag;
  }

  get prefetchCount(): number {
    return this.prefetch;
  }

  get expiresMs(): number | undefined {
    return this.expires;
  }

  get messageTtlMs(): number | null | undefined {
    return this.messageTtl;
  }

  get isExclusive(): boolean {
    return this.exclusive;
  }

  addTopic(topic: string): this {
    this.topicList.push(topic);
    return this;
  }

  setAutoDelete(autoDelete = true): this {
    this.autoDeleteFlag = autoDelete;
    return this;
  }

  setPriority(priority: number): this {
    this.priorityValue = priority;
    return this;
  }

  setCancelOnHaFailover(cancelOnHaFailover = true): this {
    this.cancelOnHaFailoverFlag = cancelOnHaFailover;
    return this;
  }

  setPrefetchCount(prefetchCount: number): this {
    this.prefetch = prefetchCount;
    return this;
  }

  setMessageTtl(ttl?: Duration | null): this {
    this.messageTtl = ttl ? Math.trunc(ttl.totalMilliseconds) : null;
    return this;
  }

  setExpiresToMaximum(): this {
    return this.setExpiresMs(LIMITS.MAX_INT32);
  }

  setExpiresMs(expires: number): this {
    this.expires = clampExpires(expires);
    return this;
  }

  setExpiresDuration(expires: Duration): this {
    this.expires = clampExpires(Duration.min(expires, MAX_QUEUE_EXPIRES).totalMilliseconds);
    return this;
  }

  setExpiresDays(expires: number): this {
    const days = Math.min(expires, TIME.MAX_QUEUE_EXPIRES_DAYS);
    this.expires = clampExpires(days * TIME.MS_PER_DAY);
    return this;
  }

  setExclusive(): this {
    this.exclusive = true;
    return this;
  }

  /**
   * Plain copy of the current values, detached from later mutation
   */
  snapshot(): SubscriptionSettings {
    return {
      topics: [...this.topicList],
      autoDelete: this.autoDeleteFlag,
      priority: this.priorityValue,
      cancelOnHaFailover: this.cancelOnHaFailoverFlag,
      prefetchCount: this.prefetch,
      expiresMs: this.expires,
      messageTtlMs: this.messageTtl,
      isExclusive: this.exclusive,
    };
  }
}
