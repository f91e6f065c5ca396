/**
 * Centralized constants for Warren MQ
 *
 * This file contains all magic numbers and string constants used throughout the library.
 */

/**
 * Time intervals in milliseconds
 */
export const TIME = {
  MS_PER_SECOND: 1_000,
  MS_PER_MINUTE: 60_000,
  MS_PER_HOUR: 3_600_000,
  MS_PER_DAY: 86_400_000,

  /**
   * Longest queue expiry the broker is asked for (24 days)
   */
  MAX_QUEUE_EXPIRES_DAYS: 24,

  /**
   * 24 days in milliseconds
   */
  MAX_QUEUE_EXPIRES_MS: 2_073_600_000,

  /**
   * Default timeout for requests (10 seconds)
   */
  DEFAULT_REQUEST_TIMEOUT_MS: 10_000,

  /**
   * Default heartbeat, in seconds as AMQP negotiates it
   */
  DEFAULT_HEARTBEAT_SECONDS: 10,

  /**
   * Upper bound on waiting for in-flight requests when a responder stops (5 seconds)
   */
  RESPONDER_DRAIN_TIMEOUT_MS: 5_000,
} as const;

/**
 * Size limits and capacity constraints
 */
export const LIMITS = {
  /**
   * Default prefetch count used when the connection string does not set one
   */
  DEFAULT_PREFETCH: 50,

  /**
   * Prefetch is an unsigned 16-bit field on the wire
   */
  MAX_PREFETCH: 65_535,

  /**
   * Largest signed 32-bit integer, the raw value behind "maximum expiry"
   */
  MAX_INT32: 2_147_483_647,

  DEFAULT_PORT: 5672,
} as const;

/**
 * Routing constants
 */
export const ROUTING = {
  /**
   * Binding used when a subscription names no topics, and routing key for topic-less requests
   */
  DEFAULT_TOPIC: '#',

  /**
   * RabbitMQ direct reply-to pseudo queue
   */
  REPLY_TO_QUEUE: 'amq.rabbitmq.reply-to',

  /**
   * Separator between endpoint and subscription id in queue names
   */
  SUBSCRIPTION_SEPARATOR: '_',
} as const;

/**
 * Exchange type constants
 */
export const EXCHANGE_TYPE = {
  TOPIC: 'topic',
} as const;

/**
 * Consumer argument keys understood by RabbitMQ
 */
export const CONSUMER_ARGUMENTS = {
  CANCEL_ON_HA_FAILOVER: 'x-cancel-on-ha-failover',
} as const;
