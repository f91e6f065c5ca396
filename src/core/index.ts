/**
 * Core utilities and types for Warren MQ
 */

// Subscription configuration
export { SubscriptionConfiguration } from './subscription/SubscriptionConfiguration';
export type {
  SubscriptionConfigurer,
  SubscriptionSettings,
} from './subscription/SubscriptionConfiguration';
export {
  toAssertQueueOptions,
  toConsumeOptions,
  resolveBindings,
  resolveQueueName,
} from './subscription/SubscriptionSetup';

// Time
export { Duration } from './time/Duration';

// Configuration
export { parseConnectionString, resolveBusConfig } from './config/ConnectionString';
export type { BusConfig, BusConfigInput } from './config/ConnectionString';
export { TIME, LIMITS, ROUTING, EXCHANGE_TYPE, CONSUMER_ARGUMENTS } from './constants';

// Connection Management
export { ConnectionManager } from './connection/ConnectionManager';
export type { ConnectionConfig } from './connection/ConnectionManager';
export { openChannel } from './connection/openChannel';
export type { AmqpChannel, AmqpConnection, ConnectionProvider } from './types/Amqp';

// Types
export type { RequestEnvelope, ResponseEnvelope, Serializer } from './types/Messages';
export { JsonSerializer, isRequestEnvelope, isResponseEnvelope } from './types/Messages';

export type { Logger, LogContext, LogLevel } from './types/Logger';
export { SilentLogger, ConsoleLogger } from './types/Logger';

// Errors
export {
  WarrenError,
  ConnectionError,
  ChannelError,
  TimeoutError,
  ValidationError,
  RemoteError,
  errorCodeOf,
  errorMessageOf,
  toError,
} from './types/Errors';
