/**
 * Warren MQ - request/response over RabbitMQ with fluent subscription configuration
 *
 * @packageDocumentation
 */

// ============================================================================
// CORE - Subscription configuration, connection management, types, errors
// ============================================================================

export {
  SubscriptionConfiguration,
  Duration,
  toAssertQueueOptions,
  toConsumeOptions,
  resolveBindings,
  resolveQueueName,
  parseConnectionString,
  resolveBusConfig,
  ConnectionManager,
  JsonSerializer,
  SilentLogger,
  ConsoleLogger,
  WarrenError,
  ConnectionError,
  ChannelError,
  TimeoutError,
  ValidationError,
  RemoteError,
} from './core';

export type {
  SubscriptionConfigurer,
  SubscriptionSettings,
  BusConfig,
  BusConfigInput,
  ConnectionConfig,
  ConnectionProvider,
  AmqpChannel,
  AmqpConnection,
  RequestEnvelope,
  ResponseEnvelope,
  Serializer,
  Logger,
  LogLevel,
} from './core';

// ============================================================================
// CLIENT / SERVER - Requester & Responder
// ============================================================================

export { Requester } from './client';
export type { RequesterConfig, RequestOptions } from './client';

export { Responder } from './server';
export type { ResponderConfig, ResponderHandler, RequestContext } from './server';

// ============================================================================
// BUS - One connection, many responders
// ============================================================================

export { Bus } from './bus';
export type { BusOptions, BusRequestOptions, RespondOptions, ResponderRegistration } from './bus';
