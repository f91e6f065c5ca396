import type { Options } from 'amqplib';
import { CONSUMER_ARGUMENTS, ROUTING } from '../constants';
import type { SubscriptionSettings } from './SubscriptionConfiguration';

/**
 * Queue declaration arguments for a subscription
 *
 * Queues are always durable; `expires` and `messageTtl` map to x-expires and
 * x-message-ttl and are only sent when present.
 */
export function toAssertQueueOptions(settings: SubscriptionSettings): Options.AssertQueue {
  const options: Options.AssertQueue = {
    durable: true,
    autoDelete: settings.autoDelete,
  };

  if (settings.expiresMs !== undefined) {
    options.expires = settings.expiresMs;
  }

  if (typeof settings.messageTtlMs === 'number') {
    options.messageTtl = settings.messageTtlMs;
  }

  return options;
}

/**
 * basic.consume arguments for a subscription
 */
export function toConsumeOptions(settings: SubscriptionSettings): Options.Consume {
  const args: Record<string, unknown> = {};
  if (settings.cancelOnHaFailover) {
    args[CONSUMER_ARGUMENTS.CANCEL_ON_HA_FAILOVER] = true;
  }

  const options: Options.Consume = {
    noAck: false,
    exclusive: settings.isExclusive,
    arguments: args,
  };

  // x-priority 0 is the broker default
  if (settings.priority !== 0) {
    options.priority = settings.priority;
  }

  return options;
}

/**
 * Routing patterns the subscription queue is bound with
 */
export function resolveBindings(settings: SubscriptionSettings): string[] {
  return settings.topics.length > 0 ? [...settings.topics] : [ROUTING.DEFAULT_TOPIC];
}

/**
 * Queue name for an endpoint; each subscription id gets a queue of its own
 */
export function resolveQueueName(endpoint: string, subscriptionId?: string): string {
  return subscriptionId
    ? `${endpoint}${ROUTING.SUBSCRIPTION_SEPARATOR}${subscriptionId}`
    : endpoint;
}
