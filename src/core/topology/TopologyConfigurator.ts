import type { ResolvedEndpointConfig } from '../config/EndpointConfig';
import type { BrokerChannel } from '../types/Amqp';
import {
  TopologyConflictError,
  errorMessage,
  isPreconditionFailed,
  toTransportError,
} from '../types/Errors';

export type TopologyConfig = Pick<
  ResolvedEndpointConfig,
  'exchange' | 'exchangeType' | 'queue' | 'durable' | 'bindingKeys'
>;

export interface DeclaredTopology {
  /**
   * Queue to consume from: the configured queue, or the server-named queue
   * bound to the exchange
   */
  queue: string;
}

/**
 * Options for the private, server-named queue bound to an exchange
 */
const SERVER_NAMED_QUEUE = { exclusive: true, autoDelete: true, durable: false } as const;

/**
 * Declare the endpoint's exchange, queue, and bindings on a channel.
 *
 * With an exchange configured, a fresh server-named queue is bound to every
 * binding key in order, or once with the empty key when there are none. Without
 * one, the named queue is declared directly (non-exclusive, non-auto-delete, no
 * arguments). Producers and consumers both run this, so topology is the same
 * whichever side starts first.
 *
 * @throws {TopologyConflictError} When the broker already holds a mismatched declaration
 * @throws {TransportError} On any other channel failure
 */
export async function declareTopology(
  config: TopologyConfig,
  channel: BrokerChannel
): Promise<DeclaredTopology> {
  if (config.exchange) {
    await assertExchange(config, channel);

    const { queue } = await run('queue', '', () => channel.assertQueue('', SERVER_NAMED_QUEUE));
    const bindingKeys = config.bindingKeys.length > 0 ? config.bindingKeys : [''];
    for (const bindingKey of bindingKeys) {
      await run('binding', bindingKey, () => channel.bindQueue(queue, config.exchange, bindingKey));
    }

    return { queue };
  }

  await assertNamedQueue(config, channel);
  return { queue: config.queue };
}

/**
 * Re-declare only the publish target: the exchange if one is configured,
 * otherwise the named queue.
 */
export async function declareTarget(config: TopologyConfig, channel: BrokerChannel): Promise<void> {
  if (config.exchange) {
    await assertExchange(config, channel);
  } else {
    await assertNamedQueue(config, channel);
  }
}

async function assertExchange(config: TopologyConfig, channel: BrokerChannel): Promise<void> {
  await run('exchange', config.exchange, () =>
    channel.assertExchange(config.exchange, config.exchangeType, { durable: config.durable })
  );
}

async function assertNamedQueue(config: TopologyConfig, channel: BrokerChannel): Promise<void> {
  await run('queue', config.queue, () =>
    channel.assertQueue(config.queue, {
      durable: config.durable,
      exclusive: false,
      autoDelete: false,
    })
  );
}

async function run<T>(kind: string, name: string, operation: () => Promise<T>): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    if (isPreconditionFailed(error)) {
      throw new TopologyConflictError(
        `Declaration of ${kind} "${name}" conflicts with existing broker state`,
        { kind, name, cause: errorMessage(error) }
      );
    }
    throw toTransportError(`Failed to declare ${kind} "${name}"`, error, { kind, name });
  }
}
