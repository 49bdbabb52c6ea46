import { EXCHANGE_TYPE, FAILURE_POLICY, LIMITS, TIME } from '../constants';
import type { ConnectionConfig } from '../connection/ConnectionManager';
import { ValidationError } from '../types/Errors';
import { type Logger, SilentLogger } from '../types/Logger';
import type { PublishProperties } from '../types/Amqp';

export type ExchangeType = (typeof EXCHANGE_TYPE)[keyof typeof EXCHANGE_TYPE] | (string & {});

export type FailurePolicy = (typeof FAILURE_POLICY)[keyof typeof FAILURE_POLICY];

/**
 * Endpoint configuration shared by producers and consumers
 */
export interface EndpointConfig {
  connection: ConnectionConfig;
  /**
   * Empty (the default) selects queue-direct mode
   */
  exchange?: string;
  exchangeType?: ExchangeType;
  queue?: string;
  durable?: boolean;
  bindingKeys?: readonly string[];
  routingKey?: string;
  concurrentConsumers?: number;
  prefetch?: number;
  autoAck?: boolean;
  rpc?: boolean;
  /**
   * Deadline for every RPC call in ms. Always in effect; override per call.
   */
  rpcTimeout?: number;
  messageProperties?: PublishProperties;
  failurePolicy?: FailurePolicy;
  shutdownTimeout?: number;
  logger?: Logger;
}

export type ResolvedEndpointConfig = Readonly<
  Required<Omit<EndpointConfig, 'bindingKeys' | 'messageProperties' | 'connection'>> & {
    connection: Readonly<ConnectionConfig>;
    bindingKeys: readonly string[];
    messageProperties: Readonly<PublishProperties>;
  }
>;

/**
 * Default endpoint configuration
 */
const DEFAULT_CONFIG = {
  exchange: '',
  exchangeType: EXCHANGE_TYPE.DIRECT,
  queue: '',
  durable: true,
  routingKey: '',
  concurrentConsumers: LIMITS.DEFAULT_CONCURRENT_CONSUMERS,
  prefetch: LIMITS.DEFAULT_PREFETCH,
  autoAck: true,
  rpc: false,
  rpcTimeout: TIME.DEFAULT_RPC_TIMEOUT_MS,
  failurePolicy: FAILURE_POLICY.DEAD_LETTER,
  shutdownTimeout: TIME.DEFAULT_SHUTDOWN_TIMEOUT_MS,
} satisfies Partial<EndpointConfig>;

const FAILURE_POLICIES: readonly string[] = Object.values(FAILURE_POLICY);

/**
 * Merge defaults, validate, and freeze an endpoint configuration.
 *
 * @throws {ValidationError} When a value is out of range
 */
export function resolveEndpointConfig(config: EndpointConfig): ResolvedEndpointConfig {
  if (!config.connection?.url) {
    throw new ValidationError('Connection URL is required');
  }

  const resolved = {
    exchange: config.exchange ?? DEFAULT_CONFIG.exchange,
    exchangeType: config.exchangeType ?? DEFAULT_CONFIG.exchangeType,
    queue: config.queue ?? DEFAULT_CONFIG.queue,
    durable: config.durable ?? DEFAULT_CONFIG.durable,
    routingKey: config.routingKey ?? DEFAULT_CONFIG.routingKey,
    concurrentConsumers: config.concurrentConsumers ?? DEFAULT_CONFIG.concurrentConsumers,
    prefetch: config.prefetch ?? DEFAULT_CONFIG.prefetch,
    autoAck: config.autoAck ?? DEFAULT_CONFIG.autoAck,
    rpc: config.rpc ?? DEFAULT_CONFIG.rpc,
    rpcTimeout: config.rpcTimeout ?? DEFAULT_CONFIG.rpcTimeout,
    failurePolicy: config.failurePolicy ?? DEFAULT_CONFIG.failurePolicy,
    shutdownTimeout: config.shutdownTimeout ?? DEFAULT_CONFIG.shutdownTimeout,
    logger: config.logger ?? config.connection.logger ?? new SilentLogger(),
    connection: Object.freeze({ ...config.connection }),
    bindingKeys: Object.freeze([...(config.bindingKeys ?? [])]),
    messageProperties: Object.freeze({ ...config.messageProperties }),
  };

  if (!Number.isInteger(resolved.concurrentConsumers) || resolved.concurrentConsumers < 1) {
    throw new ValidationError('concurrentConsumers must be a positive integer', {
      concurrentConsumers: resolved.concurrentConsumers,
    });
  }

  if (!Number.isInteger(resolved.prefetch) || resolved.prefetch < 0) {
    throw new ValidationError('prefetch must be a non-negative integer', {
      prefetch: resolved.prefetch,
    });
  }

  if (!Number.isFinite(resolved.rpcTimeout) || resolved.rpcTimeout <= 0) {
    throw new ValidationError('rpcTimeout must be a positive number of milliseconds', {
      rpcTimeout: resolved.rpcTimeout,
    });
  }

  if (!Number.isFinite(resolved.shutdownTimeout) || resolved.shutdownTimeout < 0) {
    throw new ValidationError('shutdownTimeout must be a non-negative number of milliseconds', {
      shutdownTimeout: resolved.shutdownTimeout,
    });
  }

  if (!FAILURE_POLICIES.includes(resolved.failurePolicy)) {
    throw new ValidationError(`Unknown failure policy "${resolved.failurePolicy}"`, {
      allowed: FAILURE_POLICIES,
    });
  }

  return Object.freeze(resolved);
}

/**
 * Routing/topology summary safe to log (no credentials)
 */
export function describeEndpoint(config: ResolvedEndpointConfig): Record<string, unknown> {
  return {
    exchange: config.exchange,
    exchangeType: config.exchangeType,
    queue: config.queue,
    durable: config.durable,
    bindingKeys: config.bindingKeys,
    routingKey: config.routingKey,
    concurrentConsumers: config.concurrentConsumers,
    prefetch: config.prefetch,
    autoAck: config.autoAck,
    rpc: config.rpc,
  };
}
