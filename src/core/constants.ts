/**
 * Centralized constants for the bridge
 */

/**
 * Envelope header keys. Consumers set all of them on every inbound envelope;
 * producers read ROUTING_KEY as a per-message override.
 */
export const HEADERS = {
  ROUTING_KEY: 'rabbitmq.ROUTING_KEY',
  DELIVERY_TAG: 'rabbitmq.DELIVERY_TAG',
  REPLY_TO: 'rabbitmq.REPLY_TO',
  CORRELATION_ID: 'rabbitmq.CORRELATION_ID',
  EXCHANGE_NAME: 'rabbitmq.EXCHANGE_NAME',
} as const;

/**
 * Time intervals in milliseconds
 */
export const TIME = {
  /**
   * Default deadline for RPC requests (30 seconds)
   */
  DEFAULT_RPC_TIMEOUT_MS: 30_000,

  /**
   * Default wait for in-flight deliveries on consumer shutdown (30 seconds)
   */
  DEFAULT_SHUTDOWN_TIMEOUT_MS: 30_000,
} as const;

/**
 * Size limits and capacity constraints
 */
export const LIMITS = {
  DEFAULT_CONCURRENT_CONSUMERS: 1,

  /**
   * 0 leaves the channel without a prefetch limit
   */
  DEFAULT_PREFETCH: 0,

  DEFAULT_HEARTBEAT_S: 60,
} as const;

/**
 * Exchange type constants. Any other string is passed to the broker as-is.
 */
export const EXCHANGE_TYPE = {
  DIRECT: 'direct',
  TOPIC: 'topic',
  FANOUT: 'fanout',
  HEADERS: 'headers',
} as const;

/**
 * What a worker does with a delivery whose processing failed (manual ack only)
 */
export const FAILURE_POLICY = {
  REQUEUE: 'requeue',
  DEAD_LETTER: 'dead-letter',
  DROP: 'drop',
} as const;

/**
 * The nameless default exchange, used for replies
 */
export const DEFAULT_EXCHANGE = '';
