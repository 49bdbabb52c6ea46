/**
 * Core building blocks: configuration, connection and channel lifecycle,
 * topology, envelope, pipeline, errors
 */

// Configuration
export { resolveEndpointConfig, describeEndpoint } from './config/EndpointConfig';
export type {
  EndpointConfig,
  ResolvedEndpointConfig,
  ExchangeType,
  FailurePolicy,
} from './config/EndpointConfig';
export { parseEndpointUri } from './config/EndpointUri';

// Connection Management
export { ConnectionManager, maskUrl } from './connection/ConnectionManager';
export type { ConnectionConfig, Connector } from './connection/ConnectionManager';
export { ChannelProvisioner } from './connection/ChannelProvisioner';
export type { ChannelProvisionerOptions } from './connection/ChannelProvisioner';
export { waitForDrain } from './connection/waitForDrain';

// Topology
export { declareTopology, declareTarget } from './topology/TopologyConfigurator';
export type { TopologyConfig, DeclaredTopology } from './topology/TopologyConfigurator';

// Envelope & pipeline
export { Envelope } from './message/Envelope';
export type { Body, HeaderValue, EnvelopeInit, Synchronization } from './message/Envelope';
export { compose, runPipeline } from './middleware/compose';
export type { Middleware, NextFunction, Processor } from './middleware/types';

// Constants
export { HEADERS, TIME, LIMITS, EXCHANGE_TYPE, FAILURE_POLICY, DEFAULT_EXCHANGE } from './constants';

// Transport boundary
export type {
  BrokerChannel,
  BrokerConnection,
  ConnectionSource,
  Delivery,
  PublishProperties,
} from './types/Amqp';

// Logging
export type { Logger, LogLevel, ConsoleLoggerOptions } from './types/Logger';
export { SilentLogger, ConsoleLogger, scopedLogger } from './types/Logger';

// Errors
export {
  BridgeError,
  TransportError,
  TopologyConflictError,
  EmptyBodyError,
  AckFailureError,
  TimeoutError,
  ValidationError,
} from './types/Errors';
