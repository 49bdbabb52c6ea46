/**
 * amqp-bridge - connects an application message pipeline to RabbitMQ
 *
 * Producers publish envelopes (fire-and-forget or request/reply), consumers run
 * a pool of workers that feed deliveries into the pipeline and acknowledge,
 * reject, or reply once processing has finished.
 *
 * @packageDocumentation
 */

// ============================================================================
// CORE - Configuration, Connection, Topology, Envelope, Errors
// ============================================================================

export * from './core';

// ============================================================================
// CLIENT - Producer & RPC correlation
// ============================================================================

export * from './client';

// ============================================================================
// SERVER - Consumer, workers, completion
// ============================================================================

export * from './server';
