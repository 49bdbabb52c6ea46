import { randomUUID } from 'crypto';
import {
  type EndpointConfig,
  type ResolvedEndpointConfig,
  describeEndpoint,
  resolveEndpointConfig,
} from '../../core/config/EndpointConfig';
import { ChannelProvisioner } from '../../core/connection/ChannelProvisioner';
import { ConnectionManager } from '../../core/connection/ConnectionManager';
import { waitForDrain } from '../../core/connection/waitForDrain';
import { HEADERS } from '../../core/constants';
import type { Body, Envelope, HeaderValue } from '../../core/message/Envelope';
import { declareTarget, declareTopology } from '../../core/topology/TopologyConfigurator';
import type {
  BrokerChannel,
  ConnectionSource,
  Delivery,
  PublishProperties,
} from '../../core/types/Amqp';
import { EmptyBodyError, ValidationError, toTransportError } from '../../core/types/Errors';
import type { Logger } from '../../core/types/Logger';
import { ReplySubscription } from '../rpc/ReplySubscription';
import { resolveRoutingKey } from './routingKey';

export interface ProducerOptions {
  /**
   * Source of the shared connection; defaults to the ConnectionManager for the
   * configured URL
   */
  connectionSource?: ConnectionSource;
}

export interface SendOptions {
  /**
   * RPC deadline in ms for this call; defaults to the configured rpcTimeout
   */
  timeout?: number;
  signal?: AbortSignal;
}

/**
 * Producer publishes pipeline envelopes to the broker.
 *
 * In fire-and-forget mode the envelope is published and returned as soon as the
 * publish call returns ("sent", not "confirmed"). In RPC mode each call gets a
 * private reply queue and a fresh correlation id, and the matching reply body
 * becomes the envelope's response body.
 *
 * Failures never escape send(): they are recorded on the envelope.
 *
 * @example
 * ```typescript
 * const producer = new Producer({
 *   connection: { url: 'amqp://localhost' },
 *   queue: 'invoices',
 * });
 *
 * const envelope = await producer.send(new Envelope({ body: '{"id":42}' }));
 * if (envelope.isFailed()) {
 *   console.error(envelope.getError());
 * }
 * ```
 */
export class Producer {
  private readonly config: ResolvedEndpointConfig;
  private readonly logger: Logger;
  private readonly provisioner: ChannelProvisioner;
  private tail: Promise<void> = Promise.resolve();

  /**
   * @throws {ValidationError} When the configuration is invalid
   */
  constructor(config: EndpointConfig, options: ProducerOptions = {}) {
    this.config = resolveEndpointConfig(config);
    this.logger = this.config.logger;

    const source =
      options.connectionSource ??
      ConnectionManager.getInstance({ ...this.config.connection, logger: this.logger });

    this.provisioner = new ChannelProvisioner(source, {
      label: 'producer',
      logger: this.logger,
      setup: (channel) => this.setupChannel(channel),
    });
  }

  /**
   * Publish an envelope, and in RPC mode wait for its reply.
   *
   * @returns the same envelope; check `getError()` for the outcome
   */
  async send(envelope: Envelope, options: SendOptions = {}): Promise<Envelope> {
    try {
      await this.dispatch(envelope, options);
    } catch (error) {
      const failure = error instanceof Error ? error : new Error(String(error));
      envelope.setError(failure);
      this.logger.error('Failed to send message', failure, { messageId: envelope.messageId });
    }
    return envelope;
  }

  /**
   * Pipeline-step form of send(): rethrows the recorded error so the
   * surrounding pipeline sees the failure.
   */
  readonly process = async (envelope: Envelope): Promise<void> => {
    await this.send(envelope);
    const error = envelope.getError();
    if (error) {
      throw error;
    }
  };

  /**
   * Close the producer's channel. The shared connection stays open.
   */
  async close(): Promise<void> {
    await this.provisioner.close();
    this.logger.info('Producer closed');
  }

  private async dispatch(envelope: Envelope, options: SendOptions): Promise<void> {
    const body = envelope.getBody();
    const text = envelope.getBodyAsString();

    // RPC tolerates an empty body, never an absent one
    if (this.config.rpc ? text === null : !text) {
      throw new EmptyBodyError('Message body is null or empty', { messageId: envelope.messageId });
    }

    const routingKey = resolveRoutingKey(this.config, envelope, this.logger);
    const content = toContent(body);

    this.logger.debug('Sending message', {
      messageId: envelope.messageId,
      exchange: this.config.exchange,
      routingKey,
      rpc: this.config.rpc,
    });

    if (this.config.rpc) {
      const reply = await this.request(routingKey, content, options);
      envelope.setResponseBody(reply.content.toString('utf8'));
      envelope.setHeader(HEADERS.CORRELATION_ID, reply.properties.correlationId ?? null);
      return;
    }

    const properties: PublishProperties = {
      ...this.config.messageProperties,
      headers: { ...this.config.messageProperties.headers, ...applicationHeaders(envelope) },
      messageId: envelope.messageId,
    };

    await this.exclusive(async (channel) => {
      await this.redeclareTarget(channel);
      await this.publish(channel, routingKey, content, properties);
    });
  }

  private async request(
    routingKey: string,
    content: Buffer,
    options: SendOptions
  ): Promise<Delivery> {
    const timeout = options.timeout ?? this.config.rpcTimeout;
    if (!Number.isFinite(timeout) || timeout <= 0) {
      throw new ValidationError('RPC timeout must be a positive number of milliseconds', {
        timeout,
      });
    }

    const correlationId = randomUUID();

    const subscription = await this.exclusive(async (channel) => {
      await this.redeclareTarget(channel);
      const opened = await ReplySubscription.open(channel, correlationId, this.logger);
      try {
        await this.publish(channel, routingKey, content, {
          correlationId,
          replyTo: opened.queue,
        });
      } catch (error) {
        await opened.close();
        throw error;
      }
      return opened;
    });

    try {
      const reply = await subscription.wait({ timeout, signal: options.signal });
      this.logger.debug('RPC reply received', { correlationId, queue: subscription.queue });
      return reply;
    } finally {
      await this.exclusive(() => subscription.close());
    }
  }

  /**
   * First use of the channel declares the full topology, the same way the
   * consumer does.
   */
  private async setupChannel(channel: BrokerChannel): Promise<void> {
    this.logger.debug('Producer endpoint', describeEndpoint(this.config));
    if (!this.config.exchange && !this.config.queue) {
      this.logger.warn('No exchange or queue configured; nothing to declare');
      return;
    }
    await declareTopology(this.config, channel);
  }

  /**
   * Sends that are not addressed to a named queue re-declare the target,
   * which may not exist yet.
   */
  private async redeclareTarget(channel: BrokerChannel): Promise<void> {
    if (this.config.exchange && !this.config.queue) {
      await declareTarget(this.config, channel);
    }
  }

  private async publish(
    channel: BrokerChannel,
    routingKey: string,
    content: Buffer,
    properties: PublishProperties
  ): Promise<void> {
    let written: boolean;
    try {
      written = channel.publish(this.config.exchange, routingKey, content, properties);
    } catch (error) {
      throw toTransportError('Failed to publish message', error, {
        exchange: this.config.exchange,
        routingKey,
      });
    }

    if (!written) {
      await waitForDrain(channel, 'producer');
    }
  }

  /**
   * Run a task against the producer channel with no other task interleaved
   */
  private exclusive<T>(task: (channel: BrokerChannel) => Promise<T>): Promise<T> {
    const run = this.tail.then(async () => task(await this.provisioner.getChannel()));
    // the chain only orders tasks; each caller observes its own outcome through `run`
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}

function toContent(body: Body): Buffer {
  if (body === null) {
    return Buffer.alloc(0);
  }
  return typeof body === 'string' ? Buffer.from(body, 'utf8') : body;
}

/**
 * Envelope headers forwarded as AMQP headers: everything outside the
 * bridge's own `rabbitmq.` namespace that carries a value
 */
function applicationHeaders(envelope: Envelope): Record<string, Exclude<HeaderValue, null>> {
  const headers: Record<string, Exclude<HeaderValue, null>> = {};
  for (const [key, value] of Object.entries(envelope.getHeaders())) {
    if (!key.startsWith('rabbitmq.') && value !== null) {
      headers[key] = value;
    }
  }
  return headers;
}
