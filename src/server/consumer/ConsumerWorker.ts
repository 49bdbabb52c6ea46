import type { ResolvedEndpointConfig } from '../../core/config/EndpointConfig';
import { ChannelProvisioner } from '../../core/connection/ChannelProvisioner';
import { HEADERS } from '../../core/constants';
import { Envelope, type HeaderValue } from '../../core/message/Envelope';
import { runPipeline } from '../../core/middleware/compose';
import type { Processor } from '../../core/middleware/types';
import type { BrokerChannel, ConnectionSource, Delivery } from '../../core/types/Amqp';
import { TimeoutError, TransportError, errorMessage, toTransportError } from '../../core/types/Errors';
import { type Logger, scopedLogger } from '../../core/types/Logger';
import { DeliveryCompletion, type DeliveryErrorReporter } from './DeliveryCompletion';
import type { Worker } from './WorkerPool';

export type WorkerState =
  | 'created'
  | 'channel-provisioned'
  | 'subscribed'
  | 'dispatching'
  | 'stopped';

export interface ConsumerWorkerOptions {
  name: string;
  queue: string;
  config: ResolvedEndpointConfig;
  source: ConnectionSource;
  processor: Processor;
  logger: Logger;
  report: DeliveryErrorReporter;
}

/**
 * One consuming loop: its own channel, its own subscription, its own reply
 * channel. Deliveries are turned into envelopes and handed to the pipeline;
 * the worker never looks at message content.
 *
 * The broker pushes deliveries, so "waiting for the next delivery" is the idle
 * time between callbacks; cancelling the subscription ends it.
 */
export class ConsumerWorker implements Worker {
  readonly name: string;
  private state: WorkerState = 'created';
  private readonly channelProvisioner: ChannelProvisioner;
  private readonly replyProvisioner: ChannelProvisioner;
  private consumerTag: string | null = null;
  private readonly inFlight = new Set<Promise<void>>();
  private tail: Promise<void> = Promise.resolve();
  private released: Promise<void> | null = null;
  private readonly logger: Logger;

  constructor(private readonly options: ConsumerWorkerOptions) {
    this.name = options.name;
    this.logger = scopedLogger(options.logger, { worker: options.name });
    this.channelProvisioner = new ChannelProvisioner(options.source, {
      label: options.name,
      prefetch: options.config.prefetch,
      logger: this.logger,
      onLost: (error) => this.handleChannelLost(error),
    });
    this.replyProvisioner = new ChannelProvisioner(options.source, {
      label: `${options.name}-reply`,
      logger: this.logger,
    });
  }

  getState(): WorkerState {
    return this.state;
  }

  /**
   * Number of deliveries handed to the pipeline and not yet settled
   */
  getInFlightCount(): number {
    return this.inFlight.size;
  }

  /**
   * Provision the worker's channel and subscribe to the queue
   *
   * @throws {TransportError} When the channel or subscription cannot be set up
   */
  async start(): Promise<void> {
    if (this.state !== 'created') {
      throw new TransportError(`Worker ${this.name} cannot start from state ${this.state}`);
    }

    const channel = await this.channelProvisioner.getChannel();
    this.state = 'channel-provisioned';

    try {
      const { consumerTag } = await channel.consume(
        this.options.queue,
        (msg) => this.onDelivery(channel, msg),
        { noAck: this.options.config.autoAck }
      );
      this.consumerTag = consumerTag;
    } catch (error) {
      this.state = 'stopped';
      await this.channelProvisioner.close();
      throw toTransportError(`Worker ${this.name} failed to subscribe`, error, {
        queue: this.options.queue,
      });
    }

    this.state = 'subscribed';
    this.logger.debug(`Worker ${this.name} subscribed`, {
      queue: this.options.queue,
      consumerTag: this.consumerTag,
    });
  }

  /**
   * Cancel the subscription, let in-flight deliveries settle (bounded by
   * shutdownTimeout), then close the worker's channels.
   *
   * Deliveries pushed before the broker confirms the cancel are still
   * dispatched.
   */
  async stop(): Promise<void> {
    if (this.state !== 'stopped') {
      await this.cancelSubscription();
      this.state = 'stopped';
    }
    await this.release();
  }

  /**
   * True until the worker stops or halts
   */
  isActive(): boolean {
    return this.state !== 'stopped';
  }

  private async cancelSubscription(): Promise<void> {
    const consumerTag = this.consumerTag;
    this.consumerTag = null;
    if (!consumerTag || !this.channelProvisioner.hasChannel()) {
      return;
    }

    try {
      const channel = await this.channelProvisioner.getChannel();
      await channel.cancel(consumerTag);
    } catch (error) {
      this.logger.warn(`Worker ${this.name} failed to cancel its subscription`, {
        error: errorMessage(error),
      });
    }
  }

  /**
   * Wait for in-flight deliveries, then close both channels. Runs once.
   */
  private release(): Promise<void> {
    if (!this.released) {
      this.released = this.drain().then(async () => {
        await this.channelProvisioner.close();
        await this.replyProvisioner.close();
        this.logger.debug(`Worker ${this.name} stopped`);
      });
    }
    return this.released;
  }

  private onDelivery(channel: BrokerChannel, msg: Delivery | null): void {
    if (!msg) {
      // broker-side cancel (queue deleted, node failover)
      this.logger.warn(`Worker ${this.name} subscription cancelled by broker`);
      this.halt(new TransportError(`Subscription of ${this.name} cancelled by broker`, {
        queue: this.options.queue,
      }));
      return;
    }

    if (this.state === 'stopped') {
      // arrived between cancel and close; unacked deliveries return to the queue
      this.logger.debug(`Worker ${this.name} ignoring delivery after stop`, {
        deliveryTag: msg.fields.deliveryTag,
      });
      return;
    }

    // one delivery in the pipeline at a time per worker
    this.state = 'dispatching';
    const task = this.tail
      .then(() => this.dispatch(channel, msg))
      .catch((error: unknown) => {
        this.options.report(error instanceof Error ? error : new Error(String(error)), {
          stage: 'dispatch',
          worker: this.name,
          deliveryTag: msg.fields.deliveryTag,
        });
      })
      .finally(() => {
        this.inFlight.delete(task);
        if (this.state === 'dispatching' && this.inFlight.size === 0) {
          this.state = 'subscribed';
        }
      });
    this.tail = task;
    this.inFlight.add(task);
  }

  private async dispatch(channel: BrokerChannel, msg: Delivery): Promise<void> {
    const envelope = createEnvelope(msg);

    envelope.addOnCompletion(
      new DeliveryCompletion({
        config: this.options.config,
        delivery: msg,
        channel,
        replyChannel: this.replyProvisioner,
        worker: this.name,
        logger: this.logger,
        report: this.options.report,
      })
    );

    let processingError: Error | null;
    try {
      processingError = await runPipeline(this.options.processor, envelope);
    } catch (error) {
      // a completion threw; the worker keeps consuming
      processingError = error instanceof Error ? error : new Error(String(error));
    }

    if (processingError) {
      this.options.report(processingError, {
        stage: 'dispatch',
        worker: this.name,
        deliveryTag: msg.fields.deliveryTag,
        messageId: envelope.messageId,
        envelope,
      });
    }
  }

  private handleChannelLost(error: TransportError): void {
    if (this.state === 'stopped') {
      return;
    }
    this.halt(error);
  }

  /**
   * Unrecoverable: stop consuming and report. The channels are closed once the
   * deliveries already handed to the pipeline have settled, and never reused.
   */
  private halt(error: Error): void {
    this.state = 'stopped';
    this.consumerTag = null;
    this.options.report(error, { stage: 'channel', worker: this.name });
    this.release().catch((failure: unknown) => {
      this.logger.warn(`Worker ${this.name} failed to release its channels`, {
        error: errorMessage(failure),
      });
    });
  }

  private async drain(): Promise<void> {
    if (this.inFlight.size === 0) {
      return;
    }

    const timeout = this.options.config.shutdownTimeout;
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<'timeout'>((resolve) => {
      timer = setTimeout(() => resolve('timeout'), timeout);
    });

    const outcome = await Promise.race([
      Promise.allSettled([...this.inFlight]).then(() => 'drained' as const),
      deadline,
    ]);
    clearTimeout(timer);

    if (outcome === 'timeout') {
      this.options.report(
        new TimeoutError(`Worker ${this.name} stopped with deliveries still in flight`, {
          inFlight: this.inFlight.size,
          timeout,
        }),
        { stage: 'channel', worker: this.name }
      );
    }
  }
}

/**
 * Build the pipeline envelope for a delivery
 */
export function createEnvelope(msg: Delivery): Envelope {
  const { fields, properties } = msg;
  const headers: Record<string, HeaderValue> = {};

  for (const [key, value] of Object.entries(properties.headers ?? {})) {
    if (isHeaderValue(value)) {
      headers[key] = value;
    }
  }

  headers[HEADERS.ROUTING_KEY] = fields.routingKey;
  headers[HEADERS.EXCHANGE_NAME] = fields.exchange;
  headers[HEADERS.DELIVERY_TAG] = fields.deliveryTag;
  headers[HEADERS.REPLY_TO] = properties.replyTo ?? null;
  headers[HEADERS.CORRELATION_ID] = properties.correlationId ?? null;

  return new Envelope({
    body: msg.content,
    headers,
    messageId: typeof properties.messageId === 'string' ? properties.messageId : undefined,
  });
}

function isHeaderValue(value: unknown): value is HeaderValue {
  return (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean' ||
    value instanceof Date ||
    Buffer.isBuffer(value)
  );
}
