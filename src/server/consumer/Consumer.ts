import {
  type EndpointConfig,
  type ResolvedEndpointConfig,
  describeEndpoint,
  resolveEndpointConfig,
} from '../../core/config/EndpointConfig';
import { ChannelProvisioner } from '../../core/connection/ChannelProvisioner';
import { ConnectionManager } from '../../core/connection/ConnectionManager';
import { compose } from '../../core/middleware/compose';
import type { Middleware, Processor } from '../../core/middleware/types';
import { declareTopology } from '../../core/topology/TopologyConfigurator';
import type { ConnectionSource } from '../../core/types/Amqp';
import { ValidationError } from '../../core/types/Errors';
import type { Logger } from '../../core/types/Logger';
import { ConsumerWorker } from './ConsumerWorker';
import type { DeliveryErrorContext, DeliveryErrorReporter } from './DeliveryCompletion';
import { WorkerPool } from './WorkerPool';

export interface ConsumerOptions {
  /**
   * Source of the shared connection; defaults to the ConnectionManager for the
   * configured URL
   */
  connectionSource?: ConnectionSource;
  /**
   * Receives every delivery-level failure: pipeline errors, ack/reject and
   * reply failures, and worker shutdowns caused by the broker
   */
  errorHandler?: DeliveryErrorReporter;
}

/**
 * Consumer feeds broker deliveries into an application pipeline.
 *
 * start() declares the topology, then launches `concurrentConsumers` workers,
 * each with its own channel and subscription on the same queue. Every delivery
 * becomes an Envelope; once the pipeline settles, the delivery is replied to
 * (when it carries reply-to) and acknowledged or rejected on the channel it
 * arrived on.
 *
 * @example
 * ```typescript
 * const consumer = new Consumer(
 *   { connection: { url: 'amqp://localhost' }, queue: 'invoices', concurrentConsumers: 4, autoAck: false },
 *   async (envelope) => {
 *     await invoices.record(envelope.getBodyAsString());
 *   },
 *   { errorHandler: (error, context) => metrics.failure(context.stage) }
 * );
 *
 * await consumer.start();
 * // Later...
 * await consumer.stop();
 * ```
 */
export class Consumer {
  private readonly config: ResolvedEndpointConfig;
  private readonly logger: Logger;
  private readonly source: ConnectionSource;
  private readonly setupProvisioner: ChannelProvisioner;
  private readonly errorHandler?: DeliveryErrorReporter;
  private readonly middlewares: Middleware[] = [];
  private pool: WorkerPool<ConsumerWorker> | null = null;
  private queue: string | null = null;
  private starting: Promise<void> | null = null;

  /**
   * @throws {ValidationError} When the configuration is invalid or names neither an exchange nor a queue
   */
  constructor(
    config: EndpointConfig,
    private readonly processor: Processor,
    options: ConsumerOptions = {}
  ) {
    this.config = resolveEndpointConfig(config);
    this.logger = this.config.logger;

    if (!this.config.exchange && !this.config.queue) {
      throw new ValidationError('Consumer requires an exchange or a queue');
    }

    if (typeof processor !== 'function') {
      throw new ValidationError('Processor must be a function');
    }

    this.errorHandler = options.errorHandler;
    this.source =
      options.connectionSource ??
      ConnectionManager.getInstance({ ...this.config.connection, logger: this.logger });

    this.setupProvisioner = new ChannelProvisioner(this.source, {
      label: 'consumer-setup',
      logger: this.logger,
    });
  }

  /**
   * Add pipeline middleware, run in order before the processor.
   * Takes effect for workers started afterwards.
   */
  use(...middlewares: Middleware[]): this {
    for (const middleware of middlewares) {
      if (typeof middleware !== 'function') {
        throw new ValidationError('Middleware must be a function');
      }
      this.middlewares.push(middleware);
    }
    return this;
  }

  /**
   * Declare topology and start all workers. A consumer whose workers have all
   * halted is rebuilt with fresh channels.
   *
   * @throws {TopologyConflictError} When declaration conflicts with broker state
   * @throws {TransportError} When channels or subscriptions cannot be set up
   */
  async start(): Promise<void> {
    if (this.pool?.isRunning()) {
      this.logger.warn('Consumer is already running');
      return;
    }

    if (!this.starting) {
      this.starting = this.launch().finally(() => {
        this.starting = null;
      });
    }
    return this.starting;
  }

  private async launch(): Promise<void> {
    // every worker of the previous pool halted; release it before rebuilding
    const halted = this.pool;
    if (halted) {
      this.pool = null;
      await halted.stop();
      this.logger.info('Restarting consumer after all workers halted', { workers: halted.size });
    }

    this.logger.debug('Consumer endpoint', describeEndpoint(this.config));

    const channel = await this.setupProvisioner.getChannel();
    const { queue } = await declareTopology(this.config, channel);
    this.queue = queue;

    const pipeline = compose([...this.middlewares], this.processor);
    const pool = new WorkerPool(
      this.config.concurrentConsumers,
      (index) =>
        new ConsumerWorker({
          name: `worker-${index + 1}`,
          queue,
          config: this.config,
          source: this.source,
          processor: pipeline,
          logger: this.logger,
          report: this.report,
        }),
      this.logger
    );

    try {
      await pool.start();
    } catch (error) {
      await this.setupProvisioner.close();
      throw error;
    }

    this.pool = pool;
    this.logger.info(`Consumer started on queue ${queue}`, {
      workers: pool.size,
      prefetch: this.config.prefetch,
      autoAck: this.config.autoAck,
    });
  }

  /**
   * Stop every worker, waiting for in-flight deliveries, then release channels.
   * A stopped consumer can be started again.
   */
  async stop(): Promise<void> {
    if (this.starting) {
      await this.starting.catch(() => undefined);
    }

    const pool = this.pool;
    this.pool = null;
    if (pool) {
      await pool.stop();
    }
    await this.setupProvisioner.close();

    if (pool) {
      this.logger.info('Consumer stopped');
    }
  }

  /**
   * @returns true while at least one worker is consuming
   */
  isRunning(): boolean {
    return this.pool?.isRunning() ?? false;
  }

  /**
   * Queue the workers consume from; server-named in exchange mode
   */
  getQueueName(): string | null {
    return this.queue;
  }

  getWorkers(): readonly ConsumerWorker[] {
    return this.pool?.getWorkers() ?? [];
  }

  private readonly report = (error: Error, context: DeliveryErrorContext): void => {
    this.logger.error(`Delivery error (${context.stage})`, error, {
      worker: context.worker,
      deliveryTag: context.deliveryTag,
      messageId: context.messageId,
    });

    if (!this.errorHandler) {
      return;
    }
    try {
      this.errorHandler(error, context);
    } catch (handlerError) {
      this.logger.error(
        'Consumer errorHandler threw',
        handlerError instanceof Error ? handlerError : undefined
      );
    }
  };
}
