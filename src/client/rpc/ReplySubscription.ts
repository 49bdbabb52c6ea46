import type { BrokerChannel, Delivery } from '../../core/types/Amqp';
import {
  BridgeError,
  TimeoutError,
  TransportError,
  errorMessage,
  toTransportError,
} from '../../core/types/Errors';
import type { Logger } from '../../core/types/Logger';

export interface ReplyWaitOptions {
  /**
   * Deadline in ms; always required
   */
  timeout: number;
  signal?: AbortSignal;
}

/**
 * Private reply queue plus consumer for a single RPC call.
 *
 * The queue is server-named, exclusive and auto-delete. Deliveries whose
 * correlation id differs from the call's are discarded and the wait goes on.
 * close() cancels the consumer and deletes the queue; it runs whether the
 * reply arrived, the deadline passed, or the call was aborted.
 */
export class ReplySubscription {
  private reply: Delivery | null = null;
  private failure: Error | null = null;
  private settle: ((outcome: { reply: Delivery } | { error: Error }) => void) | null = null;
  private consumerTag: string | null = null;
  private closed = false;

  private constructor(
    private readonly channel: BrokerChannel,
    readonly queue: string,
    readonly correlationId: string,
    private readonly logger: Logger
  ) {}

  /**
   * Declare the reply queue and start consuming it
   *
   * @throws {TransportError} When the queue or consumer cannot be set up
   */
  static async open(
    channel: BrokerChannel,
    correlationId: string,
    logger: Logger
  ): Promise<ReplySubscription> {
    let queue: string;
    try {
      ({ queue } = await channel.assertQueue('', {
        exclusive: true,
        autoDelete: true,
        durable: false,
      }));
    } catch (error) {
      throw toTransportError('Failed to declare reply queue', error, { correlationId });
    }

    const subscription = new ReplySubscription(channel, queue, correlationId, logger);
    try {
      const { consumerTag } = await channel.consume(queue, (msg) => subscription.handle(msg), {
        noAck: true,
      });
      subscription.consumerTag = consumerTag;
    } catch (error) {
      await subscription.close();
      throw toTransportError('Failed to consume reply queue', error, { correlationId, queue });
    }

    logger.debug('Reply subscription opened', { queue, correlationId });
    return subscription;
  }

  private handle(msg: Delivery | null): void {
    if (!msg) {
      this.fail(new TransportError('Reply consumer was cancelled by the broker', {
        queue: this.queue,
        correlationId: this.correlationId,
      }));
      return;
    }

    if (msg.properties.correlationId !== this.correlationId) {
      this.logger.debug('Discarding reply with unexpected correlation id', {
        queue: this.queue,
        expected: this.correlationId,
        received: msg.properties.correlationId,
      });
      return;
    }

    if (this.reply) {
      return;
    }
    this.reply = msg;
    this.settle?.({ reply: msg });
  }

  private fail(error: Error): void {
    if (this.reply || this.failure) {
      return;
    }
    this.failure = error;
    this.settle?.({ error });
  }

  /**
   * Wait for the reply carrying this call's correlation id
   *
   * @throws {TimeoutError} When the deadline passes first
   * @throws {BridgeError} With code RPC_ABORTED when the signal fires first
   */
  wait(options: ReplyWaitOptions): Promise<Delivery> {
    if (this.reply) {
      return Promise.resolve(this.reply);
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }

    const { timeout, signal } = options;
    const details = { correlationId: this.correlationId, queue: this.queue, timeout };

    return new Promise<Delivery>((resolve, reject) => {
      if (signal?.aborted) {
        reject(new BridgeError('RPC request aborted', 'RPC_ABORTED', details));
        return;
      }

      const cleanup = (): void => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        this.settle = null;
      };

      const onAbort = (): void => {
        cleanup();
        reject(new BridgeError('RPC request aborted', 'RPC_ABORTED', details));
      };

      const timer = setTimeout(() => {
        cleanup();
        reject(new TimeoutError(`RPC reply not received within ${timeout}ms`, details));
      }, timeout);

      signal?.addEventListener('abort', onAbort, { once: true });

      this.settle = (outcome) => {
        cleanup();
        if ('reply' in outcome) {
          resolve(outcome.reply);
        } else {
          reject(outcome.error);
        }
      };
    });
  }

  /**
   * Cancel the consumer and delete the reply queue. Safe to call more than once.
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;

    try {
      if (this.consumerTag) {
        await this.channel.cancel(this.consumerTag);
      }
      await this.channel.deleteQueue(this.queue);
      this.logger.debug('Reply subscription closed', { queue: this.queue });
    } catch (error) {
      // the broker drops the exclusive queue with the connection anyway
      this.logger.warn('Error tearing down reply subscription', {
        queue: this.queue,
        error: errorMessage(error),
      });
    }
  }
}
