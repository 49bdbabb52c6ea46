import type { BrokerChannel, ConnectionSource } from '../types/Amqp';
import { type Logger, SilentLogger } from '../types/Logger';
import { BridgeError, TransportError, errorMessage, toTransportError } from '../types/Errors';

export interface ChannelProvisionerOptions {
  /**
   * Applied with basic.qos when greater than 0
   */
  prefetch?: number;
  /**
   * Owner name used in log lines, e.g. "producer" or "worker-2"
   */
  label?: string;
  logger?: Logger;
  /**
   * Runs once against a freshly opened channel, before anyone else sees it
   */
  setup?: (channel: BrokerChannel) => Promise<void>;
  /**
   * Called when the broker closes or fails the channel
   */
  onLost?: (error: TransportError) => void;
}

/**
 * Lazily opens exactly one channel for a single owner and hands back the same
 * handle until it is closed.
 *
 * Channels are never pooled: the producer, every consumer worker, and every
 * worker's reply path each hold their own provisioner. Once the broker closes
 * the channel the cached handle is dropped, so no caller receives a stale one.
 */
export class ChannelProvisioner {
  private channel: BrokerChannel | null = null;
  private opening: Promise<BrokerChannel> | null = null;
  private closing = false;
  private readonly label: string;
  private readonly logger: Logger;

  constructor(
    private readonly source: ConnectionSource,
    private readonly options: ChannelProvisionerOptions = {}
  ) {
    this.label = options.label ?? 'channel';
    this.logger = options.logger ?? new SilentLogger();
  }

  /**
   * @returns the cached channel, opening it on first use
   * @throws {TransportError} When the connection or channel cannot be opened
   */
  async getChannel(): Promise<BrokerChannel> {
    if (this.channel) {
      return this.channel;
    }

    if (!this.opening) {
      this.closing = false;
      this.opening = this.open().finally(() => {
        this.opening = null;
      });
    }

    return this.opening;
  }

  /**
   * @returns true while a usable channel is cached
   */
  hasChannel(): boolean {
    return this.channel !== null;
  }

  private async open(): Promise<BrokerChannel> {
    let channel: BrokerChannel;
    try {
      const connection = await this.source.getConnection();
      channel = await connection.createChannel();
    } catch (error) {
      throw toTransportError(`Failed to open ${this.label} channel`, error, { label: this.label });
    }

    this.attachLifecycle(channel);

    try {
      const prefetch = this.options.prefetch ?? 0;
      if (prefetch > 0) {
        await channel.prefetch(prefetch);
      }
      if (this.options.setup) {
        await this.options.setup(channel);
      }
    } catch (error) {
      await this.discard(channel);
      throw error instanceof BridgeError
        ? error
        : toTransportError(`Failed to set up ${this.label} channel`, error);
    }

    this.channel = channel;
    this.logger.debug(`Opened ${this.label} channel`, { prefetch: this.options.prefetch ?? 0 });
    return channel;
  }

  private attachLifecycle(channel: BrokerChannel): void {
    channel.on('error', (error: Error) => {
      this.logger.error(`${this.label} channel error`, error);
    });

    channel.once('close', () => {
      const wasCurrent = this.channel === channel;
      if (wasCurrent) {
        this.channel = null;
      }
      if (wasCurrent && !this.closing) {
        const lost = new TransportError(`${this.label} channel closed by broker`, {
          label: this.label,
        });
        this.logger.warn(lost.message);
        this.options.onLost?.(lost);
      }
    });
  }

  private async discard(channel: BrokerChannel): Promise<void> {
    try {
      await channel.close();
    } catch (error) {
      // already closed by the broker after the failed operation
      this.logger.debug(`Discarded ${this.label} channel`, { error: errorMessage(error) });
    }
  }

  /**
   * Close the channel if one is open. A later getChannel() opens a new one.
   */
  async close(): Promise<void> {
    this.closing = true;
    const pending = this.opening;
    if (pending) {
      // the caller of getChannel() receives any open failure
      await pending.catch(() => undefined);
    }

    const channel = this.channel;
    this.channel = null;
    if (!channel) {
      return;
    }

    try {
      await channel.close();
      this.logger.debug(`Closed ${this.label} channel`);
    } catch (error) {
      this.logger.warn(`Error closing ${this.label} channel`, { error: errorMessage(error) });
    }
  }
}
