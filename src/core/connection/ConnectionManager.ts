import * as amqp from 'amqplib';
import { EventEmitter } from 'events';
import { LIMITS } from '../constants';
import { type Logger, SilentLogger } from '../types/Logger';
import { TransportError, errorMessage } from '../types/Errors';
import type { BrokerConnection, ConnectionSource } from '../types/Amqp';

/**
 * Connection configuration options
 */
export interface ConnectionConfig {
  url: string;
  heartbeat?: number;
  logger?: Logger;
}

/**
 * Opens the underlying broker connection; amqplib's connect by default
 */
export type Connector = (url: string, heartbeat: number) => Promise<BrokerConnection>;

const amqpConnector: Connector = (url, heartbeat) => amqp.connect(url, { heartbeat });

/**
 * ConnectionManager shares one broker connection per URL.
 *
 * Producers and every consumer worker use it only to open channels. Failures
 * surface as TransportError and are not retried here; the caller decides.
 *
 * @example
 * ```typescript
 * const manager = ConnectionManager.getInstance({ url: 'amqp://localhost' });
 * const connection = await manager.getConnection();
 * const channel = await connection.createChannel();
 * ```
 */
export class ConnectionManager extends EventEmitter implements ConnectionSource {
  private static instances = new Map<string, ConnectionManager>();
  private connection: BrokerConnection | null = null;
  private connecting: Promise<BrokerConnection> | null = null;
  private config: Required<Omit<ConnectionConfig, 'logger'>>;
  private logger: Logger;
  private isClosed = false;

  constructor(
    config: ConnectionConfig,
    private readonly connector: Connector = amqpConnector
  ) {
    super();
    this.config = { heartbeat: LIMITS.DEFAULT_HEARTBEAT_S, ...config };
    this.logger = config.logger || new SilentLogger();
  }

  /**
   * Get or create the ConnectionManager for a URL
   *
   * Multiple calls with the same URL return the same instance.
   */
  static getInstance(config: ConnectionConfig): ConnectionManager {
    const existing = ConnectionManager.instances.get(config.url);
    if (existing) {
      return existing;
    }

    const manager = new ConnectionManager(config);
    ConnectionManager.instances.set(config.url, manager);
    return manager;
  }

  /**
   * Get the active connection, establishing it if necessary.
   * Concurrent callers share a single connection attempt.
   *
   * @throws {TransportError} When the broker cannot be reached
   */
  async getConnection(): Promise<BrokerConnection> {
    if (this.isClosed) {
      throw new TransportError('ConnectionManager has been closed');
    }

    if (this.connection) {
      return this.connection;
    }

    if (!this.connecting) {
      this.connecting = this.connect().finally(() => {
        this.connecting = null;
      });
    }

    return this.connecting;
  }

  private async connect(): Promise<BrokerConnection> {
    if (this.config.heartbeat === 0) {
      this.logger.warn('Heartbeat is disabled (0); dead connections will go unnoticed');
    }

    this.logger.info('Connecting to broker', {
      url: maskUrl(this.config.url),
      heartbeat: this.config.heartbeat,
    });

    let connection: BrokerConnection;
    try {
      connection = await this.connector(this.config.url, this.config.heartbeat);
    } catch (error) {
      const transportError = new TransportError('Failed to connect to broker', {
        url: maskUrl(this.config.url),
        cause: errorMessage(error),
      });
      this.logger.error('Connection failed', transportError);
      throw transportError;
    }

    this.connection = connection;
    this.setupConnectionHandlers(connection);
    this.logger.info('Connected to broker');
    this.emit('connected');
    return connection;
  }

  private setupConnectionHandlers(connection: BrokerConnection): void {
    connection.on('error', (error: Error) => {
      this.logger.error('Connection error', error);
      // an 'error' event without listeners would throw
      if (this.listenerCount('error') > 0) {
        this.emit('error', new TransportError('Connection error', { cause: error.message }));
      }
    });

    connection.on('close', () => {
      if (this.connection === connection) {
        this.connection = null;
      }
      if (!this.isClosed) {
        this.logger.warn('Connection closed');
        this.emit('disconnected');
      }
    });
  }

  /**
   * @returns true if a connection is currently open
   */
  isConnected(): boolean {
    return this.connection !== null;
  }

  /**
   * Close the connection and forget this instance. The manager cannot be reused.
   */
  async close(): Promise<void> {
    this.isClosed = true;

    const connection = this.connection;
    this.connection = null;
    if (connection) {
      try {
        await connection.close();
        this.logger.info('Connection closed gracefully');
      } catch (error) {
        this.logger.warn('Error closing connection', { error: errorMessage(error) });
      }
    }

    if (ConnectionManager.instances.get(this.config.url) === this) {
      ConnectionManager.instances.delete(this.config.url);
    }
    this.removeAllListeners();
  }
}

/**
 * Mask credentials in a broker URL for logging
 */
export function maskUrl(url: string): string {
  try {
    const parsed = new URL(url);
    if (parsed.password) {
      parsed.password = '****';
    }
    return parsed.toString();
  } catch {
    return url.replace(/\/\/[^:]+:[^@]+@/, '//****:****@');
  }
}
