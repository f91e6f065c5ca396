import * as amqp from 'amqplib';
import { EventEmitter } from 'events';
import { type Logger, SilentLogger } from '../types/Logger';
import { ConnectionError, errorMessageOf } from '../types/Errors';
import type { AmqpConnection, ConnectionProvider } from '../types/Amqp';
import { TIME } from '../constants';

/**
 * Connection configuration options
 */
export interface ConnectionConfig {
  url: string;
  heartbeat?: number;
  logger?: Logger;
}

/**
 * ConnectionManager keeps one RabbitMQ connection per URL
 *
 * The connection is opened lazily on first use and shared by every responder and
 * requester of that URL. A dropped connection is not re-established: the next
 * `getConnection()` call opens a fresh one.
 *
 * @example
 * ```typescript
 * const manager = ConnectionManager.getInstance({ url: 'amqp://localhost' });
 * const connection = await manager.getConnection();
 * // Use connection...
 * await manager.close();
 * ```
 */
export class ConnectionManager extends EventEmitter implements ConnectionProvider {
  private static instances = new Map<string, ConnectionManager>();
  private connection: AmqpConnection | null = null;
  private connecting: Promise<AmqpConnection> | null = null;
  private config: Required<Omit<ConnectionConfig, 'logger'>>;
  private logger: Logger;
  private isClosed = false;

  private constructor(config: ConnectionConfig) {
    super();
    this.config = { heartbeat: TIME.DEFAULT_HEARTBEAT_SECONDS, ...config };
    this.logger = config.logger ?? new SilentLogger();
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
   * Get the active connection, establishing it if necessary
   *
   * Concurrent callers share a single connection attempt.
   *
   * @throws {ConnectionError} When the manager is closed or the broker cannot be reached
   */
  async getConnection(): Promise<AmqpConnection> {
    if (this.isClosed) {
      throw new ConnectionError('ConnectionManager has been closed');
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

  private async connect(): Promise<AmqpConnection> {
    this.logger.info('Connecting to RabbitMQ', {
      url: this.maskUrl(this.config.url),
      heartbeat: this.config.heartbeat,
    });

    let connection: AmqpConnection;
    try {
      connection = await amqp.connect(this.config.url, { heartbeat: this.config.heartbeat });
    } catch (error) {
      const connectionError = new ConnectionError('Failed to connect to RabbitMQ', {
        error: errorMessageOf(error),
      });
      this.logger.error('Connection failed', connectionError);
      throw connectionError;
    }

    connection.on('error', (error: unknown) => {
      this.logger.warn('Connection error', { error: errorMessageOf(error) });
    });

    connection.on('close', () => {
      if (this.connection === connection) {
        this.logger.warn('Connection closed');
        this.connection = null;
        this.emit('disconnected');
      }
    });

    this.connection = connection;
    this.logger.info('Connected to RabbitMQ');
    this.emit('connected');
    return connection;
  }

  /**
   * Check if currently connected
   */
  isConnected(): boolean {
    return this.connection !== null;
  }

  /**
   * Close the connection and forget this instance
   *
   * After calling close(), the manager cannot be reused; `getInstance` hands out a new one.
   */
  async close(): Promise<void> {
    this.isClosed = true;
    ConnectionManager.instances.delete(this.config.url);

    const connection = this.connection;
    this.connection = null;

    if (connection) {
      try {
        await connection.close();
        this.logger.info('Connection closed gracefully');
      } catch (error) {
        this.logger.warn('Error closing connection', { error: errorMessageOf(error) });
      }
    }

    this.removeAllListeners();
  }

  /**
   * Mask sensitive information in URL for logging
   */
  private maskUrl(url: string): string {
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
}
