import { Client } from 'pg';
import { InvalidEnvelopeError, TransportUnavailableError } from '../core/errors';
import { silentLogger, type Logger } from '../logging/logger';
import { ChannelDispatcher } from './channel-dispatcher';
import type { Envelope } from './message';
import type { EnvelopeHandler, MessageBus, Unsubscribe } from './message-bus';
import { encodeEnvelope } from './wire-codec';

/** PostgreSQL rejects NOTIFY payloads of 8000 bytes or more. */
export const MAX_NOTIFY_PAYLOAD_BYTES = 7999;

/** Channel names are identifiers, truncated by the server past 63 bytes. */
const MAX_CHANNEL_BYTES = 63;

/** The slice of a `pg` client the bus relies on. */
export interface NotificationClient {
  connect(): Promise<void>;
  query(text: string, values?: string[]): Promise<void>;
  onNotification(listener: (channel: string, payload: string | undefined) => void): void;
  onError(listener: (error: Error) => void): void;
  onEnd(listener: () => void): void;
  end(): Promise<void>;
}

export function pgNotificationClientFactory(connectionString: string): () => NotificationClient {
  return () => {
    const client = new Client({ connectionString });
    return {
      connect: async () => {
        await client.connect();
      },
      query: async (text, values) => {
        await client.query(text, values);
      },
      onNotification: (listener) => {
        client.on('notification', (message) => listener(message.channel, message.payload));
      },
      onError: (listener) => {
        client.on('error', listener);
      },
      onEnd: (listener) => {
        client.on('end', listener);
      },
      end: () => client.end()
    };
  };
}

export interface PostgresMessageBusOptions {
  connectionString?: string;
  clientFactory?: () => NotificationClient;
  logger?: Logger;
  /** First reconnect delay; doubles per failed attempt. Default: 500. */
  reconnectDelayMs?: number;
  /** Upper bound for the reconnect delay. Default: 30000. */
  maxReconnectDelayMs?: number;
}

/**
 * Pub/sub over PostgreSQL LISTEN/NOTIFY. One dedicated connection carries both
 * directions. When that connection drops the bus reconnects with exponential
 * backoff and re-issues LISTEN for every channel that still has subscribers.
 */
export class PostgresMessageBus implements MessageBus {
  private readonly clientFactory: () => NotificationClient;
  private readonly dispatcher: ChannelDispatcher;
  private readonly logger: Logger;
  private readonly reconnectDelayMs: number;
  private readonly maxReconnectDelayMs: number;
  private client: NotificationClient | null = null;
  private connected = false;
  private closed = false;
  private reconnectAttempts = 0;
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;

  constructor(options: PostgresMessageBusOptions) {
    if (options.clientFactory) {
      this.clientFactory = options.clientFactory;
    } else if (options.connectionString) {
      this.clientFactory = pgNotificationClientFactory(options.connectionString);
    } else {
      throw new Error('PostgresMessageBus requires a connectionString or clientFactory');
    }

    const reconnectDelayMs = options.reconnectDelayMs ?? 500;
    if (!Number.isFinite(reconnectDelayMs) || reconnectDelayMs < 0) {
      throw new Error(`reconnectDelayMs must be a finite non-negative number. Got: ${options.reconnectDelayMs}`);
    }

    this.logger = options.logger ?? silentLogger;
    this.dispatcher = new ChannelDispatcher(this.logger);
    this.reconnectDelayMs = reconnectDelayMs;
    this.maxReconnectDelayMs = options.maxReconnectDelayMs ?? 30_000;
  }

  get isConnected(): boolean {
    return this.connected;
  }

  /**
   * Opens the connection and listens on every channel that already has
   * subscribers. Fails with TransportUnavailableError when the server cannot
   * be reached.
   */
  async connect(): Promise<void> {
    if (this.closed) {
      throw new TransportUnavailableError('Cannot connect: bus is closed');
    }
    if (this.connected) {
      return;
    }

    const client = this.clientFactory();
    client.onNotification((channel, payload) => {
      if (client === this.client) {
        this.dispatcher.dispatch(channel, payload ?? '');
      }
    });
    client.onError((error) => this.handleConnectionLoss(client, error));
    client.onEnd(() => this.handleConnectionLoss(client));

    try {
      await client.connect();
      for (const channel of this.dispatcher.channels()) {
        await client.query(`LISTEN ${quoteIdentifier(channel)}`);
      }
    } catch (error) {
      await client.end().catch((endError: unknown) => {
        this.logger.debug('Error while closing failed connection:', endError);
      });
      throw new TransportUnavailableError(`Failed to connect to PostgreSQL: ${describe(error)}`, { cause: error });
    }

    this.client = client;
    this.connected = true;
    this.reconnectAttempts = 0;
    this.logger.info(`Connected (${this.dispatcher.channels().length} channels listening)`);
  }

  async publish(channel: string, envelope: Envelope): Promise<void> {
    assertChannel(channel);
    const client = this.requireClient(`publish to ${channel}`);

    const frame = encodeEnvelope(envelope);
    if (Buffer.byteLength(frame, 'utf8') > MAX_NOTIFY_PAYLOAD_BYTES) {
      throw new InvalidEnvelopeError(`Envelope ${envelope.id} exceeds ${MAX_NOTIFY_PAYLOAD_BYTES} bytes`);
    }

    try {
      await client.query('SELECT pg_notify($1, $2)', [channel, frame]);
    } catch (error) {
      throw new TransportUnavailableError(`Failed to publish to ${channel}: ${describe(error)}`, { cause: error });
    }
    this.logger.debug(`Published ${envelope.kind} ${envelope.id} to ${channel}`);
  }

  async subscribe(channel: string, handler: EnvelopeHandler): Promise<Unsubscribe> {
    assertChannel(channel);
    const client = this.requireClient(`subscribe to ${channel}`);

    const handle = this.dispatcher.add(channel, handler);
    if (handle.first) {
      try {
        await client.query(`LISTEN ${quoteIdentifier(channel)}`);
      } catch (error) {
        handle.remove();
        throw new TransportUnavailableError(`Failed to subscribe to ${channel}: ${describe(error)}`, { cause: error });
      }
    }

    return async () => {
      if (!handle.remove() || !this.connected || !this.client) {
        return;
      }
      try {
        await this.client.query(`UNLISTEN ${quoteIdentifier(channel)}`);
      } catch (error) {
        this.logger.warn(`Failed to unlisten ${channel}:`, error);
      }
    };
  }

  flush(): Promise<void> {
    return this.dispatcher.flush();
  }

  async close(): Promise<void> {
    this.closed = true;
    this.connected = false;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    this.dispatcher.clear();

    const client = this.client;
    this.client = null;
    if (client) {
      await client.end();
    }
  }

  private requireClient(operation: string): NotificationClient {
    if (this.closed) {
      throw new TransportUnavailableError(`Cannot ${operation}: bus is closed`);
    }
    if (!this.connected || !this.client) {
      throw new TransportUnavailableError(`Cannot ${operation}: broker connection is down`);
    }
    return this.client;
  }

  private handleConnectionLoss(client: NotificationClient, error?: Error): void {
    if (this.closed || client !== this.client) {
      return;
    }

    this.connected = false;
    this.client = null;
    this.logger.warn(`Connection lost${error ? `: ${error.message}` : ''}`);
    client.end().catch((endError: unknown) => {
      this.logger.debug('Error while closing lost connection:', endError);
    });
    this.scheduleReconnect();
  }

  private scheduleReconnect(): void {
    if (this.closed || this.reconnectTimer) {
      return;
    }

    const delay = Math.min(this.reconnectDelayMs * 2 ** this.reconnectAttempts, this.maxReconnectDelayMs);
    this.reconnectAttempts += 1;
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.connect()
        .then(() => {
          this.logger.info('Reconnected and resubscribed');
        })
        .catch((reconnectError: unknown) => {
          this.logger.warn(`Reconnect attempt ${this.reconnectAttempts} failed:`, reconnectError);
          this.scheduleReconnect();
        });
    }, delay);
  }
}

function quoteIdentifier(channel: string): string {
  return `"${channel.replace(/"/g, '""')}"`;
}

function assertChannel(channel: string): void {
  if (!channel || Buffer.byteLength(channel, 'utf8') > MAX_CHANNEL_BYTES) {
    throw new InvalidEnvelopeError(`Channel name must be 1-${MAX_CHANNEL_BYTES} bytes: ${channel}`);
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
