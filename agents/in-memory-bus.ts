import { InvalidEnvelopeError, TransportUnavailableError } from '../core/errors';
import { silentLogger, type Logger } from '../logging/logger';
import { ChannelDispatcher } from './channel-dispatcher';
import type { Envelope } from './message';
import type { EnvelopeHandler, MessageBus, Unsubscribe } from './message-bus';
import { encodeEnvelope } from './wire-codec';

/**
 * Process-local broker. Envelopes go through the wire codec so subscribers see
 * the same shape a networked broker would hand them. `disconnect()` and
 * `reconnect()` simulate a dropped broker connection; subscriptions survive a
 * reconnect.
 */
export class InMemoryMessageBus implements MessageBus {
  private readonly dispatcher: ChannelDispatcher;
  private readonly logger: Logger;
  private connected = true;
  private closed = false;

  constructor(options: { logger?: Logger } = {}) {
    this.logger = options.logger ?? silentLogger;
    this.dispatcher = new ChannelDispatcher(this.logger);
  }

  get isConnected(): boolean {
    return this.connected && !this.closed;
  }

  async publish(channel: string, envelope: Envelope): Promise<void> {
    this.assertConnected(`publish to ${channel}`);
    if (!channel) {
      throw new InvalidEnvelopeError('Channel name is required');
    }

    const delivered = this.dispatcher.dispatch(channel, encodeEnvelope(envelope));
    this.logger.debug(`Published ${envelope.kind} ${envelope.id} to ${channel} (${delivered} subscribers)`);
  }

  async subscribe(channel: string, handler: EnvelopeHandler): Promise<Unsubscribe> {
    this.assertConnected(`subscribe to ${channel}`);
    const handle = this.dispatcher.add(channel, handler);
    return async () => {
      handle.remove();
    };
  }

  disconnect(): void {
    this.connected = false;
  }

  reconnect(): void {
    this.connected = true;
  }

  /** Waits until every queued delivery has been handled. */
  flush(): Promise<void> {
    return this.dispatcher.flush();
  }

  async close(): Promise<void> {
    this.closed = true;
    this.dispatcher.clear();
  }

  private assertConnected(operation: string): void {
    if (this.closed) {
      throw new TransportUnavailableError(`Cannot ${operation}: bus is closed`);
    }
    if (!this.connected) {
      throw new TransportUnavailableError(`Cannot ${operation}: broker connection is down`);
    }
  }
}
