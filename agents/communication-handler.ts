import { assertTimeout, startDeadline } from '../core/deadline';
import {
  AbortedError,
  InvalidEnvelopeError,
  PeerGoneError,
  RequestTimeoutError,
  TransportUnavailableError
} from '../core/errors';
import { silentLogger, type Logger } from '../logging/logger';
import { BROADCAST_ADDRESS, BROADCAST_CHANNEL, inboxChannel } from './channels';
import { createEnvelope, createResponse, type Envelope } from './message';
import type { MessageBus, Unsubscribe } from './message-bus';
import type { Payload } from './payload';

/** Inbound side of an agent: invoked for every envelope addressed to it. */
export interface MessageHandler {
  handle(envelope: Envelope): void | Promise<void>;
}

export interface RetryPolicy {
  attempts?: number;
  baseDelayMs?: number;
}

export interface CommunicationHandlerOptions {
  bus: MessageBus;
  logger?: Logger;
  /** Retry policy for inbox subscriptions that fail with TransportUnavailable. */
  registerRetry?: RetryPolicy;
  /** History is trimmed to half this size once it grows past it. Default: 1000. */
  historyLimit?: number;
}

export interface SendAndWaitOptions {
  signal?: AbortSignal;
}

export interface CommunicationStatus {
  registeredAgents: string[];
  pendingRequests: number;
  historySize: number;
}

export const AGENT_DEREGISTERED_EVENT = 'agent_deregistered';

type Outcome = { ok: true; envelope: Envelope } | { ok: false; error: unknown };

interface PendingRequest {
  readonly from: string;
  readonly to: string;
  settle(outcome: Outcome): void;
}

interface Registration {
  handler: MessageHandler;
  readonly unsubscribe: Unsubscribe;
}

/**
 * Agent-addressed messaging on top of a MessageBus: inbox registration,
 * broadcast fan-out and request/response correlation.
 */
export class CommunicationHandler {
  private readonly bus: MessageBus;
  private readonly logger: Logger;
  private readonly retryAttempts: number;
  private readonly retryBaseDelayMs: number;
  private readonly historyLimit: number;
  private readonly registrations = new Map<string, Registration>();
  private readonly pending = new Map<string, PendingRequest>();
  private broadcastSubscription: Promise<Unsubscribe> | null = null;
  private history: Envelope[] = [];

  constructor(options: CommunicationHandlerOptions) {
    this.bus = options.bus;
    this.logger = options.logger ?? silentLogger;
    this.retryAttempts = Math.max(1, Math.floor(options.registerRetry?.attempts ?? 3));
    this.retryBaseDelayMs = Math.max(0, options.registerRetry?.baseDelayMs ?? 100);
    this.historyLimit = Math.max(2, options.historyLimit ?? 1000);
  }

  /**
   * Subscribes the agent's inbox. Registering an id that is already
   * registered swaps the handler in place and keeps the subscription.
   */
  async register(agentId: string, handler: MessageHandler): Promise<void> {
    if (!agentId) {
      throw new Error('Agent id is required');
    }

    const existing = this.registrations.get(agentId);
    if (existing) {
      existing.handler = handler;
      this.logger.info(`Replaced handler for ${agentId}`);
      return;
    }

    await this.ensureBroadcastSubscription();
    const unsubscribe = await this.withRetry(`subscribe inbox of ${agentId}`, () =>
      this.bus.subscribe(inboxChannel(agentId), (envelope) => this.deliverInbound(agentId, envelope))
    );

    const raced = this.registrations.get(agentId);
    if (raced) {
      raced.handler = handler;
      await unsubscribe();
      return;
    }

    this.registrations.set(agentId, { handler, unsubscribe });
    this.logger.info(`Registered agent ${agentId}`);
  }

  /**
   * Releases the agent's inbox and fails every outstanding request sent to or
   * by it with PeerGone. Peers in other processes learn about it through a
   * notification on the broadcast channel.
   */
  async deregister(agentId: string): Promise<void> {
    const registration = this.registrations.get(agentId);
    this.registrations.delete(agentId);
    this.failPendingFor(agentId);

    if (!registration) {
      return;
    }

    try {
      await registration.unsubscribe();
    } catch (error) {
      this.logger.warn(`Failed to release inbox of ${agentId}:`, error);
    }

    try {
      await this.bus.publish(
        BROADCAST_CHANNEL,
        createEnvelope({
          from: agentId,
          to: BROADCAST_ADDRESS,
          kind: 'notification',
          payload: { event: AGENT_DEREGISTERED_EVENT, agent_id: agentId }
        })
      );
    } catch (error) {
      this.logger.warn(`Could not announce deregistration of ${agentId}:`, error);
    }

    this.logger.info(`Deregistered agent ${agentId}`);
  }

  isRegistered(agentId: string): boolean {
    return this.registrations.has(agentId);
  }

  /** Publishes to the recipient's inbox without waiting for any reply. */
  async send(to: string, envelope: Envelope): Promise<void> {
    if (envelope.to !== to) {
      throw new InvalidEnvelopeError(`Envelope ${envelope.id} is addressed to ${envelope.to}, not ${to}`);
    }

    const channel = to === BROADCAST_ADDRESS ? BROADCAST_CHANNEL : inboxChannel(to);
    await this.bus.publish(channel, envelope);
    this.record(envelope);
    this.logger.debug(`Sent ${envelope.kind} ${envelope.id} from ${envelope.from} to ${to}`);
  }

  /**
   * Sends a request and resolves with the response whose correlation id
   * matches it. The waiting slot exists before the request is published, so
   * a reply cannot outrun it.
   */
  sendAndWait(
    to: string,
    envelope: Envelope,
    timeoutMs: number,
    options: SendAndWaitOptions = {}
  ): Promise<Envelope> {
    try {
      assertTimeout(timeoutMs);
      if (envelope.kind !== 'request') {
        throw new InvalidEnvelopeError(`Only requests can be awaited, got ${envelope.kind}`);
      }
      if (this.pending.has(envelope.id)) {
        throw new InvalidEnvelopeError(`Request ${envelope.id} is already awaiting a response`);
      }
      if (options.signal?.aborted) {
        throw new AbortedError(`Request ${envelope.id} was aborted before it was sent`);
      }
    } catch (error) {
      return Promise.reject(error);
    }

    const requestId = envelope.id;
    const signal = options.signal;

    return new Promise<Envelope>((resolve, reject) => {
      let cancelDeadline: () => void = () => {};
      const onAbort = (): void => {
        slot.settle({ ok: false, error: new AbortedError(`Request ${requestId} was aborted`) });
      };

      const slot: PendingRequest = {
        from: envelope.from,
        to,
        settle: (outcome) => {
          if (this.pending.get(requestId) !== slot) {
            return;
          }
          this.pending.delete(requestId);
          cancelDeadline();
          signal?.removeEventListener('abort', onAbort);
          if (outcome.ok) {
            resolve(outcome.envelope);
          } else {
            reject(outcome.error);
          }
        }
      };

      this.pending.set(requestId, slot);
      cancelDeadline = startDeadline(timeoutMs, () => {
        slot.settle({ ok: false, error: new RequestTimeoutError(to, timeoutMs) });
      });
      signal?.addEventListener('abort', onAbort, { once: true });

      this.send(to, envelope).catch((error: unknown) => {
        slot.settle({ ok: false, error });
      });
    });
  }

  /** Answers `request` with a response correlated to it. */
  async respond(request: Envelope, payload: Payload = {}): Promise<Envelope> {
    const response = createResponse(request, payload);
    await this.send(response.to, response);
    return response;
  }

  async broadcast(envelope: Envelope): Promise<void> {
    if (envelope.to !== BROADCAST_ADDRESS) {
      throw new InvalidEnvelopeError(`Broadcasts must be addressed to ${BROADCAST_ADDRESS}`);
    }
    await this.send(BROADCAST_ADDRESS, envelope);
  }

  getMessageHistory(agentId?: string, limit = 100): Envelope[] {
    const messages = agentId
      ? this.history.filter((envelope) => envelope.from === agentId || envelope.to === agentId)
      : this.history;
    return messages.slice(-limit);
  }

  getStatus(): CommunicationStatus {
    return {
      registeredAgents: [...this.registrations.keys()],
      pendingRequests: this.pending.size,
      historySize: this.history.length
    };
  }

  /**
   * Fails every outstanding request, deregisters all agents and releases the
   * broadcast subscription. The bus itself belongs to the caller.
   */
  async shutdown(): Promise<void> {
    for (const slot of this.pending.values()) {
      slot.settle({ ok: false, error: new PeerGoneError(slot.to) });
    }

    for (const agentId of [...this.registrations.keys()]) {
      await this.deregister(agentId);
    }

    const subscription = this.broadcastSubscription;
    this.broadcastSubscription = null;
    if (subscription) {
      try {
        const unsubscribe = await subscription;
        await unsubscribe();
      } catch (error) {
        this.logger.warn('Failed to release broadcast subscription:', error);
      }
    }
  }

  private async deliverInbound(agentId: string, envelope: Envelope): Promise<void> {
    this.record(envelope);

    if (envelope.kind === 'response' && envelope.correlationId) {
      const slot = this.pending.get(envelope.correlationId);
      if (slot && slot.from === agentId) {
        slot.settle({ ok: true, envelope });
        return;
      }
    }

    await this.invokeHandler(agentId, envelope);
  }

  private async deliverBroadcast(envelope: Envelope): Promise<void> {
    this.record(envelope);

    const gone = envelope.payload.agent_id;
    if (
      envelope.kind === 'notification' &&
      envelope.payload.event === AGENT_DEREGISTERED_EVENT &&
      typeof gone === 'string'
    ) {
      this.failPendingFor(gone);
    }

    const recipients = [...this.registrations.keys()].filter((agentId) => agentId !== envelope.from);
    await Promise.all(recipients.map((agentId) => this.invokeHandler(agentId, envelope)));
  }

  private async invokeHandler(agentId: string, envelope: Envelope): Promise<void> {
    const registration = this.registrations.get(agentId);
    if (!registration) {
      this.logger.warn(`No handler registered for ${agentId}; ${envelope.kind} ${envelope.id} not delivered`);
      return;
    }

    try {
      await registration.handler.handle(envelope);
    } catch (error) {
      this.logger.error(`Handler for ${agentId} failed on ${envelope.kind} ${envelope.id}:`, error);
    }
  }

  private failPendingFor(agentId: string): void {
    for (const slot of this.pending.values()) {
      if (slot.to === agentId || slot.from === agentId) {
        slot.settle({ ok: false, error: new PeerGoneError(agentId) });
      }
    }
  }

  private ensureBroadcastSubscription(): Promise<Unsubscribe> {
    if (!this.broadcastSubscription) {
      const subscription = this.withRetry('subscribe broadcast channel', () =>
        this.bus.subscribe(BROADCAST_CHANNEL, (envelope) => this.deliverBroadcast(envelope))
      );
      this.broadcastSubscription = subscription;
      subscription.catch((error: unknown) => {
        if (this.broadcastSubscription === subscription) {
          this.broadcastSubscription = null;
        }
        this.logger.warn('Broadcast subscription failed:', error);
      });
    }
    return this.broadcastSubscription;
  }

  private async withRetry<T>(operation: string, attempt: () => Promise<T>): Promise<T> {
    for (let tries = 1; ; tries += 1) {
      try {
        return await attempt();
      } catch (error) {
        if (!(error instanceof TransportUnavailableError) || tries >= this.retryAttempts) {
          throw error;
        }
        const delay = this.retryBaseDelayMs * 2 ** (tries - 1);
        this.logger.warn(`Failed to ${operation} (attempt ${tries}/${this.retryAttempts}), retrying in ${delay}ms`);
        await new Promise<void>((resolve) => setTimeout(resolve, delay));
      }
    }
  }

  private record(envelope: Envelope): void {
    this.history.push(envelope);
    if (this.history.length > this.historyLimit) {
      this.history = this.history.slice(-Math.floor(this.historyLimit / 2));
    }
  }
}
