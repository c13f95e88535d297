import type { Logger } from '../logging/logger';
import type { Envelope } from './message';
import type { EnvelopeHandler } from './message-bus';
import { decodeEnvelope } from './wire-codec';

interface Subscriber {
  readonly handler: EnvelopeHandler;
  active: boolean;
  tail: Promise<void>;
}

export interface SubscriberHandle {
  /** True when this subscriber is the first one on its channel. */
  readonly first: boolean;
  /** Detaches the subscriber; returns true when the channel has no subscribers left. */
  remove(): boolean;
}

/**
 * Fan-out shared by the bus implementations. Each subscriber owns a FIFO
 * queue drained asynchronously, so a slow or failing handler only delays its
 * own deliveries.
 */
export class ChannelDispatcher {
  private readonly subscribers = new Map<string, Set<Subscriber>>();

  constructor(private readonly logger: Logger) {}

  add(channel: string, handler: EnvelopeHandler): SubscriberHandle {
    let set = this.subscribers.get(channel);
    const first = !set || set.size === 0;
    if (!set) {
      set = new Set();
      this.subscribers.set(channel, set);
    }

    const subscriber: Subscriber = { handler, active: true, tail: Promise.resolve() };
    set.add(subscriber);
    const owner = set;

    return {
      first,
      remove: () => {
        if (!subscriber.active) {
          return false;
        }
        subscriber.active = false;
        owner.delete(subscriber);
        if (owner.size === 0 && this.subscribers.get(channel) === owner) {
          this.subscribers.delete(channel);
          return true;
        }
        return false;
      }
    };
  }

  channels(): string[] {
    return [...this.subscribers.keys()];
  }

  hasSubscribers(channel: string): boolean {
    return (this.subscribers.get(channel)?.size ?? 0) > 0;
  }

  /** Queues a wire frame for every current subscriber of `channel`. */
  dispatch(channel: string, frame: string): number {
    const set = this.subscribers.get(channel);
    if (!set || set.size === 0) {
      return 0;
    }

    let envelope: Envelope;
    try {
      envelope = decodeEnvelope(frame);
    } catch (error) {
      this.logger.error(`Dropping undecodable frame on ${channel}:`, error);
      return 0;
    }

    for (const subscriber of set) {
      subscriber.tail = subscriber.tail.then(() => this.invoke(channel, subscriber, envelope));
    }
    return set.size;
  }

  /** Resolves once every queued delivery, including ones queued meanwhile, has been handled. */
  async flush(): Promise<void> {
    for (;;) {
      const tails = this.tails();
      await Promise.all(tails);
      const after = this.tails();
      if (after.length === tails.length && after.every((tail, index) => tail === tails[index])) {
        return;
      }
    }
  }

  clear(): void {
    for (const set of this.subscribers.values()) {
      for (const subscriber of set) {
        subscriber.active = false;
      }
    }
    this.subscribers.clear();
  }

  private tails(): Promise<void>[] {
    return [...this.subscribers.values()].flatMap((set) => [...set].map((subscriber) => subscriber.tail));
  }

  private async invoke(channel: string, subscriber: Subscriber, envelope: Envelope): Promise<void> {
    if (!subscriber.active) {
      return;
    }
    try {
      await subscriber.handler(envelope);
    } catch (error) {
      this.logger.error(`Handler error for envelope ${envelope.id} on ${channel}:`, error);
    }
  }
}
