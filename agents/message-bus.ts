import type { Envelope } from './message';

export type EnvelopeHandler = (envelope: Envelope) => void | Promise<void>;

/** Releases a subscription. Calling it more than once is a no-op. */
export type Unsubscribe = () => Promise<void>;

/**
 * Channel-based pub/sub transport. Implementations fail `publish` and
 * `subscribe` with `TransportUnavailableError` while the broker connection is
 * down and never retry on their own.
 */
export interface MessageBus {
  publish(channel: string, envelope: Envelope): Promise<void>;
  subscribe(channel: string, handler: EnvelopeHandler): Promise<Unsubscribe>;
  close(): Promise<void>;
}
