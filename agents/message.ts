import { randomUUID } from 'crypto';
import { InvalidEnvelopeError } from '../core/errors';
import { toPayload, type Payload } from './payload';

export const MESSAGE_KINDS = ['request', 'response', 'broadcast', 'notification'] as const;

export type MessageKind = (typeof MESSAGE_KINDS)[number];

/**
 * Immutable message exchanged between agents. `kind` is a string because
 * envelopes decoded from the wire may carry kinds this process does not know;
 * routing only acts on the known ones (see `isMessageKind`).
 */
export interface Envelope {
  readonly id: string;
  readonly from: string;
  readonly to: string;
  readonly kind: string;
  readonly payload: Readonly<Payload>;
  readonly correlationId?: string;
  readonly createdAt: number;
}

export interface CreateEnvelopeOptions {
  from: string;
  to: string;
  kind: MessageKind;
  payload?: Payload;
  correlationId?: string;
}

export function isMessageKind(kind: string): kind is MessageKind {
  return (MESSAGE_KINDS as readonly string[]).includes(kind);
}

export function createEnvelope(options: CreateEnvelopeOptions): Envelope {
  if (!options.from || !options.to) {
    throw new InvalidEnvelopeError('Envelope sender and recipient are required');
  }
  if (!isMessageKind(options.kind)) {
    throw new InvalidEnvelopeError(`Unknown message kind: ${String(options.kind)}`);
  }
  if (options.correlationId !== undefined && !options.correlationId) {
    throw new InvalidEnvelopeError('Correlation id must not be empty');
  }

  return freezeEnvelope({
    id: randomUUID(),
    from: options.from,
    to: options.to,
    kind: options.kind,
    payload: toPayload(options.payload),
    correlationId: options.correlationId,
    createdAt: Date.now()
  });
}

/** Builds the response to `request`, sent back by its recipient. */
export function createResponse(request: Envelope, payload: Payload = {}): Envelope {
  return createEnvelope({
    from: request.to,
    to: request.from,
    kind: 'response',
    payload,
    correlationId: request.id
  });
}

export function freezeEnvelope(envelope: Envelope): Envelope {
  const frozen: Envelope = envelope.correlationId === undefined
    ? {
      id: envelope.id,
      from: envelope.from,
      to: envelope.to,
      kind: envelope.kind,
      payload: envelope.payload,
      createdAt: envelope.createdAt
    }
    : { ...envelope };
  return Object.freeze(frozen);
}
