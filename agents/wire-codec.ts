import { z } from 'zod';
import { InvalidEnvelopeError } from '../core/errors';
import { freezeEnvelope, type Envelope } from './message';
import { toPayload } from './payload';

const wireEnvelopeSchema = z.object({
  id: z.string().min(1),
  from: z.string().min(1),
  to: z.string().min(1),
  kind: z.string().min(1),
  payload: z.unknown(),
  correlation_id: z.string().min(1).nullable().optional(),
  created_at: z.string().datetime({ offset: true })
});

export type WireEnvelope = z.input<typeof wireEnvelopeSchema>;

export function encodeEnvelope(envelope: Envelope): string {
  const wire: WireEnvelope = {
    id: envelope.id,
    from: envelope.from,
    to: envelope.to,
    kind: envelope.kind,
    payload: envelope.payload,
    correlation_id: envelope.correlationId ?? null,
    created_at: new Date(envelope.createdAt).toISOString()
  };
  return JSON.stringify(wire);
}

/**
 * Parses a wire frame. Unknown kinds are kept verbatim so newer peers can
 * talk to older ones.
 */
export function decodeEnvelope(frame: string): Envelope {
  let raw: unknown;
  try {
    raw = JSON.parse(frame);
  } catch (error) {
    throw new InvalidEnvelopeError(
      `Envelope is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const parsed = wireEnvelopeSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidEnvelopeError(
      `Invalid envelope: ${parsed.error.issues.map((issue) => `${issue.path.join('.')} ${issue.message}`).join('; ')}`
    );
  }

  const wire = parsed.data;
  const base = {
    id: wire.id,
    from: wire.from,
    to: wire.to,
    kind: wire.kind,
    payload: toPayload(wire.payload),
    createdAt: Date.parse(wire.created_at)
  };

  return freezeEnvelope(
    wire.correlation_id ? { ...base, correlationId: wire.correlation_id } : base
  );
}
