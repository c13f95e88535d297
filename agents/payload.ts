import { z } from 'zod';
import { InvalidEnvelopeError } from '../core/errors';

export type PayloadValue =
  | string
  | number
  | boolean
  | null
  | PayloadValue[]
  | { [key: string]: PayloadValue };

export type Payload = { [key: string]: PayloadValue };

const UNSAFE_KEYS = new Set(['__proto__', 'prototype', 'constructor']);

const MAX_DEPTH = 50;

export const payloadValueSchema: z.ZodType<PayloadValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number().finite(),
    z.boolean(),
    z.null(),
    z.array(payloadValueSchema),
    z.record(payloadValueSchema)
  ])
);

export const payloadSchema: z.ZodType<Payload> = z.record(payloadValueSchema);

/**
 * Validates an arbitrary value as a payload and returns a frozen copy.
 * Rejects prototype-polluting keys, non-plain objects, non-finite numbers and
 * nesting deeper than 50 levels.
 */
export function toPayload(value: unknown): Payload {
  if (value === undefined) {
    const empty: Payload = {};
    return Object.freeze(empty);
  }
  if (!value || typeof value !== 'object' || Array.isArray(value)) {
    throw new InvalidEnvelopeError('Payload must be an object');
  }
  if (containsUnsafeKeys(value, 0)) {
    throw new InvalidEnvelopeError('Unsafe payload');
  }

  const parsed = payloadSchema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidEnvelopeError(
      `Invalid payload: ${parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'} ${issue.message}`).join('; ')}`
    );
  }

  return deepFreeze(parsed.data);
}

export function isPayloadObject(value: PayloadValue | undefined): value is Payload {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function readString(payload: Readonly<Payload>, key: string): string | undefined {
  const value = payload[key];
  return typeof value === 'string' ? value : undefined;
}

export function readNumber(payload: Readonly<Payload>, key: string): number | undefined {
  const value = payload[key];
  return typeof value === 'number' ? value : undefined;
}

function containsUnsafeKeys(value: unknown, currentDepth: number): boolean {
  if (currentDepth >= MAX_DEPTH) {
    throw new InvalidEnvelopeError(`Payload depth exceeds maximum allowed depth of ${MAX_DEPTH}`);
  }

  if (!value || typeof value !== 'object') {
    return false;
  }

  const proto: unknown = Object.getPrototypeOf(value);
  if (!Array.isArray(value) && proto !== Object.prototype && proto !== null) {
    return true;
  }

  for (const key of Object.getOwnPropertyNames(value)) {
    if (UNSAFE_KEYS.has(key)) {
      return true;
    }
    if (containsUnsafeKeys(Reflect.get(value, key), currentDepth + 1)) {
      return true;
    }
  }

  return false;
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}
