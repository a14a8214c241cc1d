import { InvalidArgumentError } from './errors';

const UNSAFE_KEYS = new Set(['__proto__', 'prototype', 'constructor']);

/**
 * Maximum nesting accepted in message payloads and memory values.
 */
const MAX_DEPTH = 50;

/**
 * Rejects payloads that could pollute prototypes once merged or spread by a
 * consumer. Every payload entering the bus and every memory value passes here.
 */
export function assertSafePayload(payload: unknown): void {
  if (payload === undefined || payload === null) {
    return;
  }

  if (typeof payload !== 'object') {
    throw new InvalidArgumentError('Payload must be an object');
  }

  if (containsUnsafeKeys(payload, 0)) {
    throw new InvalidArgumentError('Unsafe payload');
  }
}

function containsUnsafeKeys(value: unknown, currentDepth: number): boolean {
  if (currentDepth >= MAX_DEPTH) {
    throw new InvalidArgumentError(`Payload depth exceeds maximum allowed depth of ${MAX_DEPTH}`);
  }

  if (!value || typeof value !== 'object') {
    return false;
  }

  // A plain object whose prototype was swapped is a pollution attempt.
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
