/**
 * Cache entry codec
 *
 * Entries are chosen by the first matching category:
 * copy-capable, error, immutable, Set, mapping, cursor, sequence, fallback.
 * Thrown values and returned Error instances both replay as failures.
 */

import type { Cloneable, Codec, EncodedResult, Outcome } from './types.js';

function isCloneable(value: object): value is Cloneable {
  return 'clone' in value && typeof value.clone === 'function';
}

function isImmutable(value: object): boolean {
  // Freezing a Map/Set does not freeze its contents
  return Object.isFrozen(value) && !(value instanceof Map) && !(value instanceof Set);
}

function isPlainRecord(value: object): value is Record<string, unknown> {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function isCursor(value: object): value is Iterator<unknown> {
  return (
    'next' in value &&
    typeof value.next === 'function' &&
    Symbol.iterator in value &&
    typeof value[Symbol.iterator] === 'function'
  );
}

function isSequence(value: object): value is Iterable<unknown> {
  if (ArrayBuffer.isView(value)) {
    return false;
  }
  return Array.isArray(value) || (Symbol.iterator in value && typeof value[Symbol.iterator] === 'function');
}

/**
 * Encode a body outcome into a cache entry
 */
export function encodeOutcome(outcome: Outcome<unknown>): EncodedResult {
  if (outcome.kind === 'throw') {
    return { action: 'raise', stored: outcome.error, oneShot: true };
  }
  const { value } = outcome;
  if (value instanceof Date) {
    return { action: 'copy', stored: value, oneShot: false };
  }
  if (typeof value !== 'object' || value === null) {
    return { action: 'identity', stored: value, oneShot: false };
  }
  if (isCloneable(value)) {
    return { action: 'copy', stored: value, oneShot: false };
  }
  if (value instanceof Error) {
    return { action: 'raise', stored: value, oneShot: true };
  }
  if (isImmutable(value)) {
    return { action: 'identity', stored: value, oneShot: false };
  }
  if (value instanceof Set) {
    return { action: 'set', stored: Object.freeze([...value]), oneShot: false };
  }
  if (value instanceof Map) {
    return { action: 'mapping', shape: 'map', stored: Object.freeze([...value.entries()]), oneShot: false };
  }
  if (isPlainRecord(value)) {
    return { action: 'mapping', shape: 'record', stored: Object.freeze(Object.entries(value)), oneShot: false };
  }
  if (isCursor(value)) {
    return { action: 'cursor', stored: value, oneShot: true };
  }
  if (isSequence(value)) {
    return { action: 'sequence', stored: Object.freeze(Array.from(value)), oneShot: false };
  }
  return { action: 'fallback', stored: value, oneShot: false };
}

/**
 * Rebuild the value held by a cache entry; `raise` entries throw
 */
export function decodeEntry(entry: EncodedResult): unknown {
  switch (entry.action) {
    case 'copy':
      return entry.stored instanceof Date ? new Date(entry.stored.getTime()) : entry.stored.clone();
    case 'raise':
      throw entry.stored;
    case 'set':
      return new Set(entry.stored);
    case 'mapping':
      return entry.shape === 'map' ? new Map(entry.stored) : Object.fromEntries(entry.stored);
    case 'identity':
    case 'cursor':
    case 'sequence':
    case 'fallback':
      return entry.stored;
    case 'custom':
      throw new Error(`No decoder for custom cache entry "${entry.tag}"`);
  }
}

/**
 * Default codec for a function returning R.
 * Decoded values have the shape they were encoded from.
 */
export function defaultCodec<R>(): Codec<R> {
  return {
    encode: (outcome) => encodeOutcome(outcome),
    decode: (entry) => decodeEntry(entry) as R,
  };
}

/**
 * Merge per-function overrides onto the default codec
 */
export function resolveCodec<R>(overrides: Partial<Codec<R>> | undefined): Codec<R> {
  const base = defaultCodec<R>();
  return {
    encode: overrides?.encode ?? base.encode,
    decode: overrides?.decode ?? base.decode,
  };
}
