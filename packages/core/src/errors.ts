/**
 * Engine error types
 */

import type { TraceFrame } from './types.js';

export class RecursionEngineError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * The same call was requested again while it was still pending
 */
export class CyclicRecursionError extends RecursionEngineError {
  constructor(readonly call: string) {
    super(`Cyclic recursion: ${call} was requested while it was still being resolved`);
  }
}

/**
 * Depth was exhausted again without any progress on the pending calls
 */
export class StalledRecursionError extends RecursionEngineError {
  constructor(readonly call: string, cause: unknown) {
    super(`Stalled recursion: ${call} keeps exhausting the call depth without progress`, { cause });
  }
}

/**
 * Internal signal: a nested call went past maxDepth and has to be
 * resolved by the drain loop first
 */
export class DepthExceededError extends RecursionEngineError {
  constructor(readonly depth: number) {
    super(`Call depth ${depth} exceeded`);
  }
}

/**
 * Informational link in a compressed error's cause chain
 */
export class TraceInfoError extends RecursionEngineError {
  constructor(message: string, readonly frames: readonly TraceFrame[] = [], cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
  }
}

/**
 * Default depth exhaustion test for errors raised by the host itself
 */
export function isHostStackOverflow(error: unknown): boolean {
  return error instanceof RangeError && /maximum call stack size exceeded/i.test(error.message);
}

/**
 * Append `cause` at the end of `error`'s cause chain.
 * A chain ending in a non-Error cause is left untouched.
 */
export function appendCause(error: Error, cause: Error): boolean {
  let tail = error;
  const seen = new Set<Error>([tail]);
  while (tail.cause instanceof Error && !seen.has(tail.cause)) {
    tail = tail.cause;
    seen.add(tail);
  }
  if (tail.cause !== undefined) {
    return false;
  }
  tail.cause = cause;
  return true;
}

/**
 * Cut `error`'s cause chain before the first TraceInfoError, dropping the
 * summaries of an earlier compression
 */
export function detachTraceInfo(error: Error): void {
  let link = error;
  const seen = new Set<Error>([link]);
  while (link.cause instanceof Error && !seen.has(link.cause)) {
    if (link.cause instanceof TraceInfoError) {
      link.cause = undefined;
      return;
    }
    link = link.cause;
    seen.add(link);
  }
}
