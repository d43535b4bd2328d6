/**
 * Module-level API backed by a lazily created default engine
 */

import { RecursionEngine } from './engine.js';
import type { RecursiveFunction, RegisterOptions, TraceFrame } from './types.js';

let defaultEngine: RecursionEngine | undefined;

export function getDefaultEngine(): RecursionEngine {
  defaultEngine ??= new RecursionEngine();
  return defaultEngine;
}

/**
 * Register a function with the default engine
 */
export function register<A extends unknown[], R>(
  body: (...args: A) => R,
  options?: RegisterOptions<R>
): RecursiveFunction<A, R> {
  return getDefaultEngine().registerFrom(register, body, options);
}

export function setTraceCompression(enabled: boolean): void {
  getDefaultEngine().setTraceCompression(enabled);
}

export function getTrace(error: unknown): readonly TraceFrame[] | undefined {
  return getDefaultEngine().traceOf(error);
}
