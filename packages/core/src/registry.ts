/**
 * Registered functions and their private result caches
 */

import { resolveCodec } from './codec.js';
import { frameLocation } from './trace.js';
import type { Codec, EncodedResult, Outcome, RegisterOptions, TraceFrame } from './types.js';

/**
 * Source site of the caller of `entry`, e.g. `/src/fib.ts:3:20`
 */
export function captureSite(entry: Function): string {
  const holder: { stack?: string } = {};
  Error.captureStackTrace(holder, entry);
  const line = holder.stack?.split('\n')[1];
  return line ? frameLocation(line) : '<unknown>';
}

export class RegisteredFunction<A extends unknown[], R> {
  private readonly cache = new Map<string, EncodedResult>();
  private readonly codec: Codec<R>;
  readonly name: string;

  constructor(
    readonly id: number,
    readonly body: (...args: A) => R,
    readonly location: string,
    options: RegisterOptions<R> = {}
  ) {
    this.codec = resolveCodec(options.codec);
    this.name = body.name || `anonymous#${id}`;
  }

  get size(): number {
    return this.cache.size;
  }

  lookup(argsKey: string): EncodedResult | undefined {
    return this.cache.get(argsKey);
  }

  store(argsKey: string, outcome: Outcome<R>): EncodedResult {
    const entry = this.codec.encode(outcome);
    this.cache.set(argsKey, entry);
    return entry;
  }

  /**
   * Decode a cached entry; one-shot entries leave the cache first
   */
  replay(argsKey: string, entry: EncodedResult): R {
    if (entry.oneShot) {
      this.cache.delete(argsKey);
    }
    return this.codec.decode(entry);
  }

  frame(kind: TraceFrame['kind'], args: readonly unknown[]): TraceFrame {
    return {
      kind,
      functionId: this.id,
      functionName: this.name,
      location: kind === 'engine' ? '<cache>' : this.location,
      args,
    };
  }
}
