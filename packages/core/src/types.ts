/**
 * RecursionEngine type definitions
 */

/**
 * What a body produced for one call
 */
export type Outcome<R> =
  | { kind: 'return'; value: R }
  | { kind: 'throw'; error: unknown };

/**
 * Value exposing its own copy operation
 */
export interface Cloneable {
  clone(): unknown;
}

/**
 * Cache entry: how to rebuild a value plus the stored form.
 * One-shot entries are removed from the cache on first read.
 */
export type EncodedResult =
  | { readonly action: 'copy'; readonly stored: Cloneable | Date; readonly oneShot: false }
  | { readonly action: 'raise'; readonly stored: unknown; readonly oneShot: true }
  | { readonly action: 'identity'; readonly stored: unknown; readonly oneShot: false }
  | { readonly action: 'set'; readonly stored: readonly unknown[]; readonly oneShot: false }
  | {
      readonly action: 'mapping';
      readonly shape: 'map';
      readonly stored: ReadonlyArray<readonly [unknown, unknown]>;
      readonly oneShot: false;
    }
  | {
      readonly action: 'mapping';
      readonly shape: 'record';
      readonly stored: ReadonlyArray<readonly [string, unknown]>;
      readonly oneShot: false;
    }
  | { readonly action: 'cursor'; readonly stored: Iterator<unknown>; readonly oneShot: true }
  | { readonly action: 'sequence'; readonly stored: readonly unknown[]; readonly oneShot: false }
  | { readonly action: 'fallback'; readonly stored: unknown; readonly oneShot: false }
  | { readonly action: 'custom'; readonly tag: string; readonly stored: unknown; readonly oneShot: boolean };

/**
 * Encode/decode pair used by a registered function's cache
 */
export interface Codec<R> {
  encode(outcome: Outcome<R>): EncodedResult;
  decode(entry: EncodedResult): R;
}

/**
 * register() options
 */
export interface RegisterOptions<R> {
  /** Override encode and/or decode; missing hooks fall back to the default codec */
  codec?: Partial<Codec<R>>;
}

/**
 * Wrapper returned by register(): same call signature as the body
 */
export interface RecursiveFunction<A extends unknown[], R> {
  (...args: A): R;
  /** Registry id */
  readonly id: number;
  /** The wrapped body */
  readonly body: (...args: A) => R;
  /** Whether a result for these arguments is cached (never executes the body) */
  isCached(...args: A): boolean;
}

/**
 * One entry of an execution trace
 */
export interface TraceFrame {
  /**
   * `raise`: the error started in this call's body; `call`: it escaped this
   * call's body on its way out; `engine`: the engine replayed a cached error
   */
  kind: 'raise' | 'call' | 'engine';
  functionId: number;
  functionName: string;
  /** Registration site of the function, or `<cache>` for engine frames */
  location: string;
  args: readonly unknown[];
}

/**
 * Engine logger
 */
export interface EngineLogger {
  debug(message: string): void;
  warn(message: string): void;
}

/**
 * Engine introspection snapshot
 */
export interface EngineStats {
  registered: number;
  cachedEntries: number;
  pending: number;
  /** Whether an outermost call is currently running */
  active: boolean;
}

/**
 * Internal use: a call waiting in the pending set
 */
export interface PendingCall {
  /** `<function id>:<args key>` */
  key: string;
  /** Human readable form, e.g. `fib(10)` */
  describe(): string;
  /** Run the body and store its outcome; throws only engine signals */
  settle(): void;
}
