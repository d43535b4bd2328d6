/**
 * RecursionEngine main class
 */

import { describeCall, encodeArgs, pendingKey } from './callKey.js';
import { COMPRESSION_NOTICE, compressTrace } from './compress.js';
import { resolveEngineConfig, type EngineConfig, type EngineEnv } from './config.js';
import {
  CyclicRecursionError,
  DepthExceededError,
  StalledRecursionError,
  TraceInfoError,
  appendCause,
  detachTraceInfo,
  isHostStackOverflow,
} from './errors.js';
import { createConsoleLogger } from './logger.js';
import { PendingSet } from './pendingSet.js';
import { RegisteredFunction, captureSite } from './registry.js';
import { TraceRecorder, callerFrames, formatStack, throwSiteFrames } from './trace.js';
import type {
  EncodedResult,
  EngineLogger,
  EngineStats,
  Outcome,
  RecursiveFunction,
  RegisterOptions,
  TraceFrame,
} from './types.js';

/**
 * RecursionEngine configuration
 */
export interface RecursionEngineOptions extends Partial<EngineConfig> {
  /** Defaults to a console logger; debug output only when `debug` is on */
  logger?: EngineLogger;
  /** Extra test for errors meaning "call depth exhausted"; defaults to host stack overflows */
  isDepthExhaustion?: (error: unknown) => boolean;
  /** Environment read for DEEPCALL_* settings, default process.env */
  env?: EngineEnv;
}

export class RecursionEngine {
  private readonly config: EngineConfig;
  private readonly logger: EngineLogger;
  private readonly exhaustionTest: (error: unknown) => boolean;
  /** body or wrapper -> wrapper */
  private readonly wrappers = new Map<object, unknown>();
  private readonly functions: Array<{ readonly size: number }> = [];
  private readonly pending = new PendingSet();
  private readonly traces = new TraceRecorder();
  /** Stack of each compressed error as the host produced it */
  private readonly hostStacks = new WeakMap<Error, string | undefined>();
  /** An outermost call is running */
  private active = false;
  /** Nested wrapper calls currently executing */
  private depth = 0;
  /** Cache writes so far, used to tell a stalled drain from a progressing one */
  private resolutions = 0;

  constructor(options: RecursionEngineOptions = {}) {
    const { logger, isDepthExhaustion, env, ...config } = options;
    this.config = resolveEngineConfig(config, env ?? process.env);
    this.logger = logger ?? createConsoleLogger(this.config.debug);
    this.exhaustionTest = isDepthExhaustion ?? isHostStackOverflow;
  }

  get maxDepth(): number {
    return this.config.maxDepth;
  }

  get compressTraces(): boolean {
    return this.config.compressTraces;
  }

  /**
   * Toggle trace compression for errors escaping outermost calls
   */
  setTraceCompression(enabled: boolean): void {
    this.config.compressTraces = enabled;
  }

  /**
   * Register a function. Registering the same body (or a wrapper) again
   * returns the existing wrapper.
   */
  register<A extends unknown[], R>(
    body: (...args: A) => R,
    options?: RegisterOptions<R>
  ): RecursiveFunction<A, R> {
    return this.registerFrom(this.register, body, options);
  }

  /**
   * @internal register() with the registration site taken from the caller of `entry`
   */
  registerFrom<A extends unknown[], R>(
    entry: Function,
    body: (...args: A) => R,
    options?: RegisterOptions<R>
  ): RecursiveFunction<A, R> {
    const existing = this.wrappers.get(body);
    if (existing !== undefined) {
      if (options) {
        this.logger.warn(`${body.name || 'function'} is already registered; new options are ignored`);
      }
      // Wrappers are stored under the body they were created for
      return existing as RecursiveFunction<A, R>;
    }

    const fn = new RegisteredFunction<A, R>(this.functions.length, body, captureSite(entry), options);
    this.functions.push(fn);

    const wrapper = (...args: A): R => this.invoke(fn, args);
    Object.defineProperty(wrapper, 'name', { value: fn.name });
    wrapper.id = fn.id;
    wrapper.body = body;
    wrapper.isCached = (...args: A): boolean => fn.lookup(encodeArgs(args)) !== undefined;

    this.wrappers.set(body, wrapper);
    this.wrappers.set(wrapper, wrapper);
    this.logger.debug(`registered ${fn.name} as #${fn.id} at ${fn.location}`);
    return wrapper;
  }

  /**
   * Execution trace recorded for an error, outermost call first
   */
  traceOf(error: unknown): readonly TraceFrame[] | undefined {
    return this.traces.get(error);
  }

  stats(): EngineStats {
    return {
      registered: this.functions.length,
      cachedEntries: this.functions.reduce((sum, fn) => sum + fn.size, 0),
      pending: this.pending.size,
      active: this.active,
    };
  }

  private isDepthExhaustion(error: unknown): boolean {
    return error instanceof DepthExceededError || this.exhaustionTest(error);
  }

  /** Errors that are engine control flow rather than a body's result */
  private isSignal(error: unknown): boolean {
    return (
      error instanceof CyclicRecursionError ||
      error instanceof StalledRecursionError ||
      this.isDepthExhaustion(error)
    );
  }

  private invoke<A extends unknown[], R>(fn: RegisteredFunction<A, R>, args: A): R {
    const outermost = !this.active;
    this.active = true;
    if (outermost) {
      this.traces.beginRun();
    }
    this.depth++;
    const argsKey = encodeArgs(args);
    const key = pendingKey(fn.id, argsKey);

    try {
      if (this.pending.has(key)) {
        throw new CyclicRecursionError(describeCall(fn.name, args));
      }

      if (fn.lookup(argsKey) === undefined) {
        this.pending.add({
          key,
          describe: () => describeCall(fn.name, args),
          settle: () => this.settle(fn, args, argsKey),
        });
        if (!outermost && this.depth > this.config.maxDepth) {
          throw new DepthExceededError(this.depth);
        }
      }

      if (outermost) {
        this.drain();
      }
      return this.resolve(fn, args, argsKey, key, outermost);
    } catch (error) {
      if (outermost && this.pending.size > 0) {
        const reason = error instanceof Error ? error.message : String(error);
        this.logger.debug(`aborting ${this.pending.size} pending calls: ${reason}`);
        this.pending.clear();
      }
      throw error;
    } finally {
      this.depth--;
      this.active = !outermost;
    }
  }

  /**
   * Resolve the newest pending call until none are left
   */
  private drain(): void {
    let attempts = 0;
    for (let call = this.pending.last(); call; call = this.pending.last()) {
      attempts++;
      const resolutionsBefore = this.resolutions;
      try {
        call.settle();
        this.pending.delete(call.key);
      } catch (error) {
        if (!this.isDepthExhaustion(error)) {
          throw error;
        }
        if (this.pending.last() === call && this.resolutions === resolutionsBefore) {
          throw new StalledRecursionError(call.describe(), error);
        }
      }
    }
    if (attempts > 1) {
      this.logger.debug(`drained ${attempts} attempts`);
    }
  }

  /**
   * Run a pending call's body and cache whatever it returns or throws
   */
  private settle<A extends unknown[], R>(fn: RegisteredFunction<A, R>, args: A, argsKey: string): void {
    let outcome: Outcome<R>;
    try {
      outcome = { kind: 'return', value: this.execute(fn, args) };
    } catch (error) {
      if (this.isSignal(error)) {
        throw error;
      }
      outcome = { kind: 'throw', error };
    }
    fn.store(argsKey, outcome);
    this.resolutions++;
  }

  private execute<A extends unknown[], R>(fn: RegisteredFunction<A, R>, args: A): R {
    try {
      return fn.body(...args);
    } catch (error) {
      if (!this.isSignal(error)) {
        this.traces.record(error, fn.frame(this.traces.has(error) ? 'call' : 'raise', args));
      }
      throw error;
    }
  }

  private resolve<A extends unknown[], R>(
    fn: RegisteredFunction<A, R>,
    args: A,
    argsKey: string,
    key: string,
    outermost: boolean
  ): R {
    let result: R;
    try {
      const cached = fn.lookup(argsKey);
      if (cached !== undefined) {
        result = this.replay(fn, args, argsKey, cached);
      } else {
        const entry = fn.store(argsKey, { kind: 'return', value: this.execute(fn, args) });
        this.resolutions++;
        result = fn.replay(argsKey, entry);
      }
    } catch (error) {
      if (this.isSignal(error)) {
        throw error;
      }
      this.pending.delete(key);
      if (outermost && this.config.compressTraces) {
        this.compress(error);
      }
      throw error;
    }
    this.pending.delete(key);
    return result;
  }

  private replay<A extends unknown[], R>(
    fn: RegisteredFunction<A, R>,
    args: A,
    argsKey: string,
    entry: EncodedResult
  ): R {
    try {
      return fn.replay(argsKey, entry);
    } catch (error) {
      this.traces.record(error, fn.frame('engine', args));
      throw error;
    }
  }

  /**
   * Rewrite the trace of an error leaving an outermost call
   */
  private compress(error: unknown): void {
    if (!(error instanceof Error) || !this.traces.markCompressed(error)) return;

    let hostStack: string | undefined;
    if (this.hostStacks.has(error)) {
      hostStack = this.hostStacks.get(error);
      detachTraceInfo(error);
    } else {
      hostStack = error.stack;
      this.hostStacks.set(error, hostStack);
    }
    const here: { stack?: string } = {};
    Error.captureStackTrace(here);

    const trace = this.traces.get(error) ?? [];
    const { frames, summary } = compressTrace(trace, this.config.maxDepth);
    this.traces.replace(error, frames);
    error.stack = formatStack(error, frames, throwSiteFrames(hostStack), callerFrames(here.stack));

    for (let info = summary; info; info = info.cause instanceof TraceInfoError ? info.cause : undefined) {
      info.stack = formatStack(info, info.frames);
    }
    if (summary) {
      appendCause(error, summary);
    }
    const notice = new TraceInfoError(COMPRESSION_NOTICE);
    notice.stack = formatStack(notice, []);
    appendCause(error, notice);
  }
}
