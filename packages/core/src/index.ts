/**
 * deepcall - run deep recursion past the call stack limit
 *
 * Core concepts:
 * - Same call → same cached result (or replayed error)
 * - Calls past maxDepth are parked and resolved deepest-first by a drain loop
 * - Failing deep recursion gets a compressed trace
 */

export { RecursionEngine } from './engine.js';
export type { RecursionEngineOptions } from './engine.js';

export { register, setTraceCompression, getTrace, getDefaultEngine } from './defaultEngine.js';

export type {
  Outcome,
  Cloneable,
  EncodedResult,
  Codec,
  RegisterOptions,
  RecursiveFunction,
  TraceFrame,
  EngineLogger,
  EngineStats,
} from './types.js';

export {
  RecursionEngineError,
  CyclicRecursionError,
  StalledRecursionError,
  DepthExceededError,
  TraceInfoError,
  isHostStackOverflow,
} from './errors.js';

export { encodeOutcome, decodeEntry, defaultCodec } from './codec.js';
export { encodeArgs } from './callKey.js';
export { compressTrace, COMPRESSION_NOTICE } from './compress.js';
export type { CompressedTrace } from './compress.js';
export { DEFAULT_MAX_DEPTH, resolveEngineConfig } from './config.js';
export type { EngineConfig } from './config.js';
