/**
 * Execution traces attached to errors escaping registered bodies
 */

import { dirname } from 'path';
import { fileURLToPath } from 'url';
import { describeCall } from './callKey.js';
import type { TraceFrame } from './types.js';

/** Directory of the engine sources; host stack frames from here are engine internals */
const ENGINE_DIR = dirname(fileURLToPath(import.meta.url));

interface TraceEntry {
  /** Outermost call the frames belong to */
  run: number;
  /** Propagation order: origin first */
  frames: TraceFrame[];
  compressed: boolean;
}

export class TraceRecorder {
  private readonly entries = new WeakMap<object, TraceEntry>();
  private run = 0;

  /**
   * Called when an outermost call starts. Traces from earlier outermost
   * calls are dropped as soon as their error is seen again.
   */
  beginRun(): void {
    this.run++;
  }

  private current(error: object): TraceEntry {
    let entry = this.entries.get(error);
    if (!entry || entry.run !== this.run) {
      entry = { run: this.run, frames: [], compressed: false };
      this.entries.set(error, entry);
    }
    return entry;
  }

  /**
   * Whether the error already has frames in the current outermost call
   */
  has(error: unknown): boolean {
    if (typeof error !== 'object' || error === null) return false;
    const entry = this.entries.get(error);
    return entry !== undefined && entry.run === this.run && entry.frames.length > 0;
  }

  record(error: unknown, frame: TraceFrame): void {
    if (typeof error !== 'object' || error === null) return;
    this.current(error).frames.push(frame);
  }

  /**
   * Trace of an error, outermost call first
   */
  get(error: unknown): TraceFrame[] | undefined {
    if (typeof error !== 'object' || error === null) return undefined;
    const entry = this.entries.get(error);
    return entry ? [...entry.frames].reverse() : undefined;
  }

  /**
   * Replace a trace (given outermost first)
   */
  replace(error: object, outermostFirst: readonly TraceFrame[]): void {
    this.current(error).frames = [...outermostFirst].reverse();
  }

  /**
   * Mark an error compressed for the current outermost call; false if it already was
   */
  markCompressed(error: object): boolean {
    const entry = this.current(error);
    if (entry.compressed) return false;
    entry.compressed = true;
    return true;
  }
}

export function sameFrame(a: TraceFrame, b: TraceFrame): boolean {
  return a.kind === b.kind && a.functionId === b.functionId && a.location === b.location;
}

/**
 * Source location of a host stack line, e.g. `/src/fib.ts:3:20`
 */
export function frameLocation(line: string): string {
  const match = /\((.*)\)$/.exec(line);
  return match ? match[1] : line.trim().replace(/^at\s+/, '');
}

function isEngineFrame(line: string): boolean {
  const file = frameLocation(line).replace(/:\d+:\d+$/, '');
  const path = file.startsWith('file://') ? fileURLToPath(file) : file;
  return dirname(path) === ENGINE_DIR;
}

function hostFrames(stack: string | undefined): string[] {
  return (stack ?? '').split('\n').filter((line) => /^\s+at /.test(line));
}

/**
 * Host frames of a stack up to the first engine frame
 */
export function throwSiteFrames(stack: string | undefined): string[] {
  const frames = hostFrames(stack);
  const end = frames.findIndex(isEngineFrame);
  return end < 0 ? frames : frames.slice(0, end);
}

/**
 * Host frames of a stack captured inside the engine, minus the engine frames on top
 */
export function callerFrames(stack: string | undefined): string[] {
  const frames = hostFrames(stack);
  const start = frames.findIndex((line) => !isEngineFrame(line));
  return start < 0 ? [] : frames.slice(start);
}

export function formatFrame(frame: TraceFrame): string {
  if (frame.kind === 'engine') {
    return `    at <replayed cached error of ${describeCall(frame.functionName, frame.args)}>`;
  }
  return `    at ${describeCall(frame.functionName, frame.args)} (${frame.location})`;
}

/**
 * Stack text: the error's own header line, the throw site, the frames, then the caller
 */
export function formatStack(
  error: Error,
  frames: readonly TraceFrame[],
  throwSite: readonly string[] = [],
  callers: readonly string[] = []
): string {
  const header = error.message ? `${error.name}: ${error.message}` : error.name;
  return [header, ...throwSite, ...frames.map(formatFrame), ...callers].join('\n');
}
