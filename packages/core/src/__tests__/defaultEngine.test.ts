/**
 * Module-level API tests
 */

import { describe, it, expect } from 'vitest';
import { getDefaultEngine, getTrace, register, setTraceCompression } from '../defaultEngine.js';
import type { RecursiveFunction } from '../types.js';

describe('default engine', () => {
  it('should share one engine between module-level calls', () => {
    expect(getDefaultEngine()).toBe(getDefaultEngine());
  });

  it('should register functions and resolve deep recursion', () => {
    const depth: RecursiveFunction<[number], number> = register(function measure(n: number): number {
      return n === 0 ? 0 : depth(n - 1) + 1;
    });

    expect(depth(5000)).toBe(5000);
    expect(register(depth)).toBe(depth);
    expect(depth.isCached(2500)).toBe(true);
  });

  it('should expose traces and the compression switch', () => {
    setTraceCompression(false);
    const explode: RecursiveFunction<[number], number> = register(function blast(n: number): number {
      if (n === 0) throw new Error('explode');
      return explode(n - 1);
    });

    let caught: unknown;
    try {
      explode(3);
    } catch (error) {
      caught = error;
    } finally {
      setTraceCompression(true);
    }

    expect(getTrace(caught)?.map((frame) => `${frame.kind}:${String(frame.args[0])}`)).toEqual([
      'engine:3',
      'call:3',
      'call:2',
      'call:1',
      'raise:0',
    ]);
    expect(getDefaultEngine().compressTraces).toBe(true);
  });
});
