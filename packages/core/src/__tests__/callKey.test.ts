/**
 * Call key tests
 */

import { describe, it, expect } from 'vitest';
import { encodeArgs, pendingKey, describeCall } from '../callKey.js';

describe('encodeArgs', () => {
  it('should keep primitive types apart', () => {
    expect(encodeArgs([1, '1', 1n, true, null, undefined])).toBe('[1,"1",1n,true,null,undefined]');
  });

  it('should treat 0 and -0 as the same argument', () => {
    expect(encodeArgs([-0])).toBe(encodeArgs([0]));
  });

  it('should generate the same key for objects with different key order', () => {
    const key1 = encodeArgs([{ a: 1, b: 2, c: 3 }]);
    const key2 = encodeArgs([{ c: 3, a: 1, b: 2 }]);

    expect(key1).toBe(key2);
    expect(key1).toBe('[{"a":1,"b":2,"c":3}]');
  });

  it('should handle stable sorting for nested objects', () => {
    const input1 = { outer: { z: 1, a: 2 }, name: 'test' };
    const input2 = { name: 'test', outer: { a: 2, z: 1 } };

    expect(encodeArgs([input1])).toBe(encodeArgs([input2]));
  });

  it('should keep argument and array order significant', () => {
    expect(encodeArgs([1, 2])).not.toBe(encodeArgs([2, 1]));
    expect(encodeArgs([[1, 2]])).not.toBe(encodeArgs([[2, 1]]));
  });

  it('should encode dates by time value', () => {
    expect(encodeArgs([new Date(0)])).toBe('[@date(0)]');
    expect(encodeArgs([new Date(5)])).toBe(encodeArgs([new Date(5)]));
  });

  it('should encode other objects by identity', () => {
    class Point {
      constructor(readonly x: number) {}
    }
    const point = new Point(1);

    expect(encodeArgs([point])).toBe(encodeArgs([point]));
    expect(encodeArgs([point])).not.toBe(encodeArgs([new Point(1)]));
    expect(encodeArgs([new Map()])).not.toBe(encodeArgs([new Map()]));
  });

  it('should encode functions and symbols by identity', () => {
    const tag = Symbol('tag');
    const fn = () => 1;

    expect(encodeArgs([tag])).toBe(encodeArgs([tag]));
    expect(encodeArgs([tag])).not.toBe(encodeArgs([Symbol('tag')]));
    expect(encodeArgs([fn])).toBe(encodeArgs([fn]));
    expect(encodeArgs([fn])).not.toBe(encodeArgs([() => 1]));
  });

  it('should mark self references instead of looping', () => {
    const list: unknown[] = [];
    list.push(list);

    expect(encodeArgs([list])).toBe('[[@cycle]]');
  });
});

describe('pendingKey', () => {
  it('should prefix the function id', () => {
    expect(pendingKey(3, '[1]')).toBe('3:[1]');
  });
});

describe('describeCall', () => {
  it('should render a readable call', () => {
    expect(describeCall('fib', [10, 'x'])).toBe("fib(10, 'x')");
    expect(describeCall('now', [])).toBe('now()');
  });
});
