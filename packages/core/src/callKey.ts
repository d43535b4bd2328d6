/**
 * Call key derivation
 */

import { inspect } from 'util';

const objectIds = new WeakMap<object, number>();
const symbolIds = new Map<symbol, number>();
let nextRefId = 0;

function refOf(value: object): string {
  let id = objectIds.get(value);
  if (id === undefined) {
    id = nextRefId++;
    objectIds.set(value, id);
  }
  return `@ref#${id}`;
}

function symbolRefOf(value: symbol): string {
  let id = symbolIds.get(value);
  if (id === undefined) {
    id = nextRefId++;
    symbolIds.set(value, id);
  }
  return `@symbol#${id}`;
}

function isPlainObject(value: object): value is Record<string, unknown> {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Recursively stable-encode a value; plain object keys are sorted,
 * array order is kept.
 */
function stableEncode(value: unknown, ancestors: object[]): string {
  switch (typeof value) {
    case 'string':
      return JSON.stringify(value);
    case 'number':
    case 'boolean':
      return String(value);
    case 'bigint':
      return `${value}n`;
    case 'undefined':
      return 'undefined';
    case 'symbol':
      return symbolRefOf(value);
    case 'function':
      return refOf(value);
  }
  if (typeof value !== 'object' || value === null) {
    return 'null';
  }
  if (ancestors.includes(value)) {
    return '@cycle';
  }
  if (value instanceof Date) {
    return `@date(${value.getTime()})`;
  }
  if (Array.isArray(value)) {
    ancestors.push(value);
    const items = value.map((item: unknown) => stableEncode(item, ancestors));
    ancestors.pop();
    return '[' + items.join(',') + ']';
  }
  if (isPlainObject(value)) {
    ancestors.push(value);
    const keys = Object.keys(value).sort();
    const pairs = keys.map((k) => JSON.stringify(k) + ':' + stableEncode(value[k], ancestors));
    ancestors.pop();
    return '{' + pairs.join(',') + '}';
  }
  return refOf(value);
}

/**
 * Derive the cache key of an ordered argument list
 */
export function encodeArgs(args: readonly unknown[]): string {
  return stableEncode(args, []);
}

/**
 * Key of a call in the shared pending set
 */
export function pendingKey(functionId: number, argsKey: string): string {
  return `${functionId}:${argsKey}`;
}

/**
 * Human readable call, e.g. `fib(10)`
 */
export function describeCall(name: string, args: readonly unknown[]): string {
  const rendered = args.map((arg) => inspect(arg, { depth: 1, breakLength: Infinity }));
  return `${name}(${rendered.join(', ')})`;
}
