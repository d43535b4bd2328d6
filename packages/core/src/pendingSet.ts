/**
 * Insertion-ordered set of calls in flight, shared by every function of an engine
 */

import type { PendingCall } from './types.js';

export class PendingSet {
  private readonly byKey = new Map<string, PendingCall>();
  private readonly order: PendingCall[] = [];

  get size(): number {
    return this.byKey.size;
  }

  has(key: string): boolean {
    return this.byKey.has(key);
  }

  /**
   * Insert a call; callers check `has` first (a present key means a cycle)
   */
  add(call: PendingCall): void {
    if (this.byKey.has(call.key)) {
      throw new Error(`Call ${call.describe()} is already pending`);
    }
    this.byKey.set(call.key, call);
    this.order.push(call);
  }

  /**
   * Most recently inserted call
   */
  last(): PendingCall | undefined {
    return this.order[this.order.length - 1];
  }

  delete(key: string): boolean {
    const call = this.byKey.get(key);
    if (!call) return false;
    this.byKey.delete(key);
    // Resolution is almost always at the tail
    const index = this.order.lastIndexOf(call);
    if (index === this.order.length - 1) {
      this.order.pop();
    } else {
      this.order.splice(index, 1);
    }
    return true;
  }

  clear(): void {
    this.byKey.clear();
    this.order.length = 0;
  }
}
