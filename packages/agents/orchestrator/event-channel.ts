// Bounded single-consumer channel between the streaming producer task and
// the consumer. When full, 'block' suspends send() until the consumer pulls
// and 'drop' discards the item.

import type { OverflowPolicy } from '../config/settings.js';
import { ConfigurationError } from '../utils/errors.js';

interface Waiter<T> {
  resolve: (result: IteratorResult<T>) => void;
  reject: (err: unknown) => void;
}

export class EventChannel<T> implements AsyncIterable<T> {
  // Boxed so that T may itself include undefined
  private items: Array<{ value: T }> = [];
  private pullers: Array<Waiter<T>> = [];
  private pushers: Array<() => void> = [];
  private closed = false;
  private failure: { error: unknown } | undefined;

  constructor(
    readonly capacity: number,
    readonly overflow: OverflowPolicy = 'block',
  ) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new ConfigurationError(`channel capacity must be a positive integer (got ${capacity})`);
    }
  }

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Deliver or buffer an item. Resolves true once accepted, false if it was
   * dropped or the channel closed first.
   */
  async send(item: T, policy: OverflowPolicy = this.overflow): Promise<boolean> {
    if (this.closed) return false;

    while (this.items.length >= this.capacity) {
      if (policy === 'drop') return false;
      await new Promise<void>(resolve => this.pushers.push(resolve));
      if (this.closed) return false;
    }

    const puller = this.pullers.shift();
    if (puller) {
      puller.resolve({ value: item, done: false });
    } else {
      this.items.push({ value: item });
    }
    return true;
  }

  /** End iteration once buffered items are consumed */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const puller of this.pullers.splice(0)) puller.resolve({ value: undefined, done: true });
    this.wakePushers();
  }

  /** End iteration with an error once buffered items are consumed */
  fail(error: unknown): void {
    if (this.closed) return;
    this.failure = { error };
    this.closed = true;
    for (const puller of this.pullers.splice(0)) puller.reject(error);
    this.wakePushers();
  }

  next(): Promise<IteratorResult<T>> {
    const head = this.items.shift();
    if (head) {
      this.pushers.shift()?.();
      return Promise.resolve({ value: head.value, done: false });
    }
    if (this.failure) return Promise.reject(this.failure.error);
    if (this.closed) return Promise.resolve({ value: undefined, done: true });
    return new Promise<IteratorResult<T>>((resolve, reject) => {
      this.pullers.push({ resolve, reject });
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: () => this.next(),
      return: async (): Promise<IteratorResult<T>> => {
        this.items = [];
        this.close();
        return { value: undefined, done: true };
      },
    };
  }

  private wakePushers(): void {
    for (const wake of this.pushers.splice(0)) wake();
  }
}
