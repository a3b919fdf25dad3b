/**
 * Key/value cache whose entries expire after a per-entry retention period.
 *
 * Storage is a singly linked list, newest insert at the head. Expired
 * entries are unlinked lazily by the sweep that opens every query; `put`
 * does not sweep unless `sweepOnPut` is set.
 */

import type { Logger } from 'pino';
import { SystemClock, type Clock } from '../shared/clock';
import { AgedCacheError } from '../shared/errors';
import defaultLogger from '../shared/logger';
import { valueEquals, type KeyEquality } from './key-equality';

interface Entry<K, V> {
  readonly key: K;
  readonly value: V;
  readonly expiresAt: number;
  next: Entry<K, V> | null;
}

export interface AgedCacheOptions<K> {
  clock?: Clock;
  keyEquals?: KeyEquality<K>;
  /** Sweep before every insert as well as before every query. */
  sweepOnPut?: boolean;
  logger?: Logger;
}

export class AgedCache<K, V> {
  private head: Entry<K, V> | null = null;
  private readonly clock: Clock;
  private readonly keyEquals: KeyEquality<K>;
  private readonly sweepOnPut: boolean;
  private readonly log: Logger;

  constructor(options: AgedCacheOptions<K> = {}) {
    this.clock = options.clock ?? new SystemClock();
    this.keyEquals = options.keyEquals ?? valueEquals;
    this.sweepOnPut = options.sweepOnPut ?? false;
    this.log = options.logger ?? defaultLogger;
  }

  put(key: K, value: V, retentionMillis: number): void {
    if (!Number.isInteger(retentionMillis)) {
      throw new AgedCacheError({
        code: 'INVALID_RETENTION',
        message: `Retention must be an integer number of milliseconds, got ${retentionMillis}`,
        context: { key, retentionMillis },
      });
    }

    const expiresAt = this.clock.now() + retentionMillis;
    if (this.sweepOnPut) {
      this.sweep();
    }
    const replaced = this.remove(key);
    this.head = { key, value, expiresAt, next: this.head };
    this.log.debug({ keyType: typeof key, expiresAt, replaced }, 'Cache entry stored');
  }

  get(key: K): V | null {
    this.sweep();
    for (let current = this.head; current !== null; current = current.next) {
      if (this.keyEquals(current.key, key)) {
        return current.value;
      }
    }
    return null;
  }

  isEmpty(): boolean {
    this.sweep();
    return this.head === null;
  }

  size(): number {
    this.sweep();
    let count = 0;
    for (let current = this.head; current !== null; current = current.next) {
      count++;
    }
    return count;
  }

  /**
   * Unlink every entry with `expiresAt < now`, reading the clock once.
   * Walks the whole list: order is by insertion, not by expiry.
   */
  private sweep(): number {
    const now = this.clock.now();
    let removed = 0;
    let prev: Entry<K, V> | null = null;
    let current = this.head;

    while (current !== null) {
      if (current.expiresAt < now) {
        if (prev === null) {
          this.head = current.next;
        } else {
          prev.next = current.next;
        }
        removed++;
      } else {
        prev = current;
      }
      current = current.next;
    }

    if (removed > 0) {
      this.log.debug({ removed, now }, 'Expired cache entries swept');
    }
    return removed;
  }

  /** Unlink the first entry whose key equals `key`. */
  private remove(key: K): boolean {
    let prev: Entry<K, V> | null = null;
    let current = this.head;

    while (current !== null) {
      if (this.keyEquals(current.key, key)) {
        if (prev === null) {
          this.head = current.next;
        } else {
          prev.next = current.next;
        }
        return true;
      }
      prev = current;
      current = current.next;
    }
    return false;
  }
}
