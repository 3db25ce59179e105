/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { LRUCache } from 'lru-cache';
import winston from 'winston';

interface ResultEntry {
  text: string;
  fingerprint: string;
}

const DEFAULT_MAX_ENTRIES = 10000;

/**
 * Memoizes rendered rulesets. An entry is only returned while its TTL has not
 * elapsed and the fingerprint it was computed against equals the caller's,
 * so a new upstream version is always a miss.
 */
export class ResultCache {
  private log: winston.Logger;
  private cache: LRUCache<string, ResultEntry>;
  private pendingPromises: Map<string, Promise<string>>;

  constructor({
    log,
    ttlMs,
    maxEntries = DEFAULT_MAX_ENTRIES,
  }: {
    log: winston.Logger;
    ttlMs: number;
    maxEntries?: number;
  }) {
    this.log = log.child({ class: this.constructor.name });
    this.cache = new LRUCache<string, ResultEntry>({
      max: maxEntries,
      ttl: ttlMs,
      // expired entries are reclaimed by sweep()
      ttlAutopurge: false,
      updateAgeOnGet: false,
    });
    this.pendingPromises = new Map();
  }

  get(key: string, fingerprint: string): string | undefined {
    const entry = this.cache.get(key);
    if (entry === undefined || entry.fingerprint !== fingerprint) {
      return undefined;
    }
    return entry.text;
  }

  set(key: string, text: string, fingerprint: string): void {
    this.cache.set(key, { text, fingerprint });
  }

  /**
   * Returns the cached text or computes it once. Concurrent callers missing
   * on the same key and fingerprint share one computation; a failed
   * computation is not cached.
   */
  async getOrCompute(
    key: string,
    fingerprint: string,
    compute: () => Promise<string>,
  ): Promise<{ text: string; cached: boolean }> {
    const text = this.get(key, fingerprint);
    if (text !== undefined) {
      return { text, cached: true };
    }

    const pendingKey = `${fingerprint}\n${key}`;
    const existingPromise = this.pendingPromises.get(pendingKey);
    if (existingPromise) {
      this.log.debug('Joining pending computation', { key, fingerprint });
      return { text: await existingPromise, cached: false };
    }

    const promise = compute().then((result) => {
      this.set(key, result, fingerprint);
      return result;
    });
    this.pendingPromises.set(pendingKey, promise);

    try {
      return { text: await promise, cached: false };
    } finally {
      this.pendingPromises.delete(pendingKey);
    }
  }

  /** Physically removes expired entries, returning how many were removed. */
  sweep(): number {
    const before = this.cache.size;
    this.cache.purgeStale();
    const removed = before - this.cache.size;
    if (removed > 0) {
      this.log.debug('Swept expired results', { removed });
    }
    return removed;
  }

  get size(): number {
    return this.cache.size;
  }
}
