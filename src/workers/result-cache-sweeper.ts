/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import * as winston from 'winston';

import { ResultCache } from '../cache/result-cache.js';
import * as metrics from '../metrics.js';

const DEFAULT_INTERVAL_MS = 10 * 60 * 1000; // 10 minutes

/**
 * Periodically removes expired entries from the result cache. Entries that
 * are merely outdated by a new archive fingerprint are left for their TTL.
 */
export class ResultCacheSweeper {
  private log: winston.Logger;
  private resultCache: ResultCache;
  private intervalMs: number;
  private intervalId?: NodeJS.Timeout;

  constructor({
    log,
    resultCache,
    intervalMs = DEFAULT_INTERVAL_MS,
  }: {
    log: winston.Logger;
    resultCache: ResultCache;
    intervalMs?: number;
  }) {
    this.log = log.child({ class: 'ResultCacheSweeper' });
    this.resultCache = resultCache;
    this.intervalMs = intervalMs;
  }

  start(): void {
    if (this.intervalMs <= 0) {
      this.log.info('Result cache sweeper disabled');
      return;
    }

    this.intervalId = setInterval(this.sweep.bind(this), this.intervalMs);
    this.intervalId.unref();
    this.log.info('Started result cache sweeper', {
      intervalMs: this.intervalMs,
    });
  }

  stop(): void {
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = undefined;
    }
    this.log.info('Stopped result cache sweeper');
  }

  sweep(): number {
    const removed = this.resultCache.sweep();
    metrics.resultCacheSweptCounter.inc(removed);
    this.log.debug('Result cache swept', {
      removed,
      remaining: this.resultCache.size,
    });
    return removed;
  }
}
