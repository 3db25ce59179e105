/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { EventEmitter } from 'node:events';
import * as winston from 'winston';

import * as events from '../events.js';
import { errorMessage } from '../lib/error.js';
import { ArchiveSource } from '../types.js';

/**
 * Re-probes the upstream archive on a fixed interval, independent of request
 * traffic, and announces fingerprint changes on the event bus.
 */
export class ArchiveRefreshWorker {
  private log: winston.Logger;
  private archiveSource: ArchiveSource;
  private eventEmitter: EventEmitter;
  private intervalMs: number;
  private intervalId?: NodeJS.Timeout;

  constructor({
    log,
    archiveSource,
    eventEmitter,
    intervalMs,
  }: {
    log: winston.Logger;
    archiveSource: ArchiveSource;
    eventEmitter: EventEmitter;
    intervalMs: number;
  }) {
    this.log = log.child({ class: 'ArchiveRefreshWorker' });
    this.archiveSource = archiveSource;
    this.eventEmitter = eventEmitter;
    this.intervalMs = intervalMs;
  }

  start(): void {
    if (this.intervalMs <= 0) {
      this.log.info('Archive refresh disabled');
      return;
    }

    void this.refresh();
    this.intervalId = setInterval(this.refresh.bind(this), this.intervalMs);
    this.intervalId.unref();
    this.log.info('Started archive refresh worker', {
      intervalMs: this.intervalMs,
    });
  }

  stop(): void {
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = undefined;
    }
    this.log.info('Stopped archive refresh worker');
  }

  /** Never rejects; failures are logged and retried on the next tick. */
  async refresh(): Promise<void> {
    const previousFingerprint = this.archiveSource.getFingerprint();
    try {
      const { fingerprint } = await this.archiveSource.forceRefresh();
      if (fingerprint !== previousFingerprint) {
        this.log.info('Archive refreshed', {
          previousFingerprint,
          fingerprint,
        });
        this.eventEmitter.emit(events.ARCHIVE_UPDATED, { fingerprint });
      }
    } catch (error) {
      this.log.error('Archive refresh failed', {
        error: errorMessage(error),
      });
    }
  }
}
