/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { createHash } from 'node:crypto';
import winston from 'winston';

import { SourceCache } from '../cache/source-cache.js';
import { errorMessage } from '../lib/error.js';
import * as metrics from '../metrics.js';
import { ArchiveSnapshot, ArchiveSource, ArchiveTransport } from '../types.js';

/**
 * Keeps the SourceCache populated. A fresh cache is returned as is; otherwise
 * the upstream fingerprint is probed before deciding whether the archive has
 * to be downloaded again.
 */
export class ArchiveFetcher implements ArchiveSource {
  private log: winston.Logger;
  private sourceCache: SourceCache;
  private transport: ArchiveTransport;
  private pendingRefresh?: Promise<ArchiveSnapshot>;

  constructor({
    log,
    sourceCache,
    transport,
  }: {
    log: winston.Logger;
    sourceCache: SourceCache;
    transport: ArchiveTransport;
  }) {
    this.log = log.child({ class: this.constructor.name });
    this.sourceCache = sourceCache;
    this.transport = transport;
  }

  async ensureFresh(): Promise<ArchiveSnapshot> {
    const cached = this.sourceCache.get();
    if (cached !== undefined) {
      return cached;
    }
    return this.refresh();
  }

  /**
   * Probes the upstream regardless of the TTL. Meant for the background
   * refresh worker so request paths never wait on it.
   */
  async forceRefresh(): Promise<ArchiveSnapshot> {
    return this.refresh();
  }

  getFingerprint(): string | undefined {
    return this.sourceCache.getFingerprint();
  }

  private async refresh(): Promise<ArchiveSnapshot> {
    if (this.pendingRefresh) {
      return this.pendingRefresh;
    }

    this.pendingRefresh = this.probeAndFetch();
    try {
      return await this.pendingRefresh;
    } finally {
      this.pendingRefresh = undefined;
    }
  }

  private async probeAndFetch(): Promise<ArchiveSnapshot> {
    const cached = this.sourceCache.getAny();

    let upstreamFingerprint: string | undefined;
    try {
      upstreamFingerprint = await this.transport.probeFingerprint();
    } catch (error) {
      if (cached !== undefined) {
        metrics.staleArchiveServedCounter.inc();
        this.log.warn('Archive probe failed, serving cached archive', {
          fingerprint: cached.fingerprint,
          error: errorMessage(error),
        });
        return cached;
      }
      throw error;
    }

    if (
      cached !== undefined &&
      upstreamFingerprint !== undefined &&
      upstreamFingerprint === cached.fingerprint
    ) {
      this.log.debug('Archive unchanged upstream', {
        fingerprint: cached.fingerprint,
      });
      this.sourceCache.touch();
      return cached;
    }

    const data = await this.transport.download();
    const fingerprint =
      upstreamFingerprint ?? createHash('sha256').update(data).digest('hex');

    const snapshot = await this.sourceCache.set(data, fingerprint);
    this.log.info('Archive updated', {
      previousFingerprint: cached?.fingerprint,
      fingerprint,
      size: data.length,
    });
    return snapshot;
  }
}
