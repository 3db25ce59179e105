/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { default as axios, AxiosInstance, AxiosResponse } from 'axios';
import winston from 'winston';

import { USER_AGENT } from '../constants.js';
import { errorMessage, TransportError } from '../lib/error.js';
import * as metrics from '../metrics.js';
import { ArchiveTransport } from '../types.js';

const DEFAULT_REQUEST_TIMEOUT_MS = 60 * 1000;

/**
 * Strips the quotes and weak-validator prefix GitHub puts around ETags so the
 * same archive version always yields the same fingerprint.
 */
export function normalizeEtag(etag: string): string {
  return etag.replaceAll('"', '').replace(/^W\//, '').trim();
}

export class HttpArchiveTransport implements ArchiveTransport {
  private log: winston.Logger;
  private archiveUrl: string;
  private http: AxiosInstance;

  constructor({
    log,
    archiveUrl,
    requestTimeoutMs = DEFAULT_REQUEST_TIMEOUT_MS,
  }: {
    log: winston.Logger;
    archiveUrl: string;
    requestTimeoutMs?: number;
  }) {
    this.log = log.child({ class: this.constructor.name });
    this.archiveUrl = archiveUrl;
    this.http = axios.create({
      timeout: requestTimeoutMs,
      headers: { 'User-Agent': USER_AGENT },
    });
  }

  async probeFingerprint(): Promise<string | undefined> {
    let response: AxiosResponse;
    try {
      response = await this.http.head(this.archiveUrl, {
        validateStatus: () => true,
      });
    } catch (error) {
      metrics.archiveProbesCounter.inc({ result: 'error' });
      throw new TransportError('Archive probe failed', {
        url: this.archiveUrl,
        reason: errorMessage(error),
      });
    }

    if (response.status !== 200) {
      metrics.archiveProbesCounter.inc({ result: 'error' });
      throw new TransportError(
        `Archive probe failed with status ${response.status}`,
        { url: this.archiveUrl, status: response.status },
      );
    }

    metrics.archiveProbesCounter.inc({ result: 'success' });
    const etag = response.headers['etag'];
    if (typeof etag !== 'string' || normalizeEtag(etag) === '') {
      this.log.warn('Archive probe returned no ETag', { url: this.archiveUrl });
      return undefined;
    }
    return normalizeEtag(etag);
  }

  async download(): Promise<Buffer> {
    this.log.info('Downloading archive', { url: this.archiveUrl });
    const start = Date.now();

    let response: AxiosResponse<ArrayBuffer>;
    try {
      response = await this.http.get<ArrayBuffer>(this.archiveUrl, {
        responseType: 'arraybuffer',
        validateStatus: () => true,
      });
    } catch (error) {
      metrics.archiveDownloadsCounter.inc({ result: 'error' });
      throw new TransportError('Archive download failed', {
        url: this.archiveUrl,
        reason: errorMessage(error),
      });
    }

    if (response.status !== 200) {
      metrics.archiveDownloadsCounter.inc({ result: 'error' });
      throw new TransportError(
        `Archive download failed with status ${response.status}`,
        { url: this.archiveUrl, status: response.status },
      );
    }

    const data = Buffer.from(response.data);
    metrics.archiveDownloadsCounter.inc({ result: 'success' });
    this.log.info('Downloaded archive', {
      url: this.archiveUrl,
      size: data.length,
      durationMs: Date.now() - start,
    });
    return data;
  }
}
