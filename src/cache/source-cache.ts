/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import fse from 'fs-extra';
import { Packr } from 'msgpackr';
import fs from 'node:fs';
import path from 'node:path';
import winston from 'winston';

import { ZipArchive } from '../archive/zip-archive.js';
import { errorMessage, FormatError, isErrnoException } from '../lib/error.js';
import * as metrics from '../metrics.js';
import { ArchiveSnapshot } from '../types.js';

interface CachedArchive {
  data: Buffer;
  archive: ZipArchive;
  fingerprint: string;
  timestamp: number;
}

interface PersistedArchive {
  data: Uint8Array;
  fingerprint: string;
  timestamp: number;
}

const packr = new Packr({ useRecords: false });

function isPersistedArchive(value: unknown): value is PersistedArchive {
  if (
    typeof value !== 'object' ||
    value === null ||
    !('data' in value) ||
    !('fingerprint' in value) ||
    !('timestamp' in value)
  ) {
    return false;
  }
  return (
    value.data instanceof Uint8Array &&
    typeof value.fingerprint === 'string' &&
    value.fingerprint !== '' &&
    typeof value.timestamp === 'number'
  );
}

/**
 * Holds the upstream archive snapshot. Bytes, parsed archive, fingerprint and
 * timestamp are swapped in a single assignment; an optional on-disk mirror is
 * written with temp-file-then-rename.
 */
export class SourceCache {
  private log: winston.Logger;
  private ttlMs: number;
  private dataPrefix?: string;
  private persistPath?: string;
  private now: () => number;
  private current?: CachedArchive;

  constructor({
    log,
    ttlMs,
    dataPrefix,
    persistPath,
    now = Date.now,
  }: {
    log: winston.Logger;
    ttlMs: number;
    dataPrefix?: string;
    persistPath?: string;
    now?: () => number;
  }) {
    this.log = log.child({ class: this.constructor.name });
    this.ttlMs = ttlMs;
    this.dataPrefix = dataPrefix;
    this.persistPath = persistPath;
    this.now = now;
  }

  /**
   * Returns the snapshot only while its TTL has not elapsed. A stale snapshot
   * is a miss even though getAny() would still return it.
   */
  get(): ArchiveSnapshot | undefined {
    if (this.current === undefined) {
      return undefined;
    }
    if (this.now() - this.current.timestamp > this.ttlMs) {
      return undefined;
    }
    return this.snapshot(this.current);
  }

  getAny(): ArchiveSnapshot | undefined {
    return this.current === undefined
      ? undefined
      : this.snapshot(this.current);
  }

  getFingerprint(): string | undefined {
    return this.current?.fingerprint;
  }

  async set(data: Buffer, fingerprint: string): Promise<ArchiveSnapshot> {
    if (fingerprint === '') {
      throw new FormatError('Archive fingerprint must not be empty');
    }

    // throws before any state is touched
    const archive = ZipArchive.fromBuffer(data, {
      dataPrefix: this.dataPrefix,
    });

    const next: CachedArchive = {
      data,
      archive,
      fingerprint,
      timestamp: this.now(),
    };
    this.current = next;
    metrics.archiveSizeGauge.set(data.length);

    if (this.persistPath !== undefined) {
      try {
        await this.persist(this.persistPath, next);
      } catch (error) {
        metrics.archivePersistErrorsCounter.inc();
        this.log.error('Failed to persist archive snapshot', {
          path: this.persistPath,
          error: errorMessage(error),
        });
      }
    }

    return this.snapshot(next);
  }

  /**
   * Restarts the TTL window of the current snapshot, used when the upstream
   * reports the same fingerprint.
   */
  touch(): void {
    if (this.current !== undefined) {
      this.current = { ...this.current, timestamp: this.now() };
    }
  }

  /**
   * Restores a persisted snapshot and enables persistence to the same path.
   * Resolves to false when the file does not exist; other failures reject.
   */
  async loadFromFile(filePath: string): Promise<boolean> {
    this.persistPath = filePath;

    let raw: Buffer;
    try {
      raw = await fs.promises.readFile(filePath);
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return false;
      }
      throw error;
    }

    let decoded: unknown;
    try {
      decoded = packr.unpack(raw);
    } catch (error) {
      throw new FormatError('Invalid archive snapshot file', {
        path: filePath,
        reason: errorMessage(error),
      });
    }
    if (!isPersistedArchive(decoded)) {
      throw new FormatError('Invalid archive snapshot file', {
        path: filePath,
      });
    }

    const data = Buffer.from(
      decoded.data.buffer,
      decoded.data.byteOffset,
      decoded.data.byteLength,
    );
    const archive = ZipArchive.fromBuffer(data, {
      dataPrefix: this.dataPrefix,
    });
    this.current = {
      data,
      archive,
      fingerprint: decoded.fingerprint,
      timestamp: decoded.timestamp,
    };
    metrics.archiveSizeGauge.set(data.length);

    this.log.info('Loaded archive snapshot', {
      path: filePath,
      fingerprint: decoded.fingerprint,
      size: data.length,
    });
    return true;
  }

  private snapshot(cached: CachedArchive): ArchiveSnapshot {
    return { archive: cached.archive, fingerprint: cached.fingerprint };
  }

  private async persist(filePath: string, cached: CachedArchive) {
    await fse.ensureDir(path.dirname(filePath));

    // Write to a temporary file first so a crash never leaves a torn snapshot
    const tmpPath = `${filePath}.tmp`;
    const record: PersistedArchive = {
      data: cached.data,
      fingerprint: cached.fingerprint,
      timestamp: cached.timestamp,
    };
    try {
      await fs.promises.writeFile(tmpPath, packr.pack(record));
      await fse.move(tmpPath, filePath, { overwrite: true });
    } catch (error) {
      await fse.remove(tmpPath);
      throw error;
    }
  }
}
