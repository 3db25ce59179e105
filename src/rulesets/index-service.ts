/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import fse from 'fs-extra';
import fs from 'node:fs';
import path from 'node:path';
import winston from 'winston';

import { errorMessage, isErrnoException } from '../lib/error.js';
import { ArchiveSource, ListArchive } from '../types.js';

/**
 * Serializes the name to URL index with members in lexicographic order.
 * Built by hand because JSON.stringify moves integer-like keys to the front.
 */
export function buildIndex(archive: ListArchive, geositeBaseUrl: string) {
  const base = geositeBaseUrl.replace(/\/+$/, '');
  const names = archive.listMembers();
  if (names.length === 0) {
    return '{}';
  }
  const lines = names.map(
    (name) => `  ${JSON.stringify(name)}: ${JSON.stringify(`${base}/${name}`)}`,
  );
  return `{\n${lines.join(',\n')}\n}`;
}

/**
 * Publishes the list index. The index for the configured base URL is kept in
 * memory per archive fingerprint and optionally mirrored to a file.
 */
export class IndexService {
  private log: winston.Logger;
  private archiveSource: ArchiveSource;
  private baseUrl?: string;
  private indexPath?: string;
  private cached?: { fingerprint: string; body: string };

  constructor({
    log,
    archiveSource,
    baseUrl,
    indexPath,
  }: {
    log: winston.Logger;
    archiveSource: ArchiveSource;
    baseUrl?: string;
    indexPath?: string;
  }) {
    this.log = log.child({ class: this.constructor.name });
    this.archiveSource = archiveSource;
    this.baseUrl = baseUrl?.replace(/\/+$/, '');
    this.indexPath = indexPath;
  }

  /**
   * Rebuilds the index for the configured base URL when the archive changed
   * (or the index file went missing). No-op without a base URL.
   */
  async refresh(): Promise<void> {
    if (this.baseUrl === undefined) {
      return;
    }

    const { archive, fingerprint } = await this.archiveSource.ensureFresh();
    if (
      this.cached?.fingerprint === fingerprint &&
      (this.indexPath === undefined || (await fse.pathExists(this.indexPath)))
    ) {
      return;
    }

    const body = buildIndex(archive, `${this.baseUrl}/geosite`);
    this.cached = { fingerprint, body };
    this.log.info('Index rebuilt', {
      fingerprint,
      members: archive.listMembers().length,
    });

    if (this.indexPath !== undefined) {
      await this.writeIndexFile(this.indexPath, body);
      this.log.info('Index saved', { path: this.indexPath });
    }
  }

  /**
   * Index body for a request: the index file when readable, then the
   * in-memory index, then one built against the request's own base URL.
   */
  async getIndex(requestBaseUrl: string): Promise<string> {
    if (this.indexPath !== undefined) {
      try {
        return await fs.promises.readFile(this.indexPath, 'utf8');
      } catch (error) {
        if (!isErrnoException(error) || error.code !== 'ENOENT') {
          this.log.warn('Failed to read index file', {
            path: this.indexPath,
            error: errorMessage(error),
          });
        }
      }
    }

    if (this.cached !== undefined) {
      return this.cached.body;
    }

    const { archive } = await this.archiveSource.ensureFresh();
    return buildIndex(archive, `${requestBaseUrl}/geosite`);
  }

  private async writeIndexFile(filePath: string, body: string) {
    await fse.ensureDir(path.dirname(filePath));
    const tmpPath = `${filePath}.tmp`;
    await fs.promises.writeFile(tmpPath, body);
    await fse.move(tmpPath, filePath, { overwrite: true });
  }
}
