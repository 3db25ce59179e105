/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import AdmZip from 'adm-zip';

import { errorMessage, FormatError, NotFoundError } from '../lib/error.js';
import { ListArchive } from '../types.js';

export const DEFAULT_DATA_PREFIX = 'domain-list-community-master/data/';

/**
 * Read-only view of the upstream ZIP. Only entries directly under the data
 * directory are addressable as members.
 */
export class ZipArchive implements ListArchive {
  private members: Map<string, AdmZip.IZipEntry>;

  private constructor(members: Map<string, AdmZip.IZipEntry>) {
    this.members = members;
  }

  /**
   * Parses and indexes the archive. Throws FormatError when the bytes are not
   * a readable ZIP so that a corrupt download never replaces a good snapshot.
   */
  static fromBuffer(
    data: Buffer,
    { dataPrefix = DEFAULT_DATA_PREFIX }: { dataPrefix?: string } = {},
  ): ZipArchive {
    let entries: AdmZip.IZipEntry[];
    try {
      entries = new AdmZip(data).getEntries();
    } catch (error) {
      throw new FormatError('Invalid archive', {
        cause: error,
        reason: errorMessage(error),
        size: data.length,
      });
    }

    const members = new Map<string, AdmZip.IZipEntry>();
    for (const entry of entries) {
      if (entry.isDirectory || !entry.entryName.startsWith(dataPrefix)) {
        continue;
      }
      const name = entry.entryName.slice(dataPrefix.length);
      if (name === '' || name.includes('/')) {
        continue;
      }
      members.set(name, entry);
    }

    return new ZipArchive(members);
  }

  listMembers(): string[] {
    return [...this.members.keys()].sort();
  }

  async readMember(name: string): Promise<string> {
    const entry = this.members.get(name);
    if (entry === undefined) {
      throw new NotFoundError(name);
    }

    try {
      return entry.getData().toString('utf8');
    } catch (error) {
      throw new FormatError(`Unreadable list: ${name}`, {
        cause: error,
        member: name,
        reason: errorMessage(error),
      });
    }
  }
}
