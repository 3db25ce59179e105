/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import AdmZip from 'adm-zip';

import { DEFAULT_DATA_PREFIX } from '../src/archive/zip-archive.js';
import { NotFoundError } from '../src/lib/error.js';
import {
  ArchiveSnapshot,
  ArchiveSource,
  ArchiveTransport,
  ListArchive,
} from '../src/types.js';

/**
 * Builds an upstream-shaped ZIP. `lists` land under the data directory,
 * `extraEntries` are added at their literal paths.
 */
export function buildArchive(
  lists: Record<string, string>,
  extraEntries: Record<string, string> = {},
): Buffer {
  const zip = new AdmZip();
  for (const [name, text] of Object.entries(lists)) {
    zip.addFile(`${DEFAULT_DATA_PREFIX}${name}`, Buffer.from(text, 'utf8'));
  }
  for (const [entryName, text] of Object.entries(extraEntries)) {
    zip.addFile(entryName, Buffer.from(text, 'utf8'));
  }
  return zip.toBuffer();
}

export class MemoryArchive implements ListArchive {
  readonly reads: string[] = [];
  private lists: Map<string, string>;

  constructor(lists: Record<string, string>) {
    this.lists = new Map(Object.entries(lists));
  }

  listMembers(): string[] {
    return [...this.lists.keys()].sort();
  }

  async readMember(name: string): Promise<string> {
    this.reads.push(name);
    const text = this.lists.get(name);
    if (text === undefined) {
      throw new NotFoundError(name);
    }
    return text;
  }
}

/** Transport whose answers are set per test. */
export class FakeTransport implements ArchiveTransport {
  probeCalls = 0;
  downloadCalls = 0;
  fingerprint: string | undefined;
  data: Buffer;
  probeError?: Error;
  downloadError?: Error;

  constructor({
    fingerprint,
    data,
  }: {
    fingerprint: string | undefined;
    data: Buffer;
  }) {
    this.fingerprint = fingerprint;
    this.data = data;
  }

  async probeFingerprint(): Promise<string | undefined> {
    this.probeCalls++;
    if (this.probeError !== undefined) {
      throw this.probeError;
    }
    return this.fingerprint;
  }

  async download(): Promise<Buffer> {
    this.downloadCalls++;
    if (this.downloadError !== undefined) {
      throw this.downloadError;
    }
    return this.data;
  }
}

/** Archive source over a fixed in-memory archive. */
export class StaticArchiveSource implements ArchiveSource {
  ensureFreshCalls = 0;
  snapshot: ArchiveSnapshot;
  error?: Error;

  constructor(archive: ListArchive, fingerprint: string) {
    this.snapshot = { archive, fingerprint };
  }

  async ensureFresh(): Promise<ArchiveSnapshot> {
    this.ensureFreshCalls++;
    if (this.error !== undefined) {
      throw this.error;
    }
    return this.snapshot;
  }

  async forceRefresh(): Promise<ArchiveSnapshot> {
    return this.ensureFresh();
  }

  getFingerprint(): string | undefined {
    return this.snapshot.fingerprint;
  }
}
