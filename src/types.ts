/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */

export type Dialect = 'surge' | 'mihomo' | 'egern';

export const DIALECTS: readonly Dialect[] = ['surge', 'mihomo', 'egern'];

/**
 * Reads one named list member out of an archive. Implementations reject with
 * NotFoundError for a missing member and FormatError for content that cannot
 * be decoded.
 */
export interface ContentAccessor {
  readMember(name: string): Promise<string>;
}

export interface ListArchive extends ContentAccessor {
  /** Member names directly under the data directory, sorted. */
  listMembers(): string[];
}

export interface ArchiveSnapshot {
  archive: ListArchive;
  fingerprint: string;
}

export interface ArchiveTransport {
  /**
   * Cheap metadata-only request for the upstream version token. Resolves to
   * undefined when the upstream does not report one.
   */
  probeFingerprint(): Promise<string | undefined>;
  download(): Promise<Buffer>;
}

export interface ArchiveSource {
  ensureFresh(): Promise<ArchiveSnapshot>;
  forceRefresh(): Promise<ArchiveSnapshot>;
  getFingerprint(): string | undefined;
}

export interface RulesetRequest {
  name: string;
  filter: string;
  dialect: Dialect;
}
