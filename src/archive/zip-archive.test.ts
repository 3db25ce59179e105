/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { strict as assert } from 'node:assert';
import { describe, it } from 'node:test';

import { buildArchive } from '../../test/archive-fixtures.js';
import { FormatError, NotFoundError } from '../lib/error.js';
import { ZipArchive } from './zip-archive.js';

describe('ZipArchive', () => {
  const data = buildArchive(
    {
      zeta: 'domain:zeta.example\n',
      google: 'domain:google.com\nfull:www.google.com\n',
      alpha: 'alpha.example\n',
      'nested/inner': 'domain:nested.example\n',
    },
    {
      'domain-list-community-master/README.md': '# readme\n',
      'domain-list-community-master/data/empty-dir/': '',
    },
  );

  describe('fromBuffer', () => {
    it('should throw FormatError for bytes that are not a ZIP', () => {
      assert.throws(
        () => ZipArchive.fromBuffer(Buffer.from('not a zip archive')),
        FormatError,
      );
    });

    it('should only index entries directly under the data prefix', () => {
      const archive = ZipArchive.fromBuffer(data);
      assert.deepEqual(archive.listMembers(), ['alpha', 'google', 'zeta']);
    });

    it('should honor a custom data prefix', () => {
      const archive = ZipArchive.fromBuffer(data, {
        dataPrefix: 'domain-list-community-master/',
      });
      assert.deepEqual(archive.listMembers(), ['README.md']);
    });
  });

  describe('readMember', () => {
    it('should return the member text', async () => {
      const archive = ZipArchive.fromBuffer(data);
      assert.equal(
        await archive.readMember('google'),
        'domain:google.com\nfull:www.google.com\n',
      );
    });

    it('should reject with NotFoundError for a missing member', async () => {
      const archive = ZipArchive.fromBuffer(data);
      await assert.rejects(archive.readMember('missing'), (error: unknown) => {
        assert.ok(error instanceof NotFoundError);
        assert.equal(error.member, 'missing');
        assert.equal(error.message, 'List not found: missing');
        return true;
      });
    });

    it('should not expose nested entries as members', async () => {
      const archive = ZipArchive.fromBuffer(data);
      await assert.rejects(archive.readMember('nested/inner'), NotFoundError);
    });
  });
});
