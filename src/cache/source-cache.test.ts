/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { strict as assert } from 'node:assert';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, before, beforeEach, describe, it } from 'node:test';
import * as winston from 'winston';

import { buildArchive } from '../../test/archive-fixtures.js';
import { FormatError } from '../lib/error.js';
import { SourceCache } from './source-cache.js';

const TTL_MS = 1000;

let log: winston.Logger;
let currentTime: number;
let tmpDir: string;

before(() => {
  log = winston.createLogger({ silent: true });
});

beforeEach(async () => {
  currentTime = 10000;
  tmpDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'source-cache-'));
});

afterEach(async () => {
  await fs.promises.rm(tmpDir, { recursive: true, force: true });
});

function createCache(persistPath?: string) {
  return new SourceCache({
    log,
    ttlMs: TTL_MS,
    persistPath,
    now: () => currentTime,
  });
}

describe('SourceCache', () => {
  const data = buildArchive({ google: 'domain:google.com\n' });

  describe('get', () => {
    it('should miss when nothing is cached', () => {
      const cache = createCache();
      assert.equal(cache.get(), undefined);
      assert.equal(cache.getAny(), undefined);
      assert.equal(cache.getFingerprint(), undefined);
    });

    it('should hit until the TTL has elapsed', async () => {
      const cache = createCache();
      await cache.set(data, 'v1');

      currentTime += TTL_MS;
      assert.equal(cache.get()?.fingerprint, 'v1');

      currentTime += 1;
      assert.equal(cache.get(), undefined);
      assert.equal(cache.getAny()?.fingerprint, 'v1');
    });
  });

  describe('set', () => {
    it('should expose the parsed archive', async () => {
      const cache = createCache();
      const snapshot = await cache.set(data, 'v1');
      assert.equal(snapshot.fingerprint, 'v1');
      assert.deepEqual(snapshot.archive.listMembers(), ['google']);
      assert.equal(
        await snapshot.archive.readMember('google'),
        'domain:google.com\n',
      );
    });

    it('should reject an empty fingerprint', async () => {
      const cache = createCache();
      await assert.rejects(cache.set(data, ''), FormatError);
      assert.equal(cache.getAny(), undefined);
    });

    it('should keep the previous snapshot when the bytes are invalid', async () => {
      const cache = createCache();
      await cache.set(data, 'v1');
      await assert.rejects(
        cache.set(Buffer.from('truncated'), 'v2'),
        FormatError,
      );
      assert.equal(cache.getFingerprint(), 'v1');
    });

    it('should not fail when persisting fails', async () => {
      // a regular file where the snapshot directory should be
      const blocker = path.join(tmpDir, 'blocker');
      await fs.promises.writeFile(blocker, 'not a directory');
      const cache = createCache(path.join(blocker, 'archive.msgpack'));

      const snapshot = await cache.set(data, 'v1');
      assert.equal(snapshot.fingerprint, 'v1');
      assert.equal(cache.getFingerprint(), 'v1');
    });
  });

  describe('touch', () => {
    it('should restart the TTL window', async () => {
      const cache = createCache();
      await cache.set(data, 'v1');

      currentTime += TTL_MS + 1;
      assert.equal(cache.get(), undefined);

      cache.touch();
      assert.equal(cache.get()?.fingerprint, 'v1');
    });
  });

  describe('loadFromFile', () => {
    it('should restore a persisted snapshot', async () => {
      const persistPath = path.join(tmpDir, 'archive.msgpack');
      const writer = createCache(persistPath);
      await writer.set(data, 'v1');
      assert.equal(fs.existsSync(`${persistPath}.tmp`), false);

      const reader = createCache();
      assert.equal(await reader.loadFromFile(persistPath), true);
      assert.equal(reader.get()?.fingerprint, 'v1');
      assert.equal(
        await reader.get()?.archive.readMember('google'),
        'domain:google.com\n',
      );
    });

    it('should keep the persisted timestamp', async () => {
      const persistPath = path.join(tmpDir, 'archive.msgpack');
      await createCache(persistPath).set(data, 'v1');

      currentTime += TTL_MS + 1;
      const reader = createCache();
      await reader.loadFromFile(persistPath);
      assert.equal(reader.get(), undefined);
      assert.equal(reader.getAny()?.fingerprint, 'v1');
    });

    it('should resolve to false when the file does not exist', async () => {
      const cache = createCache();
      assert.equal(
        await cache.loadFromFile(path.join(tmpDir, 'missing.msgpack')),
        false,
      );
      assert.equal(cache.getAny(), undefined);
    });

    it('should reject a file that is not a snapshot', async () => {
      const persistPath = path.join(tmpDir, 'archive.msgpack');
      await fs.promises.writeFile(persistPath, 'garbage');
      const cache = createCache();
      await assert.rejects(cache.loadFromFile(persistPath), FormatError);
    });

    it('should persist later updates to the loaded path', async () => {
      const persistPath = path.join(tmpDir, 'archive.msgpack');
      const cache = createCache();
      await cache.loadFromFile(persistPath);
      await cache.set(data, 'v2');

      const reader = createCache();
      await reader.loadFromFile(persistPath);
      assert.equal(reader.getFingerprint(), 'v2');
    });
  });
});
