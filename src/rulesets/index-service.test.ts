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

import {
  MemoryArchive,
  StaticArchiveSource,
} from '../../test/archive-fixtures.js';
import { buildIndex, IndexService } from './index-service.js';

let log: winston.Logger;
let tmpDir: string;
let archiveSource: StaticArchiveSource;

const archive = new MemoryArchive({
  google: 'domain:google.com',
  apple: 'domain:apple.com',
  '123': 'domain:123.test',
});

const EXPECTED_INDEX = [
  '{',
  '  "123": "https://rules.test/geosite/123",',
  '  "apple": "https://rules.test/geosite/apple",',
  '  "google": "https://rules.test/geosite/google"',
  '}',
].join('\n');

before(() => {
  log = winston.createLogger({ silent: true });
});

beforeEach(async () => {
  tmpDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'index-'));
  archiveSource = new StaticArchiveSource(archive, 'v1');
});

afterEach(async () => {
  await fs.promises.rm(tmpDir, { recursive: true, force: true });
});

describe('buildIndex', () => {
  it('should map names to URLs in lexicographic order', () => {
    assert.equal(
      buildIndex(archive, 'https://rules.test/geosite/'),
      EXPECTED_INDEX,
    );
  });

  it('should render an empty object for an empty archive', () => {
    assert.equal(buildIndex(new MemoryArchive({}), 'https://x.test'), '{}');
  });

  it('should produce valid JSON', () => {
    assert.deepEqual(
      JSON.parse(buildIndex(archive, 'https://rules.test/geosite')),
      {
        '123': 'https://rules.test/geosite/123',
        apple: 'https://rules.test/geosite/apple',
        google: 'https://rules.test/geosite/google',
      },
    );
  });
});

describe('IndexService', () => {
  describe('refresh', () => {
    it('should do nothing without a base URL', async () => {
      const indexPath = path.join(tmpDir, 'index.json');
      const service = new IndexService({ log, archiveSource, indexPath });
      await service.refresh();
      assert.equal(archiveSource.ensureFreshCalls, 0);
      assert.equal(fs.existsSync(indexPath), false);
    });

    it('should write the index file', async () => {
      const indexPath = path.join(tmpDir, 'public', 'index.json');
      const service = new IndexService({
        log,
        archiveSource,
        baseUrl: 'https://rules.test/',
        indexPath,
      });

      await service.refresh();
      assert.equal(
        await fs.promises.readFile(indexPath, 'utf8'),
        EXPECTED_INDEX,
      );
      assert.equal(fs.existsSync(`${indexPath}.tmp`), false);
    });

    it('should skip rebuilding for an unchanged fingerprint', async () => {
      const indexPath = path.join(tmpDir, 'index.json');
      const service = new IndexService({
        log,
        archiveSource,
        baseUrl: 'https://rules.test',
        indexPath,
      });

      await service.refresh();
      await fs.promises.writeFile(indexPath, 'edited');
      await service.refresh();
      assert.equal(await fs.promises.readFile(indexPath, 'utf8'), 'edited');
    });

    it('should rewrite a missing index file', async () => {
      const indexPath = path.join(tmpDir, 'index.json');
      const service = new IndexService({
        log,
        archiveSource,
        baseUrl: 'https://rules.test',
        indexPath,
      });

      await service.refresh();
      await fs.promises.rm(indexPath);
      await service.refresh();
      assert.equal(
        await fs.promises.readFile(indexPath, 'utf8'),
        EXPECTED_INDEX,
      );
    });

    it('should rebuild when the fingerprint changes', async () => {
      const service = new IndexService({
        log,
        archiveSource,
        baseUrl: 'https://rules.test',
      });

      await service.refresh();
      archiveSource.snapshot = {
        archive: new MemoryArchive({ netflix: '' }),
        fingerprint: 'v2',
      };
      await service.refresh();
      assert.equal(
        await service.getIndex('http://ignored.test'),
        '{\n  "netflix": "https://rules.test/geosite/netflix"\n}',
      );
    });
  });

  describe('getIndex', () => {
    it('should prefer the index file', async () => {
      const indexPath = path.join(tmpDir, 'index.json');
      const service = new IndexService({
        log,
        archiveSource,
        baseUrl: 'https://rules.test',
        indexPath,
      });

      await service.refresh();
      await fs.promises.writeFile(indexPath, '{"custom": "index"}');
      assert.equal(
        await service.getIndex('http://ignored.test'),
        '{"custom": "index"}',
      );
    });

    it('should fall back to the cached index', async () => {
      const service = new IndexService({
        log,
        archiveSource,
        baseUrl: 'https://rules.test',
        indexPath: path.join(tmpDir, 'missing', 'index.json'),
      });

      await service.refresh();
      await fs.promises.rm(path.join(tmpDir, 'missing'), { recursive: true });
      assert.equal(
        await service.getIndex('http://ignored.test'),
        EXPECTED_INDEX,
      );
    });

    it('should build against the request base URL as a last resort', async () => {
      const service = new IndexService({ log, archiveSource });
      assert.equal(
        await service.getIndex('http://localhost:8080'),
        [
          '{',
          '  "123": "http://localhost:8080/geosite/123",',
          '  "apple": "http://localhost:8080/geosite/apple",',
          '  "google": "http://localhost:8080/geosite/google"',
          '}',
        ].join('\n'),
      );
    });
  });
});
