/**
 * Token cache tests
 *
 * Tests:
 *   K1: write then read, on-disk format
 *   K2: overwriting with the same entry leaves identical bytes and no temp file
 *   K3: missing file reads as no entry
 *   K4: corrupt file reads as no entry and is logged
 *   K5: clear removes the file; clearing again is a no-op
 *   K6: missing data directories are created
 *   K7: memory cache copies entries in and out
 *
 * Run: npx tsx --test tests/token_cache.spec.ts
 */

import { test } from 'node:test';
import assert from 'node:assert/strict';
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { FileTokenCache, TOKEN_CACHE_FILE } from '../src/stores/file_token_cache.js';
import { MemoryTokenCache } from '../src/stores/memory_token_cache.js';
import { capturingLogger } from './helpers/fakes.js';

const ENTRY = { token: 'test-token', expiresAtUnixSeconds: 1_700_086_400 };

function withTempDir(fn: (dir: string) => void): void {
  const dir = mkdtempSync(join(tmpdir(), 'trade-link-cache-'));
  try {
    fn(dir);
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
}

test('K1: write then read, on-disk format', () => {
  withTempDir((dir) => {
    const cache = new FileTokenCache(dir);
    cache.write(ENTRY);

    assert.equal(cache.path, join(dir, TOKEN_CACHE_FILE));
    assert.deepEqual(cache.read(), ENTRY);
    assert.equal(readFileSync(cache.path, 'utf8'), '{"token":"test-token","expires_at":1700086400}');
  });
});

test('K2: overwriting with the same entry leaves identical bytes and no temp file', () => {
  withTempDir((dir) => {
    const cache = new FileTokenCache(dir);
    cache.write(ENTRY);
    const first = readFileSync(cache.path);
    cache.write(ENTRY);
    const second = readFileSync(cache.path);

    assert.ok(first.equals(second));
    assert.equal(existsSync(`${cache.path}.tmp`), false);
  });
});

test('K3: missing file reads as no entry', () => {
  withTempDir((dir) => {
    assert.equal(new FileTokenCache(dir).read(), null);
  });
});

test('K4: corrupt file reads as no entry and is logged', () => {
  withTempDir((dir) => {
    const { logger, entries } = capturingLogger();
    const cache = new FileTokenCache(dir, logger);
    writeFileSync(cache.path, '{not json');

    assert.equal(cache.read(), null);
    assert.equal(entries.length, 1);
    assert.equal(entries[0]?.event, 'token_cache_unreadable');
    assert.equal(entries[0]?.level, 'warn');
  });
});

test('K5: clear removes the file; clearing again is a no-op', () => {
  withTempDir((dir) => {
    const cache = new FileTokenCache(dir);
    cache.write(ENTRY);
    cache.clear();
    assert.equal(existsSync(cache.path), false);
    cache.clear();
    assert.equal(cache.read(), null);
  });
});

test('K6: missing data directories are created', () => {
  withTempDir((dir) => {
    const cache = new FileTokenCache(join(dir, 'a', 'b'));
    cache.write(ENTRY);
    assert.equal(existsSync(join(dir, 'a', 'b', TOKEN_CACHE_FILE)), true);
  });
});

test('K7: memory cache copies entries in and out', () => {
  const cache = new MemoryTokenCache();
  const entry = { ...ENTRY };
  cache.write(entry);
  entry.token = 'changed';

  const read = cache.read();
  assert.equal(read?.token, 'test-token');
  assert.equal(cache.writes, 1);

  cache.clear();
  assert.equal(cache.read(), null);
});
