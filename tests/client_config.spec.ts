/**
 * Client config tests
 *
 * Tests:
 *   G1: defaults with no file and no env
 *   G2: dev environment points at the local server
 *   G3: values from the YAML file
 *   G4: environment variables override the file
 *   G5: out-of-range timeout → CONFIG_INVALID
 *   G6: invalid server URL → CONFIG_INVALID
 *   G7: non-mapping YAML → CONFIG_INVALID
 *   G8: TRADE_LINK_CONFIG selects the file
 *   G9: unknown environment names fall back to prod
 *
 * Run: npx tsx --test tests/client_config.spec.ts
 */

import { test } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { homedir, tmpdir } from 'os';
import { join } from 'path';
import { loadClientConfig, parseEnvironment } from '../src/config/client_config.js';
import { isTradeClientError } from '../src/errors.js';

function withConfigFile(contents: string | null, fn: (path: string) => void): void {
  const dir = mkdtempSync(join(tmpdir(), 'trade-link-config-'));
  const path = join(dir, 'trade-link.yaml');
  try {
    if (contents !== null) writeFileSync(path, contents);
    fn(path);
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
}

test('G1: defaults with no file and no env', () => {
  withConfigFile(null, (path) => {
    assert.deepEqual(loadClientConfig({ configPath: path, env: {} }), {
      serverUrl: 'https://trade.example.net',
      requestTimeoutSeconds: 30,
      debugLogging: false,
      dataDir: join(homedir(), '.trade-link'),
      environment: 'prod'
    });
  });
});

test('G2: dev environment points at the local server', () => {
  withConfigFile(null, (path) => {
    const config = loadClientConfig({ configPath: path, env: { TRADE_LINK_ENV: 'dev' } });
    assert.equal(config.serverUrl, 'http://localhost:5000');
    assert.equal(config.environment, 'dev');
  });
});

test('G3: values from the YAML file', () => {
  const yaml = [
    'server_url: http://trade.test:8080',
    'request_timeout_seconds: 10',
    'debug_logging: true',
    'data_dir: /tmp/trade-link-test',
    'environment: dev',
    ''
  ].join('\n');

  withConfigFile(yaml, (path) => {
    assert.deepEqual(loadClientConfig({ configPath: path, env: {} }), {
      serverUrl: 'http://trade.test:8080',
      requestTimeoutSeconds: 10,
      debugLogging: true,
      dataDir: '/tmp/trade-link-test',
      environment: 'dev'
    });
  });
});

test('G4: environment variables override the file', () => {
  withConfigFile('server_url: http://trade.test:8080\nrequest_timeout_seconds: 10\ndebug_logging: true\n', (path) => {
    const config = loadClientConfig({
      configPath: path,
      env: {
        TRADE_LINK_SERVER_URL: 'http://override.test',
        TRADE_LINK_TIMEOUT_SECONDS: '45',
        TRADE_LINK_DEBUG: 'false'
      }
    });
    assert.equal(config.serverUrl, 'http://override.test');
    assert.equal(config.requestTimeoutSeconds, 45);
    assert.equal(config.debugLogging, false);
  });
});

test('G5: out-of-range timeout → CONFIG_INVALID', () => {
  withConfigFile(null, (path) => {
    assert.throws(
      () => loadClientConfig({ configPath: path, env: { TRADE_LINK_TIMEOUT_SECONDS: '2' } }),
      (err: unknown) => isTradeClientError(err, 'CONFIG_INVALID') && /request_timeout_seconds/.test(err.message)
    );
  });
});

test('G6: invalid server URL → CONFIG_INVALID', () => {
  withConfigFile(null, (path) => {
    assert.throws(
      () => loadClientConfig({ configPath: path, env: { TRADE_LINK_SERVER_URL: 'not a url' } }),
      (err: unknown) => isTradeClientError(err, 'CONFIG_INVALID') && /server_url/.test(err.message)
    );
  });
});

test('G7: non-mapping YAML → CONFIG_INVALID', () => {
  withConfigFile('- a\n- b\n', (path) => {
    assert.throws(
      () => loadClientConfig({ configPath: path, env: {} }),
      (err: unknown) =>
        isTradeClientError(err, 'CONFIG_INVALID') &&
        err.message === `Invalid client config ${path}: expected a mapping at the top level`
    );
  });
});

test('G8: TRADE_LINK_CONFIG selects the file', () => {
  withConfigFile('request_timeout_seconds: 20\n', (path) => {
    const config = loadClientConfig({ env: { TRADE_LINK_CONFIG: path } });
    assert.equal(config.requestTimeoutSeconds, 20);
  });
});

test('G9: unknown environment names fall back to prod', () => {
  assert.equal(parseEnvironment('staging'), 'prod');
  assert.equal(parseEnvironment(undefined), 'prod');
  assert.equal(parseEnvironment(' DEV '), 'dev');
});
