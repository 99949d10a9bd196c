/**
 * Session manager tests
 *
 * Tests:
 *   S1: a valid cached token is used without touching the provider
 *   S2: an expired cache entry is deleted on construction
 *   S3: login exchanges the hex ticket and caches the token for 24h
 *   S4: login is attempted 3 times, 2s apart, then AUTH_EXCHANGE_FAILED
 *   S5: a later attempt can still succeed
 *   S6: provider unavailable → IDENTITY_UNAVAILABLE, no exchange
 *   S7: provider refuses a ticket → IDENTITY_UNAVAILABLE
 *   S8: overlapping calls share one attempt
 *   S9: a new ticket cancels the previous one
 *   S10: getToken on an expired token returns null and re-authenticates once
 *   S11: renewExpiry slides a valid token
 *   S12: renewExpiry does not resurrect an expired token
 *   S13: cleanup cancels the ticket and keeps the durable cache unless purged
 *   S14: background authentication failures are logged
 *   S15: success on the second attempt caches a 24h token
 *
 * Run: npx tsx --test tests/session_manager.spec.ts
 */

import { test } from 'node:test';
import assert from 'node:assert/strict';
import { isTradeClientError } from '../src/errors.js';
import { SessionManager, TOKEN_TTL_MS } from '../src/session/session_manager.js';
import { MemoryTokenCache } from '../src/stores/memory_token_cache.js';
import type { CachedToken } from '../src/interfaces/token_cache.js';
import type { Logger } from '../src/logging.js';
import {
  FakeIdentityProvider,
  ImmediateScheduler,
  ManualClock,
  ScriptedExchange,
  T0,
  capturingLogger
} from './helpers/fakes.js';

const T0_SECONDS = T0 / 1000;

function setup(options: { cached?: CachedToken; exchange?: ScriptedExchange; logger?: Logger } = {}) {
  const provider = new FakeIdentityProvider();
  const cache = new MemoryTokenCache(options.cached ?? null);
  const exchange = options.exchange ?? new ScriptedExchange('{"token":"test-token"}');
  const scheduler = new ImmediateScheduler();
  const clock = new ManualClock();
  const session = new SessionManager({ provider, cache, exchange, scheduler, clock, logger: options.logger });
  return { provider, cache, exchange, scheduler, clock, session };
}

test('S1: a valid cached token is used without touching the provider', async () => {
  const { provider, exchange, session } = setup({
    cached: { token: 'test-token', expiresAtUnixSeconds: T0_SECONDS + 3600 }
  });

  assert.equal(session.hasValidToken(), true);
  assert.equal(session.getToken(), 'test-token');
  await session.ensureAuthenticated();

  assert.equal(provider.requested, 0);
  assert.equal(exchange.payloads.length, 0);
});

test('S2: an expired cache entry is deleted on construction', () => {
  const { cache, session } = setup({
    cached: { token: 'test-token', expiresAtUnixSeconds: T0_SECONDS - 1 }
  });

  assert.equal(session.hasValidToken(), false);
  assert.equal(cache.read(), null);
});

test('S3: login exchanges the hex ticket and caches the token for 24h', async () => {
  const { cache, exchange, session } = setup();

  await session.ensureAuthenticated();

  assert.equal(exchange.payloads[0], '{"authTicket":"deadbeef","playerName":"Test Player"}');
  assert.equal(session.getToken(), 'test-token');
  assert.equal(session.tokenExpiresAt(), T0 + TOKEN_TTL_MS);
  assert.deepEqual(cache.read(), { token: 'test-token', expiresAtUnixSeconds: T0_SECONDS + 86_400 });
});

test('S4: login is attempted 3 times, 2s apart, then AUTH_EXCHANGE_FAILED', async () => {
  const { cache, exchange, scheduler, session } = setup({
    exchange: new ScriptedExchange(new Error('connection refused'))
  });

  await assert.rejects(session.ensureAuthenticated(), (err: unknown) => {
    assert.ok(isTradeClientError(err, 'AUTH_EXCHANGE_FAILED'));
    assert.equal(err.message, 'Server authentication failed after 3 attempts: connection refused');
    return true;
  });

  assert.equal(exchange.payloads.length, 3);
  assert.deepEqual(scheduler.delays, [2000, 2000]);
  assert.equal(cache.read(), null);
  assert.equal(session.hasValidToken(), false);
});

test('S5: a later attempt can still succeed', async () => {
  const { exchange, scheduler, session } = setup({
    exchange: new ScriptedExchange('{"error":"busy"}', new Error('timeout'), '{"token":"test-token"}')
  });

  await session.ensureAuthenticated();

  assert.equal(exchange.payloads.length, 3);
  assert.deepEqual(scheduler.delays, [2000, 2000]);
  assert.equal(session.getToken(), 'test-token');
});

test('S6: provider unavailable → IDENTITY_UNAVAILABLE, no exchange', async () => {
  const { provider, exchange, session } = setup();
  provider.available = false;

  await assert.rejects(session.ensureAuthenticated(), (err: unknown) => isTradeClientError(err, 'IDENTITY_UNAVAILABLE'));
  assert.equal(provider.requested, 0);
  assert.equal(exchange.payloads.length, 0);
  assert.equal(session.currentIdentity(), null);
});

test('S7: provider refuses a ticket → IDENTITY_UNAVAILABLE', async () => {
  const { provider, exchange, session } = setup();
  provider.ticketBytes = null;

  await assert.rejects(session.ensureAuthenticated(), (err: unknown) => isTradeClientError(err, 'IDENTITY_UNAVAILABLE'));
  assert.equal(provider.requested, 1);
  assert.equal(exchange.payloads.length, 0);
  assert.equal(session.hasOutstandingTicket(), false);
});

test('S8: overlapping calls share one attempt', async () => {
  const { provider, exchange, session } = setup();

  const first = session.ensureAuthenticated();
  const second = session.ensureAuthenticated();
  assert.equal(first, second);
  await Promise.all([first, second]);

  assert.equal(provider.requested, 1);
  assert.equal(exchange.payloads.length, 1);
});

test('S9: a new ticket cancels the previous one', async () => {
  const { provider, session } = setup();

  await session.ensureAuthenticated();
  assert.equal(provider.canceled.length, 0);

  session.clearToken();
  await session.ensureAuthenticated();

  assert.equal(provider.requested, 2);
  assert.equal(provider.canceled.length, 1);
  assert.equal(provider.canceled[0]?.handle, 1);
});

test('S10: getToken on an expired token returns null and re-authenticates once', async () => {
  const { provider, clock, session } = setup({
    exchange: new ScriptedExchange('{"token":"test-token"}', '{"token":"test-token-2"}')
  });

  await session.ensureAuthenticated();
  clock.advance(TOKEN_TTL_MS);

  assert.equal(session.getToken(), null);
  assert.equal(session.getToken(), null);
  assert.equal(provider.requested, 2);

  await session.settled();
  assert.equal(session.getToken(), 'test-token-2');
});

test('S11: renewExpiry slides a valid token', async () => {
  const { cache, clock, session } = setup();

  await session.ensureAuthenticated();
  clock.advance(3_600_000);
  session.renewExpiry();

  const expected = T0 + 3_600_000 + TOKEN_TTL_MS;
  assert.equal(session.tokenExpiresAt(), expected);
  assert.equal(cache.read()?.expiresAtUnixSeconds, expected / 1000);
});

test('S12: renewExpiry does not resurrect an expired token', async () => {
  const { clock, session } = setup();

  await session.ensureAuthenticated();
  clock.advance(TOKEN_TTL_MS);
  session.renewExpiry();

  assert.equal(session.hasValidToken(), false);
  assert.equal(session.tokenExpiresAt(), T0 + TOKEN_TTL_MS);
});

test('S13: cleanup cancels the ticket and keeps the durable cache unless purged', async () => {
  const { provider, cache, session } = setup();

  await session.ensureAuthenticated();
  session.cleanup();

  assert.equal(provider.canceled.length, 1);
  assert.equal(session.hasValidToken(), false);
  assert.notEqual(cache.read(), null);

  session.cleanup({ purgeDurable: true });
  assert.equal(cache.read(), null);
  assert.equal(provider.canceled.length, 1);
});

test('S14: background authentication failures are logged', async () => {
  const { logger, entries } = capturingLogger();
  const { provider, session } = setup({ logger });
  provider.available = false;

  assert.equal(session.getToken(), null);
  await session.settled();

  const failure = entries.find((e) => e.event === 'background_authentication_failed');
  assert.equal(failure?.level, 'warn');
});

test('S15: success on the second attempt caches a 24h token', async () => {
  const { cache, exchange, scheduler, session } = setup({
    exchange: new ScriptedExchange(new Error('socket hang up'), '{"token":"test-token"}')
  });

  await session.ensureAuthenticated();

  assert.equal(exchange.payloads.length, 2);
  assert.deepEqual(scheduler.delays, [2000]);
  assert.deepEqual(cache.read(), { token: 'test-token', expiresAtUnixSeconds: T0_SECONDS + 86_400 });
});
