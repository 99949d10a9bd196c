/**
 * Session Manager: identity ticket → bearer token, and the token's two copies.
 *
 * Lifecycle:
 *   new SessionManager(...)  loads the durable cache once; an expired entry is deleted
 *   ensureAuthenticated()    ticket → POST /auth/login → token (24h window)
 *   renewExpiry()            sliding expiration after each successful call
 *   clearToken()             server rejected the token
 *   cleanup()                shutdown: cancel ticket, drop in-memory credentials
 *
 * Invariants:
 *   - At most one identity ticket is outstanding; a new one is only requested
 *     after the previous one is canceled.
 *   - Token validity is re-evaluated against the clock on every check, never cached.
 *   - Memory and durable cache change together. Within a process, memory is
 *     authoritative; across restarts, the durable cache is.
 *   - Overlapping ensureAuthenticated() calls share one in-flight attempt.
 */

import { TradeClientError, errorMessage } from '../errors.js';
import type { IdentityProvider, IdentityTicket } from '../interfaces/identity_provider.js';
import type { TokenCache } from '../interfaces/token_cache.js';
import { decodeLoginToken, encodeLoginRequest } from '../codec/trade_codec.js';
import { redact, silentLogger, type Logger } from '../logging.js';
import { TimerScheduler, systemClock, type Clock, type Scheduler } from '../runtime/scheduler.js';

export const TOKEN_TTL_MS = 24 * 60 * 60 * 1000;
export const MAX_LOGIN_ATTEMPTS = 3;
export const LOGIN_RETRY_DELAY_MS = 2_000;

/** Sends a login payload to the server and returns the raw response body. */
export interface LoginExchange {
  login(payload: string): Promise<string>;
}

/** The slice of the session the Request Client depends on. */
export interface TokenSource {
  getToken(): string | null;
  hasValidToken(): boolean;
  ensureAuthenticated(): Promise<void>;
  renewExpiry(): void;
  clearToken(): void;
}

export interface SessionManagerOptions {
  provider: IdentityProvider;
  cache: TokenCache;
  exchange: LoginExchange;
  scheduler?: Scheduler;
  clock?: Clock;
  logger?: Logger;
  tokenTtlMs?: number;
  maxLoginAttempts?: number;
  loginRetryDelayMs?: number;
}

export interface SessionIdentity {
  displayName: string;
  identityHandle: string;
}

export function ticketToHex(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('hex');
}

export class SessionManager implements TokenSource {
  private readonly provider: IdentityProvider;
  private readonly cache: TokenCache;
  private readonly exchange: LoginExchange;
  private readonly scheduler: Scheduler;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly tokenTtlMs: number;
  private readonly maxLoginAttempts: number;
  private readonly loginRetryDelayMs: number;

  private token: string | null = null;
  private expiresAt = 0;
  private ticket: IdentityTicket | null = null;
  private inFlight: Promise<void> | null = null;

  constructor(options: SessionManagerOptions) {
    this.provider = options.provider;
    this.cache = options.cache;
    this.exchange = options.exchange;
    this.scheduler = options.scheduler ?? new TimerScheduler();
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? silentLogger;
    this.tokenTtlMs = options.tokenTtlMs ?? TOKEN_TTL_MS;
    this.maxLoginAttempts = Math.max(1, options.maxLoginAttempts ?? MAX_LOGIN_ATTEMPTS);
    this.loginRetryDelayMs = options.loginRetryDelayMs ?? LOGIN_RETRY_DELAY_MS;

    this.loadCachedToken();
  }

  hasValidToken(): boolean {
    return this.token !== null && this.token !== '' && this.clock.now() < this.expiresAt;
  }

  /** Absolute expiry in ms, or null when no token is held. */
  tokenExpiresAt(): number | null {
    return this.token === null ? null : this.expiresAt;
  }

  /**
   * The cached token if it is valid right now. Otherwise null, and one
   * background authentication is started so a later call may succeed.
   */
  getToken(): string | null {
    if (this.hasValidToken()) return this.token;

    if (this.token !== null) {
      this.logger.warn('token_expired', { error_type: 'TOKEN_EXPIRED', expired_at: new Date(this.expiresAt).toISOString() });
      this.token = null;
      this.expiresAt = 0;
      this.cache.clear();
    } else {
      this.logger.debug('token_missing');
    }

    this.ensureAuthenticated().catch((err: unknown) => {
      this.logger.warn('background_authentication_failed', { reason: errorMessage(err) });
    });
    return null;
  }

  /**
   * Resolve once a valid token is cached.
   *
   * @throws TradeClientError IDENTITY_UNAVAILABLE | AUTH_EXCHANGE_FAILED
   */
  ensureAuthenticated(): Promise<void> {
    if (this.hasValidToken()) return Promise.resolve();
    if (this.inFlight) return this.inFlight;

    this.inFlight = this.authenticate().finally(() => {
      this.inFlight = null;
    });
    return this.inFlight;
  }

  /** Resolves after any in-flight authentication has finished, whatever its outcome. */
  settled(): Promise<void> {
    if (!this.inFlight) return Promise.resolve();
    return this.inFlight.then(
      () => undefined,
      () => undefined
    );
  }

  /** Slide a still-valid token's expiry forward. An expired token stays expired. */
  renewExpiry(): void {
    const token = this.token;
    if (token === null || !this.hasValidToken()) return;
    this.storeToken(token);
    this.logger.debug('token_renewed', { expires_at: new Date(this.expiresAt).toISOString() });
  }

  clearToken(): void {
    this.token = null;
    this.expiresAt = 0;
    this.cache.clear();
    this.logger.info('token_cleared');
  }

  /**
   * Cancel the outstanding ticket and drop in-memory credentials. The durable
   * cache survives unless purgeDurable is set, so the next start can reuse it.
   */
  cleanup(options: { purgeDurable?: boolean } = {}): void {
    this.cancelTicket();
    this.token = null;
    this.expiresAt = 0;
    if (options.purgeDurable) this.cache.clear();
    this.logger.info('session_cleaned_up', { purged_durable: options.purgeDurable ?? false });
  }

  currentIdentity(): SessionIdentity | null {
    if (!this.provider.isAvailable()) return null;
    return { displayName: this.provider.displayName(), identityHandle: this.provider.identityHandle() };
  }

  hasOutstandingTicket(): boolean {
    return this.ticket !== null;
  }

  // ─── Internals ──────────────────────────────────────────────────────────────

  private async authenticate(): Promise<void> {
    if (!this.provider.isAvailable()) {
      this.logger.error('identity_unavailable');
      throw new TradeClientError(
        'IDENTITY_UNAVAILABLE',
        'Identity provider is not available; sign in to the platform and try again'
      );
    }

    this.cancelTicket();
    const ticket = this.provider.requestTicket();
    if (!ticket || ticket.bytes.length === 0) {
      this.logger.error('identity_ticket_refused');
      throw new TradeClientError('IDENTITY_UNAVAILABLE', 'Identity provider did not issue an authentication ticket');
    }
    this.ticket = ticket;

    const payload = encodeLoginRequest(ticketToHex(ticket.bytes), this.provider.displayName());
    let lastError = 'no response';

    for (let attempt = 1; attempt <= this.maxLoginAttempts; attempt++) {
      try {
        const body = await this.exchange.login(payload);
        const token = decodeLoginToken(body);
        if (token) {
          this.storeToken(token);
          this.logger.info('authenticated', {
            attempt,
            token: redact(token),
            expires_at: new Date(this.expiresAt).toISOString()
          });
          return;
        }
        lastError = 'no token in login response';
      } catch (err) {
        lastError = errorMessage(err);
      }

      if (attempt < this.maxLoginAttempts) {
        this.logger.warn('login_attempt_failed', { attempt, reason: lastError, retry_in_ms: this.loginRetryDelayMs });
        await this.scheduler.delay(this.loginRetryDelayMs);
      }
    }

    this.logger.error('login_failed', { attempts: this.maxLoginAttempts, reason: lastError });
    throw new TradeClientError(
      'AUTH_EXCHANGE_FAILED',
      `Server authentication failed after ${this.maxLoginAttempts} attempts: ${lastError}`
    );
  }

  private storeToken(token: string): void {
    this.token = token;
    this.expiresAt = this.clock.now() + this.tokenTtlMs;
    this.cache.write({ token, expiresAtUnixSeconds: Math.floor(this.expiresAt / 1000) });
  }

  private cancelTicket(): void {
    if (!this.ticket) return;
    this.provider.cancelTicket(this.ticket);
    this.ticket = null;
  }

  private loadCachedToken(): void {
    const entry = this.cache.read();
    if (!entry) return;

    const expiresAt = entry.expiresAtUnixSeconds * 1000;
    if (this.clock.now() >= expiresAt) {
      this.logger.warn('cached_token_expired', { error_type: 'TOKEN_EXPIRED', expired_at: new Date(expiresAt).toISOString() });
      this.cache.clear();
      this.token = null;
      this.expiresAt = 0;
      return;
    }

    this.token = entry.token;
    this.expiresAt = expiresAt;
    this.logger.info('cached_token_loaded', { expires_at: new Date(expiresAt).toISOString() });
  }
}
