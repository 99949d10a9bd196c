/**
 * Request Client: one logical authenticated call, with exactly one re-auth retry.
 *
 *   attempt ──2xx──▶ renewExpiry(), resolve(body)
 *      │
 *      ├─401──▶ clearToken() → ensureAuthenticated() → deferred check
 *      │            │
 *      │            ├─ token valid ──▶ attempt again (no further 401 handling)
 *      │            └─ no token ─────▶ AUTH_REJECTED
 *      │
 *      └─other─▶ TRANSPORT_ERROR (status + server detail), no retry
 *
 * This is the only module that builds wire requests; the login exchange lives
 * here too (HttpLoginExchange) so SessionManager never touches the transport.
 */

import {
  RESTART_SESSION_MESSAGE,
  TradeClientError,
  errorMessage,
  isTradeClientError
} from '../errors.js';
import { decodeServerError } from '../codec/trade_codec.js';
import { silentLogger, type Logger } from '../logging.js';
import type { Scheduler } from '../runtime/scheduler.js';
import type { LoginExchange, TokenSource } from '../session/session_manager.js';
import type { HttpMethod, HttpTransport, TransportResponse } from './transport.js';

export const ENDPOINTS = {
  login: '/auth/login',
  forSale: '/forsale',
  trade: '/trade',
  buy: '/buy',
  pendingSales: '/sales/pending',
  claimSales: '/sales/claim'
} as const;

export interface ApiRequest {
  path: string;
  method: HttpMethod;
  /** JSON text, already encoded by the codec. */
  body?: string;
}

export interface RequestClientOptions {
  transport: HttpTransport;
  session: TokenSource;
  scheduler: Scheduler;
  logger?: Logger;
  /** Delay before checking whether re-authentication produced a token. */
  reauthCheckDelayMs?: number;
}

type AttemptOutcome =
  | { kind: 'ok'; body: string }
  | { kind: 'unauthorized'; reason: string }
  | { kind: 'failed'; error: TradeClientError };

function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}

function rejectionFor(request: ApiRequest, response: TransportResponse): TradeClientError {
  const detail = decodeServerError(response.body);
  const message = detail !== null
    ? `${request.method} ${request.path} rejected (HTTP ${response.status}): ${detail}`
    : `${request.method} ${request.path} failed with HTTP ${response.status}`;
  return new TradeClientError('TRANSPORT_ERROR', message, {
    status: response.status,
    detail: detail ?? undefined
  });
}

export class RequestClient {
  private readonly transport: HttpTransport;
  private readonly session: TokenSource;
  private readonly scheduler: Scheduler;
  private readonly logger: Logger;
  private readonly reauthCheckDelayMs: number;

  constructor(options: RequestClientOptions) {
    this.transport = options.transport;
    this.session = options.session;
    this.scheduler = options.scheduler;
    this.logger = options.logger ?? silentLogger;
    this.reauthCheckDelayMs = options.reauthCheckDelayMs ?? 0;
  }

  /**
   * Resolve with the raw response body of a 2xx answer.
   *
   * @throws TradeClientError AUTH_REJECTED | TRANSPORT_ERROR
   */
  async send(request: ApiRequest): Promise<string> {
    const first = await this.attempt(request);
    if (first.kind === 'ok') return first.body;
    if (first.kind === 'failed') throw first.error;

    this.logger.warn('request_unauthorized', { method: request.method, path: request.path, reason: first.reason });
    this.session.clearToken();
    await this.session.ensureAuthenticated().catch((err: unknown) => {
      this.logger.warn('reauthentication_failed', { path: request.path, reason: errorMessage(err) });
    });
    await this.scheduler.delay(this.reauthCheckDelayMs);

    if (!this.session.hasValidToken()) {
      this.logger.error('request_auth_rejected', { path: request.path, retried: false });
      throw new TradeClientError('AUTH_REJECTED', RESTART_SESSION_MESSAGE, { status: 401 });
    }

    const second = await this.attempt(request);
    if (second.kind === 'ok') return second.body;
    if (second.kind === 'failed') throw second.error;

    this.logger.error('request_auth_rejected', { path: request.path, retried: true });
    throw new TradeClientError('AUTH_REJECTED', RESTART_SESSION_MESSAGE, { status: 401 });
  }

  private async attempt(request: ApiRequest): Promise<AttemptOutcome> {
    const headers: Record<string, string> = { Accept: 'application/json' };
    const token = this.session.getToken();
    if (token) headers['Authorization'] = `Bearer ${token}`;
    if (request.body !== undefined) headers['Content-Type'] = 'application/json';

    let response: TransportResponse;
    try {
      response = await this.transport.send({
        method: request.method,
        path: request.path,
        headers,
        body: request.body
      });
    } catch (err) {
      const text = errorMessage(err);
      // Only a status says "unauthorized"; error text from the network never does.
      if (isTradeClientError(err) && err.status === 401) return { kind: 'unauthorized', reason: text };
      const error = isTradeClientError(err)
        ? err
        : new TradeClientError('TRANSPORT_ERROR', `${request.method} ${request.path} failed: ${text}`, { cause: err });
      this.logger.warn('request_failed', { method: request.method, path: request.path, reason: text });
      return { kind: 'failed', error };
    }

    this.logger.debug('response_received', { method: request.method, path: request.path, status: response.status });

    if (isSuccess(response.status)) {
      this.session.renewExpiry();
      return { kind: 'ok', body: response.body };
    }
    if (response.status === 401) {
      return { kind: 'unauthorized', reason: `HTTP 401 from ${request.path}` };
    }

    const error = rejectionFor(request, response);
    this.logger.warn('request_failed', { method: request.method, path: request.path, status: response.status, detail: error.detail });
    return { kind: 'failed', error };
  }
}

/** POST /auth/login without an auth header. */
export class HttpLoginExchange implements LoginExchange {
  private readonly transport: HttpTransport;

  constructor(transport: HttpTransport) {
    this.transport = transport;
  }

  async login(payload: string): Promise<string> {
    const request: ApiRequest = { method: 'POST', path: ENDPOINTS.login, body: payload };
    const response = await this.transport.send({
      method: request.method,
      path: request.path,
      headers: { Accept: 'application/json', 'Content-Type': 'application/json' },
      body: payload
    });
    if (isSuccess(response.status)) return response.body;
    throw rejectionFor(request, response);
  }
}
