/**
 * HTTP transport: moves request text to the server and response text back.
 *
 * The transport does not judge status codes: any response that arrives is
 * returned as { status, body }. It rejects only when no response arrived
 * (connection refused, timeout, DNS), with TRANSPORT_ERROR.
 *
 * Bodies stay raw text in both directions; the codec owns the wire format.
 */

import axios, { type AxiosInstance } from 'axios';
import { TradeClientError } from '../errors.js';

export type HttpMethod = 'GET' | 'POST';

export interface TransportRequest {
  method: HttpMethod;
  /** Path relative to the server base URL, e.g. "/forsale". */
  path: string;
  headers: Record<string, string>;
  body?: string;
}

export interface TransportResponse {
  status: number;
  body: string;
}

export interface HttpTransport {
  send(request: TransportRequest): Promise<TransportResponse>;
}

export interface AxiosTransportOptions {
  baseUrl: string;
  timeoutMs: number;
  /** Pre-built axios instance; tests pass one with an in-process adapter. */
  instance?: AxiosInstance;
}

export function joinUrl(baseUrl: string, path: string): string {
  return `${baseUrl.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`;
}

export class AxiosTransport implements HttpTransport {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly http: AxiosInstance;

  constructor(options: AxiosTransportOptions) {
    this.baseUrl = options.baseUrl;
    this.timeoutMs = options.timeoutMs;
    this.http = options.instance ?? axios.create();
  }

  async send(request: TransportRequest): Promise<TransportResponse> {
    const url = joinUrl(this.baseUrl, request.path);
    try {
      const response = await this.http.request<unknown>({
        url,
        method: request.method,
        headers: request.headers,
        data: request.body,
        timeout: this.timeoutMs,
        responseType: 'text',
        transformResponse: [(data: unknown) => data],
        validateStatus: () => true
      });
      return { status: response.status, body: toText(response.data) };
    } catch (err) {
      if (axios.isAxiosError(err)) {
        const reason = err.code === 'ECONNABORTED' || err.code === 'ETIMEDOUT'
          ? `Request timed out after ${this.timeoutMs}ms`
          : err.message;
        throw new TradeClientError('TRANSPORT_ERROR', `${request.method} ${request.path} failed: ${reason}`, { cause: err });
      }
      const reason = err instanceof Error ? err.message : String(err);
      throw new TradeClientError('TRANSPORT_ERROR', `${request.method} ${request.path} failed: ${reason}`, { cause: err });
    }
  }
}

function toText(data: unknown): string {
  if (typeof data === 'string') return data;
  if (data === undefined || data === null) return '';
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  return JSON.stringify(data);
}
