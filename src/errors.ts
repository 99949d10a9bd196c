/**
 * TradeClientError: the single error type surfaced by trade-link.
 *
 * error_type gives callers a machine-readable category so a UI can tell
 * "try again" (TRANSPORT_ERROR) apart from "restart the session" (AUTH_REJECTED).
 *
 * TOKEN_EXPIRED is only ever logged: local expiry triggers re-authentication
 * and is never handed to an end caller.
 */

export type TradeClientErrorType =
  | 'IDENTITY_UNAVAILABLE'
  | 'AUTH_EXCHANGE_FAILED'
  | 'TOKEN_EXPIRED'
  | 'AUTH_REJECTED'
  | 'TRANSPORT_ERROR'
  | 'DECODE_ERROR'
  | 'VALIDATION_ERROR'
  | 'SERVER_REJECTED'
  | 'CONFIG_INVALID';

export interface TradeClientErrorDetails {
  /** HTTP status, when the failure came from a server response. */
  status?: number;
  /** Server-supplied detail text (see serverErrorSchemaV1). */
  detail?: string;
  cause?: unknown;
}

export class TradeClientError extends Error {
  public readonly error_type: TradeClientErrorType;
  public readonly status: number | undefined;
  public readonly detail: string | undefined;

  constructor(error_type: TradeClientErrorType, message: string, details: TradeClientErrorDetails = {}) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = 'TradeClientError';
    this.error_type = error_type;
    this.status = details.status;
    this.detail = details.detail;
  }
}

export const RESTART_SESSION_MESSAGE = 'Authentication failed - please restart the session';

export function isTradeClientError(err: unknown, type?: TradeClientErrorType): err is TradeClientError {
  if (!(err instanceof TradeClientError)) return false;
  return type === undefined || err.error_type === type;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
