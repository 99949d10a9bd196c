/**
 * Trade Codec: wire format for trade records and server envelopes.
 *
 * Decoding goes through the small JsonReader rather than JSON.parse so a
 * listing can be read element by element: one broken record is dropped,
 * the rest of the batch survives. Small fixed envelopes (login, claim,
 * buy, pending sales, errors) are checked with zod after reading.
 *
 * Encoding builds the request text directly. Every string is escaped with
 * JSON.stringify before it is embedded; integers are checked, then written.
 *
 * Wire record keys: DefName, Quantity, Price, PlayerName, Quality.
 */

import { TradeClientError } from '../errors.js';
import type { BuyLine, BuyReceipt, ClaimResult, PendingSale, TradeRecord } from '../trade/trade_types.js';
import { emptyRecord } from '../trade/trade_types.js';
import { JsonReader, isJsonObject, tryReadJson, type JsonValue } from './json_reader.js';
import {
  buyResponseSchema,
  claimResponseSchema,
  loginResponseSchema,
  pendingSaleSchema,
  pendingSalesResponseSchema,
  serverErrorSchemaV1
} from './schemas.js';

// `{"records":[]}` / `{"items":[]}`: the server's way of saying "nothing listed".
const EMPTY_LISTING = /^\s*\{\s*"(?:records|items)"\s*:\s*\[\s*\]/;

const COUNT_TEXT = /^\s*\d+\s*$/;

// ─── Decode ───────────────────────────────────────────────────────────────────

/**
 * Decode a listing response into trade records.
 *
 * @throws TradeClientError DECODE_ERROR when no outer array can be located.
 */
export function decodeTradeRecords(text: string): TradeRecord[] {
  if (EMPTY_LISTING.test(text)) return [];

  const listed = listingArray(tryReadJson(text));
  if (listed) return toTradeRecords(listed);

  // Damaged document: scan from the first '[' and keep what can be read.
  const start = text.indexOf('[');
  const end = text.lastIndexOf(']');
  if (start < 0 || end < start) {
    throw new TradeClientError('DECODE_ERROR', 'Failed to parse items for sale: no record array in response');
  }

  const { elements } = new JsonReader(text.slice(start, end + 1)).readArrayLenient();
  return toTradeRecords(elements);
}

function listingArray(doc: JsonValue | undefined): JsonValue[] | null {
  if (Array.isArray(doc)) return doc;
  if (!isJsonObject(doc)) return null;
  const records = doc['records'] ?? doc['items'];
  return Array.isArray(records) ? records : null;
}

function toTradeRecords(elements: readonly JsonValue[]): TradeRecord[] {
  const records: TradeRecord[] = [];
  for (const element of elements) {
    const record = toTradeRecord(element);
    if (record) records.push(record);
  }
  return records;
}

/**
 * Decode the /sales/claim response. Never throws.
 *
 * Schema first; if the envelope does not match, each field is looked up
 * on its own in the raw text.
 */
export function decodeClaimResult(text: string): ClaimResult {
  const parsed = claimResponseSchema.safeParse(tryReadJson(text));
  if (parsed.success) {
    return {
      status: parsed.data.status === 'success' ? 'success' : 'error',
      totalClaimed: parsed.data.total_claimed,
      claimedCount: parsed.data.claimed_sales_count
    };
  }

  const status = scanString(text, 'status');
  const totalClaimed = scanCount(text, 'total_claimed');
  const claimedCount = scanCount(text, 'claimed_sales_count');
  if (status === null && totalClaimed === null && claimedCount === null) {
    return { status: 'error', totalClaimed: 0, claimedCount: 0 };
  }
  return {
    status: status === 'success' ? 'success' : 'error',
    totalClaimed: totalClaimed ?? 0,
    claimedCount: claimedCount ?? 0
  };
}

/** Token from a /auth/login response, or null when there is none. */
export function decodeLoginToken(text: string): string | null {
  const parsed = loginResponseSchema.safeParse(tryReadJson(text));
  return parsed.success ? parsed.data.token : null;
}

export function decodeBuyReceipt(text: string): BuyReceipt {
  const doc = tryReadJson(text);
  const parsed = buyResponseSchema.safeParse(doc);
  if (parsed.success && isJsonObject(doc)) {
    const items = doc['purchased_items'];
    const purchased = Array.isArray(items)
      ? items.map(toTradeRecord).filter((r): r is TradeRecord => r !== null)
      : [];
    return { status: parsed.data.status, totalCost: parsed.data.total_cost, purchased };
  }

  return {
    status: scanString(text, 'status') ?? 'unknown',
    totalCost: scanCount(text, 'total_cost'),
    purchased: []
  };
}

/**
 * @throws TradeClientError DECODE_ERROR when the pending_sales envelope is missing.
 */
export function decodePendingSales(text: string): PendingSale[] {
  const envelope = pendingSalesResponseSchema.safeParse(tryReadJson(text));
  if (!envelope.success) {
    throw new TradeClientError('DECODE_ERROR', 'Failed to parse pending sales: no pending_sales array in response');
  }

  const sales: PendingSale[] = [];
  for (const entry of envelope.data.pending_sales) {
    const sale = pendingSaleSchema.safeParse(entry);
    if (!sale.success || sale.data.item === '') continue;
    sales.push({
      buyerName: sale.data.buyer_name,
      itemKind: sale.data.item,
      quantity: sale.data.quantity,
      unitPrice: sale.data.price,
      totalSilver: sale.data.total_silver,
      soldAt: sale.data.timestamp
    });
  }
  return sales;
}

/** Human-readable detail from an error body, or null when it is not a v1 error. */
export function decodeServerError(text: string): string | null {
  const parsed = serverErrorSchemaV1.safeParse(tryReadJson(text));
  if (!parsed.success) return null;
  const { detail } = parsed.data;
  if (typeof detail === 'string') return detail;
  return detail.map((entry) => entry.msg).join('; ');
}

// ─── Encode ───────────────────────────────────────────────────────────────────

export function encodeSellRequest(records: readonly TradeRecord[]): string {
  const body = records
    .map((r) =>
      '{' +
      `"DefName":${quote(r.itemKind)},` +
      `"Quantity":${count(r.quantity, 'Quantity')},` +
      `"Price":${count(r.unitPrice, 'Price')},` +
      `"PlayerName":${quote(r.counterpartyName)},` +
      `"Quality":${quote(r.quality)}` +
      '}'
    )
    .join(',');
  return `{"records":[${body}]}`;
}

/**
 * clientSilver is the locally observed balance; the server uses it to spot
 * a client acting on stale state.
 */
export function encodeBuyRequest(lines: readonly BuyLine[], clientSilver: number): string {
  const body = lines
    .map((line) =>
      '{' +
      `"def_name":${quote(line.itemKind)},` +
      `"quantity":${count(line.quantity, 'quantity')},` +
      `"seller_name":${quote(line.sellerName)}` +
      '}'
    )
    .join(',');
  return `{"items":[${body}],"client_silver":${count(clientSilver, 'client_silver')}}`;
}

export function encodeLoginRequest(ticketHex: string, playerName: string): string {
  return `{"authTicket":${quote(ticketHex)},"playerName":${quote(playerName)}}`;
}

// ─── Helpers ──────────────────────────────────────────────────────────────────

function toTradeRecord(value: JsonValue): TradeRecord | null {
  if (!isJsonObject(value)) return null;

  const record = emptyRecord();
  for (const [key, field] of Object.entries(value)) {
    switch (key) {
      case 'DefName':
        record.itemKind = readText(field);
        break;
      case 'Quantity':
        record.quantity = readCount(field);
        break;
      case 'Price':
        record.unitPrice = readCount(field);
        break;
      case 'PlayerName':
        record.counterpartyName = readText(field);
        break;
      case 'Quality':
        record.quality = readText(field);
        break;
      default:
        break;
    }
  }

  return record.itemKind.trim() === '' ? null : record;
}

function readText(value: JsonValue): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return '';
}

function readCount(value: JsonValue): number {
  if (typeof value === 'number') {
    return Number.isSafeInteger(value) && value >= 0 ? value : 0;
  }
  if (typeof value === 'string' && COUNT_TEXT.test(value)) {
    const parsed = Number(value.trim());
    return Number.isSafeInteger(parsed) ? parsed : 0;
  }
  return 0;
}

function scanString(text: string, key: string): string | null {
  const match = new RegExp(`"${key}"\\s*:\\s*"([^"]*)"`).exec(text);
  return match ? (match[1] ?? '') : null;
}

function scanCount(text: string, key: string): number | null {
  const match = new RegExp(`"${key}"\\s*:\\s*"?(\\d+)`).exec(text);
  if (!match || match[1] === undefined) return null;
  const parsed = Number(match[1]);
  return Number.isSafeInteger(parsed) ? parsed : null;
}

function quote(value: string): string {
  return JSON.stringify(value);
}

function count(value: number, field: string): string {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new TradeClientError('VALIDATION_ERROR', `${field} must be a non-negative integer, got ${value}`);
  }
  return String(value);
}
