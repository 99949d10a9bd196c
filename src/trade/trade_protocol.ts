/**
 * Trade Protocol: the four trade operations plus two read-only helpers.
 *
 *   fetchStock()          GET  /forsale        → TradeRecord[]
 *   submitBuy(selection)  POST /buy            → BuyReceipt, then currency out, goods in
 *   submitSell(selection) POST /trade          → ack text, then goods out
 *   claimSales()          POST /sales/claim    → ClaimResult, then currency in
 *   fetchPendingSales()   GET  /sales/pending  → PendingSale[]
 *   listColonySellables()                        local only
 *
 * The world inventory is changed only after the server has answered with
 * success. A rejected or failed call leaves it untouched.
 */

import { TradeClientError } from '../errors.js';
import {
  decodeBuyReceipt,
  decodeClaimResult,
  decodePendingSales,
  decodeTradeRecords,
  encodeBuyRequest,
  encodeSellRequest
} from '../codec/trade_codec.js';
import { ENDPOINTS, type RequestClient } from '../http/request_client.js';
import type { WorldInventory } from '../interfaces/world_inventory.js';
import { silentLogger, type Logger } from '../logging.js';
import type { PendingTradeSet } from './pending_trade_set.js';
import type { BuyLine, BuyReceipt, ClaimResult, PendingSale, TradeRecord } from './trade_types.js';

export const DEFAULT_CURRENCY_KIND = 'Silver';
export const CLAIM_FAILED_MESSAGE = 'Failed to claim sales: Invalid response';

export interface TradeProtocolOptions {
  requests: Pick<RequestClient, 'send'>;
  inventory: WorldInventory;
  logger?: Logger;
  /** Item kind used as money on both sides of a trade. */
  currencyKind?: string;
  /** Name written as PlayerName on the player's own sell records. */
  playerName?: () => string;
}

export class TradeProtocol {
  private readonly requests: Pick<RequestClient, 'send'>;
  private readonly inventory: WorldInventory;
  private readonly logger: Logger;
  private readonly currencyKind: string;
  private readonly playerName: () => string;

  constructor(options: TradeProtocolOptions) {
    this.requests = options.requests;
    this.inventory = options.inventory;
    this.logger = options.logger ?? silentLogger;
    this.currencyKind = options.currencyKind ?? DEFAULT_CURRENCY_KIND;
    this.playerName = options.playerName ?? (() => '');
  }

  async fetchStock(): Promise<TradeRecord[]> {
    const body = await this.requests.send({ method: 'GET', path: ENDPOINTS.forSale });
    const records = decodeTradeRecords(body);
    this.logger.info('stock_fetched', { records: records.length });
    return records;
  }

  /**
   * Buy every staged record. Validation runs before anything is sent.
   *
   * @throws TradeClientError VALIDATION_ERROR | SERVER_REJECTED, or whatever the request client rejects with
   */
  async submitBuy(selection: PendingTradeSet): Promise<BuyReceipt> {
    const staged = selection.entries();
    if (staged.length === 0) {
      throw new TradeClientError('VALIDATION_ERROR', 'No items specified for purchase');
    }

    for (const { record, quantity } of staged) {
      if (quantity > record.quantity) {
        throw new TradeClientError(
          'VALIDATION_ERROR',
          `Cannot buy ${quantity} ${record.itemKind}: only ${record.quantity} available`
        );
      }
    }

    const totalCost = selection.totalCost();
    const balance = this.inventory.countOf(this.currencyKind);
    if (totalCost > balance) {
      throw new TradeClientError(
        'VALIDATION_ERROR',
        `Not enough ${this.currencyKind.toLowerCase()}! Need ${totalCost}, but only have ${balance}.`
      );
    }

    const lines: BuyLine[] = staged.map(({ record, quantity }) => ({
      itemKind: record.itemKind,
      quantity,
      sellerName: record.counterpartyName
    }));

    const body = await this.requests.send({
      method: 'POST',
      path: ENDPOINTS.buy,
      body: encodeBuyRequest(lines, balance)
    });

    const receipt = decodeBuyReceipt(body);
    if (receipt.status !== 'success') {
      throw new TradeClientError('SERVER_REJECTED', `Purchase failed: server reported status "${receipt.status}"`);
    }

    const cost = receipt.totalCost ?? totalCost;
    const paid = this.inventory.remove(this.currencyKind, cost);
    if (paid < cost) {
      this.logger.warn('purchase_underpaid', { expected: cost, removed: paid });
    }

    const delivered = receipt.purchased.length > 0
      ? receipt.purchased.map((r) => ({ itemKind: r.itemKind, quantity: r.quantity }))
      : lines.map((l) => ({ itemKind: l.itemKind, quantity: l.quantity }));
    for (const item of delivered) {
      if (item.quantity > 0) this.inventory.materialize(item.itemKind, item.quantity);
    }

    selection.clear();
    this.logger.info('purchase_completed', { lines: lines.length, total_cost: cost });
    return receipt;
  }

  /**
   * Offer every staged record. `prices` overrides the asking price per record.
   * Resolves with the server's acknowledgement text.
   */
  async submitSell(selection: PendingTradeSet, prices?: ReadonlyMap<TradeRecord, number>): Promise<string> {
    const staged = selection.entries();
    if (staged.length === 0) {
      throw new TradeClientError('VALIDATION_ERROR', 'No items selected for sale');
    }

    const offers: TradeRecord[] = staged.map(({ record, quantity }) => ({
      ...record,
      quantity,
      unitPrice: prices?.get(record) ?? record.unitPrice
    }));

    const ack = await this.requests.send({
      method: 'POST',
      path: ENDPOINTS.trade,
      body: encodeSellRequest(offers)
    });

    for (const offer of offers) {
      const removed = this.inventory.remove(offer.itemKind, offer.quantity);
      if (removed < offer.quantity) {
        this.logger.warn('sell_short_removal', { item: offer.itemKind, expected: offer.quantity, removed });
      }
    }

    selection.clear();
    this.logger.info('sale_listed', { offers: offers.length });
    return ack;
  }

  /**
   * @throws TradeClientError SERVER_REJECTED when the response does not report success.
   */
  async claimSales(): Promise<ClaimResult> {
    const body = await this.requests.send({ method: 'POST', path: ENDPOINTS.claimSales, body: '{}' });
    const result = decodeClaimResult(body);
    if (result.status !== 'success') {
      throw new TradeClientError('SERVER_REJECTED', CLAIM_FAILED_MESSAGE);
    }

    if (result.totalClaimed > 0) {
      this.inventory.materialize(this.currencyKind, result.totalClaimed);
    }
    this.logger.info('sales_claimed', { total: result.totalClaimed, count: result.claimedCount });
    return result;
  }

  async fetchPendingSales(): Promise<PendingSale[]> {
    const body = await this.requests.send({ method: 'GET', path: ENDPOINTS.pendingSales });
    return decodePendingSales(body);
  }

  /**
   * One record per item kind the player could sell, summed across stacks.
   * Currency and empty stacks are left out. Price and quality come from the
   * first stack seen for a kind.
   */
  listColonySellables(): TradeRecord[] {
    const byKind = new Map<string, TradeRecord>();
    const seller = this.playerName();

    for (const stack of this.inventory.tradableStacks()) {
      if (stack.itemKind === this.currencyKind || stack.quantity <= 0) continue;
      const existing = byKind.get(stack.itemKind);
      if (existing) {
        existing.quantity += stack.quantity;
        continue;
      }
      byKind.set(stack.itemKind, {
        itemKind: stack.itemKind,
        quantity: stack.quantity,
        unitPrice: Math.max(0, Math.round(stack.unitValue)),
        counterpartyName: seller,
        quality: stack.quality
      });
    }

    return [...byKind.values()];
  }
}
