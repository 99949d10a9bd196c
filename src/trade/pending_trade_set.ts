import type { TradeRecord } from './trade_types.js';

export interface StagedTrade {
  record: TradeRecord;
  quantity: number;
}

/**
 * Quantities the player has staged against records, keyed by record identity.
 *
 * Staged quantities are truncated to integers and clamped to
 * [0, record.quantity]. Zero means "not selected" and is not kept.
 */
export class PendingTradeSet {
  private readonly staged = new Map<TradeRecord, number>();

  /** Returns the quantity actually staged after clamping. */
  stage(record: TradeRecord, quantity: number): number {
    const clamped = clampQuantity(quantity, record.quantity);
    if (clamped === 0) {
      this.staged.delete(record);
    } else {
      this.staged.set(record, clamped);
    }
    return clamped;
  }

  unstage(record: TradeRecord): void {
    this.staged.delete(record);
  }

  quantityOf(record: TradeRecord): number {
    return this.staged.get(record) ?? 0;
  }

  entries(): StagedTrade[] {
    return [...this.staged].map(([record, quantity]) => ({ record, quantity }));
  }

  /** Sum of unitPrice × staged quantity. */
  totalCost(): number {
    let total = 0;
    for (const [record, quantity] of this.staged) total += record.unitPrice * quantity;
    return total;
  }

  get size(): number {
    return this.staged.size;
  }

  clear(): void {
    this.staged.clear();
  }
}

function clampQuantity(quantity: number, available: number): number {
  if (!Number.isFinite(quantity)) return 0;
  const whole = Math.trunc(quantity);
  return Math.min(Math.max(whole, 0), Math.max(available, 0));
}
