/**
 * Trade data model shared by the codec and the protocol.
 */

/** One tradable line item: a listing, an offer, or a purchase line. */
export interface TradeRecord {
  itemKind: string;
  quantity: number;
  unitPrice: number;
  counterpartyName: string;
  quality: string;
}

export type ClaimStatus = 'success' | 'error';

export interface ClaimResult {
  status: ClaimStatus;
  totalClaimed: number;
  claimedCount: number;
}

/** One line of a buy request, as sent on the wire. */
export interface BuyLine {
  itemKind: string;
  quantity: number;
  sellerName: string;
}

export interface BuyReceipt {
  status: string;
  /** Server-computed cost; null when the response did not carry one. */
  totalCost: number | null;
  purchased: TradeRecord[];
}

export interface PendingSale {
  buyerName: string;
  itemKind: string;
  quantity: number;
  unitPrice: number;
  totalSilver: number;
  /** Unix seconds, as reported by the server. */
  soldAt: number;
}

export function emptyRecord(): TradeRecord {
  return { itemKind: '', quantity: 0, unitPrice: 0, counterpartyName: '', quality: '' };
}
