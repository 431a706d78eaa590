export type Side = 'bid' | 'ask';

export interface PriceLevel {
  readonly price: number;
  readonly size: number;
}

export type BookSide = readonly PriceLevel[];

/**
 * Immutable view of both book sides at one instant. Asks ascend by price,
 * bids descend. Never mutated after construction; a newer snapshot replaces
 * it wholesale.
 */
export interface OrderBookSnapshot {
  readonly asks: BookSide;
  readonly bids: BookSide;
  /** Epoch milliseconds the snapshot was built, `null` before any data. */
  readonly capturedAt: number | null;
  /** Local receipt-to-publication time (parse + sort), not network transit. */
  readonly parseLatencyMs: number;
}

export interface BookSummaryData {
  success: true;
  bestAsk: number;
  bestBid: number;
  midPrice: number;
  spread: number;
  spreadPct: number;
  askDepth: number;
  bidDepth: number;
  bookImbalance: number;
  askLevels: number;
  bidLevels: number;
  lastLatencyMs: number;
}

export interface EmptyBook {
  success: false;
  reason: string;
}

export type BookSummary = BookSummaryData | EmptyBook;

/** Anything holding a current snapshot: the live stream, or a fixture. */
export interface SnapshotSource {
  snapshot(): OrderBookSnapshot;
}
