import { buildSide } from './priceLevels.js';
import type { OrderBookSnapshot, PriceLevel } from './types.js';

export interface SnapshotSeed {
  asks?: readonly PriceLevel[];
  bids?: readonly PriceLevel[];
  capturedAt?: number | null;
  parseLatencyMs?: number;
}

export const EMPTY_SNAPSHOT: OrderBookSnapshot = Object.freeze({
  asks: Object.freeze([]),
  bids: Object.freeze([]),
  capturedAt: null,
  parseLatencyMs: 0,
});

/**
 * `elapsed`, when given, is read after both sides are sorted so the recorded
 * latency covers the whole build.
 */
export function createSnapshot(
  seed: SnapshotSeed,
  elapsed?: () => number,
): OrderBookSnapshot {
  const asks = buildSide('ask', seed.asks ?? []);
  const bids = buildSide('bid', seed.bids ?? []);
  return Object.freeze({
    asks,
    bids,
    capturedAt: seed.capturedAt ?? null,
    parseLatencyMs: elapsed ? elapsed() : (seed.parseLatencyMs ?? 0),
  });
}

export function midPrice(snapshot: OrderBookSnapshot): number | null {
  const ask = snapshot.asks[0];
  const bid = snapshot.bids[0];
  if (!ask || !bid) {
    return null;
  }
  return (ask.price + bid.price) / 2;
}

export function topLevels(
  snapshot: OrderBookSnapshot,
  depth: number,
): { asks: PriceLevel[]; bids: PriceLevel[] } {
  const limit = Math.max(0, Math.floor(depth));
  return {
    asks: snapshot.asks.slice(0, limit),
    bids: snapshot.bids.slice(0, limit),
  };
}
