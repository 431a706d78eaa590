import { roundTo } from '@depthcost/core';
import { totalSize } from './priceLevels.js';
import type { BookSummary, OrderBookSnapshot } from './types.js';

export const EMPTY_BOOK_REASON = 'empty orderbook';

/**
 * Display-oriented metrics of a snapshot, rounded for presentation. Depth is
 * the summed level size per side; imbalance is (bid - ask) / (bid + ask).
 */
export function summarizeBook(snapshot: OrderBookSnapshot): BookSummary {
  const ask = snapshot.asks[0];
  const bid = snapshot.bids[0];
  if (!ask || !bid) {
    return { success: false, reason: EMPTY_BOOK_REASON };
  }

  const spread = ask.price - bid.price;
  const spreadPct = bid.price > 0 ? (spread / bid.price) * 100 : 0;
  const askDepth = totalSize(snapshot.asks);
  const bidDepth = totalSize(snapshot.bids);
  const depth = askDepth + bidDepth;
  const bookImbalance = depth > 0 ? (bidDepth - askDepth) / depth : 0;

  return {
    success: true,
    bestAsk: roundTo(ask.price, 2),
    bestBid: roundTo(bid.price, 2),
    midPrice: roundTo((ask.price + bid.price) / 2, 2),
    spread: roundTo(spread, 2),
    spreadPct: roundTo(spreadPct, 4),
    askDepth: roundTo(askDepth, 4),
    bidDepth: roundTo(bidDepth, 4),
    bookImbalance: roundTo(bookImbalance, 4),
    askLevels: snapshot.asks.length,
    bidLevels: snapshot.bids.length,
    lastLatencyMs: roundTo(snapshot.parseLatencyMs, 2),
  };
}
