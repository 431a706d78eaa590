import { clamp } from '@depthcost/core';
import type { OrderBookSnapshot } from '@depthcost/core-orderbook';

const PASSIVE_RATIOS: ReadonlyMap<string, number> = new Map<string, number>([
  ['Limit', 0.8],
  ['Stop-Limit', 0.5],
  ['Take-Profit', 0.5],
]);

const MARKET_BASE_RATIO = 0.05;
const MARKET_MAX_RATIO = 0.2;
const MIN_SPREAD = 0.0001;
const VOLUME_PENALTY = 0.1;

/**
 * Expected share of an order that fills passively (as maker). Market orders
 * get a small share that grows with a tighter spread and shrinks as the
 * order eats into the top ask; other order types use a fixed share.
 */
export class MakerTakerEstimator {
  estimate(
    snapshot: OrderBookSnapshot,
    quantity: number,
    orderType: string,
  ): number {
    if (orderType !== 'Market') {
      return PASSIVE_RATIOS.get(orderType) ?? 0;
    }

    const ask = snapshot.asks[0];
    const bid = snapshot.bids[0];
    if (!ask || !bid) {
      return 0;
    }

    const spreadPct = bid.price > 0 ? (ask.price - bid.price) / bid.price : 0;
    const volumeRatio = ask.size > 0 ? Math.min(quantity / ask.size, 1) : 1;
    const spreadFactor = Math.min(
      MIN_SPREAD / Math.max(spreadPct, MIN_SPREAD),
      MARKET_MAX_RATIO,
    );
    return clamp(
      MARKET_BASE_RATIO + spreadFactor - volumeRatio * VOLUME_PENALTY,
      0,
      MARKET_MAX_RATIO,
    );
  }
}
