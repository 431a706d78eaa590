import { clamp, createLogger, type Logger } from '@depthcost/core';
import { midPrice, type OrderBookSnapshot } from '@depthcost/core-orderbook';
import type { MarketImpactEstimate, TradeSide } from './types.js';

export interface MarketImpactOptions {
  permanentImpactFactor?: number;
  temporaryImpactFactor?: number;
  volatilityScaling?: boolean;
  executionTimeframeSec?: number;
  logger?: Logger;
}

const SECONDS_PER_DAY = 24 * 60 * 60;
const DEPTH_BAND = 0.01;
const VOLATILITY_REFERENCE = 0.01;

/** Resting notional within `band` (a fraction) of the mid price, both sides. */
export function marketDepth(
  snapshot: OrderBookSnapshot,
  band = DEPTH_BAND,
): number {
  const mid = midPrice(snapshot);
  if (mid === null) {
    return 0;
  }
  const upper = mid * (1 + band);
  const lower = mid * (1 - band);
  let depth = 0;
  for (const level of snapshot.asks) {
    if (level.price > upper) {
      break;
    }
    depth += level.price * level.size;
  }
  for (const level of snapshot.bids) {
    if (level.price < lower) {
      break;
    }
    depth += level.price * level.size;
  }
  return depth;
}

function zeroImpact(side: TradeSide, depth = 0): MarketImpactEstimate {
  return {
    side,
    permanent: 0,
    temporary: 0,
    total: 0,
    bps: 0,
    marketDepth: depth,
    depthScale: 0,
    volatilityScale: 0,
  };
}

/**
 * Almgren-Chriss style cost split into a permanent part (linear in notional)
 * and a temporary part (also scaled by execution speed). Both factors are
 * scaled up for volatile markets and thin books.
 */
export class MarketImpactEstimator {
  private readonly permanentFactor: number;
  private readonly temporaryFactor: number;
  private readonly volatilityScaling: boolean;
  private readonly timeframeSec: number;
  private readonly logger: Logger;

  constructor(options: MarketImpactOptions = {}) {
    const timeframeSec = options.executionTimeframeSec ?? 1;
    if (!Number.isFinite(timeframeSec) || timeframeSec <= 0) {
      throw new Error(`executionTimeframeSec must be positive: ${timeframeSec}`);
    }
    this.permanentFactor = options.permanentImpactFactor ?? 2.5e-6;
    this.temporaryFactor = options.temporaryImpactFactor ?? 1.5e-5;
    this.volatilityScaling = options.volatilityScaling ?? true;
    this.timeframeSec = timeframeSec;
    this.logger = options.logger ?? createLogger('market-impact');
  }

  estimate(
    snapshot: OrderBookSnapshot,
    quantity: number,
    side: TradeSide,
    volatility: number,
  ): MarketImpactEstimate {
    const mid = midPrice(snapshot);
    if (mid === null) {
      this.logger.warn('empty orderbook, market impact not estimated');
      return zeroImpact(side);
    }

    const notional = quantity * mid;
    const depth = marketDepth(snapshot);
    if (notional <= 0) {
      return zeroImpact(side, depth);
    }

    let volatilityScale = 1;
    if (this.volatilityScaling) {
      const timeframeVolatility =
        volatility * Math.sqrt(this.timeframeSec / SECONDS_PER_DAY);
      volatilityScale = clamp(timeframeVolatility / VOLATILITY_REFERENCE, 0.5, 2);
    }
    // An empty band gives an infinite ratio, which clamps to the maximum.
    const depthScale = clamp(1 / (depth / notional), 0.5, 3);

    const scale = volatilityScale * depthScale;
    const permanent = this.permanentFactor * scale * notional;
    const temporary =
      this.temporaryFactor * scale * notional * Math.sqrt(1 / this.timeframeSec);
    const total = permanent + temporary;

    return {
      side,
      permanent,
      temporary,
      total,
      bps: (total / mid) * 10_000,
      marketDepth: depth,
      depthScale,
      volatilityScale,
    };
  }
}
