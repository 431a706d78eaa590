import { createLogger, type Logger } from '@depthcost/core';
import type { BookSide, OrderBookSnapshot } from '@depthcost/core-orderbook';
import type { SlippageEstimate, TradeSide } from './types.js';

export interface SlippageEstimatorOptions {
  logger?: Logger;
}

interface BookWalk {
  notional: number;
  filled: number;
  remaining: number;
  levelsConsumed: number;
  lastPrice: number;
}

function pickSide(side: TradeSide, snapshot: OrderBookSnapshot): BookSide {
  return side === 'buy' ? snapshot.asks : snapshot.bids;
}

function walkBook(levels: BookSide, quantity: number): BookWalk {
  let remaining = quantity;
  let notional = 0;
  let levelsConsumed = 0;
  let lastPrice = levels[0]?.price ?? 0;
  for (const level of levels) {
    if (remaining <= 0) {
      break;
    }
    const take = remaining < level.size ? remaining : level.size;
    notional += take * level.price;
    remaining -= take;
    levelsConsumed += 1;
    lastPrice = level.price;
  }
  return {
    notional,
    filled: quantity - remaining,
    remaining,
    levelsConsumed,
    lastPrice,
  };
}

/**
 * Walks the opposite book side from the best level to find the average fill
 * price of an immediate order. Quantity beyond the visible book is charged at
 * the worst visible price.
 */
export class SlippageEstimator {
  private readonly logger: Logger;

  constructor(options: SlippageEstimatorOptions = {}) {
    this.logger = options.logger ?? createLogger('slippage-estimator');
  }

  estimate(
    snapshot: OrderBookSnapshot,
    quantity: number,
    side: TradeSide,
    tolerancePct: number,
  ): SlippageEstimate {
    const levels = pickSide(side, snapshot);
    const best = levels[0];
    const worst = levels[levels.length - 1];
    if (!best || !worst) {
      this.logger.warn({ side }, 'empty orderbook side, slippage not estimated');
      return {
        side,
        referencePrice: 0,
        avgExecutionPrice: 0,
        worstPrice: 0,
        slippagePct: 0,
        uncappedSlippagePct: 0,
        maxTolerancePct: tolerancePct,
        capped: false,
        filledFromBook: 0,
        unfilledQuantity: quantity,
        levelsConsumed: 0,
      };
    }

    const referencePrice = best.price;
    if (quantity <= 0) {
      return {
        side,
        referencePrice,
        avgExecutionPrice: referencePrice,
        worstPrice: referencePrice,
        slippagePct: 0,
        uncappedSlippagePct: 0,
        maxTolerancePct: tolerancePct,
        capped: false,
        filledFromBook: 0,
        unfilledQuantity: 0,
        levelsConsumed: 0,
      };
    }

    const walk = walkBook(levels, quantity);
    let notional = walk.notional;
    let worstPrice = walk.lastPrice;
    if (walk.remaining > 0) {
      notional += walk.remaining * worst.price;
      worstPrice = worst.price;
    }

    const avgExecutionPrice = notional / quantity;
    const uncapped =
      referencePrice > 0
        ? side === 'buy'
          ? ((avgExecutionPrice - referencePrice) / referencePrice) * 100
          : ((referencePrice - avgExecutionPrice) / referencePrice) * 100
        : 0;
    const slippagePct = Math.min(uncapped, tolerancePct);

    return {
      side,
      referencePrice,
      avgExecutionPrice,
      worstPrice,
      slippagePct,
      uncappedSlippagePct: uncapped,
      maxTolerancePct: tolerancePct,
      capped: uncapped > tolerancePct,
      filledFromBook: walk.filled,
      unfilledQuantity: walk.remaining,
      levelsConsumed: walk.levelsConsumed,
    };
  }
}
