import {
  createLogger,
  LatencyInstrument,
  type LatencyStats,
  type Logger,
} from '@depthcost/core';
import {
  EMPTY_BOOK_REASON,
  summarizeBook,
  type BookSummary,
  type SnapshotSource,
} from '@depthcost/core-orderbook';
import { FeeModel } from './fees.js';
import { MakerTakerEstimator } from './maker-taker.js';
import { MarketImpactEstimator } from './market-impact.js';
import { SlippageEstimator } from './slippage.js';
import type {
  ExecutionEstimate,
  StageLatencies,
  TradeEstimate,
  TradeEstimateData,
  TradeEstimateFailure,
  TradeRequest,
} from './types.js';

export const STAGES = {
  snapshot: 'snapshot_read',
  makerTaker: 'maker_taker',
  fees: 'fee_calculation',
  slippage: 'slippage_estimation',
  impact: 'market_impact_estimation',
  total: 'trade_estimate',
} as const;

export interface CostEstimationPipelineOptions {
  fees?: FeeModel;
  makerTaker?: MakerTakerEstimator;
  slippage?: SlippageEstimator;
  impact?: MarketImpactEstimator;
  latency?: LatencyInstrument;
  logger?: Logger;
  clock?: () => number;
}

type EstimateDraft = Omit<TradeEstimateData, 'latencies'> & {
  latencies: Omit<StageLatencies, 'totalMs'>;
};

/**
 * Combines the four cost estimators against a single read of the current
 * snapshot. Every stage is timed under a fixed operation name; `estimate` is
 * synchronous, so the timings of concurrent callers never interleave.
 */
export class CostEstimationPipeline {
  private readonly fees: FeeModel;
  private readonly makerTaker: MakerTakerEstimator;
  private readonly slippage: SlippageEstimator;
  private readonly impact: MarketImpactEstimator;
  private readonly latency: LatencyInstrument;
  private readonly logger: Logger;
  private readonly clock: () => number;

  constructor(
    private readonly source: SnapshotSource,
    options: CostEstimationPipelineOptions = {},
  ) {
    this.logger = options.logger ?? createLogger('cost-pipeline');
    this.fees = options.fees ?? new FeeModel({ logger: this.logger });
    this.makerTaker = options.makerTaker ?? new MakerTakerEstimator();
    this.slippage =
      options.slippage ?? new SlippageEstimator({ logger: this.logger });
    this.impact =
      options.impact ?? new MarketImpactEstimator({ logger: this.logger });
    this.latency =
      options.latency ?? new LatencyInstrument({ logger: this.logger });
    this.clock = options.clock ?? Date.now;
  }

  estimate(request: TradeRequest): TradeEstimate {
    const { value, elapsedMs } = this.latency.measure(STAGES.total, () =>
      this.run(request),
    );
    if (!value.success) {
      return value;
    }
    return {
      ...value,
      latencies: { ...value.latencies, totalMs: elapsedMs },
    };
  }

  summary(): BookSummary {
    return summarizeBook(this.source.snapshot());
  }

  latencyStats(): Record<string, LatencyStats> {
    return this.latency.allStats();
  }

  private run(request: TradeRequest): EstimateDraft | TradeEstimateFailure {
    const read = this.latency.measure(STAGES.snapshot, () =>
      this.source.snapshot(),
    );
    const snapshot = read.value;
    const ask = snapshot.asks[0];
    const bid = snapshot.bids[0];
    if (!ask || !bid) {
      this.logger.warn(
        { asks: snapshot.asks.length, bids: snapshot.bids.length },
        'empty orderbook, cannot estimate trade',
      );
      return { success: false, reason: EMPTY_BOOK_REASON };
    }

    const { quantity, side } = request;
    const midPrice = (ask.price + bid.price) / 2;
    const notional = quantity * midPrice;

    const makerTaker = this.latency.measure(STAGES.makerTaker, () =>
      this.makerTaker.estimate(snapshot, quantity, request.orderType),
    );
    const fees = this.latency.measure(STAGES.fees, () =>
      this.fees.calculate(notional, makerTaker.value, request.feeTier),
    );
    const slippage = this.latency.measure(STAGES.slippage, () =>
      this.slippage.estimate(
        snapshot,
        quantity,
        side,
        request.slippageTolerancePct,
      ),
    );
    const impact = this.latency.measure(STAGES.impact, () =>
      this.impact.estimate(snapshot, quantity, side, request.volatility),
    );

    const referencePrice = side === 'buy' ? ask.price : bid.price;
    // Execution uses the uncapped figure; the cap only limits what is reported.
    const slippageAmount =
      (slippage.value.uncappedSlippagePct / 100) * referencePrice;
    const execution = executionCost({
      side,
      quantity,
      notional,
      referencePrice,
      slippageAmount,
      impactAmount: impact.value.total,
      fees: fees.value.total,
    });

    return {
      success: true,
      timestamp: this.clock(),
      exchange: request.exchange,
      asset: request.asset,
      orderType: request.orderType,
      side,
      quantity,
      referencePrice,
      midPrice,
      notional,
      makerRatio: makerTaker.value,
      fees: fees.value,
      slippage: slippage.value,
      marketImpact: impact.value,
      execution,
      latencies: {
        snapshotMs: read.elapsedMs,
        makerTakerMs: makerTaker.elapsedMs,
        feesMs: fees.elapsedMs,
        slippageMs: slippage.elapsedMs,
        impactMs: impact.elapsedMs,
      },
    };
  }
}

interface ExecutionInput {
  side: TradeRequest['side'];
  quantity: number;
  notional: number;
  referencePrice: number;
  slippageAmount: number;
  impactAmount: number;
  fees: number;
}

export function executionCost(input: ExecutionInput): ExecutionEstimate {
  const { side, quantity, notional, referencePrice, slippageAmount } = input;
  const { impactAmount, fees } = input;
  const price =
    side === 'buy'
      ? referencePrice + slippageAmount + impactAmount
      : referencePrice - slippageAmount - impactAmount;
  const cost = quantity * price;
  const totalCost = side === 'buy' ? cost + fees : cost - fees;
  let totalCostPct = 0;
  if (notional > 0) {
    totalCostPct =
      side === 'buy'
        ? (totalCost / notional - 1) * 100
        : (1 - totalCost / notional) * 100;
  }
  return { price, slippageAmount, impactAmount, cost, totalCost, totalCostPct };
}
