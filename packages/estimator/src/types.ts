export const ORDER_TYPES = ['Market', 'Limit', 'Stop-Limit', 'Take-Profit'] as const;

export type OrderType = (typeof ORDER_TYPES)[number];

export const TRADE_SIDES = ['buy', 'sell'] as const;

export type TradeSide = (typeof TRADE_SIDES)[number];

export interface TradeRequest {
  readonly exchange: string;
  readonly asset: string;
  readonly orderType: OrderType;
  readonly side: TradeSide;
  /** Base-asset units, > 0. */
  readonly quantity: number;
  /** Fee tier id or label, e.g. `Tier 2` or `Tier 2 (0.08%)`. */
  readonly feeTier: string;
  /** Cap applied to the reported slippage, in percent. */
  readonly slippageTolerancePct: number;
  /** Daily volatility as a fraction, e.g. 0.05. */
  readonly volatility: number;
}

export interface FeeTier {
  readonly id: string;
  readonly label: string;
  /** Fraction of notional, e.g. 0.0008 for 0.08%. */
  readonly makerRate: number;
  readonly takerRate: number;
}

export interface FeeBreakdown {
  tier: string;
  makerRate: number;
  takerRate: number;
  makerNotional: number;
  takerNotional: number;
  makerFee: number;
  takerFee: number;
  total: number;
  feePct: number;
}

export interface SlippageEstimate {
  side: TradeSide;
  referencePrice: number;
  avgExecutionPrice: number;
  worstPrice: number;
  /** Reported slippage, capped at `maxTolerancePct`. */
  slippagePct: number;
  uncappedSlippagePct: number;
  maxTolerancePct: number;
  capped: boolean;
  filledFromBook: number;
  unfilledQuantity: number;
  levelsConsumed: number;
}

export interface MarketImpactEstimate {
  side: TradeSide;
  permanent: number;
  temporary: number;
  total: number;
  bps: number;
  marketDepth: number;
  depthScale: number;
  volatilityScale: number;
}

export interface ExecutionEstimate {
  price: number;
  slippageAmount: number;
  impactAmount: number;
  cost: number;
  totalCost: number;
  totalCostPct: number;
}

export interface StageLatencies {
  snapshotMs: number;
  makerTakerMs: number;
  feesMs: number;
  slippageMs: number;
  impactMs: number;
  totalMs: number;
}

export interface TradeEstimateData {
  success: true;
  /** Epoch milliseconds. */
  timestamp: number;
  exchange: string;
  asset: string;
  orderType: OrderType;
  side: TradeSide;
  quantity: number;
  referencePrice: number;
  midPrice: number;
  notional: number;
  makerRatio: number;
  fees: FeeBreakdown;
  slippage: SlippageEstimate;
  marketImpact: MarketImpactEstimate;
  execution: ExecutionEstimate;
  latencies: StageLatencies;
}

export interface TradeEstimateFailure {
  success: false;
  reason: string;
}

export type TradeEstimate = TradeEstimateData | TradeEstimateFailure;
