export * from './types.js';
export { FeeModel, FEE_TIERS, DEFAULT_FEE_TIER, type FeeModelOptions } from './fees.js';
export { MakerTakerEstimator } from './maker-taker.js';
export { SlippageEstimator, type SlippageEstimatorOptions } from './slippage.js';
export {
  MarketImpactEstimator,
  marketDepth,
  type MarketImpactOptions,
} from './market-impact.js';
export {
  parseTradeRequest,
  toTradeRequest,
  type TradeRequestResult,
} from './request.js';
export {
  CostEstimationPipeline,
  STAGES,
  executionCost,
  type CostEstimationPipelineOptions,
} from './pipeline.js';
