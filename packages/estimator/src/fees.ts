import { clamp, createLogger, type Logger } from '@depthcost/core';
import type { FeeBreakdown, FeeTier } from './types.js';

export const FEE_TIERS: readonly FeeTier[] = Object.freeze([
  { id: 'Tier 1', label: 'Tier 1 (0.1%)', makerRate: 0.0008, takerRate: 0.001 },
  { id: 'Tier 2', label: 'Tier 2 (0.08%)', makerRate: 0.0006, takerRate: 0.0008 },
  { id: 'Tier 3', label: 'Tier 3 (0.05%)', makerRate: 0.0004, takerRate: 0.0005 },
  { id: 'Custom', label: 'Custom', makerRate: 0.0002, takerRate: 0.0003 },
]);

export const DEFAULT_FEE_TIER = 'Tier 1';

export interface FeeModelOptions {
  tiers?: readonly FeeTier[];
  defaultTier?: string;
  logger?: Logger;
}

const normalize = (value: string): string => value.trim().toLowerCase();

export class FeeModel {
  private readonly table: readonly FeeTier[];
  private readonly lookup = new Map<string, FeeTier>();
  private readonly fallback: FeeTier;
  private readonly logger: Logger;

  constructor(options: FeeModelOptions = {}) {
    this.table = options.tiers ?? FEE_TIERS;
    for (const tier of this.table) {
      if (tier.makerRate < 0 || tier.takerRate < 0) {
        throw new Error(`Fee rates must be non-negative: ${tier.id}`);
      }
      this.lookup.set(normalize(tier.id), tier);
      this.lookup.set(normalize(tier.label), tier);
    }
    const defaultTier = this.lookup.get(
      normalize(options.defaultTier ?? DEFAULT_FEE_TIER),
    );
    if (!defaultTier) {
      throw new Error(
        `Unknown default fee tier: ${options.defaultTier ?? DEFAULT_FEE_TIER}`,
      );
    }
    this.fallback = defaultTier;
    this.logger = options.logger ?? createLogger('fee-model');
  }

  tiers(): readonly FeeTier[] {
    return this.table;
  }

  /** Finds a tier by id or label; unknown names fall back to the default. */
  resolve(name: string): FeeTier {
    const tier = this.lookup.get(normalize(name));
    if (tier) {
      return tier;
    }
    this.logger.warn(
      { tier: name, fallback: this.fallback.id },
      'unknown fee tier, using default',
    );
    return this.fallback;
  }

  calculate(notional: number, makerRatio: number, tierName: string): FeeBreakdown {
    const tier = this.resolve(tierName);
    const ratio = clamp(makerRatio, 0, 1);
    const makerNotional = notional * ratio;
    const takerNotional = notional - makerNotional;
    const makerFee = makerNotional * tier.makerRate;
    const takerFee = takerNotional * tier.takerRate;
    const total = makerFee + takerFee;
    return {
      tier: tier.id,
      makerRate: tier.makerRate,
      takerRate: tier.takerRate,
      makerNotional,
      takerNotional,
      makerFee,
      takerFee,
      total,
      feePct: notional > 0 ? (total / notional) * 100 : 0,
    };
  }
}
