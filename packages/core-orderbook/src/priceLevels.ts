import type { PriceLevel, Side } from './types.js';

const isNonNegative = (value: number): boolean =>
  Number.isFinite(value) && value >= 0;

function compareLevels(side: Side): (a: PriceLevel, b: PriceLevel) => number {
  return side === 'bid'
    ? (a, b) => b.price - a.price
    : (a, b) => a.price - b.price;
}

/**
 * Builds one frozen book side from a full replacement list: drops empty
 * levels, then re-sorts best price first.
 */
export function buildSide(side: Side, levels: readonly PriceLevel[]): readonly PriceLevel[] {
  const kept: PriceLevel[] = [];
  for (const level of levels) {
    if (!isNonNegative(level.price) || !isNonNegative(level.size)) {
      throw new Error(`Invalid ${side} level: ${level.price}@${level.size}`);
    }
    if (level.size <= 0) {
      continue;
    }
    kept.push(Object.freeze({ price: level.price, size: level.size }));
  }
  kept.sort(compareLevels(side));
  return Object.freeze(kept);
}

export function totalSize(levels: readonly PriceLevel[]): number {
  let total = 0;
  for (const level of levels) {
    total += level.size;
  }
  return total;
}

