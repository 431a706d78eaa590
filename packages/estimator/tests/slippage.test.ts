import fc from 'fast-check';
import { EMPTY_SNAPSHOT } from '@depthcost/core-orderbook';
import { SlippageEstimator } from '../src/index.js';
import { book, createMockLogger, FIXTURE_BOOK } from './helpers.js';

describe('SlippageEstimator', () => {
  const create = () => {
    const logger = createMockLogger();
    return { estimator: new SlippageEstimator({ logger }), logger };
  };

  test('has no slippage when the top level covers the order', () => {
    const { estimator } = create();
    const result = estimator.estimate(FIXTURE_BOOK, 1, 'buy', 0.5);

    expect(result).toEqual({
      side: 'buy',
      referencePrice: 29880,
      avgExecutionPrice: 29880,
      worstPrice: 29880,
      slippagePct: 0,
      uncappedSlippagePct: 0,
      maxTolerancePct: 0.5,
      capped: false,
      filledFromBook: 1,
      unfilledQuantity: 0,
      levelsConsumed: 1,
    });
  });

  test('walks several ask levels for a larger buy', () => {
    const { estimator } = create();
    const result = estimator.estimate(FIXTURE_BOOK, 3, 'buy', 0.5);

    // 1.5 @ 29880 + 0.75 @ 29881.5 + 0.75 @ 29883
    expect(result.avgExecutionPrice).toBeCloseTo(29881.125, 6);
    expect(result.uncappedSlippagePct).toBeCloseTo((1.125 / 29880) * 100, 10);
    expect(result.slippagePct).toBe(result.uncappedSlippagePct);
    expect(result.levelsConsumed).toBe(3);
    expect(result.worstPrice).toBe(29883);
    expect(result.unfilledQuantity).toBe(0);
  });

  test('walks bids for a sell', () => {
    const { estimator } = create();
    const result = estimator.estimate(FIXTURE_BOOK, 2, 'sell', 0.5);

    // 1.2 @ 29875 + 0.8 @ 29873.5
    expect(result.referencePrice).toBe(29875);
    expect(result.avgExecutionPrice).toBeCloseTo(29874.4, 6);
    expect(result.uncappedSlippagePct).toBeCloseTo((0.6 / 29875) * 100, 10);
    expect(result.worstPrice).toBe(29873.5);
  });

  test('charges quantity beyond the book at the worst visible price', () => {
    const { estimator } = create();
    const result = estimator.estimate(FIXTURE_BOOK, 10, 'buy', 5);

    const visible = 29880 * 1.5 + 29881.5 * 0.75 + 29883 * 2.1;
    expect(result.filledFromBook).toBeCloseTo(4.35, 10);
    expect(result.unfilledQuantity).toBeCloseTo(5.65, 10);
    expect(result.avgExecutionPrice).toBeCloseTo(
      (visible + 5.65 * 29883) / 10,
      6,
    );
    expect(result.worstPrice).toBe(29883);
    expect(result.levelsConsumed).toBe(3);
  });

  test('caps the reported slippage at the tolerance', () => {
    const { estimator } = create();
    const result = estimator.estimate(FIXTURE_BOOK, 3, 'buy', 0.001);

    expect(result.slippagePct).toBe(0.001);
    expect(result.uncappedSlippagePct).toBeGreaterThan(0.001);
    expect(result.capped).toBe(true);
  });

  test('returns zeros and warns for an empty side', () => {
    const { estimator, logger } = create();
    const result = estimator.estimate(EMPTY_SNAPSHOT, 1, 'sell', 0.5);

    expect(result.slippagePct).toBe(0);
    expect(result.avgExecutionPrice).toBe(0);
    expect(result.unfilledQuantity).toBe(1);
    expect(logger.warn).toHaveBeenCalledWith(
      { side: 'sell' },
      'empty orderbook side, slippage not estimated',
    );
  });

  test('buy slippage is non-negative and non-decreasing in quantity', () => {
    const level = fc.tuple(
      fc.integer({ min: 1, max: 1_000_000 }),
      fc.integer({ min: 1, max: 10_000 }),
    );
    fc.assert(
      fc.property(
        fc.array(level, { minLength: 1, maxLength: 20 }),
        fc.integer({ min: 1, max: 50_000 }),
        fc.integer({ min: 1, max: 50_000 }),
        (levels, a, b) => {
          const { estimator } = create();
          const snapshot = book(
            levels.map(([price, size]) => [price / 100, size / 100]),
            [],
          );
          const [small, large] = a <= b ? [a / 100, b / 100] : [b / 100, a / 100];
          const first = estimator.estimate(snapshot, small, 'buy', 100);
          const second = estimator.estimate(snapshot, large, 'buy', 100);

          expect(first.uncappedSlippagePct).toBeGreaterThanOrEqual(-1e-9);
          expect(second.uncappedSlippagePct).toBeGreaterThanOrEqual(
            first.uncappedSlippagePct - 1e-9,
          );
        },
      ),
    );
  });
});
