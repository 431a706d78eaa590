import {
  createSnapshot,
  EMPTY_SNAPSHOT,
  summarizeBook,
} from '@depthcost/core-orderbook';

describe('summarizeBook', () => {
  const snapshot = createSnapshot({
    asks: [
      { price: 29880, size: 1.5 },
      { price: 29881.5, size: 0.75 },
      { price: 29883, size: 2.1 },
    ],
    bids: [
      { price: 29875, size: 1.2 },
      { price: 29873.5, size: 0.85 },
    ],
    parseLatencyMs: 0.125,
  });

  it('reports top of book and spread', () => {
    const summary = summarizeBook(snapshot);
    if (!summary.success) {
      throw new Error('expected a summary');
    }
    expect(summary.bestAsk).toBe(29880);
    expect(summary.bestBid).toBe(29875);
    expect(summary.spread).toBe(5);
    expect(summary.midPrice).toBe(29877.5);
    expect(summary.spreadPct).toBe(0.0167);
    expect(summary.askLevels).toBe(3);
    expect(summary.bidLevels).toBe(2);
    expect(summary.lastLatencyMs).toBe(0.13);
  });

  it('reports depth and imbalance', () => {
    const summary = summarizeBook(snapshot);
    if (!summary.success) {
      throw new Error('expected a summary');
    }
    expect(summary.askDepth).toBeCloseTo(4.35, 10);
    expect(summary.bidDepth).toBeCloseTo(2.05, 10);
    expect(summary.bookImbalance).toBeCloseTo(-0.3594, 10);
  });

  it('returns a typed failure for an empty side', () => {
    expect(summarizeBook(EMPTY_SNAPSHOT)).toEqual({
      success: false,
      reason: 'empty orderbook',
    });
    expect(
      summarizeBook(createSnapshot({ asks: [{ price: 1, size: 1 }] })),
    ).toEqual({ success: false, reason: 'empty orderbook' });
  });
});
