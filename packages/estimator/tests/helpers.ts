import {
  createSnapshot,
  EMPTY_SNAPSHOT,
  type OrderBookSnapshot,
  type SnapshotSource,
} from '@depthcost/core-orderbook';

type Level = [price: number, size: number];

export function createMockLogger() {
  return {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  };
}

export function book(asks: Level[], bids: Level[]): OrderBookSnapshot {
  return createSnapshot({
    asks: asks.map(([price, size]) => ({ price, size })),
    bids: bids.map(([price, size]) => ({ price, size })),
    capturedAt: 1_700_000_000_000,
    parseLatencyMs: 0.125,
  });
}

export const FIXTURE_BOOK = book(
  [
    [29880, 1.5],
    [29881.5, 0.75],
    [29883, 2.1],
  ],
  [
    [29875, 1.2],
    [29873.5, 0.85],
  ],
);

export class FixtureSource implements SnapshotSource {
  constructor(public current: OrderBookSnapshot = EMPTY_SNAPSHOT) {}

  snapshot(): OrderBookSnapshot {
    return this.current;
  }
}
