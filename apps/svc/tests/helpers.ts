import {
  createSnapshot,
  EMPTY_SNAPSHOT,
  type OrderBookSnapshot,
} from '@depthcost/core-orderbook';
import { CostEstimationPipeline, FeeModel } from '@depthcost/estimator';
import type { StreamStatus } from '@depthcost/feed';
import type { FeedHandle, ServiceContext } from '../src/server.js';

export const FIXTURE_BOOK = createSnapshot({
  asks: [
    { price: 29880, size: 1.5 },
    { price: 29881.5, size: 0.75 },
    { price: 29883, size: 2.1 },
  ],
  bids: [
    { price: 29875, size: 1.2 },
    { price: 29873.5, size: 0.85 },
  ],
  capturedAt: 1_700_000_000_000,
  parseLatencyMs: 0.125,
});

const silentLogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

export class FixtureFeed implements FeedHandle {
  constructor(public current: OrderBookSnapshot = EMPTY_SNAPSHOT) {}

  snapshot(): OrderBookSnapshot {
    return this.current;
  }

  status(): StreamStatus {
    return {
      running: true,
      connected: true,
      messages: this.current === EMPTY_SNAPSHOT ? 0 : 1,
      reconnects: 0,
      lastLatencyMs: this.current.parseLatencyMs,
      averageLatencyMs: this.current.parseLatencyMs,
      lastMessageAt: this.current.capturedAt,
      pendingFrames: 0,
    };
  }
}

export function createContext(
  book: OrderBookSnapshot = FIXTURE_BOOK,
): ServiceContext & { feed: FixtureFeed } {
  const feed = new FixtureFeed(book);
  const fees = new FeeModel({ logger: silentLogger });
  const pipeline = new CostEstimationPipeline(feed, {
    fees,
    logger: silentLogger,
  });
  return { feed, fees, pipeline };
}
