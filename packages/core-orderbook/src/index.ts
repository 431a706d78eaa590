export {
  createSnapshot,
  midPrice,
  topLevels,
  EMPTY_SNAPSHOT,
  type SnapshotSeed,
} from './snapshot.js';
export { buildSide, totalSize } from './priceLevels.js';
export {
  parseBookMessage,
  type BookMessage,
  type BookMessageResult,
} from './message.js';
export { summarizeBook, EMPTY_BOOK_REASON } from './summary.js';
export type {
  BookSide,
  BookSummary,
  BookSummaryData,
  EmptyBook,
  OrderBookSnapshot,
  PriceLevel,
  Side,
  SnapshotSource,
} from './types.js';
