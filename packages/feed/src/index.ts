export {
  OrderbookStream,
  DEFAULT_FEED_URL,
  type OrderbookStreamOptions,
  type StreamStatus,
  type WebSocketConstructor,
} from './stream.js';
