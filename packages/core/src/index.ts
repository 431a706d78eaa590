export {
  createLogger,
  describeError,
  type LogFn,
  type Logger,
  type LoggerOptions,
} from './logger.js';
export {
  LatencyInstrument,
  type LatencyInstrumentOptions,
  type LatencyStats,
} from './latency.js';
export { ConnectionError, ValidationError, ConfigError } from './errors.js';
export { clamp, roundTo } from './math.js';
