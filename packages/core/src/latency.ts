import { performance } from 'node:perf_hooks';
import { createLogger, type Logger } from './logger.js';

export interface LatencyStats {
  count: number;
  min: number;
  max: number;
  mean: number;
  median: number;
  p95: number;
  p99: number;
}

export interface LatencyInstrumentOptions {
  maxSamples?: number;
  logger?: Logger;
  now?: () => number;
}

const DEFAULT_MAX_SAMPLES = 1000;

const EMPTY_STATS: LatencyStats = Object.freeze({
  count: 0,
  min: 0,
  max: 0,
  mean: 0,
  median: 0,
  p95: 0,
  p99: 0,
});

function median(sorted: readonly number[]): number {
  const mid = sorted.length >>> 1;
  const upper = sorted[mid] ?? 0;
  if (sorted.length % 2 === 1) {
    return upper;
  }
  const lower = sorted[mid - 1] ?? upper;
  return (lower + upper) / 2;
}

/**
 * Percentile by nearest-rank on the sorted history. Small histories do not
 * carry a meaningful tail, so below `minSamples` the maximum is reported.
 */
function tail(
  sorted: readonly number[],
  fraction: number,
  minSamples: number,
): number {
  const max = sorted[sorted.length - 1] ?? 0;
  if (sorted.length < minSamples) {
    return max;
  }
  const index = Math.max(0, Math.floor(fraction * sorted.length) - 1);
  return sorted[index] ?? max;
}

/**
 * Named start/stop timer keeping a bounded history of elapsed milliseconds
 * per operation.
 */
export class LatencyInstrument {
  private readonly maxSamples: number;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly startedAt = new Map<string, number>();
  private readonly samples = new Map<string, number[]>();

  constructor(options: LatencyInstrumentOptions = {}) {
    const maxSamples = options.maxSamples ?? DEFAULT_MAX_SAMPLES;
    if (!Number.isInteger(maxSamples) || maxSamples <= 0) {
      throw new Error(`maxSamples must be a positive integer: ${maxSamples}`);
    }
    this.maxSamples = maxSamples;
    this.logger = options.logger ?? createLogger('latency');
    this.now = options.now ?? (() => performance.now());
  }

  start(name: string): void {
    this.startedAt.set(name, this.now());
  }

  stop(name: string): number {
    const started = this.startedAt.get(name);
    if (started === undefined) {
      this.logger.warn({ operation: name }, 'no start time for operation');
      return 0;
    }
    this.startedAt.delete(name);
    const elapsed = Math.max(0, this.now() - started);
    let history = this.samples.get(name);
    if (!history) {
      history = [];
      this.samples.set(name, history);
    }
    history.push(elapsed);
    if (history.length > this.maxSamples) {
      history.splice(0, history.length - this.maxSamples);
    }
    return elapsed;
  }

  measure<T>(name: string, fn: () => T): { value: T; elapsedMs: number } {
    this.start(name);
    let elapsedMs = 0;
    try {
      const value = fn();
      elapsedMs = this.stop(name);
      return { value, elapsedMs };
    } finally {
      if (this.startedAt.has(name)) {
        this.stop(name);
      }
    }
  }

  history(name: string): number[] {
    return [...(this.samples.get(name) ?? [])];
  }

  stats(name: string): LatencyStats {
    const history = this.samples.get(name);
    if (!history || history.length === 0) {
      return { ...EMPTY_STATS };
    }
    const sorted = [...history].sort((a, b) => a - b);
    const sum = sorted.reduce((acc, value) => acc + value, 0);
    return {
      count: sorted.length,
      min: sorted[0] ?? 0,
      max: sorted[sorted.length - 1] ?? 0,
      mean: sum / sorted.length,
      median: median(sorted),
      p95: tail(sorted, 0.95, 20),
      p99: tail(sorted, 0.99, 100),
    };
  }

  allStats(): Record<string, LatencyStats> {
    const result: Record<string, LatencyStats> = {};
    for (const name of this.samples.keys()) {
      result[name] = this.stats(name);
    }
    return result;
  }

  reset(name?: string): void {
    if (name === undefined) {
      this.samples.clear();
      this.startedAt.clear();
      return;
    }
    this.samples.delete(name);
    this.startedAt.delete(name);
  }
}
