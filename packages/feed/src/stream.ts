import WebSocket, {
  type ClientOptions as WebSocketClientOptions,
  type RawData,
} from 'ws';
import { performance } from 'node:perf_hooks';
import { setTimeout as sleep } from 'node:timers/promises';
import {
  ConnectionError,
  createLogger,
  describeError,
  type Logger,
} from '@depthcost/core';
import {
  createSnapshot,
  EMPTY_SNAPSHOT,
  parseBookMessage,
  type OrderBookSnapshot,
  type SnapshotSource,
} from '@depthcost/core-orderbook';
import { FrameQueue } from './frame-queue.js';

type WebSocketLike = {
  on(event: 'open', listener: () => void): WebSocketLike;
  on(event: 'message', listener: (data: RawData) => void): WebSocketLike;
  on(
    event: 'close',
    listener: (code: number, reason: Buffer) => void,
  ): WebSocketLike;
  on(event: 'error', listener: (err: Error) => void): WebSocketLike;
  close(): void;
  terminate(): void;
  readyState: number;
};

export type WebSocketConstructor = new (
  url: string,
  options?: WebSocketClientOptions,
) => WebSocketLike;

export interface OrderbookStreamOptions {
  url?: string;
  maxRetries?: number;
  retryDelayMs?: number;
  /** Drop and reconnect when no message arrives for this long; 0 disables. */
  readTimeoutMs?: number;
  latencyReportEvery?: number;
  logger?: Logger;
  wsOptions?: WebSocketClientOptions;
  WebSocketCtor?: WebSocketConstructor;
}

export interface StreamStatus {
  running: boolean;
  connected: boolean;
  messages: number;
  reconnects: number;
  lastLatencyMs: number;
  averageLatencyMs: number;
  lastMessageAt: number | null;
  /** Frames received on the live connection and not yet parsed. */
  pendingFrames: number;
}

interface Connection {
  ws: WebSocketLike;
  queue: FrameQueue<string>;
  idleTimer?: NodeJS.Timeout;
}

export const DEFAULT_FEED_URL =
  'wss://ws.gomarket-cpp.goquant.io/ws/l2-orderbook/okx/BTC-USDT-SWAP';

const DEFAULTS = {
  maxRetries: 5,
  retryDelayMs: 2_000,
  readTimeoutMs: 30_000,
  handshakeTimeoutMs: 10_000,
  latencyReportEvery: 100,
};

function decode(data: RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString('utf8');
  }
  return data.toString('utf8');
}

function preview(raw: string): string {
  return raw.length > 100 ? `${raw.slice(0, 100)}...` : raw;
}

/**
 * Keeps one up-to-date order-book snapshot from a full-snapshot WebSocket
 * feed.
 *
 * The receive side is a single async loop: connect, drain messages until the
 * socket closes, then connect again. Each valid message is turned into a new
 * frozen snapshot and published by swapping one reference, so `snapshot()`
 * readers never see a partially built book.
 */
export class OrderbookStream implements SnapshotSource {
  private readonly url: string;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly readTimeoutMs: number;
  private readonly latencyReportEvery: number;
  private readonly logger: Logger;
  private readonly wsOptions: WebSocketClientOptions;
  private readonly WebSocketImpl: WebSocketConstructor;

  private current: OrderBookSnapshot = EMPTY_SNAPSHOT;
  private connection?: Connection;
  private lifecycle = new AbortController();
  private running = false;

  private messageCount = 0;
  private totalLatencyMs = 0;
  private lastLatencyMs = 0;
  private lastMessageAt: number | null = null;
  private reconnects = 0;

  constructor(options: OrderbookStreamOptions = {}) {
    const maxRetries = options.maxRetries ?? DEFAULTS.maxRetries;
    if (!Number.isInteger(maxRetries) || maxRetries <= 0) {
      throw new Error(`maxRetries must be a positive integer: ${maxRetries}`);
    }
    const retryDelayMs = options.retryDelayMs ?? DEFAULTS.retryDelayMs;
    if (!Number.isFinite(retryDelayMs) || retryDelayMs < 0) {
      throw new Error(`retryDelayMs must be non-negative: ${retryDelayMs}`);
    }
    this.url = options.url ?? DEFAULT_FEED_URL;
    this.maxRetries = maxRetries;
    this.retryDelayMs = retryDelayMs;
    this.readTimeoutMs = Math.max(
      0,
      options.readTimeoutMs ?? DEFAULTS.readTimeoutMs,
    );
    this.latencyReportEvery = Math.max(
      1,
      Math.floor(options.latencyReportEvery ?? DEFAULTS.latencyReportEvery),
    );
    this.logger = options.logger ?? createLogger('orderbook-stream');
    this.wsOptions = {
      handshakeTimeout: DEFAULTS.handshakeTimeoutMs,
      ...options.wsOptions,
    };
    this.WebSocketImpl =
      options.WebSocketCtor ?? (WebSocket as unknown as WebSocketConstructor);
  }

  get isRunning(): boolean {
    return this.running;
  }

  /**
   * Opens the feed, retrying up to `maxRetries` attempts with a fixed delay.
   * Rejects with `ConnectionError` once the attempts are used up.
   */
  async connect(): Promise<void> {
    if (this.lifecycle.signal.aborted) {
      this.lifecycle = new AbortController();
    }
    await this.establish(this.lifecycle.signal);
  }

  /**
   * Connects and receives until `stop()`. Settles when the loop ends:
   * resolves after a stop, rejects when a reconnect runs out of retries.
   */
  async start(): Promise<void> {
    if (this.running) {
      this.logger.warn('orderbook stream is already running');
      return;
    }
    this.running = true;
    this.lifecycle = new AbortController();
    const { signal } = this.lifecycle;

    try {
      await this.establish(signal);
      while (!signal.aborted) {
        const connection = this.connection;
        if (connection) {
          await this.receive(connection);
        }
        if (signal.aborted) {
          break;
        }
        this.reconnects += 1;
        this.logger.warn(
          { reconnects: this.reconnects },
          'feed connection lost, reconnecting',
        );
        await this.establish(signal);
      }
    } catch (err) {
      if (signal.aborted) {
        return;
      }
      this.running = false;
      throw err;
    }
  }

  async stop(): Promise<void> {
    this.running = false;
    this.lifecycle.abort();
    const connection = this.connection;
    this.connection = undefined;
    if (connection) {
      this.dispose(connection);
      this.logger.info('feed connection closed');
    }
  }

  snapshot(): OrderBookSnapshot {
    return this.current;
  }

  status(): StreamStatus {
    return {
      running: this.running,
      connected: this.connection !== undefined && !this.connection.queue.isClosed,
      messages: this.messageCount,
      reconnects: this.reconnects,
      lastLatencyMs: this.lastLatencyMs,
      averageLatencyMs:
        this.messageCount > 0 ? this.totalLatencyMs / this.messageCount : 0,
      lastMessageAt: this.lastMessageAt,
      pendingFrames: this.connection?.queue.pending ?? 0,
    };
  }

  /**
   * Handles one raw feed message. Returns whether a new snapshot was
   * published; malformed messages are logged and dropped.
   */
  ingest(raw: string): boolean {
    const receivedAt = performance.now();

    let payload: unknown;
    try {
      payload = JSON.parse(raw);
    } catch (err) {
      this.logger.error(
        { error: describeError(err), message: preview(raw) },
        'failed to parse feed message as JSON',
      );
      return false;
    }

    const parsed = parseBookMessage(payload);
    if (!parsed.ok) {
      this.logger.warn(
        { reason: parsed.reason, detail: parsed.detail, message: preview(raw) },
        'discarding message without orderbook data',
      );
      return false;
    }

    const snapshot = createSnapshot(
      {
        asks: parsed.message.asks,
        bids: parsed.message.bids,
        capturedAt: Date.now(),
      },
      () => performance.now() - receivedAt,
    );
    this.current = snapshot;
    this.record(snapshot);
    return true;
  }

  private record(snapshot: OrderBookSnapshot): void {
    const latency = snapshot.parseLatencyMs;
    this.messageCount += 1;
    this.totalLatencyMs += latency;
    this.lastLatencyMs = latency;
    this.lastMessageAt = snapshot.capturedAt;

    this.logger.debug(
      {
        latencyMs: latency,
        asks: snapshot.asks.length,
        bids: snapshot.bids.length,
      },
      'orderbook snapshot published',
    );

    if (this.messageCount % this.latencyReportEvery === 0) {
      this.logger.info(
        {
          messages: this.messageCount,
          latencyMs: Number(latency.toFixed(2)),
          averageLatencyMs: Number(
            (this.totalLatencyMs / this.messageCount).toFixed(2),
          ),
        },
        'feed processing latency',
      );
    }
  }

  private async establish(signal: AbortSignal): Promise<void> {
    let attempt = 0;
    for (;;) {
      attempt += 1;
      signal.throwIfAborted();
      try {
        this.logger.info({ url: this.url, attempt }, 'connecting to feed');
        const connection = await this.open(signal);
        this.replace(connection);
        this.logger.info({ url: this.url }, 'feed connection established');
        return;
      } catch (err) {
        if (signal.aborted) {
          throw err;
        }
        this.logger.error(
          { attempt, error: describeError(err) },
          'feed connection attempt failed',
        );
        if (attempt >= this.maxRetries) {
          throw new ConnectionError(
            `Failed to connect after ${this.maxRetries} attempts`,
            { cause: err },
          );
        }
      }
      await sleep(this.retryDelayMs, undefined, { signal });
    }
  }

  private open(signal: AbortSignal): Promise<Connection> {
    return new Promise<Connection>((resolve, reject) => {
      const ws = new this.WebSocketImpl(this.url, this.wsOptions);
      const connection: Connection = { ws, queue: new FrameQueue<string>() };
      let opened = false;

      const onAbort = () => {
        this.dispose(connection);
        reject(new Error('feed connect aborted'));
      };
      signal.addEventListener('abort', onAbort, { once: true });

      ws.on('open', () => {
        opened = true;
        signal.removeEventListener('abort', onAbort);
        this.armReadTimeout(connection);
        resolve(connection);
      });
      ws.on('message', (data) => {
        if (connection.queue.offer(decode(data))) {
          this.armReadTimeout(connection);
        }
      });
      ws.on('close', (code, reason) => {
        this.disarm(connection);
        connection.queue.close();
        if (!opened) {
          signal.removeEventListener('abort', onAbort);
          reject(new Error(`WebSocket closed before open (${code})`));
          return;
        }
        if (!signal.aborted) {
          this.logger.warn(
            { code, reason: reason.toString() },
            'feed connection closed',
          );
        }
      });
      ws.on('error', (err) => {
        if (!opened) {
          signal.removeEventListener('abort', onAbort);
          connection.queue.close();
          reject(err);
          return;
        }
        this.logger.error({ error: err.message }, 'feed socket error');
      });
    });
  }

  private async receive(connection: Connection): Promise<void> {
    for await (const raw of connection.queue) {
      this.ingest(raw);
    }
    this.disarm(connection);
    if (this.connection === connection) {
      this.connection = undefined;
    }
  }

  private replace(connection: Connection): void {
    const previous = this.connection;
    if (previous && previous !== connection) {
      this.dispose(previous);
    }
    this.connection = connection;
  }

  private armReadTimeout(connection: Connection): void {
    if (this.readTimeoutMs <= 0) {
      return;
    }
    this.disarm(connection);
    const timer = setTimeout(() => {
      this.logger.warn(
        { readTimeoutMs: this.readTimeoutMs },
        'no feed message within read timeout, dropping connection',
      );
      this.dispose(connection, true);
    }, this.readTimeoutMs);
    timer.unref();
    connection.idleTimer = timer;
  }

  private disarm(connection: Connection): void {
    if (connection.idleTimer) {
      clearTimeout(connection.idleTimer);
      connection.idleTimer = undefined;
    }
  }

  /** `force` skips the close handshake, for peers that stopped responding. */
  private dispose(connection: Connection, force = false): void {
    this.disarm(connection);
    connection.queue.close();
    try {
      if (force) {
        connection.ws.terminate();
      } else {
        connection.ws.close();
      }
    } catch (err) {
      this.logger.warn(
        { error: describeError(err) },
        'failed to close feed socket',
      );
    }
  }
}
