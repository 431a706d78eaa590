import type { ClientOptions, RawData } from 'ws';

export function createMockLogger() {
  return {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  };
}

export async function waitFor(
  condition: () => boolean,
  timeoutMs = 2_000,
): Promise<void> {
  const started = Date.now();
  while (!condition()) {
    if (Date.now() - started > timeoutMs) {
      throw new Error('condition not met in time');
    }
    await new Promise<void>((resolve) => setImmediate(resolve));
  }
}

export class MockWebSocket {
  static instances: MockWebSocket[] = [];
  static autoOpen = true;
  static pendingFailures = 0;

  static reset(): void {
    MockWebSocket.instances = [];
    MockWebSocket.autoOpen = true;
    MockWebSocket.pendingFailures = 0;
  }

  public readyState = 0;
  public closed = false;
  public terminated = false;
  private listeners: {
    open: Array<() => void>;
    message: Array<(data: RawData) => void>;
    close: Array<(code: number, reason: Buffer) => void>;
    error: Array<(err: Error) => void>;
  } = {
    open: [],
    message: [],
    close: [],
    error: [],
  };

  constructor(
    public readonly url: string,
    public readonly options?: ClientOptions,
  ) {
    MockWebSocket.instances.push(this);
    if (MockWebSocket.pendingFailures > 0) {
      MockWebSocket.pendingFailures -= 1;
      queueMicrotask(() => this.emitError(new Error('connect ECONNREFUSED')));
    } else if (MockWebSocket.autoOpen) {
      queueMicrotask(() => this.emitOpen());
    }
  }

  on(event: 'open', listener: () => void): this;
  on(event: 'message', listener: (data: RawData) => void): this;
  on(event: 'close', listener: (code: number, reason: Buffer) => void): this;
  on(event: 'error', listener: (err: Error) => void): this;
  on(
    event: 'open' | 'message' | 'close' | 'error',
    listener:
      | (() => void)
      | ((data: RawData) => void)
      | ((code: number, reason: Buffer) => void)
      | ((err: Error) => void),
  ): this {
    switch (event) {
      case 'open':
        this.listeners.open.push(listener as () => void);
        break;
      case 'message':
        this.listeners.message.push(listener as (data: RawData) => void);
        break;
      case 'close':
        this.listeners.close.push(
          listener as (code: number, reason: Buffer) => void,
        );
        break;
      case 'error':
        this.listeners.error.push(listener as (err: Error) => void);
        break;
    }
    return this;
  }

  emitOpen(): void {
    this.readyState = 1;
    for (const listener of this.listeners.open) {
      listener();
    }
  }

  emitMessage(payload: unknown): void {
    const data =
      typeof payload === 'string' ? payload : JSON.stringify(payload, null, 0);
    for (const listener of this.listeners.message) {
      listener(Buffer.from(data));
    }
  }

  emitClose(code = 1000, reason = ''): void {
    this.readyState = 3;
    for (const listener of this.listeners.close) {
      listener(code, Buffer.from(reason));
    }
  }

  emitError(err: Error): void {
    for (const listener of this.listeners.error) {
      listener(err);
    }
  }

  close(): void {
    this.closed = true;
    this.readyState = 3;
  }

  terminate(): void {
    this.terminated = true;
    this.readyState = 3;
  }
}
