/**
 * Single-consumer buffer between socket callbacks and the receive loop.
 * Frames arriving while the loop is busy wait here in arrival order.
 */
export class FrameQueue<T> implements AsyncIterable<T> {
  private readonly frames: { value: T }[] = [];
  private waiter?: (result: IteratorResult<T, undefined>) => void;
  private closed = false;

  get isClosed(): boolean {
    return this.closed;
  }

  /** Frames received but not yet taken by the consumer. */
  get pending(): number {
    return this.frames.length;
  }

  /** Returns false when the queue is already closed and the frame is dropped. */
  offer(value: T): boolean {
    if (this.closed) {
      return false;
    }
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = undefined;
      waiter({ value, done: false });
    } else {
      this.frames.push({ value });
    }
    return true;
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    const waiter = this.waiter;
    this.waiter = undefined;
    waiter?.({ value: undefined, done: true });
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return { next: () => this.take() };
  }

  private take(): Promise<IteratorResult<T, undefined>> {
    const frame = this.frames.shift();
    if (frame) {
      return Promise.resolve({ value: frame.value, done: false });
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    if (this.waiter) {
      return Promise.reject(new Error('FrameQueue already has a consumer'));
    }
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }
}
