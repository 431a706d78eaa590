import { FrameQueue } from '../src/frame-queue.js';

describe('FrameQueue', () => {
  test('delivers buffered frames in arrival order', async () => {
    const queue = new FrameQueue<number>();
    queue.offer(1);
    queue.offer(2);
    expect(queue.pending).toBe(2);
    queue.close();

    const received: number[] = [];
    for await (const frame of queue) {
      received.push(frame);
    }
    expect(received).toEqual([1, 2]);
    expect(queue.pending).toBe(0);
  });

  test('hands a frame straight to a waiting consumer', async () => {
    const queue = new FrameQueue<string>();
    const next = queue[Symbol.asyncIterator]().next();

    expect(queue.offer('tick')).toBe(true);
    await expect(next).resolves.toEqual({ value: 'tick', done: false });
    expect(queue.pending).toBe(0);
  });

  test('close ends a waiting consumer after the buffered frames', async () => {
    const queue = new FrameQueue<string>();
    const consumed = (async () => {
      const frames: string[] = [];
      for await (const frame of queue) {
        frames.push(frame);
      }
      return frames;
    })();

    queue.offer('a');
    queue.close();
    await expect(consumed).resolves.toEqual(['a']);
  });

  test('drops frames offered after close', () => {
    const queue = new FrameQueue<number>();
    queue.close();

    expect(queue.isClosed).toBe(true);
    expect(queue.offer(1)).toBe(false);
    expect(queue.pending).toBe(0);
  });

  test('rejects a second concurrent consumer', async () => {
    const queue = new FrameQueue<number>();
    const iterator = queue[Symbol.asyncIterator]();
    const first = iterator.next();

    await expect(iterator.next()).rejects.toThrow(
      'FrameQueue already has a consumer',
    );
    queue.offer(7);
    await expect(first).resolves.toEqual({ value: 7, done: false });
  });
});
