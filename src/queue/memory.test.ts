import { describe, it, expect, beforeEach } from 'vitest';
import { InMemoryTaskQueue } from './memory.js';

describe('InMemoryTaskQueue', () => {
  let clock: number;
  let queue: InMemoryTaskQueue;

  beforeEach(() => {
    clock = Date.parse('2025-03-01T10:00:00.000Z');
    queue = new InMemoryTaskQueue({ visibilityTimeoutMs: 1000, now: () => clock });
  });

  it('should deliver messages in FIFO order', async () => {
    await queue.enqueue('job-1');
    await queue.enqueue('job-2');

    expect((await queue.dequeue())?.message.jobId).toBe('job-1');
    expect((await queue.dequeue())?.message.jobId).toBe('job-2');
    expect(await queue.dequeue()).toBeNull();
  });

  it('should start every message at delivery attempt 1', async () => {
    const message = await queue.enqueue('job-1');
    expect(message.deliveryAttempt).toBe(1);
    expect(message.enqueuedAt).toBe('2025-03-01T10:00:00.000Z');
  });

  it('should remove acked deliveries for good', async () => {
    await queue.enqueue('job-1');
    const delivery = await queue.dequeue();

    expect(await queue.ack(delivery?.token ?? '')).toBe(true);
    expect(await queue.ack(delivery?.token ?? '')).toBe(false);

    clock += 5000;
    expect(await queue.dequeue()).toBeNull();
  });

  it('should redeliver after the visibility timeout with a higher attempt', async () => {
    await queue.enqueue('job-1');
    const first = await queue.dequeue();
    expect(await queue.dequeue()).toBeNull();

    clock += 1000;
    const second = await queue.dequeue();
    expect(second?.message.jobId).toBe('job-1');
    expect(second?.message.deliveryAttempt).toBe(2);
    expect(second?.token).not.toBe(first?.token);

    // The timed-out token no longer settles anything.
    expect(await queue.ack(first?.token ?? '')).toBe(false);
  });

  it('should hold nacked messages for the requested delay', async () => {
    await queue.enqueue('job-1');
    const delivery = await queue.dequeue();

    expect(await queue.nack(delivery?.token ?? '', { delayMs: 500 })).toBe(true);
    expect(await queue.getStats()).toEqual({ ready: 0, inFlight: 0, delayed: 1 });
    expect(await queue.dequeue()).toBeNull();

    clock += 500;
    const redelivered = await queue.dequeue();
    expect(redelivered?.message.deliveryAttempt).toBe(2);
  });

  it('should not nack an unknown token', async () => {
    expect(await queue.nack('missing')).toBe(false);
  });

  it('should delay enqueued messages', async () => {
    await queue.enqueue('job-1', { delayMs: 200 });
    expect(await queue.dequeue()).toBeNull();

    clock += 200;
    expect((await queue.dequeue())?.message.jobId).toBe('job-1');
    expect(await queue.getStats()).toEqual({ ready: 0, inFlight: 1, delayed: 0 });
  });
});
