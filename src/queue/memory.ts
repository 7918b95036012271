import { ulid } from 'ulid';
import type { Delivery, EnqueueOptions, QueueMessage, QueueStats, TaskQueue } from './base.js';

export interface InMemoryTaskQueueOptions {
  visibilityTimeoutMs?: number;
  now?: () => number;
}

interface Scheduled {
  message: QueueMessage;
  at: number;
}

export class InMemoryTaskQueue implements TaskQueue {
  private ready: QueueMessage[] = [];
  private delayed: Scheduled[] = [];
  private inFlight = new Map<string, Scheduled>();
  private readonly visibilityTimeoutMs: number;
  private readonly now: () => number;

  constructor(options: InMemoryTaskQueueOptions = {}) {
    this.visibilityTimeoutMs = options.visibilityTimeoutMs ?? 15 * 60 * 1000;
    this.now = options.now ?? Date.now;
  }

  async enqueue(jobId: string, options: EnqueueOptions = {}): Promise<QueueMessage> {
    const message: QueueMessage = {
      messageId: ulid(),
      jobId,
      enqueuedAt: new Date(this.now()).toISOString(),
      deliveryAttempt: 1,
    };
    this.schedule(message, options.delayMs ?? 0);
    return { ...message };
  }

  async dequeue(): Promise<Delivery | null> {
    this.promote();

    const message = this.ready.shift();
    if (!message) return null;

    const token = ulid();
    this.inFlight.set(token, { message, at: this.now() + this.visibilityTimeoutMs });
    return { message: { ...message }, token };
  }

  async ack(token: string): Promise<boolean> {
    return this.inFlight.delete(token);
  }

  async nack(token: string, options: EnqueueOptions = {}): Promise<boolean> {
    const entry = this.inFlight.get(token);
    if (!entry) return false;

    this.inFlight.delete(token);
    this.schedule({ ...entry.message, deliveryAttempt: entry.message.deliveryAttempt + 1 }, options.delayMs ?? 0);
    return true;
  }

  async getStats(): Promise<QueueStats> {
    return {
      ready: this.ready.length,
      inFlight: this.inFlight.size,
      delayed: this.delayed.length,
    };
  }

  private schedule(message: QueueMessage, delayMs: number): void {
    if (delayMs > 0) {
      this.delayed.push({ message, at: this.now() + delayMs });
    } else {
      this.ready.push(message);
    }
  }

  // Moves due delayed messages and timed-out deliveries back to ready.
  private promote(): void {
    const now = this.now();

    const due = this.delayed.filter(entry => entry.at <= now);
    this.delayed = this.delayed.filter(entry => entry.at > now);
    for (const entry of due.sort((a, b) => a.at - b.at)) {
      this.ready.push(entry.message);
    }

    for (const [token, entry] of this.inFlight) {
      if (entry.at <= now) {
        this.inFlight.delete(token);
        this.ready.push({ ...entry.message, deliveryAttempt: entry.message.deliveryAttempt + 1 });
      }
    }
  }
}
