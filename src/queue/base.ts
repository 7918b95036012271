import { z } from 'zod';

/** Wake-up signal for a worker. The job record, not the message, is authoritative. */
export interface QueueMessage {
  messageId: string;
  jobId: string;
  enqueuedAt: string; // ISO
  deliveryAttempt: number;
}

export const QueueMessageSchema = z.object({
  messageId: z.string(),
  jobId: z.string(),
  enqueuedAt: z.string(),
  deliveryAttempt: z.number().int().min(1),
});

export interface Delivery {
  message: QueueMessage;
  /** Opaque handle for ack/nack of this delivery only. */
  token: string;
}

export interface EnqueueOptions {
  delayMs?: number;
}

export interface QueueStats {
  ready: number;
  inFlight: number;
  delayed: number;
}

/**
 * At-least-once delivery. A delivery that is neither acked nor nacked within
 * the visibility timeout is handed out again with `deliveryAttempt + 1`.
 */
export interface TaskQueue {
  enqueue(jobId: string, options?: EnqueueOptions): Promise<QueueMessage>;
  dequeue(): Promise<Delivery | null>;
  /** False when the delivery already timed out or was settled. */
  ack(token: string): Promise<boolean>;
  /** Returns the message for redelivery, optionally after a delay. */
  nack(token: string, options?: EnqueueOptions): Promise<boolean>;
  getStats(): Promise<QueueStats>;
}
