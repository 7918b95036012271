import { ulid } from 'ulid';
import type { UpstashClient } from '../repositories/upstash.js';
import { asNumber } from '../repositories/upstash.js';
import {
  type Delivery,
  type EnqueueOptions,
  type QueueMessage,
  type QueueStats,
  type TaskQueue,
  QueueMessageSchema,
} from './base.js';

const PROMOTE_BATCH = 100;

// KEYS: ready list, in-flight zset, delayed zset. ARGV: now ms, visibility deadline ms, batch size.
// The in-flight member is the message JSON itself and doubles as the delivery token.
const DEQUEUE = `
local now = tonumber(ARGV[1])
local batch = tonumber(ARGV[3])
local due = redis.call('ZRANGEBYSCORE', KEYS[3], '-inf', now, 'LIMIT', 0, batch)
for _, raw in ipairs(due) do
  redis.call('ZREM', KEYS[3], raw)
  redis.call('LPUSH', KEYS[1], raw)
end
local expired = redis.call('ZRANGEBYSCORE', KEYS[2], '-inf', now, 'LIMIT', 0, batch)
for _, raw in ipairs(expired) do
  redis.call('ZREM', KEYS[2], raw)
  local msg = cjson.decode(raw)
  msg.deliveryAttempt = msg.deliveryAttempt + 1
  redis.call('RPUSH', KEYS[1], cjson.encode(msg))
end
local raw = redis.call('RPOP', KEYS[1])
if not raw then return false end
redis.call('ZADD', KEYS[2], ARGV[2], raw)
return raw
`;

// KEYS as above. ARGV: token, available-at ms (0 = now).
const NACK = `
if redis.call('ZREM', KEYS[2], ARGV[1]) == 0 then return 0 end
local msg = cjson.decode(ARGV[1])
msg.deliveryAttempt = msg.deliveryAttempt + 1
local raw = cjson.encode(msg)
if tonumber(ARGV[2]) > 0 then
  redis.call('ZADD', KEYS[3], ARGV[2], raw)
else
  redis.call('LPUSH', KEYS[1], raw)
end
return 1
`;

export interface RedisTaskQueueOptions {
  keyPrefix?: string;
  visibilityTimeoutMs?: number;
}

export class RedisTaskQueue implements TaskQueue {
  private readonly keys: [ready: string, inFlight: string, delayed: string];
  private readonly visibilityTimeoutMs: number;

  constructor(private client: UpstashClient, options: RedisTaskQueueOptions = {}) {
    const prefix = options.keyPrefix ?? 'mjs';
    this.keys = [`${prefix}:queue:ready`, `${prefix}:queue:inflight`, `${prefix}:queue:delayed`];
    this.visibilityTimeoutMs = options.visibilityTimeoutMs ?? 15 * 60 * 1000;
  }

  async enqueue(jobId: string, options: EnqueueOptions = {}): Promise<QueueMessage> {
    const message: QueueMessage = {
      messageId: ulid(),
      jobId,
      enqueuedAt: new Date().toISOString(),
      deliveryAttempt: 1,
    };
    const raw = JSON.stringify(message);
    const delayMs = options.delayMs ?? 0;

    if (delayMs > 0) {
      await this.client.command(['ZADD', this.keys[2], Date.now() + delayMs, raw]);
    } else {
      await this.client.command(['LPUSH', this.keys[0], raw]);
    }
    return message;
  }

  async dequeue(): Promise<Delivery | null> {
    const now = Date.now();
    const raw = await this.client.eval(DEQUEUE, this.keys, [now, now + this.visibilityTimeoutMs, PROMOTE_BATCH]);
    if (typeof raw !== 'string') return null;

    return { message: QueueMessageSchema.parse(JSON.parse(raw)), token: raw };
  }

  async ack(token: string): Promise<boolean> {
    return asNumber(await this.client.command(['ZREM', this.keys[1], token])) === 1;
  }

  async nack(token: string, options: EnqueueOptions = {}): Promise<boolean> {
    const delayMs = options.delayMs ?? 0;
    const availableAt = delayMs > 0 ? Date.now() + delayMs : 0;
    return asNumber(await this.client.eval(NACK, this.keys, [token, availableAt])) === 1;
  }

  async getStats(): Promise<QueueStats> {
    const [ready, inFlight, delayed] = await Promise.all([
      this.client.command(['LLEN', this.keys[0]]),
      this.client.command(['ZCARD', this.keys[1]]),
      this.client.command(['ZCARD', this.keys[2]]),
    ]);
    return { ready: asNumber(ready), inFlight: asNumber(inFlight), delayed: asNumber(delayed) };
  }
}
