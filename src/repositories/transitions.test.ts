import { describe, it, expect } from 'vitest';
import { applyTransition, assertTransition, canTransition, IllegalTransitionError } from './transitions.js';
import { newJob } from './base.js';
import { ExpiredError, toJobError } from '../errors.js';

const now = new Date('2025-03-01T10:00:00.000Z');

describe('job state machine', () => {
  it('should allow exactly the documented edges', () => {
    expect(canTransition('queued', 'running')).toBe(true);
    expect(canTransition('queued', 'expired')).toBe(true);
    expect(canTransition('running', 'queued')).toBe(true);
    expect(canTransition('running', 'running')).toBe(true);
    expect(canTransition('queued', 'succeeded')).toBe(false);
    expect(canTransition('queued', 'failed')).toBe(false);
    expect(canTransition('succeeded', 'queued')).toBe(false);
    expect(canTransition('expired', 'running')).toBe(false);
  });

  it('should require an error when entering expired', () => {
    expect(() => assertTransition('queued', 'expired', {})).toThrow(IllegalTransitionError);
    expect(() => assertTransition('queued', 'expired', { error: toJobError(new ExpiredError(), 0, now) })).not.toThrow();
  });

  it('should only increment attempts on a claim', () => {
    expect(() => assertTransition('running', 'queued', { incrementAttempt: true })).toThrow(
      'attempts only increase when a worker claims a job'
    );
  });

  it('should apply fields and bump updatedAt', () => {
    const job = newJob('01JOB', { kind: 'text-to-image', inputRefs: [] }, 3, new Date('2025-03-01T09:00:00.000Z'));
    const updated = applyTransition(job, 'queued', 'running', { incrementAttempt: true, leaseId: 'lease-1' }, undefined, now);

    expect(updated).toMatchObject({ state: 'running', attemptCount: 1, leaseId: 'lease-1', updatedAt: now });
    expect(updated).not.toHaveProperty('incrementAttempt');
    expect(job.state).toBe('queued');
  });

  it('should allow a bare redelivery touch of a queued job', () => {
    expect(() => assertTransition('queued', 'queued', {})).not.toThrow();
    expect(() => assertTransition('queued', 'queued', { leaseId: 'lease-1' })).toThrow('a redelivery only touches updatedAt');
  });

  it('should only release attempts when a running job goes back to the queue', () => {
    expect(() => assertTransition('running', 'queued', { releaseAttempt: true, leaseId: null })).not.toThrow();
    expect(() => assertTransition('queued', 'running', { releaseAttempt: true })).toThrow(
      'attempts are only released when a worker hands a job back'
    );
  });

  it('should give back the attempt of a released run', () => {
    const job = newJob('01JOB', { kind: 'text-to-image', inputRefs: [], maxAttempts: 1 }, 3, now);
    const claimed = applyTransition(job, 'queued', 'running', { incrementAttempt: true, leaseId: 'lease-1' }, undefined, now);
    expect(claimed?.attemptCount).toBe(1);

    const released = claimed && applyTransition(claimed, 'running', 'queued', { releaseAttempt: true, leaseId: null }, 'lease-1', now);
    expect(released).toMatchObject({ state: 'queued', attemptCount: 0, leaseId: null });
    expect(released).not.toHaveProperty('releaseAttempt');

    const reclaimed = released && applyTransition(released, 'queued', 'running', { incrementAttempt: true, leaseId: 'lease-2' }, undefined, now);
    expect(reclaimed).toMatchObject({ state: 'running', attemptCount: 1, leaseId: 'lease-2' });
  });
});
