import { describe, it, expect } from 'vitest';
import {
  DEFAULT_RETRY_POLICY,
  abandonReasonFor,
  calculateNextAttempt,
  dueCutoff,
  isExpired,
  staleClaimCutoff,
  taskKeyFor,
} from '../../src/core/delivery-queue.js';
import { JOURNAL, SUBMISSION } from '../helpers/fixtures.js';

const created = { createdAt: '2025-06-01T00:00:00.000Z' };

describe('retry policy', () => {
  it('should default to daily retries, 7 attempts and 14 days', () => {
    expect(DEFAULT_RETRY_POLICY).toEqual({
      retryIntervalMs: 24 * 60 * 60 * 1000,
      maxAttempts: 7,
      maxAgeMs: 14 * 24 * 60 * 60 * 1000,
      claimTimeoutMs: 60 * 60 * 1000,
      schedulingToleranceMs: 60 * 60 * 1000,
    });
  });

  it('should key tasks by journal and submission', () => {
    expect(taskKeyFor(JOURNAL, SUBMISSION)).toBe('journal-1:sub-100');
  });

  it('should schedule the next attempt one interval later', () => {
    expect(calculateNextAttempt(new Date('2025-06-01T08:00:00.000Z')).toISOString()).toBe(
      '2025-06-02T08:00:00.000Z'
    );
    expect(
      calculateNextAttempt(new Date('2025-06-01T08:00:00.000Z'), { ...DEFAULT_RETRY_POLICY, retryIntervalMs: 60_000 })
        .toISOString()
    ).toBe('2025-06-01T08:01:00.000Z');
  });

  it('should claim tasks falling due within the scheduling tolerance', () => {
    expect(dueCutoff(new Date('2025-06-02T07:59:59.700Z')).toISOString()).toBe('2025-06-02T08:59:59.700Z');
  });

  it('should cap the scheduling tolerance at half the retry interval', () => {
    const policy = { ...DEFAULT_RETRY_POLICY, retryIntervalMs: 60_000 };
    expect(dueCutoff(new Date('2025-06-01T08:00:00.000Z'), policy).toISOString()).toBe('2025-06-01T08:00:30.000Z');
  });

  it('should compute the stale claim cutoff', () => {
    expect(staleClaimCutoff(new Date('2025-06-01T08:00:00.000Z')).toISOString()).toBe('2025-06-01T07:00:00.000Z');
  });
});

describe('abandonReasonFor', () => {
  it('should keep a task with attempts left inside its age limit', () => {
    expect(abandonReasonFor(created, 6, new Date('2025-06-07T00:00:00.000Z'))).toBeNull();
  });

  it('should abandon a task that used its last attempt', () => {
    expect(abandonReasonFor(created, 7, new Date('2025-06-07T00:00:00.000Z'))).toBe('attempts_exhausted');
  });

  it('should abandon a task past its age limit', () => {
    expect(abandonReasonFor(created, 2, new Date('2025-06-15T00:00:00.001Z'))).toBe('expired');
  });

  it('should report exhausted attempts before age', () => {
    expect(abandonReasonFor(created, 9, new Date('2025-07-01T00:00:00.000Z'))).toBe('attempts_exhausted');
  });
});

describe('isExpired', () => {
  it('should keep a task exactly at its age limit', () => {
    expect(isExpired(created, new Date('2025-06-15T00:00:00.000Z'))).toBe(false);
    expect(isExpired(created, new Date('2025-06-15T00:00:00.001Z'))).toBe(true);
  });
});
