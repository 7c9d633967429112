/**
 * Delivery Queue — retry policy for decision reports that could not be
 * delivered right away.
 *
 * Queued reports are retried on a fixed interval (the grading service is
 * typically down for maintenance windows, not seconds) until they succeed,
 * run out of attempts, or grow too old to be useful.
 */

import type { JournalId, SubmissionRef } from "../types/branded.js";
import type { AbandonReason, DeliveryTask } from "../types/grading-contract.js";

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

// =============================================================================
// § Retry Policy
// =============================================================================

export interface RetryPolicy {
  /** Delay between attempts of a queued report */
  retryIntervalMs: number;
  /** Attempts (including the decision-time one) before a report is abandoned */
  maxAttempts: number;
  /** Age after which a queued report is abandoned */
  maxAgeMs: number;
  /** An in_flight claim older than this belongs to a crashed drain */
  claimTimeoutMs: number;
  /**
   * A drain also claims tasks falling due this soon after it starts, so a
   * daily scheduler that fires a little early still retries daily.
   * Capped at half the retry interval.
   */
  schedulingToleranceMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  retryIntervalMs: DAY_MS,
  maxAttempts: 7,
  maxAgeMs: 14 * DAY_MS,
  claimTimeoutMs: HOUR_MS,
  schedulingToleranceMs: HOUR_MS,
};

export function taskKeyFor(journalId: JournalId, submissionRef: SubmissionRef): string {
  return `${journalId}:${submissionRef}`;
}

/**
 * When the task should be tried again after an attempt at `attemptedAt`.
 */
export function calculateNextAttempt(
  attemptedAt: Date,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY
): Date {
  return new Date(attemptedAt.getTime() + policy.retryIntervalMs);
}

/**
 * Why a task with `attempts` failed attempts should stop, or null to keep it.
 */
export function abandonReasonFor(
  task: Pick<DeliveryTask, "createdAt">,
  attempts: number,
  now: Date,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY
): AbandonReason | null {
  if (attempts >= policy.maxAttempts) return "attempts_exhausted";
  if (isExpired(task, now, policy)) return "expired";
  return null;
}

export function isExpired(
  task: Pick<DeliveryTask, "createdAt">,
  now: Date,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY
): boolean {
  return now.getTime() - new Date(task.createdAt).getTime() > policy.maxAgeMs;
}

/**
 * Latest `nextAttemptAt` a drain starting at `now` picks up.
 */
export function dueCutoff(now: Date, policy: RetryPolicy = DEFAULT_RETRY_POLICY): Date {
  const tolerance = Math.min(policy.schedulingToleranceMs, policy.retryIntervalMs / 2);
  return new Date(now.getTime() + tolerance);
}

export function staleClaimCutoff(now: Date, policy: RetryPolicy = DEFAULT_RETRY_POLICY): Date {
  return new Date(now.getTime() - policy.claimTimeoutMs);
}
