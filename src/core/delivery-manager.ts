/**
 * DeliveryManager — reports editorial decisions to the grading service and
 * drains the retry queue.
 *
 * Decision-time reporting makes exactly one attempt. A transient failure
 * parks the payload in the retry queue; the queue is drained only when an
 * external scheduler calls `drainDueTasks`. Work for one submission is
 * serialized in-process by a keyed lock and across processes by the
 * storage-level claim on each task.
 */

import { randomUUID } from "crypto";
import type { Logger } from "pino";
import { TaskId } from "../types/branded.js";
import type { JournalId, SubmissionRef } from "../types/branded.js";
import type {
  AbandonReason,
  DecisionEvent,
  DeliveryOutcome,
  DeliveryTask,
  DrainResult,
  JournalCredential,
} from "../types/grading-contract.js";
import type {
  BridgeStorage,
  PaginatedResult,
  PaginationOptions,
  TaskFilter,
  TaskStats,
} from "../storage/storage-interface.js";
import type { BridgeEventEmitter, BridgeEventInput } from "./bridge-event-emitter.js";
import type { CredentialService } from "./credential-service.js";
import type { GradingClient } from "./grading-client.js";
import {
  DEFAULT_RETRY_POLICY,
  abandonReasonFor,
  calculateNextAttempt,
  dueCutoff,
  isExpired,
  staleClaimCutoff,
  taskKeyFor,
  type RetryPolicy,
} from "./delivery-queue.js";
import { KeyedLock } from "./keyed-lock.js";
import {
  MappingError,
  QueueExhaustedError,
  TaskNotFoundError,
  TaskStateError,
  errorMessage,
} from "./errors.js";
import { createChildLogger } from "../logging.js";

// =============================================================================
// § Types
// =============================================================================

export type DecisionReportStatus =
  | "delivered"
  | "queued"
  | "credential_invalid"
  | "rejected"
  | "not_configured"
  | "mapping_failed"
  | "failed";

export interface DecisionReportResult {
  status: DecisionReportStatus;
  taskId?: TaskId;
  message?: string;
}

export interface DecisionTarget {
  journalId: JournalId;
  submissionRef: SubmissionRef;
}

export interface DeliveryManagerOptions {
  retryPolicy?: RetryPolicy;
  /** Submissions processed in parallel per drain sweep (default 4) */
  concurrency?: number;
  eventEmitter?: BridgeEventEmitter;
  logger?: Logger;
  now?: () => Date;
}

type TaskOutcome = "succeeded" | "failed" | "abandoned" | "skipped";

export const DEFAULT_DRAIN_CONCURRENCY = 4;

// =============================================================================
// § DeliveryManager
// =============================================================================

export class DeliveryManager {
  private retryPolicy: RetryPolicy;
  private concurrency: number;
  private eventEmitter?: BridgeEventEmitter;
  private logger: Logger;
  private now: () => Date;
  private lock = new KeyedLock();

  constructor(
    private storage: Pick<BridgeStorage, "tasks" | "deliveredSubmissions">,
    private credentials: CredentialService,
    private client: GradingClient,
    options?: DeliveryManagerOptions
  ) {
    this.retryPolicy = options?.retryPolicy ?? DEFAULT_RETRY_POLICY;
    this.concurrency = Math.max(1, options?.concurrency ?? DEFAULT_DRAIN_CONCURRENCY);
    this.eventEmitter = options?.eventEmitter;
    this.logger = options?.logger ?? createChildLogger({ logger: "delivery" });
    this.now = options?.now ?? (() => new Date());
  }

  /**
   * Report a decision. `buildPayload` runs under the submission's lock so
   * that it sees the editor list frozen by any earlier delivery.
   *
   * Never throws: every failure is folded into the returned status and
   * reported to operators through the event emitter.
   */
  async reportDecision(
    target: DecisionTarget,
    buildPayload: () => Promise<DecisionEvent>
  ): Promise<DecisionReportResult> {
    const taskKey = taskKeyFor(target.journalId, target.submissionRef);
    try {
      return await this.lock.run(taskKey, () => this.reportLocked(target, taskKey, buildPayload));
    } catch (error) {
      this.logger.error(
        { err: error, journalId: target.journalId, submissionRef: target.submissionRef },
        "Decision report failed unexpectedly"
      );
      return { status: "failed", message: errorMessage(error) };
    }
  }

  private async reportLocked(
    target: DecisionTarget,
    taskKey: string,
    buildPayload: () => Promise<DecisionEvent>
  ): Promise<DecisionReportResult> {
    const { journalId, submissionRef } = target;

    const credential = await this.credentials.getCredentials(journalId);
    if (!credential || !credential.validated) {
      const message = credential
        ? "Grading credentials are not validated"
        : "No grading credentials configured";
      await this.emit({ type: "credentials.missing", journalId, submissionRef, payload: { message } });
      return { status: "not_configured", message };
    }

    let payload: DecisionEvent;
    try {
      payload = await buildPayload();
    } catch (error) {
      if (!(error instanceof MappingError)) throw error;
      await this.emit({
        type: "mapping.failed",
        journalId,
        submissionRef,
        payload: { error: error.message, code: error.code },
      });
      return { status: "mapping_failed", message: error.message };
    }

    const nowDate = this.now();
    const now = nowDate.toISOString();

    // An earlier report is still queued: the newer payload replaces it
    const outstanding = await this.storage.tasks.getOutstanding(taskKey);
    if (outstanding) {
      const { task } = await this.storage.tasks.upsertOutstanding({
        taskId: TaskId(`task_${randomUUID()}`),
        taskKey,
        journalId,
        submissionRef,
        payload,
        attempts: 1,
        nextAttemptAt: calculateNextAttempt(nowDate, this.retryPolicy).toISOString(),
        now,
      });
      await this.emit({
        type: "delivery.queued",
        journalId,
        submissionRef,
        taskId: task.taskId,
        payload: { replaced: true, revision: task.revision },
      });
      return { status: "queued", taskId: task.taskId };
    }

    const outcome = await this.attempt(credential, payload);

    switch (outcome.kind) {
      case "ok":
        await this.recordDelivered(payload, now);
        await this.emit({ type: "delivery.succeeded", journalId, submissionRef });
        return { status: "delivered" };

      case "transient_failure": {
        const { task } = await this.storage.tasks.upsertOutstanding({
          taskId: TaskId(`task_${randomUUID()}`),
          taskKey,
          journalId,
          submissionRef,
          payload,
          attempts: 1,
          nextAttemptAt: calculateNextAttempt(nowDate, this.retryPolicy).toISOString(),
          lastAttemptAt: now,
          lastError: outcome.message,
          now,
        });
        await this.emit({
          type: "delivery.queued",
          journalId,
          submissionRef,
          taskId: task.taskId,
          payload: { replaced: false, nextAttemptAt: task.nextAttemptAt, error: outcome.message },
        });
        return { status: "queued", taskId: task.taskId, message: outcome.message };
      }

      case "credential_invalid":
        await this.credentials.markInvalid(journalId, outcome.message);
        return { status: "credential_invalid", message: outcome.message };

      case "permanent_reject":
        await this.emit({
          type: "delivery.rejected",
          journalId,
          submissionRef,
          payload: { statusCode: outcome.statusCode, error: outcome.message },
        });
        return { status: "rejected", message: outcome.message };
    }
  }

  // ===========================================================================
  // § Drain
  // ===========================================================================

  /**
   * Attempt every due task once. One task failing never stops the sweep.
   */
  async drainDueTasks(now: Date = this.now()): Promise<DrainResult> {
    const claimToken = randomUUID();
    const tasks = await this.storage.tasks.claimDue({
      now: now.toISOString(),
      dueBy: dueCutoff(now, this.retryPolicy).toISOString(),
      staleClaimBefore: staleClaimCutoff(now, this.retryPolicy).toISOString(),
      claimToken,
    });

    const result: DrainResult = { attempted: 0, succeeded: 0, abandoned: 0 };
    const settled = await runWithConcurrency(tasks, this.concurrency, (task) =>
      this.lock.run(task.taskKey, () => this.processTask(task, claimToken, now))
    );

    settled.forEach((outcome, index) => {
      if (outcome.status === "rejected") {
        this.logger.error(
          { err: outcome.reason, taskId: tasks[index]?.taskId },
          "Delivery task processing failed"
        );
        return;
      }
      if (outcome.value !== "skipped") result.attempted++;
      if (outcome.value === "succeeded") result.succeeded++;
      if (outcome.value === "abandoned") result.abandoned++;
    });

    await this.emit({ type: "drain.completed", payload: { claimed: tasks.length, ...result } });
    this.logger.info({ claimed: tasks.length, ...result }, "Retry queue drained");
    return result;
  }

  private async processTask(claimed: DeliveryTask, claimToken: string, nowDate: Date): Promise<TaskOutcome> {
    const now = nowDate.toISOString();
    const { journalId, submissionRef, taskId } = claimed;

    // A decision-time report may have replaced the payload while this sweep
    // waited for the submission's lock
    const task = await this.storage.tasks.get(taskId);
    if (!task || task.state !== "in_flight" || task.claimToken !== claimToken) {
      this.logger.warn({ taskId, submissionRef }, "Claimed task changed hands before it was processed");
      return "skipped";
    }

    const credential = await this.credentials.getCredentials(journalId);
    if (!credential || !credential.validated) {
      // Not an attempt: nothing was sent
      if (isExpired(task, nowDate, this.retryPolicy)) {
        return this.abandonTask(task, claimToken, task.attempts, "expired", now, task.lastError);
      }
      const message = credential
        ? "Grading credentials are not validated"
        : "No grading credentials configured";
      await this.storage.tasks.reschedule(taskId, claimToken, {
        attempts: task.attempts,
        nextAttemptAt: calculateNextAttempt(nowDate, this.retryPolicy).toISOString(),
        lastError: message,
        now,
      });
      await this.emit({ type: "credentials.missing", journalId, submissionRef, taskId, payload: { message } });
      return "skipped";
    }

    const outcome = await this.attempt(credential, task.payload, taskId);
    const attempts = task.attempts + 1;

    switch (outcome.kind) {
      case "ok": {
        const completion = await this.storage.tasks.complete(taskId, claimToken, task.revision, now);
        if (completion === "lost_claim") {
          this.logger.warn({ taskId, submissionRef }, "Delivered task was reclaimed by another drain");
        }
        await this.recordDelivered(task.payload, now);
        await this.emit({
          type: "delivery.succeeded",
          journalId,
          submissionRef,
          taskId,
          payload: { attempts, completion },
        });
        return "succeeded";
      }

      case "credential_invalid":
        await this.credentials.markInvalid(journalId, outcome.message);
        await this.storage.tasks.reschedule(taskId, claimToken, {
          attempts: task.attempts,
          nextAttemptAt: calculateNextAttempt(nowDate, this.retryPolicy).toISOString(),
          lastAttemptAt: now,
          lastError: outcome.message,
          now,
        });
        return "failed";

      case "permanent_reject":
        return this.abandonTask(task, claimToken, attempts, "permanent_reject", now, outcome.message);

      case "transient_failure": {
        const reason = abandonReasonFor(task, attempts, nowDate, this.retryPolicy);
        if (reason) {
          return this.abandonTask(task, claimToken, attempts, reason, now, outcome.message);
        }
        const rescheduled = await this.storage.tasks.reschedule(taskId, claimToken, {
          attempts,
          nextAttemptAt: calculateNextAttempt(nowDate, this.retryPolicy).toISOString(),
          lastAttemptAt: now,
          lastError: outcome.message,
          now,
        });
        if (rescheduled) {
          await this.emit({
            type: "delivery.rescheduled",
            journalId,
            submissionRef,
            taskId,
            payload: { attempts, nextAttemptAt: rescheduled.nextAttemptAt, error: outcome.message },
          });
        }
        return "failed";
      }
    }
  }

  private async abandonTask(
    task: DeliveryTask,
    claimToken: string,
    attempts: number,
    reason: AbandonReason,
    now: string,
    lastError?: string
  ): Promise<TaskOutcome> {
    const abandoned = await this.storage.tasks.abandon(task.taskId, claimToken, {
      attempts,
      reason,
      lastError,
      now,
    });
    // Only the holder of the claim reports the abandonment
    if (!abandoned) return "failed";

    const error = new QueueExhaustedError(task.taskId, task.submissionRef, attempts, lastError ?? reason);
    await this.emit({
      type: "delivery.abandoned",
      journalId: task.journalId,
      submissionRef: task.submissionRef,
      taskId: task.taskId,
      payload: { reason, attempts, lastError, message: error.message },
    });
    return "abandoned";
  }

  // ===========================================================================
  // § Queue Inspection
  // ===========================================================================

  async listTasks(filter: TaskFilter = {}, pagination?: PaginationOptions): Promise<PaginatedResult<DeliveryTask>> {
    return this.storage.tasks.list(filter, pagination);
  }

  /**
   * @throws TaskNotFoundError
   */
  async getTask(taskId: TaskId): Promise<DeliveryTask> {
    const task = await this.storage.tasks.get(taskId);
    if (!task) throw new TaskNotFoundError(taskId);
    return task;
  }

  /**
   * Give an abandoned task a fresh set of attempts, due now.
   *
   * @throws TaskNotFoundError
   * @throws TaskStateError unless the task is abandoned and nothing newer is queued
   */
  async requeueTask(taskId: TaskId): Promise<DeliveryTask> {
    const task = await this.getTask(taskId);
    const requeued = await this.storage.tasks.requeue(taskId, this.now().toISOString());
    if (!requeued) {
      throw new TaskStateError(
        taskId,
        task.state === "abandoned"
          ? "a newer report for the same submission is already queued"
          : `task is ${task.state}, only abandoned tasks can be requeued`
      );
    }
    this.logger.info({ taskId, submissionRef: task.submissionRef }, "Abandoned task requeued");
    return requeued;
  }

  async stats(): Promise<TaskStats> {
    return this.storage.tasks.stats();
  }

  /** Delete tasks abandoned more than `olderThanMs` ago */
  async purgeAbandoned(olderThanMs: number): Promise<number> {
    const before = new Date(this.now().getTime() - olderThanMs).toISOString();
    return this.storage.tasks.purgeAbandoned(before);
  }

  // ===========================================================================
  // § Helpers
  // ===========================================================================

  private async attempt(
    credential: JournalCredential,
    payload: DecisionEvent,
    taskId?: TaskId
  ): Promise<DeliveryOutcome> {
    const start = Date.now();
    let outcome: DeliveryOutcome;
    try {
      outcome = await this.client.reportDecision(credential, payload);
    } catch (error) {
      outcome = { kind: "transient_failure", message: errorMessage(error) };
    }

    await this.emit({
      type: "delivery.attempted",
      journalId: payload.journalId,
      submissionRef: payload.submissionRef,
      taskId,
      payload: {
        outcome: outcome.kind,
        durationMs: Date.now() - start,
        ...(outcome.kind !== "ok" && { error: outcome.message }),
        ...(outcome.statusCode !== undefined && { statusCode: outcome.statusCode }),
      },
    });
    return outcome;
  }

  private async recordDelivered(payload: DecisionEvent, now: string): Promise<void> {
    await this.storage.deliveredSubmissions.recordDelivery({
      journalId: payload.journalId,
      submissionRef: payload.submissionRef,
      editors: payload.editors,
      sentReviewerIds: payload.reviewerIds,
      firstDeliveredAt: now,
    });
  }

  private async emit(event: BridgeEventInput): Promise<void> {
    await this.eventEmitter?.emit(event);
  }
}

/**
 * Run `fn` over `items` with at most `limit` calls in flight.
 * Results keep the order of `items`.
 */
export async function runWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T) => Promise<R>
): Promise<PromiseSettledResult<R>[]> {
  const results: PromiseSettledResult<R>[] = new Array(items.length);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      const item = items[index];
      if (item === undefined) continue;
      try {
        results[index] = { status: "fulfilled", value: await fn(item) };
      } catch (reason) {
        results[index] = { status: "rejected", reason };
      }
    }
  };

  await Promise.allSettled(Array.from({ length: Math.min(limit, items.length) }, () => worker()));
  return results;
}
