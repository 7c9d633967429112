/**
 * BridgeStorage — Unified pluggable storage interface.
 *
 * Provides a single abstraction over all persisted state:
 * journal credentials, consent records, journal salts, delivered
 * submissions and the retry queue.
 *
 * Implementations:
 * - MemoryStorage: In-memory for dev/testing
 * - SqliteStorage: SQLite for single-node production (via better-sqlite3)
 *
 * Every method that decides based on existing state (create-if-absent,
 * conditional update, claim) is atomic in both implementations.
 */

import type {
  AbandonReason,
  ConsentKey,
  ConsentRecord,
  DecisionEvent,
  DeliveredSubmission,
  DeliveryTask,
  DeliveryTaskState,
  JournalCredential,
} from "../types/grading-contract.js";
import type { JournalId, SubmissionRef, TaskId } from "../types/branded.js";

// =============================================================================
// § Pagination
// =============================================================================

export interface PaginatedResult<T> {
  items: T[];
  total: number;
  offset: number;
  limit: number;
  hasMore: boolean;
}

export interface PaginationOptions {
  limit?: number;
  offset?: number;
}

// =============================================================================
// § Credentials
// =============================================================================

export interface CredentialStorage {
  get(journalId: JournalId): Promise<JournalCredential | null>;
  save(credential: JournalCredential): Promise<void>;
  /** Update the validation flag; returns null if the journal has no credentials */
  setValidation(
    journalId: JournalId,
    validated: boolean,
    at: string
  ): Promise<JournalCredential | null>;
}

// =============================================================================
// § Consent
// =============================================================================

export interface ConsentStorage {
  get(key: ConsentKey): Promise<ConsentRecord | null>;
  /** Insert `record` unless one exists for its key; returns the stored record */
  createIfAbsent(record: ConsentRecord): Promise<{ record: ConsentRecord; created: boolean }>;
  /**
   * Record an answer unless the reviewer was already asked.
   * Creates the record when none exists. `applied` is false when the
   * stored record was left untouched.
   */
  answerIfUnasked(
    key: ConsentKey,
    optedIn: boolean,
    at: string
  ): Promise<{ record: ConsentRecord; applied: boolean }>;
}

// =============================================================================
// § Journal Salts & Delivered Submissions
// =============================================================================

export interface SaltStorage {
  getOrCreate(journalId: JournalId, generate: () => string): Promise<string>;
}

export interface DeliveredSubmissionStorage {
  get(journalId: JournalId, submissionRef: SubmissionRef): Promise<DeliveredSubmission | null>;
  /**
   * Record a successful report. Editors and `firstDeliveredAt` of the first
   * record are kept; `sentReviewerIds` accumulate. Returns the stored record.
   */
  recordDelivery(record: DeliveredSubmission): Promise<DeliveredSubmission>;
}

// =============================================================================
// § Retry Queue
// =============================================================================

export interface NewDeliveryTask {
  taskId: TaskId;
  taskKey: string;
  journalId: JournalId;
  submissionRef: SubmissionRef;
  payload: DecisionEvent;
  attempts: number;
  nextAttemptAt: string;
  lastAttemptAt?: string;
  lastError?: string;
  now: string;
}

export interface ClaimDueInput {
  now: string;
  dueBy: string;
  staleClaimBefore: string;
  claimToken: string;
}

export interface RescheduleInput {
  attempts: number;
  nextAttemptAt: string;
  lastAttemptAt?: string;
  lastError?: string;
  now: string;
}

export interface AbandonInput {
  attempts: number;
  reason: AbandonReason;
  lastError?: string;
  now: string;
}

export type CompleteResult = "removed" | "superseded" | "lost_claim";

export interface TaskFilter {
  state?: DeliveryTaskState;
  journalId?: JournalId;
}

export interface TaskStats {
  pending: number;
  inFlight: number;
  abandoned: number;
}

export interface TaskStorage {
  /**
   * Insert a pending task, or — when an outstanding (pending/in_flight) task
   * with the same key exists — replace its payload and bump its revision.
   * Attempts, schedule and state of an existing task are kept.
   */
  upsertOutstanding(input: NewDeliveryTask): Promise<{ task: DeliveryTask; created: boolean }>;
  get(taskId: TaskId): Promise<DeliveryTask | null>;
  getOutstanding(taskKey: string): Promise<DeliveryTask | null>;
  /**
   * Flip every pending task due by `dueBy`, and every in_flight task claimed
   * before `staleClaimBefore`, to in_flight under `claimToken`, claimed at `now`.
   */
  claimDue(input: ClaimDueInput): Promise<DeliveryTask[]>;
  /**
   * Delete a delivered task. If its payload was replaced since the claim
   * (revision changed) it goes back to pending, due at `now`.
   */
  complete(taskId: TaskId, claimToken: string, revision: number, now: string): Promise<CompleteResult>;
  /** in_flight → pending; null when the claim was lost */
  reschedule(taskId: TaskId, claimToken: string, input: RescheduleInput): Promise<DeliveryTask | null>;
  /** in_flight → abandoned; null when the claim was lost */
  abandon(taskId: TaskId, claimToken: string, input: AbandonInput): Promise<DeliveryTask | null>;
  /** abandoned → pending with attempts reset; null unless the task is abandoned */
  requeue(taskId: TaskId, now: string): Promise<DeliveryTask | null>;
  list(filter: TaskFilter, pagination?: PaginationOptions): Promise<PaginatedResult<DeliveryTask>>;
  stats(): Promise<TaskStats>;
  /** Delete abandoned tasks abandoned before `before`; returns the count */
  purgeAbandoned(before: string): Promise<number>;
}

// =============================================================================
// § Unified Storage Interface
// =============================================================================

export interface BridgeStorage {
  credentials: CredentialStorage;
  consents: ConsentStorage;
  salts: SaltStorage;
  deliveredSubmissions: DeliveredSubmissionStorage;
  tasks: TaskStorage;
  initialize(): Promise<void>;
  close(): Promise<void>;
  healthCheck(): Promise<{ ok: boolean; latencyMs: number }>;
}
