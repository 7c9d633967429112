/**
 * MemoryStorage — In-memory implementation of BridgeStorage.
 *
 * Each method runs to completion without awaiting, which makes every
 * read-modify-write atomic on the single JS thread. Records are cloned on
 * the way in and out so callers never share state with the store.
 */

import type {
  ConsentKey,
  ConsentRecord,
  DeliveredSubmission,
  DeliveryTask,
  JournalCredential,
} from "../types/grading-contract.js";
import type { JournalId, ReviewerId, SubmissionRef, TaskId } from "../types/branded.js";
import type {
  AbandonInput,
  BridgeStorage,
  ClaimDueInput,
  CompleteResult,
  ConsentStorage,
  CredentialStorage,
  DeliveredSubmissionStorage,
  NewDeliveryTask,
  PaginatedResult,
  PaginationOptions,
  RescheduleInput,
  SaltStorage,
  TaskFilter,
  TaskStats,
  TaskStorage,
} from "./storage-interface.js";

function consentKeyString(key: ConsentKey): string {
  return `${key.journalId}\u0000${key.reviewerId}\u0000${key.gradingYear}`;
}

// =============================================================================
// § In-Memory Credentials
// =============================================================================

export class InMemoryCredentialStorage implements CredentialStorage {
  private credentials = new Map<string, JournalCredential>();

  async get(journalId: JournalId): Promise<JournalCredential | null> {
    const found = this.credentials.get(journalId);
    return found ? structuredClone(found) : null;
  }

  async save(credential: JournalCredential): Promise<void> {
    this.credentials.set(credential.journalId, structuredClone(credential));
  }

  async setValidation(
    journalId: JournalId,
    validated: boolean,
    at: string
  ): Promise<JournalCredential | null> {
    const existing = this.credentials.get(journalId);
    if (!existing) return null;
    existing.validated = validated;
    existing.updatedAt = at;
    if (validated) existing.validatedAt = at;
    return structuredClone(existing);
  }
}

// =============================================================================
// § In-Memory Consent
// =============================================================================

export class InMemoryConsentStorage implements ConsentStorage {
  private records = new Map<string, ConsentRecord>();

  async get(key: ConsentKey): Promise<ConsentRecord | null> {
    const found = this.records.get(consentKeyString(key));
    return found ? structuredClone(found) : null;
  }

  async createIfAbsent(record: ConsentRecord): Promise<{ record: ConsentRecord; created: boolean }> {
    const id = consentKeyString(record);
    const existing = this.records.get(id);
    if (existing) {
      return { record: structuredClone(existing), created: false };
    }
    this.records.set(id, structuredClone(record));
    return { record: structuredClone(record), created: true };
  }

  async answerIfUnasked(
    key: ConsentKey,
    optedIn: boolean,
    at: string
  ): Promise<{ record: ConsentRecord; applied: boolean }> {
    const id = consentKeyString(key);
    const existing = this.records.get(id);
    if (existing?.asked) {
      return { record: structuredClone(existing), applied: false };
    }

    const record: ConsentRecord = {
      reviewerId: key.reviewerId,
      journalId: key.journalId,
      gradingYear: key.gradingYear,
      createdAt: existing?.createdAt ?? at,
      asked: true,
      optedIn,
      answeredAt: at,
    };
    this.records.set(id, record);
    return { record: structuredClone(record), applied: true };
  }
}

// =============================================================================
// § In-Memory Salts & Delivered Submissions
// =============================================================================

export class InMemorySaltStorage implements SaltStorage {
  private salts = new Map<string, string>();

  async getOrCreate(journalId: JournalId, generate: () => string): Promise<string> {
    let salt = this.salts.get(journalId);
    if (salt === undefined) {
      salt = generate();
      this.salts.set(journalId, salt);
    }
    return salt;
  }
}

function mergeIds(known: ReviewerId[], added: ReviewerId[]): ReviewerId[] {
  return [...new Set([...known, ...added])];
}

export class InMemoryDeliveredSubmissionStorage implements DeliveredSubmissionStorage {
  private records = new Map<string, DeliveredSubmission>();

  async get(journalId: JournalId, submissionRef: SubmissionRef): Promise<DeliveredSubmission | null> {
    const found = this.records.get(`${journalId}:${submissionRef}`);
    return found ? structuredClone(found) : null;
  }

  async recordDelivery(record: DeliveredSubmission): Promise<DeliveredSubmission> {
    const id = `${record.journalId}:${record.submissionRef}`;
    const existing = this.records.get(id);
    const stored: DeliveredSubmission = existing
      ? { ...existing, sentReviewerIds: mergeIds(existing.sentReviewerIds, record.sentReviewerIds) }
      : { ...record, sentReviewerIds: mergeIds([], record.sentReviewerIds) };
    this.records.set(id, structuredClone(stored));
    return structuredClone(stored);
  }
}

// =============================================================================
// § In-Memory Retry Queue
// =============================================================================

export class InMemoryTaskStorage implements TaskStorage {
  private tasks = new Map<string, DeliveryTask>();
  /** taskKey -> taskId of the outstanding (pending / in_flight) task */
  private outstanding = new Map<string, string>();

  async upsertOutstanding(input: NewDeliveryTask): Promise<{ task: DeliveryTask; created: boolean }> {
    const existingId = this.outstanding.get(input.taskKey);
    const existing = existingId ? this.tasks.get(existingId) : undefined;

    if (existing) {
      existing.payload = structuredClone(input.payload);
      existing.revision += 1;
      existing.updatedAt = input.now;
      return { task: structuredClone(existing), created: false };
    }

    const task: DeliveryTask = {
      taskId: input.taskId,
      taskKey: input.taskKey,
      journalId: input.journalId,
      submissionRef: input.submissionRef,
      payload: structuredClone(input.payload),
      attempts: input.attempts,
      revision: 1,
      state: "pending",
      createdAt: input.now,
      updatedAt: input.now,
      nextAttemptAt: input.nextAttemptAt,
      lastAttemptAt: input.lastAttemptAt,
      lastError: input.lastError,
    };
    this.tasks.set(task.taskId, task);
    this.outstanding.set(task.taskKey, task.taskId);
    return { task: structuredClone(task), created: true };
  }

  async get(taskId: TaskId): Promise<DeliveryTask | null> {
    const found = this.tasks.get(taskId);
    return found ? structuredClone(found) : null;
  }

  async getOutstanding(taskKey: string): Promise<DeliveryTask | null> {
    const id = this.outstanding.get(taskKey);
    if (!id) return null;
    const found = this.tasks.get(id);
    return found ? structuredClone(found) : null;
  }

  async claimDue({ now, dueBy, staleClaimBefore, claimToken }: ClaimDueInput): Promise<DeliveryTask[]> {
    const claimed: DeliveryTask[] = [];
    for (const task of this.tasks.values()) {
      const due = task.state === "pending" && task.nextAttemptAt <= dueBy;
      const stale =
        task.state === "in_flight" && task.claimedAt !== undefined && task.claimedAt < staleClaimBefore;
      if (!due && !stale) continue;

      task.state = "in_flight";
      task.claimedAt = now;
      task.claimToken = claimToken;
      task.updatedAt = now;
      claimed.push(structuredClone(task));
    }
    return claimed.sort((a, b) => a.nextAttemptAt.localeCompare(b.nextAttemptAt));
  }

  async complete(taskId: TaskId, claimToken: string, revision: number, now: string): Promise<CompleteResult> {
    const task = this.tasks.get(taskId);
    if (!task || task.state !== "in_flight" || task.claimToken !== claimToken) {
      return "lost_claim";
    }

    if (task.revision !== revision) {
      this.release(task, now);
      task.nextAttemptAt = now;
      return "superseded";
    }

    this.tasks.delete(taskId);
    this.outstanding.delete(task.taskKey);
    return "removed";
  }

  async reschedule(taskId: TaskId, claimToken: string, input: RescheduleInput): Promise<DeliveryTask | null> {
    const task = this.tasks.get(taskId);
    if (!task || task.state !== "in_flight" || task.claimToken !== claimToken) return null;

    this.release(task, input.now);
    task.attempts = input.attempts;
    task.nextAttemptAt = input.nextAttemptAt;
    if (input.lastAttemptAt !== undefined) task.lastAttemptAt = input.lastAttemptAt;
    if (input.lastError !== undefined) task.lastError = input.lastError;
    return structuredClone(task);
  }

  async abandon(taskId: TaskId, claimToken: string, input: AbandonInput): Promise<DeliveryTask | null> {
    const task = this.tasks.get(taskId);
    if (!task || task.state !== "in_flight" || task.claimToken !== claimToken) return null;

    task.state = "abandoned";
    task.attempts = input.attempts;
    task.abandonReason = input.reason;
    task.abandonedAt = input.now;
    task.updatedAt = input.now;
    task.claimedAt = undefined;
    task.claimToken = undefined;
    if (input.lastError !== undefined) task.lastError = input.lastError;
    this.outstanding.delete(task.taskKey);
    return structuredClone(task);
  }

  async requeue(taskId: TaskId, now: string): Promise<DeliveryTask | null> {
    const task = this.tasks.get(taskId);
    if (!task || task.state !== "abandoned" || this.outstanding.has(task.taskKey)) return null;

    task.state = "pending";
    task.attempts = 0;
    task.createdAt = now;
    task.updatedAt = now;
    task.nextAttemptAt = now;
    task.abandonReason = undefined;
    task.abandonedAt = undefined;
    this.outstanding.set(task.taskKey, task.taskId);
    return structuredClone(task);
  }

  async list(filter: TaskFilter, pagination?: PaginationOptions): Promise<PaginatedResult<DeliveryTask>> {
    const matching = [...this.tasks.values()]
      .filter((task) => !filter.state || task.state === filter.state)
      .filter((task) => !filter.journalId || task.journalId === filter.journalId)
      .sort((a, b) => a.createdAt.localeCompare(b.createdAt));

    const offset = pagination?.offset ?? 0;
    const limit = pagination?.limit ?? 50;
    return {
      items: matching.slice(offset, offset + limit).map((task) => structuredClone(task)),
      total: matching.length,
      offset,
      limit,
      hasMore: offset + limit < matching.length,
    };
  }

  async stats(): Promise<TaskStats> {
    const stats: TaskStats = { pending: 0, inFlight: 0, abandoned: 0 };
    for (const task of this.tasks.values()) {
      switch (task.state) {
        case "pending":
          stats.pending++;
          break;
        case "in_flight":
          stats.inFlight++;
          break;
        case "abandoned":
          stats.abandoned++;
          break;
      }
    }
    return stats;
  }

  async purgeAbandoned(before: string): Promise<number> {
    let removed = 0;
    for (const [id, task] of this.tasks) {
      if (task.state === "abandoned" && task.abandonedAt !== undefined && task.abandonedAt < before) {
        this.tasks.delete(id);
        removed++;
      }
    }
    return removed;
  }

  private release(task: DeliveryTask, now: string): void {
    task.state = "pending";
    task.claimedAt = undefined;
    task.claimToken = undefined;
    task.updatedAt = now;
  }
}

// =============================================================================
// § MemoryStorage — Unified In-Memory Storage
// =============================================================================

export class MemoryStorage implements BridgeStorage {
  credentials: InMemoryCredentialStorage;
  consents: InMemoryConsentStorage;
  salts: InMemorySaltStorage;
  deliveredSubmissions: InMemoryDeliveredSubmissionStorage;
  tasks: InMemoryTaskStorage;

  constructor() {
    this.credentials = new InMemoryCredentialStorage();
    this.consents = new InMemoryConsentStorage();
    this.salts = new InMemorySaltStorage();
    this.deliveredSubmissions = new InMemoryDeliveredSubmissionStorage();
    this.tasks = new InMemoryTaskStorage();
  }

  async initialize(): Promise<void> {
    // No-op for in-memory
  }

  async close(): Promise<void> {
    // No-op for in-memory
  }

  async healthCheck(): Promise<{ ok: boolean; latencyMs: number }> {
    return { ok: true, latencyMs: 0 };
  }
}
