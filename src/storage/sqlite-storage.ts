/**
 * SqliteStorage — SQLite-based implementation of BridgeStorage.
 *
 * Uses better-sqlite3 for synchronous, fast SQLite access. Conditional
 * writes are single statements (`ON CONFLICT`, `UPDATE ... RETURNING`) or
 * run inside `db.transaction`, so several processes sharing one database
 * file (e.g. two drain invocations fired by a misconfigured scheduler)
 * never claim or duplicate the same task.
 *
 * Tables:
 * - credentials: journal_id, api_key, validated, ...
 * - consents: (journal_id, reviewer_id, grading_year), asked, opted_in, ...
 * - journal_salts: journal_id, salt
 * - delivered_submissions: (journal_id, submission_ref), editors and sent reviewer ids (JSON), ...
 * - delivery_tasks: task_id, task_key, payload (JSON), attempts, revision, state, ...
 */

import Database from "better-sqlite3";
import type {
  AbandonReason,
  ConsentKey,
  ConsentRecord,
  DeliveredSubmission,
  DeliveryTask,
  DeliveryTaskState,
  JournalCredential,
} from "../types/grading-contract.js";
import { JournalId, ReviewerId, SubmissionRef, TaskId } from "../types/branded.js";
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

// =============================================================================
// § Row Types
// =============================================================================

interface CredentialRow {
  journal_id: string;
  api_key: string;
  validated: number;
  validated_at: string | null;
  updated_at: string;
}

interface ConsentRow {
  journal_id: string;
  reviewer_id: string;
  grading_year: number;
  asked: number;
  opted_in: number;
  created_at: string;
  answered_at: string | null;
}

interface DeliveredRow {
  journal_id: string;
  submission_ref: string;
  editors: string;
  sent_reviewer_ids: string;
  first_delivered_at: string;
}

interface TaskRow {
  task_id: string;
  task_key: string;
  journal_id: string;
  submission_ref: string;
  payload: string;
  attempts: number;
  revision: number;
  state: string;
  created_at: string;
  updated_at: string;
  next_attempt_at: string;
  last_attempt_at: string | null;
  claimed_at: string | null;
  claim_token: string | null;
  last_error: string | null;
  abandon_reason: string | null;
  abandoned_at: string | null;
}

const TASK_STATES: readonly DeliveryTaskState[] = ["pending", "in_flight", "abandoned"];
const ABANDON_REASONS: readonly AbandonReason[] = ["attempts_exhausted", "expired", "permanent_reject"];

function toTaskState(value: string): DeliveryTaskState {
  const state = TASK_STATES.find((candidate) => candidate === value);
  if (!state) {
    throw new Error(`Corrupt delivery task row: unknown state '${value}'`);
  }
  return state;
}

function toAbandonReason(value: string | null): AbandonReason | undefined {
  return ABANDON_REASONS.find((candidate) => candidate === value);
}

function optional(value: string | null): string | undefined {
  return value ?? undefined;
}

function rowToCredential(row: CredentialRow): JournalCredential {
  return {
    journalId: JournalId(row.journal_id),
    apiKey: row.api_key,
    validated: row.validated === 1,
    validatedAt: optional(row.validated_at),
    updatedAt: row.updated_at,
  };
}

function rowToConsent(row: ConsentRow): ConsentRecord {
  return {
    journalId: JournalId(row.journal_id),
    reviewerId: ReviewerId(row.reviewer_id),
    gradingYear: row.grading_year,
    asked: row.asked === 1,
    optedIn: row.opted_in === 1,
    createdAt: row.created_at,
    answeredAt: optional(row.answered_at),
  };
}

function parseReviewerIds(text: string): ReviewerId[] {
  const parsed: unknown = JSON.parse(text);
  if (!Array.isArray(parsed)) return [];
  return parsed.filter((value): value is string => typeof value === "string").map(ReviewerId);
}

function rowToDelivered(row: DeliveredRow): DeliveredSubmission {
  return {
    journalId: JournalId(row.journal_id),
    submissionRef: SubmissionRef(row.submission_ref),
    editors: JSON.parse(row.editors),
    sentReviewerIds: parseReviewerIds(row.sent_reviewer_ids),
    firstDeliveredAt: row.first_delivered_at,
  };
}

function rowToTask(row: TaskRow): DeliveryTask {
  return {
    taskId: TaskId(row.task_id),
    taskKey: row.task_key,
    journalId: JournalId(row.journal_id),
    submissionRef: SubmissionRef(row.submission_ref),
    payload: JSON.parse(row.payload),
    attempts: row.attempts,
    revision: row.revision,
    state: toTaskState(row.state),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    nextAttemptAt: row.next_attempt_at,
    lastAttemptAt: optional(row.last_attempt_at),
    claimedAt: optional(row.claimed_at),
    claimToken: optional(row.claim_token),
    lastError: optional(row.last_error),
    abandonReason: toAbandonReason(row.abandon_reason),
    abandonedAt: optional(row.abandoned_at),
  };
}

// =============================================================================
// § SQLite Credentials
// =============================================================================

class SqliteCredentialStorage implements CredentialStorage {
  constructor(private db: Database.Database) {}

  async get(journalId: JournalId): Promise<JournalCredential | null> {
    const row = this.db
      .prepare<[string], CredentialRow>("SELECT * FROM credentials WHERE journal_id = ?")
      .get(journalId);
    return row ? rowToCredential(row) : null;
  }

  async save(credential: JournalCredential): Promise<void> {
    this.db
      .prepare(
        `INSERT INTO credentials (journal_id, api_key, validated, validated_at, updated_at)
         VALUES (?, ?, ?, ?, ?)
         ON CONFLICT(journal_id) DO UPDATE SET
           api_key = excluded.api_key,
           validated = excluded.validated,
           validated_at = excluded.validated_at,
           updated_at = excluded.updated_at`
      )
      .run(
        credential.journalId,
        credential.apiKey,
        credential.validated ? 1 : 0,
        credential.validatedAt ?? null,
        credential.updatedAt
      );
  }

  async setValidation(
    journalId: JournalId,
    validated: boolean,
    at: string
  ): Promise<JournalCredential | null> {
    const row = this.db
      .prepare<[number, number, string, string, string], CredentialRow>(
        `UPDATE credentials
         SET validated = ?,
             validated_at = CASE WHEN ? = 1 THEN ? ELSE validated_at END,
             updated_at = ?
         WHERE journal_id = ?
         RETURNING *`
      )
      .get(validated ? 1 : 0, validated ? 1 : 0, at, at, journalId);
    return row ? rowToCredential(row) : null;
  }
}

// =============================================================================
// § SQLite Consent
// =============================================================================

class SqliteConsentStorage implements ConsentStorage {
  constructor(private db: Database.Database) {}

  async get(key: ConsentKey): Promise<ConsentRecord | null> {
    const row = this.db
      .prepare<[string, string, number], ConsentRow>(
        "SELECT * FROM consents WHERE journal_id = ? AND reviewer_id = ? AND grading_year = ?"
      )
      .get(key.journalId, key.reviewerId, key.gradingYear);
    return row ? rowToConsent(row) : null;
  }

  async createIfAbsent(record: ConsentRecord): Promise<{ record: ConsentRecord; created: boolean }> {
    const result = this.db
      .prepare(
        `INSERT INTO consents (journal_id, reviewer_id, grading_year, asked, opted_in, created_at, answered_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT(journal_id, reviewer_id, grading_year) DO NOTHING`
      )
      .run(
        record.journalId,
        record.reviewerId,
        record.gradingYear,
        record.asked ? 1 : 0,
        record.optedIn ? 1 : 0,
        record.createdAt,
        record.answeredAt ?? null
      );

    const stored = await this.get(record);
    if (!stored) {
      throw new Error(`Consent record vanished after insert for reviewer '${record.reviewerId}'`);
    }
    return { record: stored, created: result.changes > 0 };
  }

  async answerIfUnasked(
    key: ConsentKey,
    optedIn: boolean,
    at: string
  ): Promise<{ record: ConsentRecord; applied: boolean }> {
    const result = this.db
      .prepare(
        `INSERT INTO consents (journal_id, reviewer_id, grading_year, asked, opted_in, created_at, answered_at)
         VALUES (?, ?, ?, 1, ?, ?, ?)
         ON CONFLICT(journal_id, reviewer_id, grading_year) DO UPDATE SET
           asked = 1,
           opted_in = excluded.opted_in,
           answered_at = excluded.answered_at
         WHERE consents.asked = 0`
      )
      .run(key.journalId, key.reviewerId, key.gradingYear, optedIn ? 1 : 0, at, at);

    const stored = await this.get(key);
    if (!stored) {
      throw new Error(`Consent record vanished after answer for reviewer '${key.reviewerId}'`);
    }
    return { record: stored, applied: result.changes > 0 };
  }
}

// =============================================================================
// § SQLite Salts & Delivered Submissions
// =============================================================================

class SqliteSaltStorage implements SaltStorage {
  constructor(private db: Database.Database) {}

  async getOrCreate(journalId: JournalId, generate: () => string): Promise<string> {
    const select = this.db.prepare<[string], { salt: string }>(
      "SELECT salt FROM journal_salts WHERE journal_id = ?"
    );
    const existing = select.get(journalId);
    if (existing) return existing.salt;

    // Another process may have inserted meanwhile; its salt wins
    this.db
      .prepare("INSERT INTO journal_salts (journal_id, salt) VALUES (?, ?) ON CONFLICT(journal_id) DO NOTHING")
      .run(journalId, generate());
    const row = select.get(journalId);
    if (!row) {
      throw new Error(`Salt for journal '${journalId}' vanished after insert`);
    }
    return row.salt;
  }
}

class SqliteDeliveredSubmissionStorage implements DeliveredSubmissionStorage {
  constructor(private db: Database.Database) {}

  async get(journalId: JournalId, submissionRef: SubmissionRef): Promise<DeliveredSubmission | null> {
    const row = this.db
      .prepare<[string, string], DeliveredRow>(
        "SELECT * FROM delivered_submissions WHERE journal_id = ? AND submission_ref = ?"
      )
      .get(journalId, submissionRef);
    return row ? rowToDelivered(row) : null;
  }

  async recordDelivery(record: DeliveredSubmission): Promise<DeliveredSubmission> {
    const run = this.db.transaction((): DeliveredSubmission => {
      this.db
        .prepare(
          `INSERT INTO delivered_submissions (journal_id, submission_ref, editors, sent_reviewer_ids, first_delivered_at)
           VALUES (?, ?, ?, '[]', ?)
           ON CONFLICT(journal_id, submission_ref) DO NOTHING`
        )
        .run(record.journalId, record.submissionRef, JSON.stringify(record.editors), record.firstDeliveredAt);

      const row = this.db
        .prepare<[string, string], DeliveredRow>(
          "SELECT * FROM delivered_submissions WHERE journal_id = ? AND submission_ref = ?"
        )
        .get(record.journalId, record.submissionRef);
      if (!row) {
        throw new Error(`Delivered submission '${record.submissionRef}' vanished after insert`);
      }

      const stored = rowToDelivered(row);
      const sentReviewerIds = [...new Set([...stored.sentReviewerIds, ...record.sentReviewerIds])];
      this.db
        .prepare("UPDATE delivered_submissions SET sent_reviewer_ids = ? WHERE journal_id = ? AND submission_ref = ?")
        .run(JSON.stringify(sentReviewerIds), record.journalId, record.submissionRef);
      return { ...stored, sentReviewerIds };
    });
    return run();
  }
}

// =============================================================================
// § SQLite Retry Queue
// =============================================================================

class SqliteTaskStorage implements TaskStorage {
  constructor(private db: Database.Database) {}

  async upsertOutstanding(input: NewDeliveryTask): Promise<{ task: DeliveryTask; created: boolean }> {
    const row = this.db
      .prepare<unknown[], TaskRow>(
        `INSERT INTO delivery_tasks (
           task_id, task_key, journal_id, submission_ref, payload, attempts, revision, state,
           created_at, updated_at, next_attempt_at, last_attempt_at, last_error
         )
         VALUES (?, ?, ?, ?, ?, ?, 1, 'pending', ?, ?, ?, ?, ?)
         ON CONFLICT(task_key) WHERE state <> 'abandoned' DO UPDATE SET
           payload = excluded.payload,
           revision = delivery_tasks.revision + 1,
           updated_at = excluded.updated_at
         RETURNING *`
      )
      .get(
        input.taskId,
        input.taskKey,
        input.journalId,
        input.submissionRef,
        JSON.stringify(input.payload),
        input.attempts,
        input.now,
        input.now,
        input.nextAttemptAt,
        input.lastAttemptAt ?? null,
        input.lastError ?? null
      );
    if (!row) {
      throw new Error(`Upsert of delivery task '${input.taskKey}' returned no row`);
    }
    const task = rowToTask(row);
    return { task, created: task.taskId === input.taskId };
  }

  async get(taskId: TaskId): Promise<DeliveryTask | null> {
    const row = this.db
      .prepare<[string], TaskRow>("SELECT * FROM delivery_tasks WHERE task_id = ?")
      .get(taskId);
    return row ? rowToTask(row) : null;
  }

  async getOutstanding(taskKey: string): Promise<DeliveryTask | null> {
    const row = this.db
      .prepare<[string], TaskRow>(
        "SELECT * FROM delivery_tasks WHERE task_key = ? AND state <> 'abandoned'"
      )
      .get(taskKey);
    return row ? rowToTask(row) : null;
  }

  async claimDue({ now, dueBy, staleClaimBefore, claimToken }: ClaimDueInput): Promise<DeliveryTask[]> {
    const rows = this.db
      .prepare<unknown[], TaskRow>(
        `UPDATE delivery_tasks
         SET state = 'in_flight', claimed_at = ?, claim_token = ?, updated_at = ?
         WHERE (state = 'pending' AND next_attempt_at <= ?)
            OR (state = 'in_flight' AND claimed_at < ?)
         RETURNING *`
      )
      .all(now, claimToken, now, dueBy, staleClaimBefore);
    return rows.map(rowToTask).sort((a, b) => a.nextAttemptAt.localeCompare(b.nextAttemptAt));
  }

  async complete(taskId: TaskId, claimToken: string, revision: number, now: string): Promise<CompleteResult> {
    const run = this.db.transaction((): CompleteResult => {
      const row = this.db
        .prepare<[string], TaskRow>("SELECT * FROM delivery_tasks WHERE task_id = ?")
        .get(taskId);
      if (!row || row.state !== "in_flight" || row.claim_token !== claimToken) {
        return "lost_claim";
      }

      if (row.revision !== revision) {
        this.db
          .prepare(
            `UPDATE delivery_tasks
             SET state = 'pending', claimed_at = NULL, claim_token = NULL, next_attempt_at = ?, updated_at = ?
             WHERE task_id = ?`
          )
          .run(now, now, taskId);
        return "superseded";
      }

      this.db.prepare("DELETE FROM delivery_tasks WHERE task_id = ?").run(taskId);
      return "removed";
    });
    return run();
  }

  async reschedule(taskId: TaskId, claimToken: string, input: RescheduleInput): Promise<DeliveryTask | null> {
    const row = this.db
      .prepare<unknown[], TaskRow>(
        `UPDATE delivery_tasks
         SET state = 'pending',
             claimed_at = NULL,
             claim_token = NULL,
             attempts = ?,
             next_attempt_at = ?,
             last_attempt_at = COALESCE(?, last_attempt_at),
             last_error = COALESCE(?, last_error),
             updated_at = ?
         WHERE task_id = ? AND state = 'in_flight' AND claim_token = ?
         RETURNING *`
      )
      .get(
        input.attempts,
        input.nextAttemptAt,
        input.lastAttemptAt ?? null,
        input.lastError ?? null,
        input.now,
        taskId,
        claimToken
      );
    return row ? rowToTask(row) : null;
  }

  async abandon(taskId: TaskId, claimToken: string, input: AbandonInput): Promise<DeliveryTask | null> {
    const row = this.db
      .prepare<unknown[], TaskRow>(
        `UPDATE delivery_tasks
         SET state = 'abandoned',
             claimed_at = NULL,
             claim_token = NULL,
             attempts = ?,
             abandon_reason = ?,
             abandoned_at = ?,
             last_error = COALESCE(?, last_error),
             updated_at = ?
         WHERE task_id = ? AND state = 'in_flight' AND claim_token = ?
         RETURNING *`
      )
      .get(input.attempts, input.reason, input.now, input.lastError ?? null, input.now, taskId, claimToken);
    return row ? rowToTask(row) : null;
  }

  async requeue(taskId: TaskId, now: string): Promise<DeliveryTask | null> {
    const run = this.db.transaction((): TaskRow | undefined => {
      const row = this.db
        .prepare<[string], TaskRow>("SELECT * FROM delivery_tasks WHERE task_id = ? AND state = 'abandoned'")
        .get(taskId);
      if (!row) return undefined;

      const blocking = this.db
        .prepare<[string], { task_id: string }>(
          "SELECT task_id FROM delivery_tasks WHERE task_key = ? AND state <> 'abandoned'"
        )
        .get(row.task_key);
      if (blocking) return undefined;

      return this.db
        .prepare<unknown[], TaskRow>(
          `UPDATE delivery_tasks
           SET state = 'pending', attempts = 0, created_at = ?, updated_at = ?, next_attempt_at = ?,
               abandon_reason = NULL, abandoned_at = NULL
           WHERE task_id = ?
           RETURNING *`
        )
        .get(now, now, now, taskId);
    });
    const row = run();
    return row ? rowToTask(row) : null;
  }

  async list(filter: TaskFilter, pagination?: PaginationOptions): Promise<PaginatedResult<DeliveryTask>> {
    const whereClauses: string[] = [];
    const params: unknown[] = [];

    if (filter.state) {
      whereClauses.push("state = ?");
      params.push(filter.state);
    }
    if (filter.journalId) {
      whereClauses.push("journal_id = ?");
      params.push(filter.journalId);
    }

    const whereStr = whereClauses.length > 0 ? "WHERE " + whereClauses.join(" AND ") : "";

    const countRow = this.db
      .prepare<unknown[], { count: number }>(`SELECT COUNT(*) as count FROM delivery_tasks ${whereStr}`)
      .get(...params);
    const total = countRow?.count ?? 0;

    const offset = pagination?.offset ?? 0;
    const limit = pagination?.limit ?? 50;

    const rows = this.db
      .prepare<unknown[], TaskRow>(
        `SELECT * FROM delivery_tasks ${whereStr} ORDER BY created_at ASC LIMIT ? OFFSET ?`
      )
      .all(...params, limit, offset);

    return {
      items: rows.map(rowToTask),
      total,
      offset,
      limit,
      hasMore: offset + limit < total,
    };
  }

  async stats(): Promise<TaskStats> {
    const rows = this.db
      .prepare<[], { state: string; count: number }>(
        "SELECT state, COUNT(*) as count FROM delivery_tasks GROUP BY state"
      )
      .all();

    const stats: TaskStats = { pending: 0, inFlight: 0, abandoned: 0 };
    for (const row of rows) {
      switch (toTaskState(row.state)) {
        case "pending":
          stats.pending = row.count;
          break;
        case "in_flight":
          stats.inFlight = row.count;
          break;
        case "abandoned":
          stats.abandoned = row.count;
          break;
      }
    }
    return stats;
  }

  async purgeAbandoned(before: string): Promise<number> {
    const result = this.db
      .prepare("DELETE FROM delivery_tasks WHERE state = 'abandoned' AND abandoned_at < ?")
      .run(before);
    return result.changes;
  }
}

// =============================================================================
// § SqliteStorage — Unified SQLite Storage
// =============================================================================

export interface SqliteStorageOptions {
  /** Path to SQLite database file (or :memory: for in-memory) */
  dbPath: string;
}

class NotInitializedError extends Error {
  constructor() {
    super("SqliteStorage used before initialize()");
    this.name = "NotInitializedError";
  }
}

export class SqliteStorage implements BridgeStorage {
  private db: Database.Database | null = null;
  private stores: {
    credentials: SqliteCredentialStorage;
    consents: SqliteConsentStorage;
    salts: SqliteSaltStorage;
    deliveredSubmissions: SqliteDeliveredSubmissionStorage;
    tasks: SqliteTaskStorage;
  } | null = null;
  private dbPath: string;

  constructor(options: SqliteStorageOptions) {
    this.dbPath = options.dbPath;
  }

  get credentials(): CredentialStorage {
    return this.requireStores().credentials;
  }

  get consents(): ConsentStorage {
    return this.requireStores().consents;
  }

  get salts(): SaltStorage {
    return this.requireStores().salts;
  }

  get deliveredSubmissions(): DeliveredSubmissionStorage {
    return this.requireStores().deliveredSubmissions;
  }

  get tasks(): TaskStorage {
    return this.requireStores().tasks;
  }

  async initialize(): Promise<void> {
    if (this.db) return;

    const db = new Database(this.dbPath);
    db.pragma("journal_mode = WAL");
    db.pragma("busy_timeout = 5000");

    db.exec(`
      CREATE TABLE IF NOT EXISTS credentials (
        journal_id TEXT PRIMARY KEY,
        api_key TEXT NOT NULL,
        validated INTEGER NOT NULL DEFAULT 0,
        validated_at TEXT,
        updated_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS consents (
        journal_id TEXT NOT NULL,
        reviewer_id TEXT NOT NULL,
        grading_year INTEGER NOT NULL,
        asked INTEGER NOT NULL DEFAULT 0,
        opted_in INTEGER NOT NULL DEFAULT 0,
        created_at TEXT NOT NULL,
        answered_at TEXT,
        PRIMARY KEY (journal_id, reviewer_id, grading_year)
      );

      CREATE TABLE IF NOT EXISTS journal_salts (
        journal_id TEXT PRIMARY KEY,
        salt TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS delivered_submissions (
        journal_id TEXT NOT NULL,
        submission_ref TEXT NOT NULL,
        editors TEXT NOT NULL,
        sent_reviewer_ids TEXT NOT NULL DEFAULT '[]',
        first_delivered_at TEXT NOT NULL,
        PRIMARY KEY (journal_id, submission_ref)
      );

      CREATE TABLE IF NOT EXISTS delivery_tasks (
        task_id TEXT PRIMARY KEY,
        task_key TEXT NOT NULL,
        journal_id TEXT NOT NULL,
        submission_ref TEXT NOT NULL,
        payload TEXT NOT NULL,
        attempts INTEGER NOT NULL,
        revision INTEGER NOT NULL,
        state TEXT NOT NULL,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL,
        next_attempt_at TEXT NOT NULL,
        last_attempt_at TEXT,
        claimed_at TEXT,
        claim_token TEXT,
        last_error TEXT,
        abandon_reason TEXT,
        abandoned_at TEXT
      );

      CREATE UNIQUE INDEX IF NOT EXISTS idx_delivery_tasks_outstanding
        ON delivery_tasks(task_key) WHERE state <> 'abandoned';
      CREATE INDEX IF NOT EXISTS idx_delivery_tasks_due ON delivery_tasks(state, next_attempt_at);
      CREATE INDEX IF NOT EXISTS idx_delivery_tasks_journal ON delivery_tasks(journal_id);
    `);

    this.db = db;
    this.stores = {
      credentials: new SqliteCredentialStorage(db),
      consents: new SqliteConsentStorage(db),
      salts: new SqliteSaltStorage(db),
      deliveredSubmissions: new SqliteDeliveredSubmissionStorage(db),
      tasks: new SqliteTaskStorage(db),
    };
  }

  async close(): Promise<void> {
    if (this.db) {
      this.db.close();
      this.db = null;
      this.stores = null;
    }
  }

  async healthCheck(): Promise<{ ok: boolean; latencyMs: number }> {
    const start = Date.now();
    try {
      if (!this.db) {
        return { ok: false, latencyMs: Date.now() - start };
      }
      this.db.prepare("SELECT 1").get();
      return { ok: true, latencyMs: Date.now() - start };
    } catch {
      return { ok: false, latencyMs: Date.now() - start };
    }
  }

  private requireStores(): NonNullable<SqliteStorage["stores"]> {
    if (!this.stores) {
      throw new NotInitializedError();
    }
    return this.stores;
  }
}
