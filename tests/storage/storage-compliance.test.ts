/**
 * Behaviour every BridgeStorage backend must share.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { MemoryStorage } from '../../src/storage/memory-storage.js';
import { SqliteStorage } from '../../src/storage/sqlite-storage.js';
import type { BridgeStorage, NewDeliveryTask } from '../../src/storage/storage-interface.js';
import type { DecisionEvent, DeliveredSubmission } from '../../src/types/grading-contract.js';
import { JournalId, ReviewerId, SubmissionRef, TaskId } from '../../src/types/branded.js';
import { JOURNAL, SUBMISSION } from '../helpers/fixtures.js';

const T0 = '2025-06-01T08:00:00.000Z';
const T1 = '2025-06-02T08:00:00.000Z';
const T2 = '2025-06-03T08:00:00.000Z';
const KEY = 'journal-1:sub-100';

function createPayload(decisionKind: DecisionEvent['decisionKind'] = 'ACCEPT'): DecisionEvent {
  return {
    journalId: JOURNAL,
    submissionRef: SUBMISSION,
    title: 'On the grading of reviews',
    submittedAt: null,
    decisionKind,
    authors: [],
    editors: [],
    reviews: [],
    reviewerIds: [],
    createdAt: T0,
  };
}

function createTaskInput(overrides: Partial<NewDeliveryTask> = {}): NewDeliveryTask {
  return {
    taskId: TaskId('task_1'),
    taskKey: KEY,
    journalId: JOURNAL,
    submissionRef: SUBMISSION,
    payload: createPayload(),
    attempts: 1,
    nextAttemptAt: T1,
    lastAttemptAt: T0,
    lastError: 'HTTP 503: maintenance',
    now: T0,
    ...overrides,
  };
}

const backends: Array<[string, () => BridgeStorage]> = [
  ['MemoryStorage', () => new MemoryStorage()],
  ['SqliteStorage', () => new SqliteStorage({ dbPath: ':memory:' })],
];

describe.each(backends)('%s', (_name, createStorage) => {
  let storage: BridgeStorage;

  beforeEach(async () => {
    storage = createStorage();
    await storage.initialize();
  });

  afterEach(async () => {
    await storage.close();
  });

  it('should pass its health check', async () => {
    expect((await storage.healthCheck()).ok).toBe(true);
  });

  // ===========================================================================
  // § Credentials
  // ===========================================================================

  describe('credentials', () => {
    it('should save, read and flip validation', async () => {
      await storage.credentials.save({
        journalId: JOURNAL,
        apiKey: 'test-secret',
        validated: true,
        validatedAt: T0,
        updatedAt: T0,
      });

      const invalidated = await storage.credentials.setValidation(JOURNAL, false, T1);
      expect(invalidated).toEqual({
        journalId: JOURNAL,
        apiKey: 'test-secret',
        validated: false,
        validatedAt: T0,
        updatedAt: T1,
      });

      const revalidated = await storage.credentials.setValidation(JOURNAL, true, T2);
      expect(revalidated?.validated).toBe(true);
      expect(revalidated?.validatedAt).toBe(T2);
      expect(await storage.credentials.get(JOURNAL)).toEqual(revalidated);
    });

    it('should return null for unknown journals', async () => {
      expect(await storage.credentials.get(JournalId('nope'))).toBeNull();
      expect(await storage.credentials.setValidation(JournalId('nope'), true, T0)).toBeNull();
    });
  });

  // ===========================================================================
  // § Consent
  // ===========================================================================

  describe('consents', () => {
    const key = { reviewerId: ReviewerId('R'), journalId: JournalId('J'), gradingYear: 2025 };

    it('should create a record only once', async () => {
      const first = await storage.consents.createIfAbsent({ ...key, asked: false, optedIn: false, createdAt: T0 });
      const second = await storage.consents.createIfAbsent({ ...key, asked: false, optedIn: false, createdAt: T1 });

      expect(first.created).toBe(true);
      expect(second.created).toBe(false);
      expect(second.record.createdAt).toBe(T0);
    });

    it('should apply the first answer only', async () => {
      await storage.consents.createIfAbsent({ ...key, asked: false, optedIn: false, createdAt: T0 });

      const first = await storage.consents.answerIfUnasked(key, true, T1);
      const second = await storage.consents.answerIfUnasked(key, false, T2);

      expect(first).toEqual({
        applied: true,
        record: { ...key, asked: true, optedIn: true, createdAt: T0, answeredAt: T1 },
      });
      expect(second.applied).toBe(false);
      expect(second.record.optedIn).toBe(true);
      expect(second.record.answeredAt).toBe(T1);
    });

    it('should answer without a prior record', async () => {
      const { record, applied } = await storage.consents.answerIfUnasked(key, false, T1);

      expect(applied).toBe(true);
      expect(record).toEqual({ ...key, asked: true, optedIn: false, createdAt: T1, answeredAt: T1 });
    });

    it('should keep grading years apart', async () => {
      await storage.consents.answerIfUnasked(key, true, T1);

      expect(await storage.consents.get({ ...key, gradingYear: 2026 })).toBeNull();
    });
  });

  // ===========================================================================
  // § Salts & Delivered Submissions
  // ===========================================================================

  describe('salts', () => {
    it('should generate a salt once per journal', async () => {
      const generate = vi.fn(() => 'test-salt');

      expect(await storage.salts.getOrCreate(JOURNAL, generate)).toBe('test-salt');
      expect(await storage.salts.getOrCreate(JOURNAL, generate)).toBe('test-salt');
      expect(generate).toHaveBeenCalledTimes(1);
    });
  });

  describe('deliveredSubmissions', () => {
    it('should keep the first delivered editor list', async () => {
      const first: DeliveredSubmission = {
        journalId: JOURNAL,
        submissionRef: SUBMISSION,
        editors: [{ editorRef: { email: 'a@uni.test', firstName: 'A', lastName: 'E', orcid: null }, roleLevel: 3 }],
        sentReviewerIds: [],
        firstDeliveredAt: T0,
      };

      await storage.deliveredSubmissions.recordDelivery(first);
      const stored = await storage.deliveredSubmissions.recordDelivery({ ...first, editors: [], firstDeliveredAt: T1 });

      expect(stored).toEqual(first);
      expect(await storage.deliveredSubmissions.get(JOURNAL, SUBMISSION)).toEqual(first);
      expect(await storage.deliveredSubmissions.get(JOURNAL, SubmissionRef('other'))).toBeNull();
    });

    it('should accumulate the reviewers sent across deliveries', async () => {
      const record: DeliveredSubmission = {
        journalId: JOURNAL,
        submissionRef: SUBMISSION,
        editors: [],
        sentReviewerIds: [ReviewerId('reviewer-1'), ReviewerId('reviewer-2')],
        firstDeliveredAt: T0,
      };

      await storage.deliveredSubmissions.recordDelivery(record);
      const stored = await storage.deliveredSubmissions.recordDelivery({
        ...record,
        sentReviewerIds: [ReviewerId('reviewer-2'), ReviewerId('reviewer-3')],
        firstDeliveredAt: T1,
      });

      expect(stored.sentReviewerIds).toEqual(['reviewer-1', 'reviewer-2', 'reviewer-3']);
      expect(stored.firstDeliveredAt).toBe(T0);
      expect((await storage.deliveredSubmissions.get(JOURNAL, SUBMISSION))?.sentReviewerIds).toEqual([
        'reviewer-1',
        'reviewer-2',
        'reviewer-3',
      ]);
    });
  });

  // ===========================================================================
  // § Retry Queue
  // ===========================================================================

  describe('tasks', () => {
    it('should create a pending task', async () => {
      const { task, created } = await storage.tasks.upsertOutstanding(createTaskInput());

      expect(created).toBe(true);
      expect(task).toMatchObject({
        taskId: 'task_1',
        taskKey: KEY,
        attempts: 1,
        revision: 1,
        state: 'pending',
        createdAt: T0,
        nextAttemptAt: T1,
        lastAttemptAt: T0,
        lastError: 'HTTP 503: maintenance',
      });
      expect(task.payload).toEqual(createPayload());
    });

    it('should replace the payload of an outstanding task instead of adding one', async () => {
      await storage.tasks.upsertOutstanding(createTaskInput());
      const { task, created } = await storage.tasks.upsertOutstanding(
        createTaskInput({ taskId: TaskId('task_2'), payload: createPayload('REJECT'), attempts: 5, now: T1 })
      );

      expect(created).toBe(false);
      expect(task.taskId).toBe('task_1');
      expect(task.revision).toBe(2);
      expect(task.attempts).toBe(1);
      expect(task.payload.decisionKind).toBe('REJECT');
      expect(task.updatedAt).toBe(T1);
      expect(await storage.tasks.stats()).toEqual({ pending: 1, inFlight: 0, abandoned: 0 });
      expect(await storage.tasks.get(TaskId('task_2'))).toBeNull();
    });

    it('should claim due tasks once', async () => {
      await storage.tasks.upsertOutstanding(createTaskInput());

      expect(await storage.tasks.claimDue({ now: T0, dueBy: T0, staleClaimBefore: T0, claimToken: 'early' })).toEqual([]);

      const claimed = await storage.tasks.claimDue({ now: T1, dueBy: T1, staleClaimBefore: T0, claimToken: 'claim-a' });
      expect(claimed).toHaveLength(1);
      expect(claimed[0]).toMatchObject({ state: 'in_flight', claimToken: 'claim-a', claimedAt: T1 });

      expect(await storage.tasks.claimDue({ now: T1, dueBy: T1, staleClaimBefore: T0, claimToken: 'claim-b' })).toEqual([]);
    });

    it('should claim tasks due by the cutoff and stamp the claim with the drain time', async () => {
      await storage.tasks.upsertOutstanding(createTaskInput());
      const drainStart = '2025-06-02T07:59:59.700Z';

      expect(
        await storage.tasks.claimDue({ now: drainStart, dueBy: drainStart, staleClaimBefore: T0, claimToken: 'strict' })
      ).toEqual([]);

      const claimed = await storage.tasks.claimDue({
        now: drainStart,
        dueBy: '2025-06-02T08:59:59.700Z',
        staleClaimBefore: T0,
        claimToken: 'tolerant',
      });
      expect(claimed).toHaveLength(1);
      expect(claimed[0]).toMatchObject({ claimToken: 'tolerant', claimedAt: drainStart, nextAttemptAt: T1 });
    });

    it('should reclaim tasks held by a stale claim', async () => {
      await storage.tasks.upsertOutstanding(createTaskInput());
      await storage.tasks.claimDue({ now: T1, dueBy: T1, staleClaimBefore: T0, claimToken: 'crashed' });

      const reclaimed = await storage.tasks.claimDue({ now: T2, dueBy: T2, staleClaimBefore: '2025-06-02T09:00:00.000Z', claimToken: 'claim-b' });

      expect(reclaimed.map((task) => task.claimToken)).toEqual(['claim-b']);
      expect(await storage.tasks.complete(TaskId('task_1'), 'crashed', 1, T2)).toBe('lost_claim');
    });

    it('should remove a completed task', async () => {
      await storage.tasks.upsertOutstanding(createTaskInput());
      await storage.tasks.claimDue({ now: T1, dueBy: T1, staleClaimBefore: T0, claimToken: 'claim-a' });

      expect(await storage.tasks.complete(TaskId('task_1'), 'claim-a', 1, T1)).toBe('removed');
      expect(await storage.tasks.get(TaskId('task_1'))).toBeNull();
      expect(await storage.tasks.getOutstanding(KEY)).toBeNull();
    });

    it('should keep a task whose payload was replaced during delivery', async () => {
      await storage.tasks.upsertOutstanding(createTaskInput());
      await storage.tasks.claimDue({ now: T1, dueBy: T1, staleClaimBefore: T0, claimToken: 'claim-a' });
      await storage.tasks.upsertOutstanding(createTaskInput({ taskId: TaskId('task_2'), payload: createPayload('REJECT'), now: T1 }));

      expect(await storage.tasks.complete(TaskId('task_1'), 'claim-a', 1, T2)).toBe('superseded');

      const task = await storage.tasks.get(TaskId('task_1'));
      expect(task).toMatchObject({ state: 'pending', revision: 2, nextAttemptAt: T2 });
      expect(task?.claimToken).toBeUndefined();
      expect(task?.payload.decisionKind).toBe('REJECT');
    });

    it('should reschedule only under the holding claim', async () => {
      await storage.tasks.upsertOutstanding(createTaskInput());
      await storage.tasks.claimDue({ now: T1, dueBy: T1, staleClaimBefore: T0, claimToken: 'claim-a' });
      const input = { attempts: 2, nextAttemptAt: T2, lastAttemptAt: T1, lastError: 'HTTP 502: no details', now: T1 };

      expect(await storage.tasks.reschedule(TaskId('task_1'), 'claim-b', input)).toBeNull();

      const rescheduled = await storage.tasks.reschedule(TaskId('task_1'), 'claim-a', input);
      expect(rescheduled).toMatchObject({
        state: 'pending',
        attempts: 2,
        nextAttemptAt: T2,
        lastAttemptAt: T1,
        lastError: 'HTTP 502: no details',
      });
      expect(rescheduled?.claimToken).toBeUndefined();
    });

    it('should abandon a task once', async () => {
      await storage.tasks.upsertOutstanding(createTaskInput());
      await storage.tasks.claimDue({ now: T1, dueBy: T1, staleClaimBefore: T0, claimToken: 'claim-a' });
      const input = { attempts: 7, reason: 'attempts_exhausted' as const, now: T1 };

      const abandoned = await storage.tasks.abandon(TaskId('task_1'), 'claim-a', input);
      expect(abandoned).toMatchObject({
        state: 'abandoned',
        attempts: 7,
        abandonReason: 'attempts_exhausted',
        abandonedAt: T1,
        lastError: 'HTTP 503: maintenance',
      });
      expect(await storage.tasks.abandon(TaskId('task_1'), 'claim-a', input)).toBeNull();
      expect(await storage.tasks.getOutstanding(KEY)).toBeNull();
      expect(await storage.tasks.stats()).toEqual({ pending: 0, inFlight: 0, abandoned: 1 });
    });

    it('should let a new report queue next to an abandoned task', async () => {
      await storage.tasks.upsertOutstanding(createTaskInput());
      await storage.tasks.claimDue({ now: T1, dueBy: T1, staleClaimBefore: T0, claimToken: 'claim-a' });
      await storage.tasks.abandon(TaskId('task_1'), 'claim-a', { attempts: 7, reason: 'expired', now: T1 });

      const { task, created } = await storage.tasks.upsertOutstanding(createTaskInput({ taskId: TaskId('task_2'), now: T1 }));

      expect(created).toBe(true);
      expect(task.taskId).toBe('task_2');
      expect(await storage.tasks.requeue(TaskId('task_1'), T2)).toBeNull();
    });

    it('should requeue an abandoned task with fresh attempts', async () => {
      await storage.tasks.upsertOutstanding(createTaskInput());
      await storage.tasks.claimDue({ now: T1, dueBy: T1, staleClaimBefore: T0, claimToken: 'claim-a' });
      await storage.tasks.abandon(TaskId('task_1'), 'claim-a', { attempts: 7, reason: 'expired', now: T1 });

      const requeued = await storage.tasks.requeue(TaskId('task_1'), T2);

      expect(requeued).toMatchObject({ state: 'pending', attempts: 0, createdAt: T2, nextAttemptAt: T2 });
      expect(requeued?.abandonReason).toBeUndefined();
      expect((await storage.tasks.getOutstanding(KEY))?.taskId).toBe('task_1');
      expect(await storage.tasks.requeue(TaskId('task_1'), T2)).toBeNull();
    });

    it('should list with filters and pagination', async () => {
      await storage.tasks.upsertOutstanding(createTaskInput());
      await storage.tasks.upsertOutstanding(
        createTaskInput({ taskId: TaskId('task_2'), taskKey: 'journal-1:sub-200', submissionRef: SubmissionRef('sub-200'), now: T1 })
      );
      await storage.tasks.upsertOutstanding(
        createTaskInput({
          taskId: TaskId('task_3'),
          taskKey: 'journal-2:sub-300',
          journalId: JournalId('journal-2'),
          submissionRef: SubmissionRef('sub-300'),
          now: T2,
        })
      );

      const page = await storage.tasks.list({ journalId: JOURNAL }, { limit: 1 });
      expect(page.items.map((task) => task.taskId)).toEqual(['task_1']);
      expect(page).toMatchObject({ total: 2, offset: 0, limit: 1, hasMore: true });

      const all = await storage.tasks.list({ state: 'pending' });
      expect(all.items.map((task) => task.taskId)).toEqual(['task_1', 'task_2', 'task_3']);
      expect(all.hasMore).toBe(false);

      expect((await storage.tasks.list({ state: 'abandoned' })).total).toBe(0);
    });

    it('should purge tasks abandoned before the cutoff', async () => {
      await storage.tasks.upsertOutstanding(createTaskInput());
      await storage.tasks.claimDue({ now: T1, dueBy: T1, staleClaimBefore: T0, claimToken: 'claim-a' });
      await storage.tasks.abandon(TaskId('task_1'), 'claim-a', { attempts: 7, reason: 'expired', now: T1 });

      expect(await storage.tasks.purgeAbandoned(T1)).toBe(0);
      expect(await storage.tasks.purgeAbandoned(T2)).toBe(1);
      expect(await storage.tasks.get(TaskId('task_1'))).toBeNull();
    });
  });
});
