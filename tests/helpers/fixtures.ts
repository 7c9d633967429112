/**
 * Shared test fixtures: host records and an in-process grading service.
 */

import { JournalId, ReviewerId, SubmissionRef } from '../../src/types/branded.js';
import type { HostDecision, HostEditorAssignment, HostPerson, HostReview, HostSubmission } from '../../src/types/host.js';
import type { BridgeEvent, BridgeEventType } from '../../src/types/grading-contract.js';
import { BridgeEventEmitter } from '../../src/core/bridge-event-emitter.js';

export const JOURNAL = JournalId('journal-1');
export const SUBMISSION = SubmissionRef('sub-100');
export const REVIEWER = ReviewerId('reviewer-7');
export const BASE_URL = 'https://grading.test';
export const API_KEY = 'test-secret';

// =============================================================================
// § Host Records
// =============================================================================

export function createPerson(overrides: Partial<HostPerson> = {}): HostPerson {
  return {
    id: 'person-1',
    email: 'person@uni.test',
    firstName: 'Pat',
    lastName: 'Example',
    ...overrides,
  };
}

export function createSubmission(overrides: Partial<HostSubmission> = {}): HostSubmission {
  return {
    ref: SUBMISSION,
    journalId: JOURNAL,
    title: 'On the grading of reviews',
    submittedAt: '2025-01-10T09:00:00.000Z',
    ...overrides,
  };
}

export function createDecision(overrides: Partial<HostDecision> = {}): HostDecision {
  return {
    kind: 'accept',
    decidedAt: '2025-06-02T08:00:00.000Z',
    ...overrides,
  };
}

export function createReview(overrides: Partial<HostReview> = {}): HostReview {
  return {
    reviewer: createPerson({ id: REVIEWER, email: 'reviewer@uni.test', firstName: 'Robin', lastName: 'Reviewer' }),
    reviewerAuthenticated: true,
    requestedAt: '2025-03-01T10:00:00.000Z',
    acceptedAt: '2025-03-02T10:00:00.000Z',
    completedAt: '2025-04-01T10:00:00.000Z',
    answers: ['<p>Sound methods.</p>', '<p>Minor typos.</p>'],
    recommendation: 'minor_revisions',
    ...overrides,
  };
}

export function createEditorAssignment(
  email: string,
  role: HostEditorAssignment['role'] = 'editor'
): HostEditorAssignment {
  return { editor: createPerson({ id: email, email }), role };
}

// =============================================================================
// § Grading Service Stand-in
// =============================================================================

export interface RecordedCall {
  path: string;
  body: Record<string, unknown>;
}

export type ScriptedResponse =
  | { status: number; body?: unknown }
  | { error: Error };

/**
 * Answers grading service calls from a script, then with `defaultResponse`.
 */
export class FakeGradingService {
  readonly calls: RecordedCall[] = [];
  defaultResponse: ScriptedResponse = { status: 200, body: { ok: true } };
  private script: ScriptedResponse[] = [];

  respondWith(...responses: ScriptedResponse[]): this {
    this.script.push(...responses);
    return this;
  }

  callsTo(path: string): RecordedCall[] {
    return this.calls.filter((call) => call.path === path);
  }

  fetchFn = async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const url = typeof input === 'string' ? input : input instanceof URL ? input.href : input.url;
    const parsed: unknown = JSON.parse(typeof init?.body === 'string' ? init.body : '{}');
    this.calls.push({ path: new URL(url).pathname, body: isRecord(parsed) ? parsed : {} });

    const next = this.script.shift() ?? this.defaultResponse;
    if ('error' in next) throw next.error;
    const text = typeof next.body === 'string' ? next.body : JSON.stringify(next.body ?? {});
    return new Response(text, { status: next.status, headers: { 'Content-Type': 'application/json' } });
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// =============================================================================
// § Events & Clock
// =============================================================================

export function recordEvents(emitter: BridgeEventEmitter = new BridgeEventEmitter()): {
  emitter: BridgeEventEmitter;
  events: BridgeEvent[];
  ofType: (type: BridgeEventType) => BridgeEvent[];
} {
  const events: BridgeEvent[] = [];
  emitter.addListener(async (event) => {
    events.push(event);
  });
  return { emitter, events, ofType: (type) => events.filter((event) => event.type === type) };
}

export class TestClock {
  constructor(public current: Date) {}

  now = (): Date => this.current;

  set(iso: string): void {
    this.current = new Date(iso);
  }
}

// =============================================================================
// § Log Capture
// =============================================================================

/**
 * pino destination that keeps each JSON line, parsed.
 */
export function createLogSink(): { write: (line: string) => void; lines: Array<Record<string, unknown>> } {
  const lines: Array<Record<string, unknown>> = [];
  return {
    lines,
    write(line: string) {
      const parsed: unknown = JSON.parse(line);
      if (isRecord(parsed)) lines.push(parsed);
    },
  };
}
