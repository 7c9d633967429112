/**
 * Grading Contract - TypeScript type definitions for the data this service
 * exchanges with the review grading service and keeps in its own storage.
 */

import type { EventId, JournalId, ReviewerId, SubmissionRef, TaskId } from "./branded.js";

// =============================================================================
// § Taxonomy
// =============================================================================

/**
 * Editorial outcomes understood by the grading service.
 */
export type DecisionKind = "ACCEPT" | "MINORREVISION" | "MAJORREVISION" | "REJECT";

export const DecisionKind = {
  ACCEPT: "ACCEPT",
  MINOR_REVISION: "MINORREVISION",
  MAJOR_REVISION: "MAJORREVISION",
  REJECT: "REJECT",
} as const;

/**
 * Editorial involvement levels. Level 2 exists in the remote taxonomy but is
 * never populated by this service.
 */
export type EditorLevel = 1 | 2 | 3;

// =============================================================================
// § Normalized Payload
// =============================================================================

export interface PersonRef {
  email: string;
  firstName: string;
  lastName: string;
  orcid: string | null;
}

export interface AuthorRef extends PersonRef {
  orderNumber: number;
}

export interface EditorAssignment {
  editorRef: PersonRef;
  roleLevel: EditorLevel;
}

export interface IdentifiedReviewerRef extends PersonRef {
  kind: "identified";
}

/**
 * Opaque reviewer reference. `token` is stable for one reviewer within one
 * submission; `pseudoEmail` is the same token in address form for remote
 * schemas that key reviewers by email.
 */
export interface AnonymousReviewerRef {
  kind: "anonymous";
  token: string;
  pseudoEmail: string;
}

export type ReviewerRef = IdentifiedReviewerRef | AnonymousReviewerRef;

export interface ReviewPayload {
  /** 1-based position of the review within the submission */
  visibleId: string;
  reviewerRef: ReviewerRef;
  content: string;
  isAnonymous: boolean;
  isHtml: boolean;
  invitedAt: string | null;
  agreedAt: string | null;
  dueAt: string | null;
  submittedAt: string | null;
  suggestedDecision: DecisionKind | null;
}

export interface DecisionEvent {
  journalId: JournalId;
  submissionRef: SubmissionRef;
  title: string;
  submittedAt: string | null;
  decisionKind: DecisionKind;
  authors: AuthorRef[];
  editors: EditorAssignment[];
  reviews: ReviewPayload[];
  /** Host reviewer ids of `reviews`, in the same order. Kept for bookkeeping, never sent */
  reviewerIds: ReviewerId[];
  createdAt: string;
}

// =============================================================================
// § Stored Records
// =============================================================================

export interface JournalCredential {
  journalId: JournalId;
  apiKey: string;
  validated: boolean;
  validatedAt?: string;
  updatedAt: string;
}

export interface ConsentRecord {
  reviewerId: ReviewerId;
  journalId: JournalId;
  gradingYear: number;
  asked: boolean;
  optedIn: boolean;
  createdAt: string;
  answeredAt?: string;
}

export interface ConsentKey {
  reviewerId: ReviewerId;
  journalId: JournalId;
  gradingYear: number;
}

/**
 * Editor list sent with the first successful report of a submission, which
 * later reports must repeat unchanged, and every reviewer whose review has
 * reached the grading service.
 */
export interface DeliveredSubmission {
  journalId: JournalId;
  submissionRef: SubmissionRef;
  editors: EditorAssignment[];
  sentReviewerIds: ReviewerId[];
  firstDeliveredAt: string;
}

export type DeliveryTaskState = "pending" | "in_flight" | "abandoned";

export type AbandonReason = "attempts_exhausted" | "expired" | "permanent_reject";

export interface DeliveryTask {
  taskId: TaskId;
  /** `${journalId}:${submissionRef}` — at most one outstanding task per key */
  taskKey: string;
  journalId: JournalId;
  submissionRef: SubmissionRef;
  payload: DecisionEvent;
  attempts: number;
  /** Incremented whenever the payload is replaced */
  revision: number;
  state: DeliveryTaskState;
  createdAt: string;
  updatedAt: string;
  nextAttemptAt: string;
  lastAttemptAt?: string;
  claimedAt?: string;
  /** Set by the drain sweep that holds the task while in_flight */
  claimToken?: string;
  lastError?: string;
  abandonReason?: AbandonReason;
  abandonedAt?: string;
}

// =============================================================================
// § Delivery Outcomes
// =============================================================================

export type DeliveryOutcome =
  | { kind: "ok"; statusCode: number }
  | { kind: "transient_failure"; statusCode?: number; message: string }
  | { kind: "credential_invalid"; statusCode: number; message: string }
  | { kind: "permanent_reject"; statusCode: number; message: string };

export type CredentialCheckResult =
  | { ok: true }
  | { ok: false; reason: string; retryable: boolean };

export type GradingTriggerResult =
  | { ok: true; redirectUrl?: string }
  | { ok: false; outcome: Exclude<DeliveryOutcome, { kind: "ok" }> };

export interface DrainResult {
  attempted: number;
  succeeded: number;
  abandoned: number;
}

// =============================================================================
// § Bridge Events
// =============================================================================

export type BridgeEventType =
  | "consent.created"
  | "consent.answered"
  | "consent.answer_ignored"
  | "credentials.saved"
  | "credentials.invalidated"
  | "credentials.missing"
  | "delivery.attempted"
  | "delivery.succeeded"
  | "delivery.queued"
  | "delivery.rescheduled"
  | "delivery.rejected"
  | "delivery.abandoned"
  | "mapping.failed"
  | "drain.completed";

/**
 * Lifecycle event fanned out to listeners (metrics, operator alerts).
 */
export interface BridgeEvent {
  eventId: EventId;
  type: BridgeEventType;
  ts: string;
  journalId?: JournalId;
  submissionRef?: SubmissionRef;
  taskId?: TaskId;
  payload?: Record<string, unknown>;
}
