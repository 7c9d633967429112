/**
 * Event Normalizer — turns host submission, review, decision and editor data
 * into the grading service's taxonomy.
 *
 * Pure: no storage or network access. Everything it needs (consent records,
 * the journal salt, a previously delivered editor list) is handed in by the
 * caller, so equal inputs always produce equal payloads.
 */

import { ReviewerId } from "../types/branded.js";
import type { JournalId, SubmissionRef } from "../types/branded.js";
import { DecisionKind } from "../types/grading-contract.js";
import type {
  AuthorRef,
  ConsentRecord,
  DecisionEvent,
  EditorAssignment,
  EditorLevel,
  PersonRef,
  ReviewPayload,
} from "../types/grading-contract.js";
import type {
  HostAuthor,
  HostDecision,
  HostDecisionKind,
  HostEditorAssignment,
  HostPerson,
  HostReview,
  HostSubmission,
} from "../types/host.js";
import { requiresAnonymization } from "./consent-service.js";
import { anonymousReviewerRef } from "./pseudonymizer.js";
import { UnmappableDecisionError } from "./errors.js";

// =============================================================================
// § Limits
// =============================================================================

export const MAX_SINGLE_LINE_LENGTH = 2000;
export const MAX_MULTI_LINE_LENGTH = 200_000;
export const MAX_LIST_LENGTH = 20;

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

/** Cuts at `max` UTF-16 units, one fewer when the cut would split a surrogate pair. */
export function truncate(value: string, max: number): string {
  if (value.length <= max) return value;
  const end = max > 0 && isHighSurrogate(value.charCodeAt(max - 1)) ? max - 1 : max;
  return value.slice(0, end);
}

function line(value: string | undefined): string {
  return truncate(value ?? "", MAX_SINGLE_LINE_LENGTH);
}

// =============================================================================
// § Decisions
// =============================================================================

const DECISION_MAP: Record<HostDecisionKind, DecisionKind> = {
  accept: DecisionKind.ACCEPT,
  // Lossy: the grading service has no conditional acceptance
  conditional_accept: DecisionKind.MINOR_REVISION,
  minor_revisions: DecisionKind.MINOR_REVISION,
  major_revisions: DecisionKind.MAJOR_REVISION,
  reject: DecisionKind.REJECT,
};

function isHostDecisionKind(value: string): value is HostDecisionKind {
  return Object.prototype.hasOwnProperty.call(DECISION_MAP, value);
}

/**
 * @throws UnmappableDecisionError for decisions outside the host taxonomy
 */
export function mapDecision(hostDecisionKind: string): DecisionKind {
  if (!isHostDecisionKind(hostDecisionKind)) {
    throw new UnmappableDecisionError(hostDecisionKind);
  }
  return DECISION_MAP[hostDecisionKind];
}

/**
 * Reviewer recommendation → suggested decision. Unknown values yield null.
 */
export function mapRecommendation(hostRecommendation?: string | null): DecisionKind | null {
  if (!hostRecommendation) return null;
  const normalized = hostRecommendation.trim().toLowerCase();
  return isHostDecisionKind(normalized) ? DECISION_MAP[normalized] : null;
}

// =============================================================================
// § Editors
// =============================================================================

export function toPersonRef(person: HostPerson): PersonRef {
  return {
    email: line(person.email),
    firstName: line(person.firstName),
    lastName: line(person.lastName),
    orcid: person.orcid ? line(person.orcid) : null,
  };
}

export function toAuthorRef(author: HostAuthor): AuthorRef {
  return { ...toPersonRef(author), orderNumber: author.orderNumber };
}

export interface MapEditorsOptions {
  /** Editor list sent on the first successful report; returned unchanged */
  frozen?: EditorAssignment[];
  /** Demote the first editor to level 1 when nobody else holds it */
  requireLevelOneEditor?: boolean;
}

/**
 * Level 1: section editors (assigned, or named on a decision draft).
 * Level 3: editors assigned, the deciding editor, attributed editors and
 * editors named on drafts. One entry per email; level 3 wins.
 */
export function mapEditors(
  assignments: HostEditorAssignment[],
  decision: HostDecision,
  options?: MapEditorsOptions
): EditorAssignment[] {
  if (options?.frozen) {
    return options.frozen.map((entry) => ({ editorRef: { ...entry.editorRef }, roleLevel: entry.roleLevel }));
  }

  const seen = new Map<string, { person: HostPerson; level: EditorLevel }>();
  const add = (person: HostPerson | undefined, level: EditorLevel): void => {
    if (!person) return;
    const key = person.email.trim().toLowerCase();
    const existing = seen.get(key);
    if (!existing) {
      seen.set(key, { person, level });
    } else if (level > existing.level) {
      existing.level = level;
    }
  };

  for (const assignment of assignments) {
    add(assignment.editor, assignment.role === "editor" ? 3 : 1);
  }
  add(decision.decidedBy, 3);
  for (const editor of decision.attributedEditors ?? []) {
    add(editor, 3);
  }
  for (const draft of decision.drafts ?? []) {
    add(draft.sectionEditor, 1);
    add(draft.editor, 3);
  }

  // Array.prototype.sort is stable, so first-seen order holds within a level
  const editors: EditorAssignment[] = [...seen.values()]
    .sort((a, b) => a.level - b.level)
    .slice(0, MAX_LIST_LENGTH)
    .map(({ person, level }) => ({ editorRef: toPersonRef(person), roleLevel: level }));

  const first = editors[0];
  if (options?.requireLevelOneEditor && first && first.roleLevel !== 1) {
    first.roleLevel = 1;
  }

  return editors;
}

// =============================================================================
// § Reviews
// =============================================================================

export interface ReviewMappingContext {
  journalId: JournalId;
  submissionRef: SubmissionRef;
  salt: string;
  visibleId: string;
  withholdAnonymousContent: boolean;
}

export function mapReview(
  review: HostReview,
  consent: ConsentRecord | null,
  isAuthenticated: boolean,
  context: ReviewMappingContext
): ReviewPayload {
  const isAnonymous = requiresAnonymization(consent, isAuthenticated);
  const text = truncate(review.answers.join(" "), MAX_MULTI_LINE_LENGTH);

  return {
    visibleId: context.visibleId,
    reviewerRef: isAnonymous
      ? anonymousReviewerRef(context.salt, context.journalId, context.submissionRef, review.reviewer.id)
      : { kind: "identified", ...toPersonRef(review.reviewer) },
    content: isAnonymous && context.withholdAnonymousContent ? "" : text,
    isAnonymous,
    isHtml: true,
    invitedAt: review.requestedAt ?? null,
    agreedAt: review.acceptedAt ?? null,
    dueAt: review.dueAt ?? null,
    // A review declined after it was reported stays, but counts as not submitted
    submittedAt: review.declinedAt ? null : review.completedAt ?? null,
    suggestedDecision: mapRecommendation(review.recommendation),
  };
}

// =============================================================================
// § Decision Events
// =============================================================================

export interface ReviewWithConsent {
  review: HostReview;
  consent: ConsentRecord | null;
}

export interface DecisionEventInput {
  submission: HostSubmission;
  decision: HostDecision;
  editors: HostEditorAssignment[];
  reviews: ReviewWithConsent[];
}

export interface NormalizationContext {
  salt: string;
  createdAt: string;
  withholdAnonymousContent: boolean;
  requireLevelOneEditor?: boolean;
  frozenEditors?: EditorAssignment[];
  /** Reviewers already reported for this submission */
  sentReviewerIds?: readonly ReviewerId[];
  /** Called with the number of accepted reviews left out over the list limit */
  onReviewOverflow?: (dropped: number) => void;
}

/**
 * Reports the reviews the reviewer agreed to write and has not declined, plus
 * declined ones that an earlier report already carried, in the order they
 * were requested.
 *
 * @throws UnmappableDecisionError
 */
export function normalizeDecisionEvent(
  input: DecisionEventInput,
  context: NormalizationContext
): DecisionEvent {
  const { submission, decision } = input;
  const decisionKind = mapDecision(decision.kind);

  const sent = new Set(context.sentReviewerIds ?? []);
  const accepted = input.reviews
    .filter(({ review }) =>
      review.declinedAt === undefined
        ? review.acceptedAt !== undefined
        : sent.has(ReviewerId(review.reviewer.id))
    )
    .sort((a, b) => (a.review.requestedAt ?? "").localeCompare(b.review.requestedAt ?? ""));

  if (accepted.length > MAX_LIST_LENGTH) {
    context.onReviewOverflow?.(accepted.length - MAX_LIST_LENGTH);
  }

  const reported = accepted.slice(0, MAX_LIST_LENGTH);
  const reviews = reported.map(({ review, consent }, index) =>
    mapReview(review, consent, review.reviewerAuthenticated, {
      journalId: submission.journalId,
      submissionRef: submission.ref,
      salt: context.salt,
      visibleId: String(index + 1),
      withholdAnonymousContent: context.withholdAnonymousContent,
    })
  );

  return {
    journalId: submission.journalId,
    submissionRef: submission.ref,
    title: line(submission.title),
    submittedAt: submission.submittedAt ?? null,
    decisionKind,
    authors: submission.correspondingAuthor ? [toAuthorRef(submission.correspondingAuthor)] : [],
    editors: mapEditors(input.editors, decision, {
      frozen: context.frozenEditors,
      requireLevelOneEditor: context.requireLevelOneEditor,
    }),
    reviews,
    reviewerIds: reported.map(({ review }) => ReviewerId(review.reviewer.id)),
    createdAt: context.createdAt,
  };
}
