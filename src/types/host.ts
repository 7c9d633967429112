/**
 * Host workflow shapes - what the manuscript system hands us when it raises
 * "review submitted" and "decision made" events.
 */

import type { JournalId, SubmissionRef } from "./branded.js";

/**
 * Editorial decisions the host can record.
 */
export type HostDecisionKind =
  | "accept"
  | "conditional_accept"
  | "minor_revisions"
  | "major_revisions"
  | "reject";

export interface HostPerson {
  id: string;
  email: string;
  firstName?: string;
  lastName?: string;
  orcid?: string;
}

export interface HostEditorAssignment {
  editor: HostPerson;
  /** "editor" assignments are level 3, "section_editor" assignments level 1 */
  role: "editor" | "section_editor";
  assignedAt?: string;
}

/**
 * A decision draft prepared by a section editor for a (chief) editor.
 */
export interface HostDecisionDraft {
  sectionEditor?: HostPerson;
  editor?: HostPerson;
}

export interface HostDecision {
  kind: string;
  decidedAt: string;
  decidedBy?: HostPerson;
  /** Editors credited with the decision besides the one who recorded it */
  attributedEditors?: HostPerson[];
  drafts?: HostDecisionDraft[];
}

export interface HostAuthor extends HostPerson {
  /** 1-based position in the author list */
  orderNumber: number;
}

export interface HostSubmission {
  ref: SubmissionRef;
  journalId: JournalId;
  title: string;
  submittedAt?: string;
  /** The one author who corresponds with the journal; no other author is reported */
  correspondingAuthor?: HostAuthor;
}

export interface HostReview {
  reviewer: HostPerson;
  /** False when the reviewer worked through one-click (unauthenticated) access */
  reviewerAuthenticated: boolean;
  requestedAt?: string;
  acceptedAt?: string;
  declinedAt?: string;
  dueAt?: string;
  completedAt?: string;
  /** Free-text answers of the review form, HTML */
  answers: string[];
  recommendation?: string;
  /** Consent year; defaults to the UTC year in which the review was completed */
  gradingYear?: number;
}
