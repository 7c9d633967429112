/**
 * Branded Types for Domain IDs
 *
 * Nominal string types so that journal, reviewer, submission and task
 * identifiers cannot be swapped by accident. At runtime they are plain strings.
 */

// =============================================================================
// § Brand Symbols (unique per type)
// =============================================================================

export declare const JournalIdBrand: unique symbol;
export declare const ReviewerIdBrand: unique symbol;
export declare const SubmissionRefBrand: unique symbol;
export declare const TaskIdBrand: unique symbol;
export declare const EventIdBrand: unique symbol;

// =============================================================================
// § Branded Types
// =============================================================================

export type JournalId = string & { readonly __brand: typeof JournalIdBrand };
export type ReviewerId = string & { readonly __brand: typeof ReviewerIdBrand };
export type SubmissionRef = string & { readonly __brand: typeof SubmissionRefBrand };
export type TaskId = string & { readonly __brand: typeof TaskIdBrand };
export type EventId = string & { readonly __brand: typeof EventIdBrand };

// =============================================================================
// § Constructor Functions
// =============================================================================

export function JournalId(value: string): JournalId {
  return value as JournalId;
}

export function ReviewerId(value: string): ReviewerId {
  return value as ReviewerId;
}

export function SubmissionRef(value: string): SubmissionRef {
  return value as SubmissionRef;
}

export function TaskId(value: string): TaskId {
  return value as TaskId;
}

export function EventId(value: string): EventId {
  return value as EventId;
}
