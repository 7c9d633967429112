/**
 * Shared error classes for the grading bridge.
 *
 * Centralized here to avoid instanceof checks failing when
 * error classes are defined in multiple modules.
 */

import { timingSafeEqual } from "crypto";

export type BridgeErrorCode =
  | "configuration"
  | "consent"
  | "already_answered"
  | "mapping"
  | "unmappable_decision"
  | "transient_delivery"
  | "credential_invalid"
  | "permanent_reject"
  | "queue_exhausted"
  | "task_not_found"
  | "task_state";

export abstract class BridgeError extends Error {
  abstract readonly code: BridgeErrorCode;
}

/**
 * Missing or unvalidated journal credentials. Blocks every remote call for the journal.
 */
export class ConfigurationError extends BridgeError {
  readonly code = "configuration";

  constructor(message: string, public readonly journalId?: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class ConsentError extends BridgeError {
  readonly code: BridgeErrorCode = "consent";

  constructor(message: string) {
    super(message);
    this.name = "ConsentError";
  }
}

/**
 * The consent question is asked at most once per reviewer, journal and year.
 */
export class AlreadyAnsweredError extends ConsentError {
  override readonly code = "already_answered";

  constructor(
    public readonly reviewerId: string,
    public readonly journalId: string,
    public readonly gradingYear: number
  ) {
    super(
      `Reviewer '${reviewerId}' already answered the consent question for journal '${journalId}' in ${gradingYear}`
    );
    this.name = "AlreadyAnsweredError";
  }
}

export class MappingError extends BridgeError {
  readonly code: BridgeErrorCode = "mapping";

  constructor(message: string) {
    super(message);
    this.name = "MappingError";
  }
}

export class UnmappableDecisionError extends MappingError {
  override readonly code = "unmappable_decision";

  constructor(public readonly decisionKind: string) {
    super(`Decision kind '${decisionKind}' has no grading equivalent`);
    this.name = "UnmappableDecisionError";
  }
}

/**
 * Network error, timeout or 5xx. Decision reports failing this way are queued.
 */
export class TransientDeliveryError extends BridgeError {
  readonly code = "transient_delivery";

  constructor(message: string, public readonly statusCode?: number) {
    super(message);
    this.name = "TransientDeliveryError";
  }
}

export class CredentialInvalidError extends BridgeError {
  readonly code = "credential_invalid";

  constructor(
    public readonly journalId: string,
    public readonly statusCode: number,
    detail?: string
  ) {
    super(
      `Grading service rejected the credentials of journal '${journalId}' (HTTP ${statusCode})${detail ? `: ${detail}` : ""}`
    );
    this.name = "CredentialInvalidError";
  }
}

export class PermanentRejectError extends BridgeError {
  readonly code = "permanent_reject";

  constructor(
    public readonly statusCode: number,
    detail: string
  ) {
    super(`Grading service rejected the request (HTTP ${statusCode}): ${detail}`);
    this.name = "PermanentRejectError";
  }
}

/**
 * A queued decision report was given up. Its data never reached the grading service.
 */
export class QueueExhaustedError extends BridgeError {
  readonly code = "queue_exhausted";

  constructor(
    public readonly taskId: string,
    public readonly submissionRef: string,
    public readonly attempts: number,
    reason: string
  ) {
    super(
      `Delivery of submission '${submissionRef}' abandoned after ${attempts} attempt(s): ${reason}`
    );
    this.name = "QueueExhaustedError";
  }
}

export class TaskNotFoundError extends BridgeError {
  readonly code = "task_not_found";

  constructor(taskId: string) {
    super(`Delivery task not found: ${taskId}`);
    this.name = "TaskNotFoundError";
  }
}

export class TaskStateError extends BridgeError {
  readonly code = "task_state";

  constructor(
    public readonly taskId: string,
    detail: string
  ) {
    super(`Delivery task '${taskId}' cannot be changed: ${detail}`);
    this.name = "TaskStateError";
  }
}

/**
 * Constant-time string comparison for host bearer tokens.
 */
export function timingSafeTokenCompare(a: string, b: string): boolean {
  if (a.length !== b.length) return false;
  return timingSafeEqual(Buffer.from(a), Buffer.from(b));
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
