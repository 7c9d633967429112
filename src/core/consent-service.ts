/**
 * ConsentService — asks each reviewer once per journal and grading year
 * whether their reviews may be graded under their own name.
 */

import type { JournalId, ReviewerId } from "../types/branded.js";
import type { ConsentKey, ConsentRecord } from "../types/grading-contract.js";
import type { ConsentStorage } from "../storage/storage-interface.js";
import type { BridgeEventEmitter } from "./bridge-event-emitter.js";
import { AlreadyAnsweredError } from "./errors.js";

// =============================================================================
// § Anonymization Rule
// =============================================================================

/**
 * A review is anonymized unless the reviewer is logged in and opted in.
 * Reviewers who never answered count as not opted in.
 */
export function requiresAnonymization(
  consent: Pick<ConsentRecord, "optedIn"> | null | undefined,
  isAuthenticated: boolean
): boolean {
  return !isAuthenticated || !consent?.optedIn;
}

/**
 * UTC calendar year of an ISO timestamp.
 */
export function gradingYearOf(timestamp: string): number {
  const year = new Date(timestamp).getUTCFullYear();
  if (Number.isNaN(year)) {
    throw new RangeError(`Not a valid timestamp: '${timestamp}'`);
  }
  return year;
}

// =============================================================================
// § ConsentService
// =============================================================================

export interface ConsentServiceOptions {
  eventEmitter?: BridgeEventEmitter;
  /** Clock override for tests */
  now?: () => Date;
}

export class ConsentService {
  private eventEmitter?: BridgeEventEmitter;
  private now: () => Date;

  constructor(
    private store: ConsentStorage,
    options?: ConsentServiceOptions
  ) {
    this.eventEmitter = options?.eventEmitter;
    this.now = options?.now ?? (() => new Date());
  }

  /**
   * Make sure a consent record exists; `promptRequired` stays true until the
   * reviewer answers.
   */
  async getOrCreateConsent(
    reviewerId: ReviewerId,
    journalId: JournalId,
    gradingYear: number
  ): Promise<{ record: ConsentRecord; promptRequired: boolean }> {
    const { record, created } = await this.store.createIfAbsent({
      reviewerId,
      journalId,
      gradingYear,
      asked: false,
      optedIn: false,
      createdAt: this.now().toISOString(),
    });

    if (created) {
      await this.eventEmitter?.emit({
        type: "consent.created",
        journalId,
        payload: { reviewerId, gradingYear },
      });
    }

    return { record, promptRequired: !record.asked };
  }

  /**
   * @throws AlreadyAnsweredError when the reviewer already answered for this journal-year
   */
  async recordAnswer(
    reviewerId: ReviewerId,
    journalId: JournalId,
    gradingYear: number,
    optedIn: boolean
  ): Promise<ConsentRecord> {
    const key: ConsentKey = { reviewerId, journalId, gradingYear };
    const { record, applied } = await this.store.answerIfUnasked(
      key,
      optedIn,
      this.now().toISOString()
    );

    if (!applied) {
      throw new AlreadyAnsweredError(reviewerId, journalId, gradingYear);
    }

    await this.eventEmitter?.emit({
      type: "consent.answered",
      journalId,
      payload: { reviewerId, gradingYear, optedIn },
    });
    return record;
  }

  async getConsent(
    reviewerId: ReviewerId,
    journalId: JournalId,
    gradingYear: number
  ): Promise<ConsentRecord | null> {
    return this.store.get({ reviewerId, journalId, gradingYear });
  }

  async isAnonymizationRequired(
    reviewerId: ReviewerId,
    journalId: JournalId,
    gradingYear: number,
    isAuthenticated: boolean
  ): Promise<boolean> {
    if (!isAuthenticated) return true;
    const consent = await this.getConsent(reviewerId, journalId, gradingYear);
    return requiresAnonymization(consent, isAuthenticated);
  }
}
