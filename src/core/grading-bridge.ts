/**
 * GradingBridge — entry point for the host's workflow events.
 *
 * Wires consent, credential and delivery services over one storage and one
 * grading client. The HTTP routes and the drain CLI only talk to this class.
 */

import type { Logger } from "pino";
import { ReviewerId } from "../types/branded.js";
import type { JournalId, SubmissionRef } from "../types/branded.js";
import type { ConsentRecord, DecisionEvent, DrainResult } from "../types/grading-contract.js";
import type {
  HostDecision,
  HostEditorAssignment,
  HostReview,
  HostSubmission,
} from "../types/host.js";
import type { BridgeStorage } from "../storage/storage-interface.js";
import { BridgeEventEmitter } from "./bridge-event-emitter.js";
import { ConsentService, gradingYearOf, requiresAnonymization } from "./consent-service.js";
import { CredentialService } from "./credential-service.js";
import {
  DeliveryManager,
  type DecisionReportResult,
} from "./delivery-manager.js";
import type { RetryPolicy } from "./delivery-queue.js";
import { normalizeDecisionEvent, type ReviewWithConsent } from "./event-normalizer.js";
import type { GradingClient } from "./grading-client.js";
import { Pseudonymizer } from "./pseudonymizer.js";
import {
  AlreadyAnsweredError,
  CredentialInvalidError,
  PermanentRejectError,
  TransientDeliveryError,
} from "./errors.js";
import { createChildLogger } from "../logging.js";

// =============================================================================
// § Types
// =============================================================================

export interface GradingBridgeOptions {
  storage: BridgeStorage;
  client: GradingClient;
  eventEmitter?: BridgeEventEmitter;
  retryPolicy?: RetryPolicy;
  drainConcurrency?: number;
  /** Drop the review text of anonymized reviewers (default true) */
  withholdAnonymousContent?: boolean;
  requireLevelOneEditor?: boolean;
  logger?: Logger;
  now?: () => Date;
}

export interface ReviewSubmittedInput {
  reviewerId: ReviewerId;
  journalId: JournalId;
  submissionRef: SubmissionRef;
  /** Defaults to the UTC year of `completedAt`, else the current UTC year */
  gradingYear?: number;
  completedAt?: string;
  isAuthenticated: boolean;
}

export interface ConsentAnsweredInput {
  reviewerId: ReviewerId;
  journalId: JournalId;
  /** The year `onReviewSubmitted` reported for the same review */
  gradingYear: number;
  optedIn: boolean;
}

export interface EditorialDecisionInput {
  submission: HostSubmission;
  decision: HostDecision;
  editors: HostEditorAssignment[];
  reviews: HostReview[];
}

export interface GradeButtonInput {
  submission: Pick<HostSubmission, "ref" | "journalId">;
  interactiveUser?: string;
  returnUrl?: string;
}

export interface GradingAvailability {
  available: boolean;
  hasOutstandingReviews: boolean;
}

// =============================================================================
// § GradingBridge
// =============================================================================

export class GradingBridge {
  readonly consents: ConsentService;
  readonly credentials: CredentialService;
  readonly delivery: DeliveryManager;
  readonly events: BridgeEventEmitter;

  private storage: BridgeStorage;
  private client: GradingClient;
  private pseudonymizer: Pseudonymizer;
  private withholdAnonymousContent: boolean;
  private requireLevelOneEditor: boolean;
  private logger: Logger;
  private now: () => Date;

  constructor(options: GradingBridgeOptions) {
    this.storage = options.storage;
    this.client = options.client;
    this.events = options.eventEmitter ?? new BridgeEventEmitter();
    this.withholdAnonymousContent = options.withholdAnonymousContent ?? true;
    this.requireLevelOneEditor = options.requireLevelOneEditor ?? false;
    this.logger = options.logger ?? createChildLogger({ logger: "grading-bridge" });
    this.now = options.now ?? (() => new Date());

    const shared = { eventEmitter: this.events, now: this.now };
    this.consents = new ConsentService(this.storage.consents, shared);
    this.credentials = new CredentialService(this.storage.credentials, this.client, shared);
    this.pseudonymizer = new Pseudonymizer(this.storage.salts);
    this.delivery = new DeliveryManager(this.storage, this.credentials, this.client, {
      ...shared,
      retryPolicy: options.retryPolicy,
      concurrency: options.drainConcurrency,
      logger: options.logger,
    });
  }

  /**
   * A reviewer finished a review. Makes sure the consent record exists and
   * tells the host whether to show the consent question.
   */
  async onReviewSubmitted(
    input: ReviewSubmittedInput
  ): Promise<{ promptRequired: boolean; anonymized: boolean; record: ConsentRecord }> {
    const { record, promptRequired } = await this.consents.getOrCreateConsent(
      input.reviewerId,
      input.journalId,
      input.gradingYear ?? this.completionYear(input.completedAt)
    );
    return {
      record,
      promptRequired,
      anonymized: requiresAnonymization(record, input.isAuthenticated),
    };
  }

  /**
   * Record the reviewer's answer. A repeated answer changes nothing.
   */
  async onConsentAnswered(
    input: ConsentAnsweredInput
  ): Promise<{ applied: boolean; record: ConsentRecord }> {
    const { gradingYear } = input;
    try {
      const record = await this.consents.recordAnswer(
        input.reviewerId,
        input.journalId,
        gradingYear,
        input.optedIn
      );
      return { applied: true, record };
    } catch (error) {
      if (!(error instanceof AlreadyAnsweredError)) throw error;

      await this.events.emit({
        type: "consent.answer_ignored",
        journalId: input.journalId,
        payload: { reviewerId: input.reviewerId, gradingYear, attempted: input.optedIn },
      });
      const record = await this.consents.getConsent(input.reviewerId, input.journalId, gradingYear);
      if (!record) throw error;
      return { applied: false, record };
    }
  }

  /**
   * An editor recorded a decision. Never throws: the editor's workflow
   * carries on whatever happens to the report.
   */
  async onEditorialDecisionMade(input: EditorialDecisionInput): Promise<DecisionReportResult> {
    const { submission } = input;
    return this.delivery.reportDecision(
      { journalId: submission.journalId, submissionRef: submission.ref },
      () => this.buildDecisionEvent(input)
    );
  }

  /**
   * Interactive grading trigger. Errors surface to the editor who pressed the button.
   *
   * @throws ConfigurationError when the journal has no validated credentials
   * @throws CredentialInvalidError when the grading service rejects the key
   * @throws PermanentRejectError when the grading service refuses the request
   * @throws TransientDeliveryError when the grading service is unreachable
   */
  async onGradeButtonPressed(input: GradeButtonInput): Promise<{ ok: true; redirectUrl?: string }> {
    const { journalId, ref } = input.submission;
    const credential = await this.credentials.requireUsable(journalId);

    const result = await this.client.triggerGrading(credential, {
      submissionRef: ref,
      interactiveUser: input.interactiveUser,
      returnUrl: input.returnUrl,
    });
    if (result.ok) {
      return { ok: true, redirectUrl: result.redirectUrl };
    }

    const { outcome } = result;
    switch (outcome.kind) {
      case "credential_invalid":
        await this.credentials.markInvalid(journalId, outcome.message);
        throw new CredentialInvalidError(journalId, outcome.statusCode, outcome.message);
      case "permanent_reject":
        throw new PermanentRejectError(outcome.statusCode, outcome.message);
      case "transient_failure":
        throw new TransientDeliveryError(outcome.message, outcome.statusCode);
    }
  }

  /**
   * The grade button is offered once credentials are validated and at least
   * one reviewer agreed to review. Reviews agreed to but not yet written
   * are flagged so the host can warn the editor.
   */
  async getGradingAvailability(journalId: JournalId, reviews: HostReview[]): Promise<GradingAvailability> {
    const credential = await this.credentials.getCredentials(journalId);
    const accepted = reviews.filter((review) => review.acceptedAt !== undefined);
    return {
      available: Boolean(credential?.validated) && accepted.length > 0,
      hasOutstandingReviews: accepted.some(
        (review) => review.completedAt === undefined && review.declinedAt === undefined
      ),
    };
  }

  async drainDueTasks(now: Date = this.now()): Promise<DrainResult> {
    return this.delivery.drainDueTasks(now);
  }

  /**
   * Consent is kept per completion year. A review not completed yet is being
   * completed now.
   */
  private completionYear(completedAt: string | undefined): number {
    return completedAt ? gradingYearOf(completedAt) : this.now().getUTCFullYear();
  }

  private async buildDecisionEvent(input: EditorialDecisionInput): Promise<DecisionEvent> {
    const { submission, decision } = input;
    const salt = await this.pseudonymizer.saltFor(submission.journalId);
    const delivered = await this.storage.deliveredSubmissions.get(submission.journalId, submission.ref);

    const reviews: ReviewWithConsent[] = await Promise.all(
      input.reviews.map(async (review) => {
        const gradingYear = review.gradingYear ?? this.completionYear(review.completedAt);
        const consent = await this.consents.getConsent(
          ReviewerId(review.reviewer.id),
          submission.journalId,
          gradingYear
        );
        return { review, consent };
      })
    );

    return normalizeDecisionEvent(
      { submission, decision, editors: input.editors, reviews },
      {
        salt,
        createdAt: this.now().toISOString(),
        withholdAnonymousContent: this.withholdAnonymousContent,
        requireLevelOneEditor: this.requireLevelOneEditor,
        frozenEditors: delivered?.editors,
        sentReviewerIds: delivered?.sentReviewerIds,
        onReviewOverflow: (dropped) =>
          this.logger.warn(
            { journalId: submission.journalId, submissionRef: submission.ref, dropped },
            "Too many reviews for one report; the latest requested were left out"
          ),
      }
    );
  }
}
