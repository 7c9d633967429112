/**
 * GradingClient — HTTP client for the review grading service.
 *
 * Every call carries an explicit timeout. Failures are classified rather
 * than thrown so callers decide whether to queue, alert or surface them:
 * - network error, timeout, 408, 429, 5xx → transient_failure
 * - 401, 403 → credential_invalid
 * - any other non-2xx → permanent_reject
 */

import { z } from "zod";
import type {
  CredentialCheckResult,
  DecisionEvent,
  DeliveryOutcome,
  GradingTriggerResult,
  JournalCredential,
} from "../types/grading-contract.js";
import type { SubmissionRef } from "../types/branded.js";
import { errorMessage } from "./errors.js";

// =============================================================================
// § Types
// =============================================================================

export interface GradingClientOptions {
  /** Base URL of the grading service API, without trailing slash */
  baseUrl: string;
  /** Per-request timeout (defaults to 20 s) */
  timeoutMs?: number;
  /** Custom fetch implementation (for testing) */
  fetchFn?: typeof fetch;
}

export interface GradingTriggerRequest {
  submissionRef: SubmissionRef;
  /** Email of the editor pressing the grade button */
  interactiveUser?: string;
  /** Page the grading service sends the editor back to */
  returnUrl?: string;
}

export const DEFAULT_TIMEOUT_MS = 20_000;

const okResponseSchema = z.object({ ok: z.boolean() }).passthrough();

const triggerResponseSchema = z
  .object({
    ok: z.boolean(),
    redirectUrl: z.string().url().optional(),
  })
  .passthrough();

const errorResponseSchema = z
  .object({
    error: z.union([z.string(), z.object({ message: z.string() }).passthrough()]),
  })
  .passthrough();

type RawResult =
  | { kind: "response"; status: number; body: unknown }
  | { kind: "network_error"; message: string };

// =============================================================================
// § Classification
// =============================================================================

export function isTransientStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

function describeBody(body: unknown): string {
  const parsed = errorResponseSchema.safeParse(body);
  if (parsed.success) {
    const { error } = parsed.data;
    return typeof error === "string" ? error : error.message;
  }
  return typeof body === "string" && body.length > 0 ? body.slice(0, 500) : "no details";
}

/**
 * Map an HTTP status to a delivery outcome.
 */
export function classifyStatus(status: number, body: unknown): DeliveryOutcome {
  if (status >= 200 && status < 300) {
    return { kind: "ok", statusCode: status };
  }
  const message = `HTTP ${status}: ${describeBody(body)}`;
  if (status === 401 || status === 403) {
    return { kind: "credential_invalid", statusCode: status, message };
  }
  if (isTransientStatus(status)) {
    return { kind: "transient_failure", statusCode: status, message };
  }
  return { kind: "permanent_reject", statusCode: status, message };
}

// =============================================================================
// § GradingClient
// =============================================================================

export class GradingClient {
  private baseUrl: string;
  private timeoutMs: number;
  private fetchFn: typeof fetch;

  constructor(options: GradingClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchFn = options.fetchFn ?? globalThis.fetch;
  }

  async validateCredentials(credential: JournalCredential): Promise<CredentialCheckResult> {
    const result = await this.post("/credentials/validate", {
      journalId: credential.journalId,
      apiKey: credential.apiKey,
    });

    if (result.kind === "network_error") {
      return { ok: false, reason: result.message, retryable: true };
    }

    const outcome = classifyStatus(result.status, result.body);
    if (outcome.kind !== "ok") {
      return { ok: false, reason: outcome.message, retryable: outcome.kind === "transient_failure" };
    }

    const parsed = okResponseSchema.safeParse(result.body);
    if (!parsed.success) {
      return { ok: false, reason: "Malformed response from grading service", retryable: true };
    }
    return parsed.data.ok
      ? { ok: true }
      : { ok: false, reason: describeBody(result.body), retryable: false };
  }

  /**
   * Interactive grading trigger. Never queued: the editor sees the outcome.
   */
  async triggerGrading(
    credential: JournalCredential,
    request: GradingTriggerRequest
  ): Promise<GradingTriggerResult> {
    const result = await this.post("/grading/trigger", {
      journalId: credential.journalId,
      apiKey: credential.apiKey,
      submissionRef: request.submissionRef,
      ...(request.interactiveUser !== undefined && { interactiveUser: request.interactiveUser }),
      ...(request.returnUrl !== undefined && { returnUrl: request.returnUrl }),
    });

    const outcome = this.toOutcome(result);
    if (outcome.kind !== "ok") {
      return { ok: false, outcome };
    }

    const parsed = triggerResponseSchema.safeParse(result.kind === "response" ? result.body : undefined);
    if (!parsed.success || !parsed.data.ok) {
      return {
        ok: false,
        outcome: { kind: "permanent_reject", statusCode: outcome.statusCode, message: "Grading service did not confirm the trigger" },
      };
    }
    return { ok: true, redirectUrl: parsed.data.redirectUrl };
  }

  async reportDecision(credential: JournalCredential, event: DecisionEvent): Promise<DeliveryOutcome> {
    const result = await this.post("/decision/report", {
      journalId: credential.journalId,
      apiKey: credential.apiKey,
      submissionRef: event.submissionRef,
      title: event.title,
      submittedAt: event.submittedAt,
      decisionKind: event.decisionKind,
      authors: event.authors,
      editors: event.editors,
      reviews: event.reviews,
    });

    const outcome = this.toOutcome(result);
    if (outcome.kind !== "ok") return outcome;

    const parsed = okResponseSchema.safeParse(result.kind === "response" ? result.body : undefined);
    if (!parsed.success) {
      return { kind: "transient_failure", statusCode: outcome.statusCode, message: "Malformed response from grading service" };
    }
    if (!parsed.data.ok) {
      return { kind: "permanent_reject", statusCode: outcome.statusCode, message: "Grading service refused the report" };
    }
    return outcome;
  }

  private toOutcome(result: RawResult): DeliveryOutcome {
    if (result.kind === "network_error") {
      return { kind: "transient_failure", message: result.message };
    }
    return classifyStatus(result.status, result.body);
  }

  private async post(path: string, body: Record<string, unknown>): Promise<RawResult> {
    let response: Response;
    try {
      response = await this.fetchFn(`${this.baseUrl}${path}`, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Accept: "application/json",
        },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      if (error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError")) {
        return { kind: "network_error", message: `Request timed out after ${this.timeoutMs}ms` };
      }
      return { kind: "network_error", message: `Network error: ${errorMessage(error)}` };
    }

    const text = await response.text().catch(() => "");
    let parsedBody: unknown = text;
    if (text.length > 0) {
      try {
        parsedBody = JSON.parse(text);
      } catch {
        // non-JSON body, kept as text for error messages
      }
    }
    return { kind: "response", status: response.status, body: parsedBody };
  }
}
