/**
 * CredentialService — per-journal API keys for the grading service.
 *
 * A key is usable only after the grading service confirmed it. Reports that
 * come back 401/403 flip it to unusable until an operator revalidates.
 */

import type { JournalId } from "../types/branded.js";
import type { CredentialCheckResult, JournalCredential } from "../types/grading-contract.js";
import type { CredentialStorage } from "../storage/storage-interface.js";
import type { GradingClient } from "./grading-client.js";
import type { BridgeEventEmitter } from "./bridge-event-emitter.js";
import { ConfigurationError } from "./errors.js";

export interface CredentialServiceOptions {
  eventEmitter?: BridgeEventEmitter;
  now?: () => Date;
}

export class CredentialService {
  private eventEmitter?: BridgeEventEmitter;
  private now: () => Date;

  constructor(
    private store: CredentialStorage,
    private client: GradingClient,
    options?: CredentialServiceOptions
  ) {
    this.eventEmitter = options?.eventEmitter;
    this.now = options?.now ?? (() => new Date());
  }

  /**
   * Check `apiKey` with the grading service and store it with the result.
   * A rejected key is still stored, marked unvalidated.
   *
   * @throws ConfigurationError for an empty key
   */
  async saveCredentials(
    journalId: JournalId,
    apiKey: string
  ): Promise<{ credential: JournalCredential; check: CredentialCheckResult }> {
    const trimmed = apiKey.trim();
    if (trimmed.length === 0) {
      throw new ConfigurationError("API key must not be empty", journalId);
    }

    const at = this.now().toISOString();
    const candidate: JournalCredential = { journalId, apiKey: trimmed, validated: false, updatedAt: at };
    const check = await this.client.validateCredentials(candidate);

    const credential: JournalCredential = check.ok
      ? { ...candidate, validated: true, validatedAt: at }
      : candidate;
    await this.store.save(credential);

    await this.eventEmitter?.emit({
      type: "credentials.saved",
      journalId,
      payload: { validated: credential.validated, ...(!check.ok && { reason: check.reason }) },
    });
    return { credential, check };
  }

  /**
   * Re-check the stored key and record the result. A retryable failure
   * (grading service unreachable) leaves the stored flag untouched.
   *
   * @throws ConfigurationError when the journal has no stored key
   */
  async validateCredentials(journalId: JournalId): Promise<CredentialCheckResult> {
    const credential = await this.store.get(journalId);
    if (!credential) {
      throw new ConfigurationError(`No grading credentials stored for journal '${journalId}'`, journalId);
    }

    const check = await this.client.validateCredentials(credential);
    if (check.ok) {
      await this.store.setValidation(journalId, true, this.now().toISOString());
    } else if (!check.retryable) {
      await this.markInvalid(journalId, check.reason);
    }
    return check;
  }

  async getCredentials(journalId: JournalId): Promise<JournalCredential | null> {
    return this.store.get(journalId);
  }

  /**
   * @throws ConfigurationError when credentials are missing or not validated
   */
  async requireUsable(journalId: JournalId): Promise<JournalCredential> {
    const credential = await this.store.get(journalId);
    if (!credential) {
      throw new ConfigurationError(`No grading credentials stored for journal '${journalId}'`, journalId);
    }
    if (!credential.validated) {
      throw new ConfigurationError(
        `Grading credentials of journal '${journalId}' are not validated`,
        journalId
      );
    }
    return credential;
  }

  async markInvalid(journalId: JournalId, reason: string): Promise<void> {
    const previous = await this.store.get(journalId);
    const updated = await this.store.setValidation(journalId, false, this.now().toISOString());
    if (updated && previous?.validated) {
      await this.eventEmitter?.emit({
        type: "credentials.invalidated",
        journalId,
        payload: { reason },
      });
    }
  }
}
