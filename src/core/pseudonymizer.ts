/**
 * Pseudonymizer — opaque reviewer tokens for anonymized reviews.
 *
 * Tokens are HMAC-SHA256 over (journal, submission, reviewer) keyed with a
 * random per-journal salt: stable within one submission, unlinkable across
 * submissions and journals.
 */

import { createHmac, randomBytes } from "crypto";
import type { JournalId, SubmissionRef } from "../types/branded.js";
import type { AnonymousReviewerRef } from "../types/grading-contract.js";
import type { SaltStorage } from "../storage/storage-interface.js";

export const PSEUDO_EMAIL_DOMAIN = "example.edu";

const TOKEN_LENGTH = 32;

export function generateSalt(): string {
  return randomBytes(32).toString("hex");
}

/**
 * Derive the anonymous reference for one reviewer on one submission.
 */
export function anonymousReviewerRef(
  salt: string,
  journalId: JournalId,
  submissionRef: SubmissionRef,
  reviewerIdentity: string
): AnonymousReviewerRef {
  const token = createHmac("sha256", salt)
    .update(`${journalId}\u0000${submissionRef}\u0000${reviewerIdentity.toLowerCase()}`)
    .digest("hex")
    .slice(0, TOKEN_LENGTH);

  return {
    kind: "anonymous",
    token,
    pseudoEmail: `${token}@${PSEUDO_EMAIL_DOMAIN}`,
  };
}

export class Pseudonymizer {
  constructor(private salts: SaltStorage) {}

  async saltFor(journalId: JournalId): Promise<string> {
    return this.salts.getOrCreate(journalId, generateSalt);
  }
}
