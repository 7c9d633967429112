/**
 * Request schemas for the host-facing HTTP API.
 *
 * Parsed output carries branded IDs so route handlers can hand it straight
 * to GradingBridge.
 */

import { z } from "zod";
import { JournalId, ReviewerId, SubmissionRef, TaskId } from "../types/branded.js";

const timestamp = z.string().datetime({ offset: true });

const nonEmpty = z.string().trim().min(1);

export const journalIdSchema = nonEmpty.max(255).transform(JournalId);
export const reviewerIdSchema = nonEmpty.max(255).transform(ReviewerId);
export const submissionRefSchema = nonEmpty.max(255).transform(SubmissionRef);
export const taskIdSchema = nonEmpty.max(255).transform(TaskId);

const gradingYearSchema = z.number().int().min(2000).max(2999);

// =============================================================================
// § Host Records
// =============================================================================

export const hostPersonSchema = z.object({
  id: nonEmpty,
  email: z.string().email(),
  firstName: z.string().optional(),
  lastName: z.string().optional(),
  orcid: z.string().optional(),
});

export const hostEditorAssignmentSchema = z.object({
  editor: hostPersonSchema,
  role: z.enum(["editor", "section_editor"]),
  assignedAt: timestamp.optional(),
});

export const hostDecisionSchema = z.object({
  kind: nonEmpty,
  decidedAt: timestamp,
  decidedBy: hostPersonSchema.optional(),
  attributedEditors: z.array(hostPersonSchema).optional(),
  drafts: z
    .array(
      z.object({
        sectionEditor: hostPersonSchema.optional(),
        editor: hostPersonSchema.optional(),
      })
    )
    .optional(),
});

export const hostSubmissionSchema = z.object({
  ref: submissionRefSchema,
  journalId: journalIdSchema,
  title: z.string(),
  submittedAt: timestamp.optional(),
  correspondingAuthor: hostPersonSchema.extend({ orderNumber: z.number().int().min(1) }).optional(),
});

export const hostReviewSchema = z.object({
  reviewer: hostPersonSchema,
  reviewerAuthenticated: z.boolean(),
  requestedAt: timestamp.optional(),
  acceptedAt: timestamp.optional(),
  declinedAt: timestamp.optional(),
  dueAt: timestamp.optional(),
  completedAt: timestamp.optional(),
  answers: z.array(z.string()).default([]),
  recommendation: z.string().optional(),
  gradingYear: gradingYearSchema.optional(),
});

// =============================================================================
// § Event Bodies
// =============================================================================

export const reviewSubmittedSchema = z.object({
  reviewerId: reviewerIdSchema,
  journalId: journalIdSchema,
  submissionRef: submissionRefSchema,
  /** Defaults to the UTC year of completedAt, else the current one */
  gradingYear: gradingYearSchema.optional(),
  completedAt: timestamp.optional(),
  isAuthenticated: z.boolean(),
});

export const consentAnsweredSchema = z.object({
  reviewerId: reviewerIdSchema,
  journalId: journalIdSchema,
  /** The year returned by review-submitted */
  gradingYear: gradingYearSchema,
  optedIn: z.boolean(),
});

export const decisionMadeSchema = z.object({
  submission: hostSubmissionSchema,
  decision: hostDecisionSchema,
  editors: z.array(hostEditorAssignmentSchema).default([]),
  reviews: z.array(hostReviewSchema).default([]),
});

export const gradeRequestSchema = z.object({
  journalId: journalIdSchema,
  interactiveUser: z.string().email().optional(),
  returnUrl: z.string().url().optional(),
});

export const gradingAvailabilitySchema = z.object({
  journalId: journalIdSchema,
  reviews: z.array(hostReviewSchema).default([]),
});

export const saveCredentialsSchema = z.object({
  apiKey: nonEmpty.max(255),
});

export const drainRequestSchema = z.object({
  now: timestamp.optional(),
});

export const taskListQuerySchema = z
  .object({
    state: z.enum(["pending", "in_flight", "abandoned"]).optional(),
    journalId: journalIdSchema.optional(),
    limit: z.coerce.number().int().min(1).max(500).optional(),
    offset: z.coerce.number().int().min(0).optional(),
  })
  .strict();
