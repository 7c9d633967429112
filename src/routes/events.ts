/**
 * Host Event Routes
 *
 * Endpoints the manuscript system calls when its workflow moves on:
 * - POST /events/review-submitted — a reviewer finished a review
 * - POST /events/consent-answered — a reviewer answered the consent question
 * - POST /events/decision-made    — an editor recorded a decision
 */

import { Hono } from 'hono';
import type { GradingBridge } from '../core/grading-bridge.js';
import {
  consentAnsweredSchema,
  decisionMadeSchema,
  reviewSubmittedSchema,
} from '../schemas/host-events.js';
import { parseJsonBody } from './shared/request-body.js';

export function createEventRouter(bridge: GradingBridge): Hono {
  const router = new Hono();

  router.post('/events/review-submitted', async (c) => {
    const body = await parseJsonBody(c, reviewSubmittedSchema);
    const result = await bridge.onReviewSubmitted(body);
    return c.json({
      ok: true,
      promptRequired: result.promptRequired,
      anonymized: result.anonymized,
      gradingYear: result.record.gradingYear,
    });
  });

  router.post('/events/consent-answered', async (c) => {
    const body = await parseJsonBody(c, consentAnsweredSchema);
    const result = await bridge.onConsentAnswered(body);
    return c.json({ ok: true, applied: result.applied, consent: result.record });
  });

  /**
   * Always 202: the editor's decision stands whatever happens to the report.
   */
  router.post('/events/decision-made', async (c) => {
    const body = await parseJsonBody(c, decisionMadeSchema);
    const result = await bridge.onEditorialDecisionMade(body);
    return c.json({ ok: true, ...result }, 202);
  });

  return router;
}
