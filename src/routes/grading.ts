/**
 * Grading Routes
 *
 * - POST /submissions/:submissionRef/grade                — editor pressed the grade button
 * - POST /submissions/:submissionRef/grading-availability — should the button be shown
 */

import { Hono } from 'hono';
import type { GradingBridge } from '../core/grading-bridge.js';
import {
  gradeRequestSchema,
  gradingAvailabilitySchema,
  submissionRefSchema,
} from '../schemas/host-events.js';
import { parseJsonBody } from './shared/request-body.js';

export function createGradingRouter(bridge: GradingBridge): Hono {
  const router = new Hono();

  router.post('/submissions/:submissionRef/grade', async (c) => {
    const submissionRef = submissionRefSchema.parse(c.req.param('submissionRef'));
    const body = await parseJsonBody(c, gradeRequestSchema);

    const result = await bridge.onGradeButtonPressed({
      submission: { ref: submissionRef, journalId: body.journalId },
      interactiveUser: body.interactiveUser,
      returnUrl: body.returnUrl,
    });
    return c.json({ ok: true, redirectUrl: result.redirectUrl ?? null });
  });

  router.post('/submissions/:submissionRef/grading-availability', async (c) => {
    const body = await parseJsonBody(c, gradingAvailabilitySchema);
    const availability = await bridge.getGradingAvailability(body.journalId, body.reviews);
    return c.json({ ok: true, ...availability });
  });

  return router;
}
