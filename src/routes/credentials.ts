/**
 * Journal Credential Routes
 *
 * - PUT  /journals/:journalId/credentials          — store (and check) an API key
 * - POST /journals/:journalId/credentials/validate — re-check the stored key
 *
 * The API key is never echoed back.
 */

import { Hono } from 'hono';
import type { GradingBridge } from '../core/grading-bridge.js';
import { journalIdSchema, saveCredentialsSchema } from '../schemas/host-events.js';
import { parseJsonBody } from './shared/request-body.js';

export function createCredentialRouter(bridge: GradingBridge): Hono {
  const router = new Hono();

  router.put('/journals/:journalId/credentials', async (c) => {
    const journalId = journalIdSchema.parse(c.req.param('journalId'));
    const body = await parseJsonBody(c, saveCredentialsSchema);

    const { credential, check } = await bridge.credentials.saveCredentials(journalId, body.apiKey);
    return c.json({
      ok: true,
      journalId,
      validated: credential.validated,
      ...(!check.ok && { reason: check.reason, retryable: check.retryable }),
    });
  });

  router.post('/journals/:journalId/credentials/validate', async (c) => {
    const journalId = journalIdSchema.parse(c.req.param('journalId'));
    const check = await bridge.credentials.validateCredentials(journalId);
    return c.json({
      ok: true,
      journalId,
      validated: check.ok,
      ...(!check.ok && { reason: check.reason, retryable: check.retryable }),
    });
  });

  return router;
}
