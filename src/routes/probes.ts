/**
 * Liveness + Readiness Probe Routes
 *
 * GET /health — process is up
 * GET /ready  — checks storage backend connectivity
 */

import { Hono } from 'hono';
import type { BridgeStorage } from '../storage/storage-interface.js';

export interface ProbeOptions {
  storage: BridgeStorage;
}

/**
 * Creates a Hono router with liveness and readiness probe endpoints.
 */
export function createProbeRouter(options: ProbeOptions): Hono {
  const { storage } = options;
  const router = new Hono();

  router.get('/health', (c) => c.json({ ok: true }, 200));

  /**
   * GET /ready — Readiness probe
   * Checks storage backend connectivity via healthCheck().
   */
  router.get('/ready', async (c) => {
    try {
      const result = await storage.healthCheck();
      if (result.ok) {
        return c.json({ ok: true, latencyMs: result.latencyMs }, 200);
      }
      return c.json({ ok: false, latencyMs: result.latencyMs }, 503);
    } catch {
      return c.json({ ok: false, latencyMs: 0 }, 503);
    }
  });

  return router;
}
