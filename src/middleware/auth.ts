/**
 * Host Token Auth Middleware
 *
 * Guards host-facing routes behind a shared bearer token:
 *   Authorization: Bearer <token>
 *
 * When no token is configured, all requests pass through (dev mode).
 */

import type { MiddlewareHandler } from 'hono';
import { timingSafeTokenCompare } from '../core/errors.js';

export function createHostAuthMiddleware(hostToken: string | undefined): MiddlewareHandler {
  return async (c, next) => {
    if (!hostToken) return next();

    const authHeader = c.req.header('Authorization');
    const bearerToken = authHeader?.startsWith('Bearer ') ? authHeader.slice(7) : null;

    if (!bearerToken || !timingSafeTokenCompare(bearerToken, hostToken)) {
      return c.json(
        {
          ok: false,
          error: {
            type: 'unauthorized',
            message: 'Valid host token required',
          },
        },
        401
      );
    }
    return next();
  };
}
