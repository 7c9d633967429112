/**
 * Error Handler Middleware
 *
 * Catches errors thrown by route handlers and turns them into
 * `{ ok: false, error: { type, message } }` responses with a status code
 * derived from the error class.
 */

import type { Context } from 'hono';
import { HTTPException } from 'hono/http-exception';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import type { Logger } from 'pino';
import { ZodError } from 'zod';
import {
  AlreadyAnsweredError,
  BridgeError,
  ConfigurationError,
  CredentialInvalidError,
  MappingError,
  PermanentRejectError,
  TaskNotFoundError,
  TaskStateError,
  TransientDeliveryError,
} from '../core/errors.js';
import { getLogger } from '../logging.js';

export interface ErrorResponse {
  ok: false;
  error: {
    type: string;
    message: string;
    details?: unknown;
  };
}

function isContentfulStatus(status: number): status is ContentfulStatusCode {
  return status >= 200 && status <= 599 && status !== 204 && status !== 205 && status !== 304;
}

/**
 * Maps error types to HTTP status codes
 */
export function getStatusCodeForError(error: unknown): ContentfulStatusCode {
  if (error instanceof HTTPException) {
    return isContentfulStatus(error.status) ? error.status : 500;
  }
  if (error instanceof ZodError) return 400;
  if (error instanceof TaskNotFoundError) return 404;
  if (error instanceof ConfigurationError) return 409;
  if (error instanceof AlreadyAnsweredError) return 409;
  if (error instanceof TaskStateError) return 409;
  if (error instanceof CredentialInvalidError) return 403;
  if (error instanceof PermanentRejectError) return 422;
  if (error instanceof MappingError) return 422;
  if (error instanceof TransientDeliveryError) return 503;
  return 500;
}

function errorType(error: unknown, status: number): string {
  if (error instanceof BridgeError) return error.code;
  if (error instanceof ZodError) return 'invalid_request';
  if (status === 401) return 'unauthorized';
  if (status === 404) return 'not_found';
  return status >= 500 ? 'internal_error' : 'invalid_request';
}

export function formatError(error: unknown, status: number): ErrorResponse {
  if (error instanceof ZodError) {
    return {
      ok: false,
      error: {
        type: 'invalid_request',
        message: 'Request validation failed',
        details: error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
      },
    };
  }

  const known = error instanceof BridgeError || error instanceof HTTPException;
  const message = error instanceof Error ? error.message : 'Unknown error occurred';
  return {
    ok: false,
    error: {
      type: errorType(error, status),
      message: known || process.env.NODE_ENV !== 'production' ? message : 'An internal error occurred',
    },
  };
}

/**
 * Error handler factory.
 *
 * Usage:
 * ```typescript
 * const app = new Hono();
 * app.onError(createErrorHandler());
 * ```
 */
export function createErrorHandler(options?: {
  logger?: Logger;
}): (err: Error, c: Context) => Response | Promise<Response> {
  return (err: Error, c: Context): Response => {
    const statusCode = getStatusCodeForError(err);
    const logger = options?.logger ?? getLogger();

    if (statusCode >= 500) {
      logger.error({ err, path: c.req.path, logger: 'http' }, 'Request failed');
    } else {
      logger.debug({ err: err.message, status: statusCode, path: c.req.path, logger: 'http' }, 'Request rejected');
    }

    return c.json(formatError(err, statusCode), statusCode);
  };
}

/**
 * Throws an HTTPException with 400 status for invalid request body/params
 */
export function throwValidationError(message: string): never {
  throw new HTTPException(400, { message });
}
