/**
 * Bridge Configuration Loader
 *
 * Reads environment variables (with Docker secrets `_FILE` support)
 * and validates them into a `BridgeConfig`.
 */

import { z } from 'zod';
import { resolveSecret } from './secrets.js';
import { ConfigurationError } from './core/errors.js';

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  RQC_BRIDGE_API_URL: z.string().url(),
  RQC_BRIDGE_TIMEOUT_MS: z.coerce.number().int().min(1000).max(120_000).default(20_000),
  RQC_BRIDGE_RETRY_INTERVAL_HOURS: z.coerce.number().positive().default(24),
  RQC_BRIDGE_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(30).default(7),
  RQC_BRIDGE_MAX_TASK_AGE_DAYS: z.coerce.number().positive().default(14),
  RQC_BRIDGE_DRAIN_CONCURRENCY: z.coerce.number().int().min(1).max(64).default(4),
  RQC_BRIDGE_DB_PATH: z.string().min(1).optional(),
  RQC_BRIDGE_WITHHOLD_ANONYMOUS_CONTENT: booleanFlag.default('true'),
  RQC_BRIDGE_REQUIRE_LEVEL_ONE_EDITOR: booleanFlag.default('false'),
  PORT: z.coerce.number().int().min(1).max(65_535).default(3000),
});

export interface BridgeConfig {
  apiBaseUrl: string;
  requestTimeoutMs: number;
  retryPolicy: {
    retryIntervalMs: number;
    maxAttempts: number;
    maxAgeMs: number;
  };
  drainConcurrency: number;
  /** SQLite database file; memory storage when absent */
  dbPath?: string;
  /** Bearer token the host must present; routes are open when absent */
  hostToken?: string;
  withholdAnonymousContent: boolean;
  requireLevelOneEditor: boolean;
  port: number;
}

/**
 * Load bridge configuration from environment variables.
 *
 * Env vars:
 * - `RQC_BRIDGE_API_URL` — base URL of the grading service API (required)
 * - `RQC_BRIDGE_TIMEOUT_MS` — per-request timeout (default: 20000)
 * - `RQC_BRIDGE_RETRY_INTERVAL_HOURS` — delay between queued attempts (default: 24)
 * - `RQC_BRIDGE_MAX_ATTEMPTS` — attempts before a queued report is abandoned (default: 7)
 * - `RQC_BRIDGE_MAX_TASK_AGE_DAYS` — age after which a queued report is abandoned (default: 14)
 * - `RQC_BRIDGE_DRAIN_CONCURRENCY` — submissions processed in parallel per sweep (default: 4)
 * - `RQC_BRIDGE_DB_PATH` — SQLite file (default: in-memory storage)
 * - `RQC_BRIDGE_HOST_TOKEN` — bearer token for host calls (supports `_FILE`)
 * - `RQC_BRIDGE_WITHHOLD_ANONYMOUS_CONTENT` — drop review text of anonymized reviewers (default: true)
 * - `RQC_BRIDGE_REQUIRE_LEVEL_ONE_EDITOR` — force one level-1 editor per report (default: false)
 * - `PORT` — HTTP port (default: 3000)
 *
 * @throws ConfigurationError if a variable is missing or malformed
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): BridgeConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid bridge configuration: ${details}`);
  }

  const vars = parsed.data;
  const hostToken = resolveSecret('RQC_BRIDGE_HOST_TOKEN', env);

  return {
    apiBaseUrl: vars.RQC_BRIDGE_API_URL.replace(/\/+$/, ''),
    requestTimeoutMs: vars.RQC_BRIDGE_TIMEOUT_MS,
    retryPolicy: {
      retryIntervalMs: vars.RQC_BRIDGE_RETRY_INTERVAL_HOURS * HOUR_MS,
      maxAttempts: vars.RQC_BRIDGE_MAX_ATTEMPTS,
      maxAgeMs: vars.RQC_BRIDGE_MAX_TASK_AGE_DAYS * DAY_MS,
    },
    drainConcurrency: vars.RQC_BRIDGE_DRAIN_CONCURRENCY,
    dbPath: vars.RQC_BRIDGE_DB_PATH,
    hostToken: hostToken ? hostToken : undefined,
    withholdAnonymousContent: vars.RQC_BRIDGE_WITHHOLD_ANONYMOUS_CONTENT,
    requireLevelOneEditor: vars.RQC_BRIDGE_REQUIRE_LEVEL_ONE_EDITOR,
    port: vars.PORT,
  };
}
