/**
 * Grading Bridge App Factory
 *
 * Creates the Hono application the host talks to, and the runtime
 * (storage, grading client, bridge) behind it.
 */

import { Hono } from 'hono';
import { secureHeaders } from 'hono/secure-headers';
import { bodyLimit } from 'hono/body-limit';
import type { Logger } from 'pino';
import type { BridgeConfig } from './config.js';
import { BridgeEventEmitter } from './core/bridge-event-emitter.js';
import { GradingBridge } from './core/grading-bridge.js';
import { GradingClient } from './core/grading-client.js';
import { DEFAULT_RETRY_POLICY } from './core/delivery-queue.js';
import { createOperatorAlertListener } from './core/operator-alerts.js';
import { createErrorHandler } from './middleware/error-handler.js';
import { createHostAuthMiddleware } from './middleware/auth.js';
import { requestIdMiddleware, type BridgeEnv } from './middleware/request-id.js';
import { requestLoggerMiddleware } from './middleware/request-logger.js';
import { createCredentialRouter } from './routes/credentials.js';
import { createEventRouter } from './routes/events.js';
import { createGradingRouter } from './routes/grading.js';
import { createProbeRouter } from './routes/probes.js';
import { createTaskRouter } from './routes/tasks.js';
import { attachMetricsListeners, getMetricsContentType, getMetricsText } from './metrics.js';
import { getLogger } from './logging.js';
import type { BridgeStorage } from './storage/storage-interface.js';
import { MemoryStorage } from './storage/memory-storage.js';
import { SqliteStorage } from './storage/sqlite-storage.js';

/** Decision payloads carry full review texts */
const MAX_BODY_BYTES = 10 * 1024 * 1024;

// =============================================================================
// § Runtime
// =============================================================================

export interface BridgeRuntime {
  bridge: GradingBridge;
  storage: BridgeStorage;
}

export interface BridgeRuntimeOptions {
  /** Overrides the storage chosen from `config.dbPath` */
  storage?: BridgeStorage;
  /** Custom fetch implementation (for testing) */
  fetchFn?: typeof fetch;
  logger?: Logger;
  now?: () => Date;
}

/**
 * Build storage, grading client and bridge from configuration, with
 * operator alerts and metrics listening on the bridge's events.
 */
export async function createBridgeRuntime(
  config: BridgeConfig,
  options?: BridgeRuntimeOptions
): Promise<BridgeRuntime> {
  const logger = options?.logger ?? getLogger();
  const storage =
    options?.storage ??
    (config.dbPath ? new SqliteStorage({ dbPath: config.dbPath }) : new MemoryStorage());
  await storage.initialize();

  const eventEmitter = new BridgeEventEmitter();
  eventEmitter.addListener(createOperatorAlertListener(logger));
  attachMetricsListeners(eventEmitter);

  const client = new GradingClient({
    baseUrl: config.apiBaseUrl,
    timeoutMs: config.requestTimeoutMs,
    fetchFn: options?.fetchFn,
  });

  const bridge = new GradingBridge({
    storage,
    client,
    eventEmitter,
    retryPolicy: { ...DEFAULT_RETRY_POLICY, ...config.retryPolicy },
    drainConcurrency: config.drainConcurrency,
    withholdAnonymousContent: config.withholdAnonymousContent,
    requireLevelOneEditor: config.requireLevelOneEditor,
    logger: logger.child({ logger: 'grading-bridge' }),
    now: options?.now,
  });

  return { bridge, storage };
}

// =============================================================================
// § HTTP App
// =============================================================================

export interface BridgeAppOptions {
  bridge: GradingBridge;
  storage: BridgeStorage;
  /** Bearer token required on host routes; open when absent */
  hostToken?: string;
  logger?: Logger;
}

export function createBridgeApp(options: BridgeAppOptions): Hono<BridgeEnv> {
  const { bridge, storage, hostToken } = options;
  const logger = options.logger ?? getLogger();
  const app = new Hono<BridgeEnv>();

  app.use('*', requestIdMiddleware());
  app.use('*', requestLoggerMiddleware(logger));
  app.use('*', secureHeaders());
  app.use('*', bodyLimit({ maxSize: MAX_BODY_BYTES }));
  app.onError(createErrorHandler({ logger }));

  // Probes and metrics stay open for orchestrators and scrapers
  app.route('/', createProbeRouter({ storage }));
  app.get('/metrics', async (c) => {
    const text = await getMetricsText();
    return c.text(text, 200, { 'Content-Type': getMetricsContentType() });
  });

  const hostAuth = createHostAuthMiddleware(hostToken);
  for (const path of ['/events/*', '/submissions/*', '/journals/*', '/tasks', '/tasks/*']) {
    app.use(path, hostAuth);
  }

  app.route('/', createEventRouter(bridge));
  app.route('/', createGradingRouter(bridge));
  app.route('/', createCredentialRouter(bridge));
  app.route('/', createTaskRouter(bridge));

  app.notFound((c) =>
    c.json({ ok: false, error: { type: 'not_found', message: `No route for ${c.req.method} ${c.req.path}` } }, 404)
  );

  return app;
}
