/**
 * Review grading bridge
 * Reports editorial decisions and peer reviews to a review grading service.
 */

// =============================================================================
// Bridge & Services
// =============================================================================

export { GradingBridge } from './core/grading-bridge.js';
export type {
  GradingBridgeOptions,
  ReviewSubmittedInput,
  ConsentAnsweredInput,
  EditorialDecisionInput,
  GradeButtonInput,
  GradingAvailability,
} from './core/grading-bridge.js';

export { ConsentService, requiresAnonymization, gradingYearOf } from './core/consent-service.js';
export { CredentialService } from './core/credential-service.js';
export { DeliveryManager, runWithConcurrency } from './core/delivery-manager.js';
export type { DecisionReportResult, DecisionReportStatus } from './core/delivery-manager.js';
export { GradingClient, classifyStatus } from './core/grading-client.js';
export type { GradingClientOptions, GradingTriggerRequest } from './core/grading-client.js';
export { DEFAULT_RETRY_POLICY, taskKeyFor } from './core/delivery-queue.js';
export type { RetryPolicy } from './core/delivery-queue.js';
export { KeyedLock } from './core/keyed-lock.js';
export { Pseudonymizer, anonymousReviewerRef } from './core/pseudonymizer.js';

// =============================================================================
// Normalization
// =============================================================================

export {
  mapDecision,
  mapEditors,
  mapRecommendation,
  mapReview,
  normalizeDecisionEvent,
} from './core/event-normalizer.js';

// =============================================================================
// Events, Alerts & Metrics
// =============================================================================

export { BridgeEventEmitter } from './core/bridge-event-emitter.js';
export type { BridgeEventListener } from './core/bridge-event-emitter.js';
export { createOperatorAlertListener } from './core/operator-alerts.js';
export { attachMetricsListeners, metricsRegistry } from './metrics.js';

// =============================================================================
// Errors
// =============================================================================

export {
  BridgeError,
  ConfigurationError,
  ConsentError,
  AlreadyAnsweredError,
  MappingError,
  UnmappableDecisionError,
  TransientDeliveryError,
  CredentialInvalidError,
  PermanentRejectError,
  QueueExhaustedError,
  TaskNotFoundError,
  TaskStateError,
} from './core/errors.js';

// =============================================================================
// Storage
// =============================================================================

export type { BridgeStorage } from './storage/storage-interface.js';
export { MemoryStorage } from './storage/memory-storage.js';
export { SqliteStorage } from './storage/sqlite-storage.js';

// =============================================================================
// HTTP & Configuration
// =============================================================================

export { createBridgeApp, createBridgeRuntime } from './app.js';
export { loadConfigFromEnv } from './config.js';
export type { BridgeConfig } from './config.js';
export { runDrain } from './drain.js';
export { createLogger, getLogger, setLogger } from './logging.js';

// =============================================================================
// Types
// =============================================================================

export * from './types/branded.js';
export type * from './types/grading-contract.js';
export type * from './types/host.js';
