/**
 * Prometheus metrics for the grading bridge.
 *
 * Attaches a listener to BridgeEventEmitter so core services stay free of
 * instrumentation code.
 */
import client from 'prom-client';
import type { BridgeEventEmitter } from './core/bridge-event-emitter.js';
import type { BridgeEvent } from './types/grading-contract.js';

// Use a dedicated registry to avoid polluting the global one in tests
export const metricsRegistry = new client.Registry();

// Default Node.js metrics (event loop lag, heap, GC, etc.)
client.collectDefaultMetrics({ register: metricsRegistry });

export const decisionReportsTotal = new client.Counter({
  name: 'rqc_bridge_decision_reports_total',
  help: 'Decision report attempts by outcome',
  labelNames: ['outcome'] as const,
  registers: [metricsRegistry],
});

export const deliveryAttemptDurationSeconds = new client.Histogram({
  name: 'rqc_bridge_delivery_attempt_duration_seconds',
  help: 'Duration of calls to the grading service (seconds)',
  buckets: [0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10, 30],
  registers: [metricsRegistry],
});

export const deliveryTasksTotal = new client.Counter({
  name: 'rqc_bridge_delivery_tasks_total',
  help: 'Retry queue transitions',
  labelNames: ['transition'] as const,
  registers: [metricsRegistry],
});

export const consentAnswersTotal = new client.Counter({
  name: 'rqc_bridge_consent_answers_total',
  help: 'Reviewer consent answers by choice',
  labelNames: ['choice'] as const,
  registers: [metricsRegistry],
});

export const drainRunsTotal = new client.Counter({
  name: 'rqc_bridge_drain_runs_total',
  help: 'Completed retry queue sweeps',
  registers: [metricsRegistry],
});

function numberField(event: BridgeEvent, key: string): number | undefined {
  const value = event.payload?.[key];
  return typeof value === 'number' ? value : undefined;
}

/**
 * Wire metrics listeners to a BridgeEventEmitter.
 * Call once at app startup.
 */
export function attachMetricsListeners(emitter: BridgeEventEmitter): void {
  emitter.addListener(async (event: BridgeEvent) => {
    switch (event.type) {
      case 'delivery.attempted': {
        const outcome = event.payload?.['outcome'];
        decisionReportsTotal.inc({ outcome: typeof outcome === 'string' ? outcome : 'unknown' });
        const durationMs = numberField(event, 'durationMs');
        if (durationMs !== undefined) {
          deliveryAttemptDurationSeconds.observe(durationMs / 1000);
        }
        break;
      }

      case 'delivery.queued':
        deliveryTasksTotal.inc({ transition: 'queued' });
        break;

      case 'delivery.rescheduled':
        deliveryTasksTotal.inc({ transition: 'rescheduled' });
        break;

      case 'delivery.abandoned':
        deliveryTasksTotal.inc({ transition: 'abandoned' });
        break;

      case 'delivery.succeeded':
        if (event.taskId) {
          deliveryTasksTotal.inc({ transition: 'completed' });
        }
        break;

      case 'consent.answered':
        consentAnswersTotal.inc({ choice: event.payload?.['optedIn'] === true ? 'opt_in' : 'opt_out' });
        break;

      case 'drain.completed':
        drainRunsTotal.inc();
        break;
    }
  });
}

/**
 * Returns the Prometheus text format metrics string.
 */
export async function getMetricsText(): Promise<string> {
  return metricsRegistry.metrics();
}

/**
 * Returns the content type for Prometheus metrics.
 */
export function getMetricsContentType(): string {
  return metricsRegistry.contentType;
}
