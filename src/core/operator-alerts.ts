/**
 * Operator alerts — turns failure events into structured log lines
 * that operators and administrators watch.
 *
 * Decision-time failures are never shown to the editor who made the
 * decision; this listener is where they surface instead.
 */

import type { Logger } from 'pino';
import type { BridgeEvent, BridgeEventType } from '../types/grading-contract.js';
import type { BridgeEventListener } from './bridge-event-emitter.js';

type AlertSeverity = 'error' | 'warn';

const ALERTS: Partial<Record<BridgeEventType, { severity: AlertSeverity; message: string }>> = {
  'delivery.abandoned': {
    severity: 'error',
    message: 'Decision report abandoned; submission data was never sent to the grading service',
  },
  'delivery.rejected': {
    severity: 'error',
    message: 'Grading service permanently rejected a decision report',
  },
  'credentials.invalidated': {
    severity: 'error',
    message: 'Grading service rejected journal credentials; reports are blocked until they are revalidated',
  },
  'credentials.missing': {
    severity: 'warn',
    message: 'Decision not reported: journal has no validated grading credentials',
  },
  'mapping.failed': {
    severity: 'error',
    message: 'Decision could not be mapped to the grading taxonomy',
  },
  'consent.answer_ignored': {
    severity: 'warn',
    message: 'Ignored a repeated consent answer',
  },
};

export function createOperatorAlertListener(logger: Logger): BridgeEventListener {
  const log = logger.child({ logger: 'operator-alerts' });

  return async (event: BridgeEvent) => {
    const alert = ALERTS[event.type];
    if (!alert) return;

    const context = {
      alert: event.type,
      eventId: event.eventId,
      journalId: event.journalId,
      submissionRef: event.submissionRef,
      taskId: event.taskId,
      ...event.payload,
    };

    if (alert.severity === 'error') {
      log.error(context, alert.message);
    } else {
      log.warn(context, alert.message);
    }
  };
}
