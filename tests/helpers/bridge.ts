/**
 * A GradingBridge over memory storage, a fake grading service and a test clock.
 */

import { GradingBridge } from '../../src/core/grading-bridge.js';
import { GradingClient } from '../../src/core/grading-client.js';
import type { RetryPolicy } from '../../src/core/delivery-queue.js';
import { MemoryStorage } from '../../src/storage/memory-storage.js';
import { API_KEY, BASE_URL, FakeGradingService, JOURNAL, TestClock, recordEvents } from './fixtures.js';

export interface BridgeHarnessOptions {
  retryPolicy?: RetryPolicy;
  withholdAnonymousContent?: boolean;
  requireLevelOneEditor?: boolean;
  /** Store validated credentials for JOURNAL (default true) */
  withCredentials?: boolean;
}

export async function createBridgeHarness(options: BridgeHarnessOptions = {}) {
  const storage = new MemoryStorage();
  const service = new FakeGradingService();
  const clock = new TestClock(new Date('2025-06-02T08:00:00.000Z'));
  const recorder = recordEvents();
  const client = new GradingClient({ baseUrl: BASE_URL, fetchFn: service.fetchFn });

  const bridge = new GradingBridge({
    storage,
    client,
    eventEmitter: recorder.emitter,
    retryPolicy: options.retryPolicy,
    withholdAnonymousContent: options.withholdAnonymousContent,
    requireLevelOneEditor: options.requireLevelOneEditor,
    now: clock.now,
  });

  if (options.withCredentials ?? true) {
    await storage.credentials.save({
      journalId: JOURNAL,
      apiKey: API_KEY,
      validated: true,
      validatedAt: '2025-01-01T00:00:00.000Z',
      updatedAt: '2025-01-01T00:00:00.000Z',
    });
  }

  return { bridge, storage, service, clock, ...recorder };
}
