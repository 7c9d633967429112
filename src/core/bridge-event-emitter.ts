/**
 * Bridge event emitter — fans out lifecycle events to multiple listeners.
 */
import { randomUUID } from 'crypto';
import { EventId } from '../types/branded.js';
import type { BridgeEvent } from '../types/grading-contract.js';
import { getLogger } from '../logging.js';

export type BridgeEventListener = (event: BridgeEvent) => Promise<void>;

export type BridgeEventInput = Omit<BridgeEvent, 'eventId' | 'ts'>;

export class BridgeEventEmitter {
  private listeners: BridgeEventListener[] = [];

  addListener(listener: BridgeEventListener): void {
    this.listeners.push(listener);
  }

  async emit(input: BridgeEventInput): Promise<void> {
    const event: BridgeEvent = {
      eventId: EventId(`evt_${randomUUID()}`),
      ts: new Date().toISOString(),
      ...input,
    };
    // allSettled: one failing listener must not block the others
    const results = await Promise.allSettled(this.listeners.map((fn) => fn(event)));
    for (const result of results) {
      if (result.status === 'rejected') {
        getLogger().error(
          { err: result.reason, eventType: event.type, logger: 'bridge-events' },
          'Event listener failed'
        );
      }
    }
  }
}
