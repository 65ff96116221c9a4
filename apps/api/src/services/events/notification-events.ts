// =====================================================
// Notification Event Bus
// =====================================================
// Outbound domain events for record management (address
// corrections) and audit dashboards. Every event is also
// written to the analytics log stream.

import { EventEmitter } from 'node:events';
import type { ReminderEventMap, ReminderEventName } from '@yahrzeit-reminders/shared-types';
import { trackEvent } from '../../utils/analytics';
import { logger } from '../../utils/logger';

type Listener<K extends ReminderEventName> = (payload: ReminderEventMap[K]) => void;

export class NotificationEventBus {
  private readonly emitter = new EventEmitter();

  on<K extends ReminderEventName>(event: K, listener: Listener<K>): () => void {
    this.emitter.on(event, listener);
    return () => {
      this.emitter.off(event, listener);
    };
  }

  emit<K extends ReminderEventName>(event: K, payload: ReminderEventMap[K]): void {
    trackEvent({ name: event, properties: toProperties(payload) });

    try {
      this.emitter.emit(event, payload);
    } catch (error) {
      // A failing consumer must not undo a ledger transition that already happened
      logger.error('[NotificationEvents] Listener failed', { event, error });
    }
  }
}

function toProperties(payload: object): Record<string, string | number | boolean | null> {
  const properties: Record<string, string | number | boolean | null> = {};
  for (const [key, value] of Object.entries(payload)) {
    if (
      typeof value === 'string' ||
      typeof value === 'number' ||
      typeof value === 'boolean' ||
      value === null
    ) {
      properties[key] = value;
    } else if (value !== undefined) {
      properties[key] = JSON.stringify(value);
    }
  }
  return properties;
}
