// =====================================================
// Analytics Event Tracking
// =====================================================
// Logs domain events via structured logging with an analytics: true marker.
// Events are filterable in any JSON log aggregator.

import { baseLogger } from './logger';

const analyticsLogger = baseLogger.child({ analytics: true });

export interface AnalyticsEvent {
  name: string;
  subjectId?: string;
  properties?: Record<string, string | number | boolean | null>;
}

export function trackEvent(event: AnalyticsEvent): void {
  analyticsLogger.info(
    { eventName: event.name, subjectId: event.subjectId, ...event.properties },
    `[analytics] ${event.name}`
  );
}
