// =====================================================
// Outbound Event Types
// =====================================================
// Emitted by the reminder service for audit and dashboard
// consumers. Payloads carry identities only, never addresses.

import type { ChannelKind } from './ledger.types';
import type { LunisolarMonthDay, SolarDateString } from './calendar.types';

export interface OccurrenceRolledOverEvent {
  subjectId: string;
  previousOccurrence: SolarDateString;
  nextOccurrence: SolarDateString;
  anniversary: LunisolarMonthDay;
  notifiedCycle: boolean;
}

export interface NotificationSentEvent {
  entryId: string;
  subjectId: string;
  recipientId: string;
  cycleYear: number;
  channelKind: ChannelKind;
  attemptCount: number;
  providerMessageId: string | null;
}

export interface NotificationFailedTerminalEvent {
  entryId: string;
  subjectId: string;
  recipientId: string;
  cycleYear: number;
  channelKind: ChannelKind;
  attemptCount: number;
  reason: string;
  permanent: boolean;
}

export interface RecipientDeactivatedEvent {
  recipientId: string;
  subjectId: string;
  channelKind: ChannelKind;
  reason: string;
}

export interface SubjectScheduleStaleEvent {
  subjectId: string;
  lastKnownOccurrence: SolarDateString | null;
  error: string;
}

export interface ReminderEventMap {
  occurrence_rolled_over: OccurrenceRolledOverEvent;
  notification_sent: NotificationSentEvent;
  notification_failed_terminal: NotificationFailedTerminalEvent;
  recipient_deactivated: RecipientDeactivatedEvent;
  subject_schedule_stale: SubjectScheduleStaleEvent;
}

export type ReminderEventName = keyof ReminderEventMap;
