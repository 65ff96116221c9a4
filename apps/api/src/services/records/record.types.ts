// =====================================================
// Record projections
// =====================================================

import { ChannelKind, OccurrenceKind } from '@yahrzeit-reminders/shared-types';
import type {
  LunisolarDate,
  LunisolarMonthDay,
  SolarDateString,
} from '@yahrzeit-reminders/shared-types';

export type RecipientLocale = 'en' | 'he';

export interface Subject {
  id: string;
  displayName: string;
  deathDateSolar: SolarDateString;
  deathDateLunisolar: LunisolarDate;
  anniversaryDateLunisolar: LunisolarMonthDay;
  nextOccurrenceSolar: SolarDateString;
  /** Ledger cycle of the next occurrence */
  nextOccurrenceCycle: number;
  nextOccurrenceKind: OccurrenceKind;
  scheduleStale: boolean;
  lastScheduleError: string | null;
  deletedAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface Recipient {
  id: string;
  subjectId: string;
  displayName: string;
  channelKind: ChannelKind;
  address: string;
  locale: RecipientLocale;
  active: boolean;
  optedOut: boolean;
  deactivationReason: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface SubjectScheduleFields {
  deathDateSolar: SolarDateString;
  deathDateLunisolar: LunisolarDate;
  anniversaryDateLunisolar: LunisolarMonthDay;
  nextOccurrenceSolar: SolarDateString;
  nextOccurrenceCycle: number;
  nextOccurrenceKind: OccurrenceKind;
}

export interface RecipientInput {
  id: string;
  subjectId: string;
  displayName: string;
  channelKind: ChannelKind;
  address: string;
  locale: RecipientLocale;
  active: boolean;
  optedOut: boolean;
}

export function isEligibleRecipient(recipient: Recipient): boolean {
  return recipient.active && !recipient.optedOut;
}

export function parseChannelKind(value: string): ChannelKind {
  const kind = Object.values(ChannelKind).find((candidate) => candidate === value);
  if (kind === undefined) throw new Error(`Unknown channel kind "${value}"`);
  return kind;
}

export function parseOccurrenceKind(value: string): OccurrenceKind {
  const kind = Object.values(OccurrenceKind).find((candidate) => candidate === value);
  if (kind === undefined) throw new Error(`Unknown occurrence kind "${value}"`);
  return kind;
}
