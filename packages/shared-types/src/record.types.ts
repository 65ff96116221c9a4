// =====================================================
// Record Types
// =====================================================
// Subjects (memorial records) and recipients (contacts) are
// owned by record management. The reminder service keeps a
// projection of them plus its own scheduling columns.

import type { ChannelKind } from './ledger.types';
import type { LunisolarDate, LunisolarMonthDay, OccurrenceKind, SolarDateString } from './calendar.types';

export interface SubjectDto {
  id: string;
  displayName: string;
  deathDateSolar: SolarDateString;
  deathDateLunisolar: LunisolarDate;
  anniversaryDateLunisolar: LunisolarMonthDay;
  nextOccurrenceSolar: SolarDateString;
  nextOccurrenceKind: OccurrenceKind;
  scheduleStale: boolean;
  deletedAt: string | null;
}

export interface RecipientDto {
  id: string;
  subjectId: string;
  displayName: string;
  channelKind: ChannelKind;
  address: string;
  locale: 'en' | 'he';
  active: boolean;
  optedOut: boolean;
  deactivationReason: string | null;
}
