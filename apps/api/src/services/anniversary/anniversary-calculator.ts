// =====================================================
// Anniversary Calculator
// =====================================================
// Fixes a subject's recurring lunisolar month/day at creation
// and finds the solar date of its next occurrence. Each
// occurrence carries its cycle: the lunisolar year it falls in,
// or the year of death for the one-off first observance.

import { OccurrenceKind } from '@yahrzeit-reminders/shared-types';
import type {
  LunisolarDate,
  LunisolarMonthDay,
  SolarDateString,
} from '@yahrzeit-reminders/shared-types';
import { AppError, DateComputationError, UnsupportedDateRangeError } from '../../utils/errors';
import { addDays } from '../calendar/solar-date';
import type { CalendarConverter } from '../calendar/calendar-converter';

/**
 * Extra lunisolar years tried after the one containing the
 * reference date. A month/day found only in leap years can be
 * absent for two years in a row, and the current year's
 * occurrence may already have passed.
 */
export const MAX_LUNISOLAR_YEAR_ROLLS = 3;

export interface AnniversaryOptions {
  /** Months from death to the first-year observance (0 = none, 11 = azkara) */
  offsetMonths: number;
}

export interface InitialAnniversary {
  deathDateLunisolar: LunisolarDate;
  anniversaryDateLunisolar: LunisolarMonthDay;
}

export interface Occurrence {
  solar: SolarDateString;
  cycleYear: number;
  kind: OccurrenceKind;
}

export interface SubjectSchedule extends InitialAnniversary {
  nextOccurrenceSolar: SolarDateString;
  nextOccurrenceCycle: number;
  nextOccurrenceKind: OccurrenceKind;
}

export class AnniversaryCalculator {
  constructor(
    private readonly converter: CalendarConverter,
    private readonly options: AnniversaryOptions
  ) {}

  /** The recurring anniversary is always the death date's month/day. */
  async initialAnniversary(deathDateSolar: SolarDateString): Promise<InitialAnniversary> {
    return withDateComputation(async () => {
      const deathDateLunisolar = await this.converter.toLunisolar(deathDateSolar);
      return {
        deathDateLunisolar,
        anniversaryDateLunisolar: { month: deathDateLunisolar.month, day: deathDateLunisolar.day },
      };
    });
  }

  /**
   * The one-off observance `offsetMonths` after death, with the day
   * clamped to the target month. Null when no offset is configured.
   */
  async firstObservance(deathDateLunisolar: LunisolarDate): Promise<Occurrence | null> {
    if (this.options.offsetMonths <= 0) return null;

    return withDateComputation(async () => {
      const shifted = await this.converter.addMonths(deathDateLunisolar, this.options.offsetMonths);
      return {
        solar: await this.converter.toSolar(shifted),
        cycleYear: deathDateLunisolar.year,
        kind: OccurrenceKind.FIRST_OBSERVANCE,
      };
    });
  }

  /**
   * Smallest solar date strictly after `afterSolar` that falls on
   * `anniversary`. Years lacking the month/day are skipped.
   */
  async nextOccurrence(
    anniversary: LunisolarMonthDay,
    afterSolar: SolarDateString
  ): Promise<SolarDateString> {
    const next = await this.nextCycle(anniversary, afterSolar);
    return next.solar;
  }

  /** `nextOccurrence` together with the lunisolar year it falls in. */
  async nextCycle(anniversary: LunisolarMonthDay, afterSolar: SolarDateString): Promise<Occurrence> {
    return withDateComputation(async () => {
      const { year } = await this.converter.toLunisolar(afterSolar);

      for (let roll = 0; roll <= MAX_LUNISOLAR_YEAR_ROLLS; roll++) {
        const candidate = await this.converter.tryToSolar(year + roll, anniversary);
        if (candidate !== null && candidate > afterSolar) {
          return { solar: candidate, cycleYear: year + roll, kind: OccurrenceKind.ANNIVERSARY };
        }
      }

      throw new DateComputationError(
        `No occurrence of ${anniversary.day} ${anniversary.month} within ${MAX_LUNISOLAR_YEAR_ROLLS + 1} years after ${afterSolar}`
      );
    });
  }

  /**
   * Everything record management needs for a new or corrected
   * death date. The next occurrence is on or after `today` and
   * never the death date itself; a first observance still ahead
   * comes before the first anniversary.
   */
  async scheduleFor(deathDateSolar: SolarDateString, today: SolarDateString): Promise<SubjectSchedule> {
    const initial = await this.initialAnniversary(deathDateSolar);
    const yesterday = addDays(today, -1);
    const after = yesterday > deathDateSolar ? yesterday : deathDateSolar;

    const anniversary = await this.nextCycle(initial.anniversaryDateLunisolar, after);
    const first = await this.firstObservance(initial.deathDateLunisolar);
    const next = first !== null && first.solar > after && first.solar < anniversary.solar ? first : anniversary;

    return {
      ...initial,
      nextOccurrenceSolar: next.solar,
      nextOccurrenceCycle: next.cycleYear,
      nextOccurrenceKind: next.kind,
    };
  }
}

// Range errors are final for the subject; anything else from the
// converter is treated as a transient table failure
async function withDateComputation<T>(operation: () => Promise<T>): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    if (error instanceof UnsupportedDateRangeError || error instanceof DateComputationError) {
      throw error;
    }
    if (error instanceof AppError && error.statusCode < 500) {
      throw error;
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new DateComputationError(`Date computation failed: ${message}`, error);
  }
}
