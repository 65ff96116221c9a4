// =====================================================
// Notification Scheduler Test Suite
// =====================================================
// Runs the anniversary sweep against an in-memory database.
//
// Reference subject: died 2023-01-15 (22 Tevet 5783), created
// on 2026-10-18, so its next occurrence is 2027-01-01
// (22 Tevet 5787, cycle 5787) and the one after that 2028-01-21.
// Lead time is 14 days, look-ahead 1 day, grace 3 days, send
// hour 08:00 UTC.

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ChannelKind, LedgerStatus, LunisolarMonth, OccurrenceKind } from '@yahrzeit-reminders/shared-types';
import type { LunisolarYearTable } from '@yahrzeit-reminders/shared-types';
import { createTestHarness } from '../../../../test/helpers/container.helper';
import type { TestHarness } from '../../../../test/helpers/container.helper';
import { createTestRecipient, createTestSubject } from '../../../../test/fixtures/records.fixture';
import { ComputedYearTableSource } from '../../calendar/computed-year-table.source';
import type { YearTableSource } from '../../calendar/year-table.source';
import { SWEEP_LOCK_KEY } from '../notification-scheduler.service';

class FlakyYearTableSource implements YearTableSource {
  readonly name = 'flaky';
  failing = false;
  private readonly computed = new ComputedYearTableSource();

  async getYearTable(year: number): Promise<LunisolarYearTable> {
    if (this.failing) throw new Error('calendar tables unavailable');
    return this.computed.getYearTable(year);
  }
}

async function seedSubjectWithRecipients(harness: TestHarness): Promise<void> {
  const { container } = harness;
  await createTestSubject(container);
  createTestRecipient(container);
  createTestRecipient(container, {
    id: 'recipient-2',
    displayName: 'Family group',
    channelKind: ChannelKind.GROUP_MESSAGE,
    address: 'group-123',
  });
  createTestRecipient(container, { id: 'recipient-3', address: 'ruth@example.com', optedOut: true });
}

describe('NotificationSchedulerService.runSweep', () => {
  let harness: TestHarness;

  beforeEach(async () => {
    harness = createTestHarness({ now: '2026-10-18T09:00:00.000Z' });
    await seedSubjectWithRecipients(harness);
  });

  // ===========================================
  // Lead window
  // ===========================================

  describe('lead window', () => {
    it('creates one pending entry per eligible recipient 15 days before the occurrence', async () => {
      const { container, clock } = harness;
      clock.set('2026-12-17T09:00:00.000Z');

      const result = await container.scheduler.runSweep();

      expect(result).toMatchObject({
        acquired: true,
        success: true,
        today: '2026-12-17',
        subjectsScanned: 1,
        entriesCreated: 2,
        rolledOver: 0,
        failed: 0,
      });

      const entries = container.ledger.listBySubject('subject-1');
      expect(entries.map((entry) => entry.recipientId).sort()).toEqual(['recipient-1', 'recipient-2']);
      for (const entry of entries) {
        expect(entry.status).toBe(LedgerStatus.PENDING);
        expect(entry.cycleYear).toBe(5787);
        expect(entry.scheduledFor.toISOString()).toBe('2026-12-18T08:00:00.000Z');
        expect(entry.attemptCount).toBe(0);
      }
      expect(container.subjects.getById('subject-1').nextOccurrenceSolar).toBe('2027-01-01');
    });

    it('captures the recipient channel and rendered payload on the entry', async () => {
      const { container, clock } = harness;
      clock.set('2026-12-17T09:00:00.000Z');

      await container.scheduler.runSweep();

      const group = container.ledger.listBySubject('subject-1').find((entry) => entry.recipientId === 'recipient-2');
      expect(group?.channelKind).toBe(ChannelKind.GROUP_MESSAGE);
      expect(group?.payload.subject).toBe('Yahrzeit reminder: Miriam Levi');
      expect(group?.payload.variables.occurrenceDate).toBe('2027-01-01');
    });

    it('does nothing before the window opens', async () => {
      const { container, clock } = harness;
      clock.set('2026-12-16T09:00:00.000Z');

      const result = await container.scheduler.runSweep();

      expect(result.subjectsScanned).toBe(0);
      expect(container.ledger.listBySubject('subject-1')).toHaveLength(0);
    });

    it('creates due entries when the send time has already passed', async () => {
      const { container, clock } = harness;
      clock.set('2026-12-20T09:00:00.000Z');

      await container.scheduler.runSweep();

      const statuses = container.ledger.listBySubject('subject-1').map((entry) => entry.status);
      expect(statuses).toEqual([LedgerStatus.DUE, LedgerStatus.DUE]);
    });

    it('skips a soft-deleted subject', async () => {
      const { container, clock } = harness;
      container.hooks.onSubjectDeleted('subject-1');
      clock.set('2026-12-17T09:00:00.000Z');

      const result = await container.scheduler.runSweep();

      expect(result.subjectsScanned).toBe(0);
      expect(container.ledger.listBySubject('subject-1')).toHaveLength(0);
    });
  });

  // ===========================================
  // Idempotency
  // ===========================================

  it('produces one entry per (subject, recipient, cycle) across repeated sweeps', async () => {
    const { container, clock } = harness;
    clock.set('2026-12-17T09:00:00.000Z');

    const first = await container.scheduler.runSweep();
    clock.advance(60_000);
    const second = await container.scheduler.runSweep();
    clock.set('2026-12-25T09:00:00.000Z');
    const third = await container.scheduler.runSweep();

    expect(first.entriesCreated).toBe(2);
    expect(second.entriesCreated).toBe(0);
    expect(third.entriesCreated).toBe(0);
    expect(container.ledger.listBySubject('subject-1')).toHaveLength(2);
  });

  // ===========================================
  // Rollover
  // ===========================================

  describe('rollover', () => {
    it('advances an elapsed occurrence without duplicating the notified cycle', async () => {
      const { container, clock } = harness;
      const rolledOver = vi.fn();
      container.events.on('occurrence_rolled_over', rolledOver);

      clock.set('2026-12-17T09:00:00.000Z');
      await container.scheduler.runSweep();

      clock.set('2027-01-02T09:00:00.000Z');
      const result = await container.scheduler.runSweep();

      expect(result.rolledOver).toBe(1);
      expect(result.entriesCreated).toBe(0);
      expect(container.subjects.getById('subject-1').nextOccurrenceSolar).toBe('2028-01-21');
      expect(container.ledger.listBySubject('subject-1')).toHaveLength(2);
      expect(rolledOver).toHaveBeenCalledWith({
        subjectId: 'subject-1',
        previousOccurrence: '2027-01-01',
        nextOccurrence: '2028-01-21',
        anniversary: { month: LunisolarMonth.TEVET, day: 22 },
        notifiedCycle: true,
      });
    });

    it('notifies a missed cycle inside the grace period and rolls forward in the same sweep', async () => {
      const { container, clock } = harness;
      clock.set('2027-01-02T09:00:00.000Z');

      const result = await container.scheduler.runSweep();

      expect(result.entriesCreated).toBe(2);
      expect(result.rolledOver).toBe(1);
      const entries = container.ledger.listBySubject('subject-1');
      expect(entries.map((entry) => [entry.cycleYear, entry.status])).toEqual([
        [5787, LedgerStatus.DUE],
        [5787, LedgerStatus.DUE],
      ]);
      expect(container.subjects.getById('subject-1').nextOccurrenceSolar).toBe('2028-01-21');
    });

    it('rolls forward without notifying once the grace period has passed', async () => {
      const { container, clock } = harness;
      clock.set('2027-01-06T09:00:00.000Z');

      const result = await container.scheduler.runSweep();

      expect(result.entriesCreated).toBe(0);
      expect(result.rolledOver).toBe(1);
      expect(container.subjects.getById('subject-1').nextOccurrenceSolar).toBe('2028-01-21');
    });

    it('resolves a leap-month anniversary to the next leap year', async () => {
      const { container, clock } = harness;
      // 10 Adar II 5784
      await createTestSubject(container, { id: 'subject-leap', deathDateSolar: '2024-03-20' });
      expect(container.subjects.getById('subject-leap').nextOccurrenceSolar).toBe('2027-03-19');

      clock.set('2027-03-20T09:00:00.000Z');
      await container.scheduler.runSweep();

      const subject = container.subjects.getById('subject-leap');
      expect(subject.anniversaryDateLunisolar).toEqual({ month: LunisolarMonth.ADAR_II, day: 10 });
      // 5788 and 5789 have no Adar II
      expect(subject.nextOccurrenceSolar).toBe('2030-03-15');
    });
  });

  // ===========================================
  // Multi-year schedule
  // ===========================================

  describe('daily sweeps across several years', () => {
    const DAY_MS = 24 * 60 * 60 * 1000;

    const SLOW_TEST_TIMEOUT_MS = 30_000;

    async function sweepDailyUntil(target: TestHarness, from: string, until: string): Promise<void> {
      const { container, clock } = target;
      clock.set(from);
      while (clock.now().getTime() <= new Date(until).getTime()) {
        await container.scheduler.runSweep();
        clock.advance(DAY_MS);
      }
    }

    it('notifies both occurrences that fall in the same solar year', async () => {
      await sweepDailyUntil(harness, '2026-12-01T09:00:00.000Z', '2030-01-05T09:00:00.000Z');

      const entries = harness.container.ledger
        .listBySubject('subject-1')
        .filter((entry) => entry.recipientId === 'recipient-1');
      // 2029 holds both 22 Tevet 5789 and 22 Tevet 5790
      expect(entries.map((entry) => [entry.cycleYear, entry.payload.variables.occurrenceDate])).toEqual([
        [5790, '2029-12-28'],
        [5789, '2029-01-09'],
        [5788, '2028-01-21'],
        [5787, '2027-01-01'],
      ]);
      expect(harness.container.ledger.listBySubject('subject-1')).toHaveLength(8);
      expect(harness.container.subjects.getById('subject-1').nextOccurrenceSolar).toBe('2031-01-17');
    }, SLOW_TEST_TIMEOUT_MS);

    it('sends a one-off first observance before the yearly anniversaries', async () => {
      const firstObservance = createTestHarness({
        now: '2023-06-01T09:00:00.000Z',
        config: { anniversary: { offsetMonths: 11 } },
      });
      const { container } = firstObservance;
      const subject = await createTestSubject(container);
      createTestRecipient(container);
      // 22 Kislev 5784, eleven months after 22 Tevet 5783
      expect(subject.nextOccurrenceSolar).toBe('2023-12-05');
      expect(subject.nextOccurrenceKind).toBe(OccurrenceKind.FIRST_OBSERVANCE);

      await sweepDailyUntil(firstObservance, '2023-11-01T09:00:00.000Z', '2025-02-01T09:00:00.000Z');

      const entries = container.ledger.listBySubject('subject-1');
      expect(
        entries.map((entry) => [entry.cycleYear, entry.payload.templateId, entry.payload.variables.occurrenceDate])
      ).toEqual([
        [5785, 'yahrzeit.reminder', '2025-01-22'],
        [5784, 'yahrzeit.reminder', '2024-01-03'],
        [5783, 'yahrzeit.first-observance', '2023-12-05'],
      ]);
      expect(container.subjects.getById('subject-1')).toMatchObject({
        anniversaryDateLunisolar: { month: LunisolarMonth.TEVET, day: 22 },
        nextOccurrenceSolar: '2026-01-11',
        nextOccurrenceKind: OccurrenceKind.ANNIVERSARY,
      });
    }, SLOW_TEST_TIMEOUT_MS);
  });

  // ===========================================
  // Failure isolation
  // ===========================================

  describe('failure isolation', () => {
    let source: FlakyYearTableSource;

    beforeEach(async () => {
      source = new FlakyYearTableSource();
      harness = createTestHarness({ now: '2026-10-18T09:00:00.000Z', yearTableSource: source });
      await seedSubjectWithRecipients(harness);
      // 2 Shevat 5786; next occurrence 2027-01-10
      await createTestSubject(harness.container, { id: 'subject-2', displayName: 'Aaron Katz', deathDateSolar: '2026-01-20' });
      createTestRecipient(harness.container, { id: 'recipient-4', subjectId: 'subject-2', address: 'sara@example.com' });
    });

    it('marks a failing subject stale, keeps its occurrence and sweeps the others', async () => {
      const { container, clock } = harness;
      const stale = vi.fn();
      container.events.on('subject_schedule_stale', stale);
      source.failing = true;
      clock.set('2027-01-02T09:00:00.000Z');

      const result = await container.scheduler.runSweep();

      expect(result).toMatchObject({ success: false, subjectsScanned: 2, failed: 1, entriesCreated: 1 });

      const failed = container.subjects.getById('subject-1');
      expect(failed.scheduleStale).toBe(true);
      expect(failed.lastScheduleError).toBe('Date computation failed: calendar tables unavailable');
      expect(failed.nextOccurrenceSolar).toBe('2027-01-01');
      expect(container.ledger.listBySubject('subject-1')).toHaveLength(0);
      expect(container.ledger.listBySubject('subject-2')).toHaveLength(1);
      expect(stale).toHaveBeenCalledWith({
        subjectId: 'subject-1',
        lastKnownOccurrence: '2027-01-01',
        error: 'Date computation failed: calendar tables unavailable',
      });
    });

    it('catches up on the next sweep once the tables are back', async () => {
      const { container, clock } = harness;
      source.failing = true;
      clock.set('2027-01-02T09:00:00.000Z');
      await container.scheduler.runSweep();

      source.failing = false;
      clock.set('2027-01-03T09:00:00.000Z');
      const result = await container.scheduler.runSweep();

      expect(result.failed).toBe(0);
      const subject = container.subjects.getById('subject-1');
      expect(subject.scheduleStale).toBe(false);
      expect(subject.nextOccurrenceSolar).toBe('2028-01-21');
      expect(container.ledger.listBySubject('subject-1')).toHaveLength(2);
    });
  });

  // ===========================================
  // Run lock
  // ===========================================

  it('skips the sweep while another run holds the lock', async () => {
    const { container, clock, runLock } = harness;
    clock.set('2026-12-17T09:00:00.000Z');
    await runLock.acquire(SWEEP_LOCK_KEY, 60_000);

    const result = await container.scheduler.runSweep();

    expect(result.acquired).toBe(false);
    expect(result.entriesCreated).toBe(0);
    expect(container.ledger.listBySubject('subject-1')).toHaveLength(0);
  });

  it('releases the lock after a sweep', async () => {
    const { container, runLock } = harness;

    await container.scheduler.runSweep();

    await expect(runLock.acquire(SWEEP_LOCK_KEY, 60_000)).resolves.not.toBeNull();
  });
});
