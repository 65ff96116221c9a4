// =====================================================
// Record Hooks Test Suite
// =====================================================

import { describe, it, expect, beforeEach } from 'vitest';
import { ChannelKind, ERROR_CODES, LedgerStatus, LunisolarMonth, OccurrenceKind } from '@yahrzeit-reminders/shared-types';
import { ConflictError, NotFoundError } from '../../../utils/errors';
import { createTestHarness } from '../../../../test/helpers/container.helper';
import type { TestHarness } from '../../../../test/helpers/container.helper';
import { createTestEntry } from '../../../../test/fixtures/ledger.fixture';
import { createTestRecipient, createTestSubject } from '../../../../test/fixtures/records.fixture';

describe('RecordHooksService', () => {
  let harness: TestHarness;

  beforeEach(() => {
    harness = createTestHarness({ now: '2026-10-18T09:00:00.000Z' });
  });

  // ===========================================
  // Subjects
  // ===========================================

  describe('onSubjectCreated', () => {
    it('fixes the anniversary and the first occurrence on or after today', async () => {
      const subject = await createTestSubject(harness.container);

      expect(subject).toEqual({
        id: 'subject-1',
        displayName: 'Miriam Levi',
        deathDateSolar: '2023-01-15',
        deathDateLunisolar: { year: 5783, month: LunisolarMonth.TEVET, day: 22 },
        anniversaryDateLunisolar: { month: LunisolarMonth.TEVET, day: 22 },
        nextOccurrenceSolar: '2027-01-01',
        nextOccurrenceKind: OccurrenceKind.ANNIVERSARY,
        scheduleStale: false,
        deletedAt: null,
      });
    });

    it('keeps a leap-month anniversary in the leap month', async () => {
      const subject = await createTestSubject(harness.container, { deathDateSolar: '2024-03-20' });

      expect(subject.deathDateLunisolar).toEqual({ year: 5784, month: LunisolarMonth.ADAR_II, day: 10 });
      expect(subject.nextOccurrenceSolar).toBe('2027-03-19');
    });
  });

  describe('onSubjectDeathDateChanged', () => {
    beforeEach(async () => {
      await createTestSubject(harness.container);
      createTestRecipient(harness.container);
    });

    it('recomputes the schedule and cancels entries rendered for the old date', async () => {
      const { container } = harness;
      const entry = createTestEntry(container);

      const subject = await container.hooks.onSubjectDeathDateChanged('subject-1', '2024-03-20');

      expect(subject.anniversaryDateLunisolar).toEqual({ month: LunisolarMonth.ADAR_II, day: 10 });
      expect(subject.nextOccurrenceSolar).toBe('2027-03-19');
      const stored = container.ledger.getById(entry.id);
      expect(stored.status).toBe(LedgerStatus.CANCELLED);
      expect(stored.cancellationReason).toBe('death_date_changed');
    });

    it('leaves everything alone when the date is unchanged', async () => {
      const { container } = harness;
      const entry = createTestEntry(container);

      const subject = await container.hooks.onSubjectDeathDateChanged('subject-1', '2023-01-15');

      expect(subject.nextOccurrenceSolar).toBe('2027-01-01');
      expect(container.ledger.getById(entry.id).status).toBe(LedgerStatus.DUE);
    });

    it('rejects an unknown subject', async () => {
      await expect(harness.container.hooks.onSubjectDeathDateChanged('missing', '2024-03-20')).rejects.toMatchObject({
        code: ERROR_CODES.SUBJECT_NOT_FOUND,
        statusCode: 404,
      });
    });

    it('rejects a deleted subject', async () => {
      const { container } = harness;
      container.hooks.onSubjectDeleted('subject-1');

      await expect(container.hooks.onSubjectDeathDateChanged('subject-1', '2024-03-20')).rejects.toBeInstanceOf(
        ConflictError
      );
    });
  });

  describe('onSubjectDeleted', () => {
    it('soft-deletes the subject and cancels its live entries only', async () => {
      const { container, email } = harness;
      await createTestSubject(container);
      createTestRecipient(container);
      const sent = createTestEntry(container, { cycleYear: 5786 });
      await container.dispatcher.runPass();
      const live = createTestEntry(container);

      const result = container.hooks.onSubjectDeleted('subject-1');

      expect(result).toEqual({ changed: true, cancelledEntries: 1 });
      expect(email.sent).toHaveLength(1);
      expect(container.ledger.getById(sent.id).status).toBe(LedgerStatus.SENT);
      expect(container.ledger.getById(live.id).cancellationReason).toBe('subject_deleted');
      expect(container.subjects.getById('subject-1').deletedAt?.toISOString()).toBe('2026-10-18T09:00:00.000Z');
    });

    it('is a no-op the second time', async () => {
      const { container } = harness;
      await createTestSubject(container);
      container.hooks.onSubjectDeleted('subject-1');

      expect(container.hooks.onSubjectDeleted('subject-1')).toEqual({ changed: false, cancelledEntries: 0 });
    });

    it('throws for an unknown subject', () => {
      expect(() => harness.container.hooks.onSubjectDeleted('missing')).toThrow(NotFoundError);
    });
  });

  // ===========================================
  // Recipients
  // ===========================================

  describe('recipients', () => {
    beforeEach(async () => {
      await createTestSubject(harness.container);
    });

    it('creates and then updates a recipient in place', () => {
      const { container } = harness;
      createTestRecipient(container);

      const updated = createTestRecipient(container, {
        channelKind: ChannelKind.GROUP_MESSAGE,
        address: 'group-123',
        locale: 'he',
      });

      expect(updated).toEqual({
        id: 'recipient-1',
        subjectId: 'subject-1',
        displayName: 'David Levi',
        channelKind: ChannelKind.GROUP_MESSAGE,
        address: 'group-123',
        locale: 'he',
        active: true,
        optedOut: false,
        deactivationReason: null,
      });
      expect(container.recipients.listBySubject('subject-1')).toHaveLength(1);
    });

    it('cancels live entries when a recipient is saved as opted out', () => {
      const { container } = harness;
      createTestRecipient(container);
      const entry = createTestEntry(container);

      createTestRecipient(container, { optedOut: true });

      expect(container.ledger.getById(entry.id).cancellationReason).toBe('recipient_opted_out');
    });

    it('refuses recipients for a deleted subject', () => {
      const { container } = harness;
      container.hooks.onSubjectDeleted('subject-1');

      expect(() => createTestRecipient(container)).toThrow(ConflictError);
    });

    it('deactivates a recipient and cancels its entries', () => {
      const { container } = harness;
      createTestRecipient(container);
      createTestEntry(container);

      const result = container.hooks.onRecipientDeactivated('recipient-1', 'address bounced');

      expect(result).toEqual({ changed: true, cancelledEntries: 1 });
      const recipient = container.recipients.findById('recipient-1');
      expect(recipient?.active).toBe(false);
      expect(recipient?.deactivationReason).toBe('address bounced');
    });

    it('records an opt-out', () => {
      const { container } = harness;
      createTestRecipient(container);
      const entry = createTestEntry(container);

      container.hooks.onRecipientOptedOut('recipient-1');

      expect(container.recipients.findById('recipient-1')?.optedOut).toBe(true);
      expect(container.ledger.getById(entry.id).cancellationReason).toBe('recipient_opted_out');
    });

    it('reactivating a recipient clears the deactivation reason', () => {
      const { container } = harness;
      createTestRecipient(container);
      container.hooks.onRecipientDeactivated('recipient-1', 'address bounced');

      const restored = createTestRecipient(container, { address: 'david.levi@example.com' });

      expect(restored.active).toBe(true);
      expect(restored.deactivationReason).toBeNull();
    });

    it('throws for an unknown recipient', () => {
      expect(() => harness.container.hooks.onRecipientOptedOut('missing')).toThrow(NotFoundError);
    });
  });

  // ===========================================
  // Read side
  // ===========================================

  describe('getSubjectLedger', () => {
    it('returns the subject with its recipients and entries', async () => {
      const { container } = harness;
      await createTestSubject(container);
      createTestRecipient(container);
      const entry = createTestEntry(container);

      const view = container.hooks.getSubjectLedger('subject-1');

      expect(view.subject.id).toBe('subject-1');
      expect(view.recipients.map((recipient) => recipient.id)).toEqual(['recipient-1']);
      expect(view.entries).toEqual([
        {
          id: entry.id,
          subjectId: 'subject-1',
          recipientId: 'recipient-1',
          cycleYear: 5787,
          status: LedgerStatus.DUE,
          channelKind: ChannelKind.EMAIL,
          scheduledFor: '2026-10-18T08:00:00.000Z',
          attemptCount: 0,
          lastAttemptAt: null,
          nextRetryAt: null,
          lastError: null,
          cancellationReason: null,
          createdAt: '2026-10-18T09:00:00.000Z',
          updatedAt: '2026-10-18T09:00:00.000Z',
        },
      ]);
    });
  });

  describe('convertDate', () => {
    it('returns the lunisolar date with both renderings', async () => {
      const result = await harness.container.hooks.convertDate('2023-01-15');

      expect(result).toEqual({
        solar: '2023-01-15',
        lunisolar: { year: 5783, month: LunisolarMonth.TEVET, day: 22 },
        formatted: {
          english: '22 Tevet 5783',
          hebrew: expect.stringContaining('כ״ב טבת'),
        },
      });
    });
  });
});
