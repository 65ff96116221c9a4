import { describe, it, expect, beforeEach } from 'vitest';
import { LedgerStatus } from '@yahrzeit-reminders/shared-types';
import { DuplicateLedgerEntryError } from '../../utils/errors';
import { createTestHarness } from '../../../test/helpers/container.helper';
import type { TestHarness } from '../../../test/helpers/container.helper';
import { buildTestEntry, createTestEntry } from '../../../test/fixtures/ledger.fixture';
import { createTestRecipient, createTestSubject } from '../../../test/fixtures/records.fixture';

describe('LedgerRepository', () => {
  let harness: TestHarness;

  beforeEach(async () => {
    harness = createTestHarness({ now: '2026-10-18T09:00:00.000Z' });
    await createTestSubject(harness.container);
    createTestRecipient(harness.container);
  });

  // ===========================================
  // Creation
  // ===========================================

  describe('create', () => {
    it('stores the entry with no attempts', () => {
      const entry = createTestEntry(harness.container);

      expect(entry).toMatchObject({
        subjectId: 'subject-1',
        recipientId: 'recipient-1',
        cycleYear: 5787,
        status: LedgerStatus.DUE,
        attemptCount: 0,
        claimToken: null,
        nextRetryAt: null,
      });
      expect(entry.payload.subject).toBe('Yahrzeit reminder: Miriam Levi');
    });

    it('rejects a second live entry for the same cycle', () => {
      const { container } = harness;
      createTestEntry(container);

      expect(() => createTestEntry(container, { status: LedgerStatus.PENDING })).toThrow(DuplicateLedgerEntryError);
    });

    it('returns null from createIfAbsent for a duplicate', () => {
      const { container, clock } = harness;
      createTestEntry(container);

      expect(container.ledger.createIfAbsent(buildTestEntry(), clock.now())).toBeNull();
      expect(container.ledger.listBySubject('subject-1')).toHaveLength(1);
    });

    it('allows a new entry once the previous one is cancelled', () => {
      const { container, clock } = harness;
      createTestEntry(container);
      container.ledger.cancelForRecipient('recipient-1', 'recipient_opted_out', clock.now());

      const replacement = container.ledger.createIfAbsent(buildTestEntry(), clock.now());

      expect(replacement?.status).toBe(LedgerStatus.DUE);
      expect(container.ledger.countLiveForCycle('subject-1', 5787)).toBe(1);
    });
  });

  // ===========================================
  // Claiming
  // ===========================================

  describe('claimDue', () => {
    it('claims ready entries under the given token', () => {
      const { container, clock } = harness;
      const entry = createTestEntry(container);

      const claimed = container.ledger.claimDue(clock.now(), 10, 'token-a');

      expect(claimed.map((claim) => claim.id)).toEqual([entry.id]);
      expect(claimed[0]?.status).toBe(LedgerStatus.IN_FLIGHT);
      expect(claimed[0]?.claimToken).toBe('token-a');
      expect(container.ledger.claimDue(clock.now(), 10, 'token-b')).toEqual([]);
    });

    it('skips entries waiting for a retry', () => {
      const { container, clock } = harness;
      const entry = createTestEntry(container);
      container.ledger.claimDue(clock.now(), 10, 'token-a');
      container.ledger.markRetry(entry.id, 'token-a', clock.now(), new Date('2026-10-18T09:05:00.000Z'), 'timeout');

      expect(container.ledger.claimDue(clock.now(), 10, 'token-b')).toEqual([]);
      expect(container.ledger.claimDue(new Date('2026-10-18T09:05:00.000Z'), 10, 'token-b')).toHaveLength(1);
    });

    it('respects the batch limit in scheduled order', () => {
      const { container, clock } = harness;
      createTestRecipient(container, { id: 'recipient-2', address: 'ruth@example.com' });
      createTestEntry(container, { scheduledFor: new Date('2026-10-18T08:30:00.000Z') });
      const earlier = createTestEntry(container, {
        recipientId: 'recipient-2',
        scheduledFor: new Date('2026-10-18T07:00:00.000Z'),
      });

      const claimed = container.ledger.claimDue(clock.now(), 1, 'token-a');

      expect(claimed.map((claim) => claim.id)).toEqual([earlier.id]);
    });
  });

  // ===========================================
  // Results
  // ===========================================

  describe('touchClaim', () => {
    it('restarts the claim timeout for the holder only', () => {
      const { container, clock } = harness;
      const entry = createTestEntry(container);
      container.ledger.claimDue(clock.now(), 10, 'token-a');
      clock.advance(8 * 60_000);

      expect(container.ledger.touchClaim(entry.id, 'token-b', clock.now())).toBe(false);
      expect(container.ledger.touchClaim(entry.id, 'token-a', clock.now())).toBe(true);
      expect(container.ledger.getById(entry.id).claimedAt?.toISOString()).toBe('2026-10-18T09:08:00.000Z');

      clock.advance(5 * 60_000);
      expect(container.ledger.recoverStaleClaims(clock.now(), 10 * 60_000, 5)).toEqual([]);
    });

    it('fails once the claim has been recovered', () => {
      const { container, clock } = harness;
      const entry = createTestEntry(container);
      container.ledger.claimDue(clock.now(), 10, 'token-a');
      clock.advance(11 * 60_000);
      container.ledger.recoverStaleClaims(clock.now(), 10 * 60_000, 5);

      expect(container.ledger.touchClaim(entry.id, 'token-a', clock.now())).toBe(false);
    });
  });

  describe('result writes', () => {
    it('refuses a result written with another token', () => {
      const { container, clock } = harness;
      const entry = createTestEntry(container);
      container.ledger.claimDue(clock.now(), 10, 'token-a');

      expect(container.ledger.markSent(entry.id, 'token-b', clock.now(), 'msg-1')).toBe(false);
      expect(container.ledger.getById(entry.id).status).toBe(LedgerStatus.IN_FLIGHT);
      expect(container.ledger.markSent(entry.id, 'token-a', clock.now(), 'msg-1')).toBe(true);
    });

    it('never leaves a terminal status', () => {
      const { container, clock } = harness;
      const entry = createTestEntry(container);
      container.ledger.claimDue(clock.now(), 10, 'token-a');
      container.ledger.markFailed(entry.id, 'token-a', clock.now(), 'gone');

      expect(container.ledger.markSent(entry.id, 'token-a', clock.now(), 'msg-1')).toBe(false);
      expect(container.ledger.cancelForSubject('subject-1', 'subject_deleted', clock.now())).toBe(0);
      expect(container.ledger.getById(entry.id)).toMatchObject({ status: LedgerStatus.FAILED, attemptCount: 1 });
    });

    it('counts every attempt', () => {
      const { container, clock } = harness;
      const entry = createTestEntry(container);

      container.ledger.claimDue(clock.now(), 10, 'token-a');
      container.ledger.markRetry(entry.id, 'token-a', clock.now(), clock.now(), 'timeout');
      container.ledger.claimDue(clock.now(), 10, 'token-b');
      container.ledger.markSent(entry.id, 'token-b', clock.now(), 'msg-2');

      expect(container.ledger.getById(entry.id)).toMatchObject({
        status: LedgerStatus.SENT,
        attemptCount: 2,
        providerMessageId: 'msg-2',
        lastError: null,
      });
    });
  });

  // ===========================================
  // Promotion and cancellation
  // ===========================================

  it('promotes only pending entries whose time has come', () => {
    const { container, clock } = harness;
    createTestRecipient(container, { id: 'recipient-2', address: 'ruth@example.com' });
    const ready = createTestEntry(container, { status: LedgerStatus.PENDING });
    const later = createTestEntry(container, {
      recipientId: 'recipient-2',
      status: LedgerStatus.PENDING,
      scheduledFor: new Date('2026-10-19T08:00:00.000Z'),
    });

    expect(container.ledger.promoteDue(clock.now())).toBe(1);
    expect(container.ledger.getById(ready.id).status).toBe(LedgerStatus.DUE);
    expect(container.ledger.getById(later.id).status).toBe(LedgerStatus.PENDING);
  });

  it('cancels pending, due and in-flight entries for a subject', () => {
    const { container, clock } = harness;
    createTestRecipient(container, { id: 'recipient-2', address: 'ruth@example.com' });
    createTestRecipient(container, { id: 'recipient-3', address: 'noa@example.com' });
    createTestEntry(container, { status: LedgerStatus.PENDING, scheduledFor: new Date('2026-12-18T08:00:00.000Z') });
    createTestEntry(container, { recipientId: 'recipient-2' });
    createTestEntry(container, { recipientId: 'recipient-3' });
    container.ledger.claimDue(clock.now(), 1, 'token-a');

    const cancelled = container.ledger.cancelForSubject('subject-1', 'subject_deleted', clock.now());

    expect(cancelled).toBe(3);
    expect(container.ledger.listBySubject('subject-1').map((entry) => entry.claimToken)).toEqual([null, null, null]);
  });

  // ===========================================
  // Recovery
  // ===========================================

  describe('recoverStaleClaims', () => {
    it('requeues claims older than the timeout and leaves fresh ones', () => {
      const { container, clock } = harness;
      createTestRecipient(container, { id: 'recipient-2', address: 'ruth@example.com' });
      const stale = createTestEntry(container);
      container.ledger.claimDue(clock.now(), 10, 'token-a');

      clock.advance(11 * 60_000);
      const fresh = createTestEntry(container, { recipientId: 'recipient-2' });
      container.ledger.claimDue(clock.now(), 10, 'token-b');

      const recovered = container.ledger.recoverStaleClaims(clock.now(), 10 * 60_000, 5);

      expect(recovered.map(({ entry, outcome }) => [entry.id, outcome])).toEqual([[stale.id, 'requeued']]);
      expect(container.ledger.getById(stale.id)).toMatchObject({
        status: LedgerStatus.DUE,
        attemptCount: 1,
        nextRetryAt: new Date('2026-10-18T09:11:00.000Z'),
      });
      expect(container.ledger.getById(fresh.id).status).toBe(LedgerStatus.IN_FLIGHT);
    });

    it('fails a stale claim at the attempt limit', () => {
      const { container, clock } = harness;
      const entry = createTestEntry(container);
      container.ledger.claimDue(clock.now(), 10, 'token-a');
      clock.advance(11 * 60_000);

      const recovered = container.ledger.recoverStaleClaims(clock.now(), 10 * 60_000, 1);

      expect(recovered.map(({ outcome }) => outcome)).toEqual(['failed']);
      expect(container.ledger.getById(entry.id)).toMatchObject({ status: LedgerStatus.FAILED, attemptCount: 1 });
    });
  });
});
