// =====================================================
// Ledger Entry State Machine
// =====================================================
//
//   pending ──> due ──> in_flight ──> sent
//      │         ▲          │
//      │         └──retry───┤
//      │                    └──> failed
//      └──────> cancelled <── (any non-terminal)
//
// `in_flight` is the claim marker held by one dispatch worker.
// A retryable failure or a timed-out claim returns the entry
// to `due`; sent, failed and cancelled are terminal.

import { LedgerStatus } from '@yahrzeit-reminders/shared-types';
import { InvalidLedgerTransitionError } from '../../utils/errors';

const TRANSITIONS: Record<LedgerStatus, readonly LedgerStatus[]> = {
  [LedgerStatus.PENDING]: [LedgerStatus.DUE, LedgerStatus.CANCELLED],
  [LedgerStatus.DUE]: [LedgerStatus.IN_FLIGHT, LedgerStatus.CANCELLED],
  [LedgerStatus.IN_FLIGHT]: [
    LedgerStatus.SENT,
    LedgerStatus.DUE,
    LedgerStatus.FAILED,
    LedgerStatus.CANCELLED,
  ],
  [LedgerStatus.SENT]: [],
  [LedgerStatus.FAILED]: [],
  [LedgerStatus.CANCELLED]: [],
};

/** Statuses a cancellation may still stop */
export const CANCELLABLE_STATUSES: readonly LedgerStatus[] = [
  LedgerStatus.PENDING,
  LedgerStatus.DUE,
  LedgerStatus.IN_FLIGHT,
];

export function canTransition(from: LedgerStatus, to: LedgerStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function assertTransition(from: LedgerStatus, to: LedgerStatus): void {
  if (!canTransition(from, to)) {
    throw new InvalidLedgerTransitionError(from, to);
  }
}

export function parseLedgerStatus(value: string): LedgerStatus {
  const status = Object.values(LedgerStatus).find((candidate) => candidate === value);
  if (status === undefined) {
    throw new Error(`Unknown ledger status "${value}"`);
  }
  return status;
}
