// =====================================================
// Controllable clock for tests
// =====================================================

import type { Clock } from '../../src/utils/clock';

export interface FixedClock extends Clock {
  set(next: Date | string): void;
  advance(ms: number): void;
}

export function fixedClock(at: Date | string): FixedClock {
  let current = new Date(at);
  return {
    now: () => new Date(current.getTime()),
    set(next) {
      current = new Date(next);
    },
    advance(ms) {
      current = new Date(current.getTime() + ms);
    },
  };
}
