// =====================================================
// Clock
// =====================================================
// Services never call `new Date()` for scheduling decisions;
// they read time from an injected clock so sweeps and
// dispatch passes can be replayed at any instant in tests.

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};
