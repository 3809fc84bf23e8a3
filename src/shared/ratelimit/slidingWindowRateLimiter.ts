import { monotonicClock, sleep as defaultSleep, type Clock, type Sleep } from "../time/sleep";

export type RateLimiter = {
  acquire(): Promise<void>;
};

export type SlidingWindowRateLimiterOptions = {
  maxRequests: number;
  windowMs: number;
  marginMs?: number;
  clock?: Clock;
  sleep?: Sleep;
};

/**
 * Request budget of `maxRequests` per trailing `windowMs`, shared by every run
 * that talks to the same account.
 * Usage:
 *   const limiter = createSlidingWindowRateLimiter({ maxRequests: 150, windowMs: 10_000 });
 *   await limiter.acquire();
 */
export const createSlidingWindowRateLimiter = (opts: SlidingWindowRateLimiterOptions) => {
  const { maxRequests, windowMs, marginMs = 100, clock = monotonicClock, sleep = defaultSleep } = opts;
  if (!Number.isInteger(maxRequests) || maxRequests < 1) {
    throw new Error("maxRequests must be an integer >= 1");
  }
  if (!Number.isInteger(windowMs) || windowMs < 1) {
    throw new Error("windowMs must be an integer >= 1");
  }

  // oldest first, non-decreasing
  const timestamps: number[] = [];

  const evict = (now: number) => {
    while (timestamps.length > 0 && now - timestamps[0] >= windowMs) {
      timestamps.shift();
    }
  };

  const acquire = async (): Promise<void> => {
    // Evict, check and record happen without an await in between; waiters
    // sleep outside of that and re-validate once they wake up.
    while (true) {
      const now = clock();
      evict(now);
      if (timestamps.length < maxRequests) {
        const last = timestamps.length > 0 ? timestamps[timestamps.length - 1] : now;
        timestamps.push(Math.max(now, last));
        return;
      }

      await sleep(windowMs - (now - timestamps[0]) + marginMs);
    }
  };

  return {
    acquire,
    windowSize: () => timestamps.length
  };
};
