import { sleep as defaultSleep, type Sleep } from "../time/sleep";

export type RetryDecision =
  | boolean
  | {
      retry: boolean;
      delayMs?: number;
    };

export type RetryContext = { attempt: number; maxAttempts: number; delayMs: number; error: unknown };

export type RetryOptions = {
  retries: number;                           // max attempts after initial try (e.g. 3 means up to 4 total tries)
  backoffMs: (attempt: number) => number;    // delay before the next try when the decision gives none
  shouldRetry: (err: unknown) => RetryDecision;
  onRetry?: (ctx: RetryContext) => void | Promise<void>;
  onGiveUp?: (ctx: { attempt: number; maxAttempts: number; error: unknown }) => void;
  sleep?: Sleep;
};

/**
 * `base * 2^attempt + base`: with a one second base the waits are 2s, 3s, 5s, 9s...
 */
export const exponentialBackoff = (baseDelayMs: number) => (attempt: number): number =>
  baseDelayMs * Math.pow(2, attempt) + baseDelayMs;

export const retry = async <T>(fn: () => Promise<T>, opts: RetryOptions): Promise<T> => {
  const { retries, backoffMs, shouldRetry, onRetry, onGiveUp, sleep = defaultSleep } = opts;

  let attempt = 0;
  const maxAttempts = retries + 1;
  // attempt=0 is first try, then up to retries extra
  while (true) {
    try {
      return await fn();
    } catch (err) {
      const decision = shouldRetry(err);
      const normalized =
        typeof decision === "boolean"
          ? { retry: decision, delayMs: undefined }
          : decision;
      if (attempt >= retries || !normalized.retry) {
        onGiveUp?.({ attempt: attempt + 1, maxAttempts, error: err });
        throw err;
      }

      const customDelayMs =
        typeof normalized.delayMs === "number" && Number.isFinite(normalized.delayMs) && normalized.delayMs >= 0
          ? normalized.delayMs
          : undefined;
      const waitMs = customDelayMs ?? backoffMs(attempt);
      await onRetry?.({ attempt: attempt + 1, maxAttempts, delayMs: waitMs, error: err });
      await sleep(waitMs);
      attempt += 1;
    }
  }
};
