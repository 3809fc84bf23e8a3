import type { RateLimiter } from "../../shared/ratelimit/slidingWindowRateLimiter";
import { exponentialBackoff, retry } from "../../shared/retry/retry";
import { sleep as defaultSleep, type Sleep } from "../../shared/time/sleep";
import { CrmRequestError, isTransientFailure } from "./CrmRequestError";

export type RetryPolicy = Readonly<{
  maxRetries: number;
  baseBackoffMs: number;
  timeoutMs: number;
}>;

export const defaultRetryPolicy: RetryPolicy = Object.freeze({
  maxRetries: 3,
  baseBackoffMs: 1000,
  timeoutMs: 30000
});

export const defaultRetryAfterMs = 1000;

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE";

export type QueryParams = Record<string, string | number | boolean | undefined>;

export type ExecuteRequest = {
  method: HttpMethod;
  url: string;
  headers?: Record<string, string>;
  params?: QueryParams;
  body?: unknown;
  maxRetries?: number;
};

export type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

export type RetryingRequestExecutorOptions = {
  rateLimiter: RateLimiter;
  policy?: Partial<RetryPolicy>;
  defaultHeaders?: Record<string, string>;
  fetchFn?: FetchFn;
  sleep?: Sleep;
};

/**
 * `Retry-After` in whole seconds; anything else falls back to one second.
 */
export const parseRetryAfterMs = (value: string | null): number => {
  if (value == null) return defaultRetryAfterMs;
  const normalized = value.trim();
  if (!/^\d+$/.test(normalized)) return defaultRetryAfterMs;
  const seconds = Number(normalized);
  return Number.isSafeInteger(seconds * 1000) ? seconds * 1000 : defaultRetryAfterMs;
};

const toErrorMessage = (reason: unknown): string => (reason instanceof Error ? reason.message : String(reason));

const buildUrl = (base: string, params: QueryParams = {}): URL => {
  const url = new URL(base);
  for (const [key, value] of Object.entries(params)) {
    if (value === undefined) continue;
    url.searchParams.set(key, String(value));
  }
  return url;
};

const nullBodyStatuses: ReadonlySet<number> = new Set([204, 205, 304]);

const bufferResponse = async (res: Response): Promise<Response> => {
  const text = await res.text();
  return new Response(nullBodyStatuses.has(res.status) ? null : text, {
    status: res.status,
    statusText: res.statusText,
    headers: res.headers
  });
};

/**
 * Runs one logical HTTP call: every attempt waits for a rate limiter slot,
 * 429 and 5xx responses and transport failures are retried, any other
 * status is returned as-is.
 */
export class RetryingRequestExecutor {
  private readonly rateLimiter: RateLimiter;
  private readonly policy: RetryPolicy;
  private readonly defaultHeaders: Readonly<Record<string, string>>;
  private readonly fetchFn: FetchFn;
  private readonly sleep: Sleep;

  constructor(opts: RetryingRequestExecutorOptions) {
    this.rateLimiter = opts.rateLimiter;
    this.policy = Object.freeze({ ...defaultRetryPolicy, ...opts.policy });
    this.defaultHeaders = Object.freeze({ ...opts.defaultHeaders });
    this.fetchFn = opts.fetchFn ?? ((input, init) => fetch(input, init));
    this.sleep = opts.sleep ?? defaultSleep;
  }

  get retryPolicy(): RetryPolicy {
    return this.policy;
  }

  async execute(request: ExecuteRequest): Promise<Response> {
    const url = buildUrl(request.url, request.params);
    const requestUrl = `${url.origin}${url.pathname}${url.search}`;
    const headers = { ...this.defaultHeaders, ...request.headers };
    const body = request.body === undefined ? undefined : JSON.stringify(request.body);
    const { timeoutMs, baseBackoffMs } = this.policy;

    const attempt = async (): Promise<Response> => {
      await this.rateLimiter.acquire();

      const controller = new AbortController();
      const timeout = setTimeout(() => controller.abort(), timeoutMs);
      let res: Response;
      try {
        const received = await this.fetchFn(url.toString(), {
          method: request.method,
          headers,
          body,
          signal: controller.signal
        });
        // The deadline covers the body too, so it is read before the timer is cleared.
        res = await bufferResponse(received);
      } catch (err) {
        if (controller.signal.aborted) {
          throw new CrmRequestError({
            kind: "timeout",
            message: `CRM request timeout after ${timeoutMs}ms`,
            requestUrl,
            cause: err
          });
        }
        throw new CrmRequestError({
          kind: "network",
          message: `CRM request failed: ${toErrorMessage(err)}`,
          requestUrl,
          cause: err
        });
      } finally {
        clearTimeout(timeout);
      }

      if (res.status === 429) {
        throw new CrmRequestError({
          kind: "rate_limited",
          message: "CRM request failed: 429",
          requestUrl,
          status: 429,
          retryDelayMs: parseRetryAfterMs(res.headers.get("retry-after")),
          response: res
        });
      }

      if (res.status >= 500 && res.status < 600) {
        throw new CrmRequestError({
          kind: "server_error",
          message: `CRM request failed: ${res.status}`,
          requestUrl,
          status: res.status,
          response: res
        });
      }

      return res;
    };

    try {
      return await retry(attempt, {
        retries: request.maxRetries ?? this.policy.maxRetries,
        backoffMs: exponentialBackoff(baseBackoffMs),
        sleep: this.sleep,
        shouldRetry: (err) => {
          if (!(err instanceof CrmRequestError) || !isTransientFailure(err)) return false;
          if (err.kind === "rate_limited") {
            return { retry: true, delayMs: err.retryDelayMs };
          }
          return true;
        },
        onRetry: async ({ attempt: attemptNumber, maxAttempts, delayMs, error }) => {
          const status = error instanceof CrmRequestError ? error.status ?? null : null;
          // eslint-disable-next-line no-console
          console.warn(JSON.stringify({
            event: "http.retry",
            status,
            url: requestUrl,
            attempt: attemptNumber,
            maxAttempts,
            delayMs
          }));
          if (error instanceof CrmRequestError && error.response) {
            await error.response.text().catch(() => "");
          }
        },
        onGiveUp: ({ attempt: attemptNumber, maxAttempts, error }) => {
          const status = error instanceof CrmRequestError ? error.status ?? null : null;
          // eslint-disable-next-line no-console
          console.warn(JSON.stringify({
            event: "http.give_up",
            status,
            url: requestUrl,
            attempt: attemptNumber,
            maxAttempts
          }));
        }
      });
    } catch (err) {
      // Exhausted 429/5xx: the caller gets the last response, not an exception.
      if (err instanceof CrmRequestError && err.response) {
        return err.response;
      }
      throw err;
    }
  }
}
