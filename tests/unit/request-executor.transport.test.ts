import { CrmRequestError } from "../../src/infrastructure/crm/CrmRequestError";
import { RetryingRequestExecutor, type FetchFn } from "../../src/infrastructure/crm/RetryingRequestExecutor";
import { startServer } from "../support/startServer";

const neverResolvingFetch: FetchFn = (_input, init) =>
  new Promise<Response>((_resolve, reject) => {
    init.signal?.addEventListener("abort", () => reject(new Error("This operation was aborted")));
  });

describe("RetryingRequestExecutor transport failures", () => {
  let warnSpy: jest.SpyInstance;

  beforeEach(() => {
    warnSpy = jest.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    warnSpy.mockRestore();
  });

  it("aborts slow requests, retries them and throws a timeout error when exhausted", async () => {
    const sleeps: number[] = [];
    const fetchFn = jest.fn(neverResolvingFetch);
    const executor = new RetryingRequestExecutor({
      rateLimiter: { acquire: async () => undefined },
      policy: { timeoutMs: 20, maxRetries: 2 },
      fetchFn,
      sleep: async (ms) => {
        sleeps.push(ms);
      }
    });

    const failure = executor.execute({ method: "GET", url: "http://127.0.0.1:1/slow" });

    await expect(failure).rejects.toBeInstanceOf(CrmRequestError);
    await expect(failure).rejects.toMatchObject({
      kind: "timeout",
      message: "CRM request timeout after 20ms",
      requestUrl: "http://127.0.0.1:1/slow"
    });
    expect(fetchFn).toHaveBeenCalledTimes(3);
    expect(sleeps).toEqual([2000, 3000]);
  });

  it("retries network failures with the same backoff and then throws", async () => {
    const sleeps: number[] = [];
    const fetchFn = jest.fn<Promise<Response>, Parameters<FetchFn>>().mockRejectedValue(new TypeError("fetch failed"));
    const rateLimiter = { acquire: jest.fn().mockResolvedValue(undefined) };
    const executor = new RetryingRequestExecutor({
      rateLimiter,
      fetchFn,
      sleep: async (ms) => {
        sleeps.push(ms);
      }
    });

    await expect(executor.execute({ method: "GET", url: "http://127.0.0.1:1/down" })).rejects.toMatchObject({
      kind: "network",
      message: "CRM request failed: fetch failed"
    });
    expect(fetchFn).toHaveBeenCalledTimes(4);
    expect(rateLimiter.acquire).toHaveBeenCalledTimes(4);
    expect(sleeps).toEqual([2000, 3000, 5000]);

    const giveUp = JSON.parse(String(warnSpy.mock.calls[3]?.[0]));
    expect(giveUp).toEqual({
      event: "http.give_up",
      status: null,
      url: "http://127.0.0.1:1/down",
      attempt: 4,
      maxAttempts: 4
    });
  });

  it("succeeds when a network failure is followed by a response", async () => {
    const server = await startServer((_req, res) => {
      res.writeHead(200, { "content-type": "application/json" });
      res.end("{\"ok\":true}");
    });

    let calls = 0;
    const fetchFn: FetchFn = (input, init) => {
      calls += 1;
      return calls === 1 ? Promise.reject(new Error("socket hang up")) : fetch(input, init);
    };
    const executor = new RetryingRequestExecutor({
      rateLimiter: { acquire: async () => undefined },
      fetchFn,
      sleep: async () => undefined
    });

    const res = await executor.execute({ method: "GET", url: server.baseUrl });
    expect(res.status).toBe(200);
    await expect(res.json()).resolves.toEqual({ ok: true });
    expect(calls).toBe(2);

    await server.close();
  });

  it("sends method, merged headers, query params and a JSON body", async () => {
    const seen: { method?: string; url?: string; auth?: string; custom?: string; body?: string } = {};
    const server = await startServer((req, res) => {
      let body = "";
      req.on("data", (chunk: Buffer) => {
        body += chunk.toString();
      });
      req.on("end", () => {
        seen.method = req.method;
        seen.url = req.url;
        seen.auth = req.headers.authorization;
        seen.custom = String(req.headers["x-custom"]);
        seen.body = body;
        res.writeHead(200);
        res.end("{}");
      });
    });

    const executor = new RetryingRequestExecutor({
      rateLimiter: { acquire: async () => undefined },
      defaultHeaders: { authorization: "Bearer test-secret", "content-type": "application/json" },
      sleep: async () => undefined
    });

    const res = await executor.execute({
      method: "POST",
      url: `${server.baseUrl}/search`,
      headers: { "x-custom": "1" },
      params: { limit: 10, archived: false, after: undefined },
      body: { filters: [] }
    });
    await res.text();

    expect(seen).toEqual({
      method: "POST",
      url: "/search?limit=10&archived=false",
      auth: "Bearer test-secret",
      custom: "1",
      body: "{\"filters\":[]}"
    });

    await server.close();
  });

  it("exposes the effective retry policy", () => {
    const executor = new RetryingRequestExecutor({
      rateLimiter: { acquire: async () => undefined },
      policy: { maxRetries: 5 }
    });
    expect(executor.retryPolicy).toEqual({ maxRetries: 5, baseBackoffMs: 1000, timeoutMs: 30000 });
  });
});
