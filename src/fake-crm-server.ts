import http from "http";
import { URL } from "url";

/**
 * Minimal fake CRM API for local runs and E2E.
 * - GET /crm/v3/objects/deals?limit=...&after=...  pages `total` synthetic deals;
 *   the cursor is the offset of the next record
 * - GET /account-info/v3/api-usage/daily, GET /account-info/v3/details
 * The first `rateLimitedResponses` requests are answered with 429.
 */
export type FakeCrmServerOptions = {
  total: number;
  rateLimitedResponses?: number;
  retryAfterSeconds?: number;
  accessToken?: string;
};

const baseTime = Date.UTC(2024, 0, 1);

const makeDeal = (index: number) => ({
  id: String(index),
  properties: {
    dealname: `Deal ${index}`,
    amount: String(index * 100),
    dealstage: "appointmentscheduled",
    pipeline: "default",
    createdate: new Date(baseTime + index * 60000).toISOString(),
    hs_lastmodifieddate: new Date(baseTime + index * 120000).toISOString()
  },
  createdAt: new Date(baseTime + index * 60000).toISOString(),
  updatedAt: new Date(baseTime + index * 120000).toISOString(),
  archived: false
});

const sendJson = (res: http.ServerResponse, status: number, body: unknown, headers: Record<string, string> = {}) => {
  res.writeHead(status, { "content-type": "application/json", ...headers });
  res.end(JSON.stringify(body));
};

export const createFakeCrmServer = (opts: FakeCrmServerOptions) => {
  let rateLimitedLeft = opts.rateLimitedResponses ?? 0;
  const retryAfter = String(opts.retryAfterSeconds ?? 1);

  return http.createServer((req, res) => {
    const url = new URL(req.url ?? "/", "http://localhost");

    if (opts.accessToken !== undefined && req.headers.authorization !== `Bearer ${opts.accessToken}`) {
      return sendJson(res, 401, { status: "error", message: "Authentication credentials not found" });
    }

    if (rateLimitedLeft > 0) {
      rateLimitedLeft -= 1;
      return sendJson(res, 429, { status: "error", message: "rate_limited" }, { "Retry-After": retryAfter });
    }

    if (url.pathname === "/account-info/v3/api-usage/daily") {
      return sendJson(res, 200, { currentUsage: { dailyLimit: 250000, dailyRemaining: 249000 } }, {
        "X-HubSpot-RateLimit-Daily": "250000",
        "X-HubSpot-RateLimit-Daily-Remaining": "249000"
      });
    }

    if (url.pathname === "/account-info/v3/details") {
      return sendJson(res, 200, { portalId: 1234, timeZone: "UTC", companyCurrency: "USD" });
    }

    if (url.pathname !== "/crm/v3/objects/deals") {
      res.writeHead(404);
      return res.end();
    }

    const limit = Number(url.searchParams.get("limit") ?? "10");
    const offset = Number(url.searchParams.get("after") ?? "0");
    const end = Math.min(opts.total, offset + limit);

    const results = [];
    for (let i = offset + 1; i <= end; i += 1) results.push(makeDeal(i));

    const body: Record<string, unknown> = { total: opts.total, results };
    if (end < opts.total) {
      body.paging = { next: { after: String(end), link: `${url.pathname}?after=${end}` } };
    }
    return sendJson(res, 200, body);
  });
};

if (require.main === module) {
  const port = Number(process.env.FAKE_CRM_PORT ?? 3999);
  const total = Number(process.env.FAKE_CRM_TOTAL ?? 250);
  const server = createFakeCrmServer({ total });

  server.listen(port, () => {
    // eslint-disable-next-line no-console
    console.log(`Fake CRM server on http://localhost:${port}`);
  });
}
