import type { CrmRecordsClient, FetchPageParams, PageResult, RawRecord } from "../../ports/CrmRecordsClient";
import { CrmRequestError } from "./CrmRequestError";
import type { QueryParams, RetryingRequestExecutor } from "./RetryingRequestExecutor";

export const crmMaxPageSize = 100;

export const crmAppBaseUrl = "https://app.hubspot.com";

const appRecordSegments: Readonly<Record<string, string>> = {
  deals: "deal",
  companies: "company",
  contacts: "contact",
  tickets: "ticket"
};

/** Web-app location of one object type in a portal; `deals` becomes `.../contacts/{portal}/deal`. */
export const buildRecordUrlBase = (portalId: string, objectType: string): string => {
  const segment = appRecordSegments[objectType] ?? objectType;
  return `${crmAppBaseUrl}/contacts/${encodeURIComponent(portalId)}/${encodeURIComponent(segment)}`;
};

export const defaultRecordProperties: readonly string[] = [
  "dealname",
  "amount",
  "dealstage",
  "pipeline",
  "closedate",
  "createdate",
  "hs_lastmodifieddate",
  "hubspot_owner_id",
  "dealtype",
  "hs_deal_stage_probability"
];

// Owned by the paginator; extra parameters never override them.
const reservedQueryParams: ReadonlySet<string> = new Set(["limit", "after", "archived", "properties", "associations"]);

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const asObject = (value: unknown): Record<string, unknown> => (isRecord(value) ? value : {});

const asOptionalString = (value: unknown): string | null => (typeof value === "string" ? value : null);

const normalizeId = (id: unknown): string | null => {
  if (typeof id === "string") return id.trim() === "" ? null : id;
  if (typeof id === "number" && Number.isFinite(id)) return String(id);
  return null;
};

const normalizeRawRecord = (item: unknown): RawRecord => {
  const record = asObject(item);

  return {
    id: normalizeId(record.id),
    properties: asObject(record.properties),
    associations: asObject(record.associations),
    createdAt: asOptionalString(record.createdAt),
    updatedAt: asOptionalString(record.updatedAt),
    archived: record.archived === true
  };
};

/** `paging.next.after`, or null when the response carries no usable cursor. */
export const extractNextCursor = (body: Record<string, unknown>): string | null => {
  const next = asObject(asObject(body.paging).next);
  const after = next.after;
  if (typeof after === "string" && after !== "") return after;
  if (typeof after === "number" && Number.isFinite(after)) return String(after);
  return null;
};

export const normalizePage = (body: Record<string, unknown>): PageResult => {
  const results = Array.isArray(body.results) ? body.results : [];
  const total = body.total;

  return {
    records: results.map(normalizeRawRecord),
    nextCursor: extractNextCursor(body),
    rawTotal: typeof total === "number" && Number.isInteger(total) ? total : null
  };
};

/**
 * One "list records" call per page. Retries and rate limiting belong to the
 * executor; this class only shapes the request and the response.
 */
export class CrmRecordsHttpClient implements CrmRecordsClient {
  constructor(
    private readonly executor: RetryingRequestExecutor,
    private readonly baseUrl: string,
    private readonly objectType = "deals"
  ) {}

  private endpoint(): string {
    const url = new URL(this.baseUrl);
    const base = url.pathname.endsWith("/") ? url.pathname.slice(0, -1) : url.pathname;
    url.pathname = `${base}/crm/v3/objects/${encodeURIComponent(this.objectType)}`;
    return url.toString();
  }

  async fetchPage(params: FetchPageParams): Promise<PageResult> {
    const properties = params.properties.length > 0 ? params.properties : defaultRecordProperties;
    const query: QueryParams = {
      limit: Math.min(params.batchSize, crmMaxPageSize),
      archived: params.includeArchived ? "true" : "false",
      properties: properties.join(",")
    };
    if (params.associations.length > 0) query.associations = params.associations.join(",");
    if (params.cursor) query.after = params.cursor;
    for (const [key, value] of Object.entries(params.extraParams ?? {})) {
      if (reservedQueryParams.has(key)) continue;
      query[key] = value;
    }

    const res = await this.executor.execute({ method: "GET", url: this.endpoint(), params: query });
    const requestUrl = this.endpoint();

    if (!res.ok) {
      await res.text().catch(() => "");
      throw new CrmRequestError({
        kind: "http_status",
        message: `CRM request failed: ${res.status}`,
        requestUrl,
        status: res.status
      });
    }

    const json: unknown = await res.json().catch((err: unknown) => {
      throw new CrmRequestError({
        kind: "invalid_response",
        message: "CRM response is not valid JSON",
        requestUrl,
        status: res.status,
        cause: err
      });
    });
    if (!isRecord(json)) {
      throw new CrmRequestError({
        kind: "invalid_response",
        message: "CRM response is not an object",
        requestUrl,
        status: res.status
      });
    }

    return normalizePage(json);
  }
}
