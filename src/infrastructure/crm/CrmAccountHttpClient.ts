import type { CrmRecordsClient } from "../../ports/CrmRecordsClient";
import type { RetryingRequestExecutor } from "./RetryingRequestExecutor";

export type ApiUsage = {
  dailyLimit?: number;
  dailyRemaining?: number;
  intervalLimit: number;
  intervalWindowSeconds: number;
  timestamp: string;
};

export type ConnectionReport = {
  tokenValid: boolean;
  apiReachable: boolean;
  recordsAccessible: boolean;
  accountInfo: Record<string, unknown> | null;
  usageInfo: ApiUsage | null;
  error: string | null;
};

const usagePath = "/account-info/v3/api-usage/daily";
const detailsPath = "/account-info/v3/details";

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const toErrorMessage = (reason: unknown): string => (reason instanceof Error ? reason.message : String(reason));

const parseOptionalInteger = (value: unknown): number | undefined => {
  if (typeof value === "number" && Number.isInteger(value)) return value;
  if (typeof value === "string" && /^\d+$/.test(value.trim())) return Number(value.trim());
  return undefined;
};

/**
 * Account-level probes used before a run is started. None of these throw:
 * failures are logged and reported as false/null.
 */
export class CrmAccountHttpClient {
  constructor(
    private readonly executor: RetryingRequestExecutor,
    private readonly baseUrl: string,
    private readonly records: CrmRecordsClient,
    private readonly interval: { maxRequests: number; windowMs: number },
    private readonly now: () => Date = () => new Date()
  ) {}

  private url(path: string): string {
    const url = new URL(this.baseUrl);
    const base = url.pathname.endsWith("/") ? url.pathname.slice(0, -1) : url.pathname;
    url.pathname = `${base}${path}`;
    return url.toString();
  }

  private warn(operation: string, err: unknown): void {
    // eslint-disable-next-line no-console
    console.warn(JSON.stringify({ event: "crm.account_probe_failed", operation, error: toErrorMessage(err) }));
  }

  private async getJson(path: string): Promise<{ body: Record<string, unknown>; headers: Headers } | null> {
    const res = await this.executor.execute({ method: "GET", url: this.url(path), maxRetries: 1 });
    if (res.status !== 200) {
      await res.text().catch(() => "");
      return null;
    }
    const body: unknown = await res.json();
    return isRecord(body) ? { body, headers: res.headers } : null;
  }

  async validateToken(): Promise<boolean> {
    try {
      const res = await this.executor.execute({ method: "GET", url: this.url(usagePath), maxRetries: 1 });
      await res.text().catch(() => "");
      return res.status === 200;
    } catch (err) {
      this.warn("validate_token", err);
      return false;
    }
  }

  async getAccountDetails(): Promise<Record<string, unknown> | null> {
    try {
      const result = await this.getJson(detailsPath);
      return result?.body ?? null;
    } catch (err) {
      this.warn("get_account_details", err);
      return null;
    }
  }

  async getApiUsage(): Promise<ApiUsage | null> {
    try {
      const result = await this.getJson(usagePath);
      if (!result) return null;

      const current = isRecord(result.body.currentUsage) ? result.body.currentUsage : {};
      const usage: ApiUsage = {
        intervalLimit: this.interval.maxRequests,
        intervalWindowSeconds: this.interval.windowMs / 1000,
        timestamp: this.now().toISOString()
      };

      const dailyLimit =
        parseOptionalInteger(result.headers.get("x-hubspot-ratelimit-daily")) ?? parseOptionalInteger(current.dailyLimit);
      const dailyRemaining =
        parseOptionalInteger(result.headers.get("x-hubspot-ratelimit-daily-remaining")) ??
        parseOptionalInteger(current.dailyRemaining);
      if (dailyLimit !== undefined) usage.dailyLimit = dailyLimit;
      if (dailyRemaining !== undefined) usage.dailyRemaining = dailyRemaining;

      return usage;
    } catch (err) {
      this.warn("get_api_usage", err);
      return null;
    }
  }

  async testConnection(): Promise<ConnectionReport> {
    const report: ConnectionReport = {
      tokenValid: false,
      apiReachable: false,
      recordsAccessible: false,
      accountInfo: null,
      usageInfo: null,
      error: null
    };

    report.tokenValid = await this.validateToken();
    report.apiReachable = report.tokenValid;
    if (!report.tokenValid) {
      report.error = "Invalid access token";
      return report;
    }

    report.accountInfo = await this.getAccountDetails();
    report.usageInfo = await this.getApiUsage();

    try {
      await this.records.fetchPage({
        cursor: null,
        batchSize: 1,
        properties: [],
        associations: [],
        includeArchived: false
      });
      report.recordsAccessible = true;
    } catch (err) {
      report.error = `Records access failed: ${toErrorMessage(err)}`;
      this.warn("fetch_records", err);
    }

    return report;
  }
}
