import type { NormalizedRecord, RawRecord } from "./record.types";

export type TransformContext = {
  scanId: string;
  organizationId: string;
  pageNumber: number;
  extractedAt: string;
  sourceService?: string;
  /** App URL the record id is appended to, e.g. `.../contacts/1234/deal`. */
  recordUrlBase?: string;
};

export const defaultSourceService = "crm_deals";
export const defaultCurrency = "USD";

const isoDatePrefix = /^\d{4}-\d{2}-\d{2}/;

const asOptionalString = (value: unknown): string | null => {
  if (typeof value === "string") return value;
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return null;
};

export const parseDecimal = (value: unknown): number | null => {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }

  if (typeof value === "string") {
    const normalized = value.trim();
    if (normalized === "") return null;
    const parsed = Number(normalized);
    return Number.isFinite(parsed) ? parsed : null;
  }

  return null;
};

const toIsoString = (epochMs: number): string | null => {
  const date = new Date(epochMs);
  return Number.isNaN(date.getTime()) ? null : date.toISOString();
};

/**
 * Epoch values and ISO-8601 strings to an ISO-8601 UTC string.
 * Digit-only strings are epoch milliseconds; bare numbers above 1e10 are
 * milliseconds, below that seconds.
 */
export const parseTimestamp = (value: unknown): string | null => {
  if (typeof value === "number") {
    if (!Number.isFinite(value)) return null;
    return toIsoString(value > 1e10 ? value : value * 1000);
  }

  if (typeof value !== "string") return null;
  const normalized = value.trim();
  if (normalized === "") return null;

  if (/^\d+$/.test(normalized)) {
    return toIsoString(Number(normalized));
  }

  if (!isoDatePrefix.test(normalized)) return null;
  return toIsoString(Date.parse(normalized));
};

export const transformRecord = (raw: RawRecord, context: TransformContext): NormalizedRecord => {
  const properties = raw.properties;

  return {
    recordId: raw.id,
    name: asOptionalString(properties.dealname),
    amount: parseDecimal(properties.amount),
    currency: asOptionalString(properties.deal_currency_code) ?? defaultCurrency,
    stage: asOptionalString(properties.dealstage),
    stageLabel: asOptionalString(properties.dealstage_label),
    pipelineId: asOptionalString(properties.pipeline),
    pipelineLabel: asOptionalString(properties.pipeline_label),
    closeDate: parseTimestamp(properties.closedate),
    createdAt: parseTimestamp(properties.createdate) ?? parseTimestamp(raw.createdAt),
    updatedAt: parseTimestamp(properties.hs_lastmodifieddate) ?? parseTimestamp(raw.updatedAt),
    ownerId: asOptionalString(properties.hubspot_owner_id),
    ownerEmail: asOptionalString(properties.hubspot_owner_email),
    recordType: asOptionalString(properties.dealtype),
    recordUrl: raw.id && context.recordUrlBase ? `${context.recordUrlBase}/${encodeURIComponent(raw.id)}` : null,
    isArchived: raw.archived,
    properties,
    associations: raw.associations,
    extraction: {
      extractedAt: context.extractedAt,
      scanId: context.scanId,
      organizationId: context.organizationId,
      pageNumber: context.pageNumber,
      sourceService: context.sourceService ?? defaultSourceService
    }
  };
};
