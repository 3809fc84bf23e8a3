import { randomUUID } from "crypto";
import {
  defaultExtractionFilters,
  resolveExtractionFilters,
  type ExtractionFilters
} from "../../application/extract-records/extractor.config";
import { defaultRetryPolicy, type RetryPolicy } from "../../infrastructure/crm/RetryingRequestExecutor";

export const runtimeCaps = {
  timeoutMs: { min: 1000, max: 120000 },
  maxRetries: { min: 0, max: 10 },
  baseBackoffMs: { min: 0, max: 60000 },
  rateLimitMaxRequests: { min: 1, max: 10000 },
  rateLimitWindowMs: { min: 1, max: 3600000 },
  batchSize: { min: 1, max: 1000 },
  maxPages: { min: 1, max: 1000000 },
  checkpointInterval: { min: 1, max: 10000 }
} as const;

export const defaultRateLimit = { maxRequests: 150, windowMs: 10000 } as const;

export type RuntimeConfig = {
  objectType: string;
  retryPolicy: RetryPolicy;
  rateLimit: { maxRequests: number; windowMs: number };
  filters: ExtractionFilters;
};

export type ExtractionJobConfig = {
  organizationId: string;
  scanId: string;
  resume: boolean;
  portalId: string | null;
};

const parseOptionalIntInRange = (
  env: NodeJS.ProcessEnv,
  name: string,
  range: { min: number; max: number }
): number | undefined => {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return undefined;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    throw new Error(`${name}=${raw} is out of allowed range [${range.min}..${range.max}]`);
  }

  return value;
};

const parseOptionalBoolean = (env: NodeJS.ProcessEnv, name: string): boolean | undefined => {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return undefined;

  const normalized = raw.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") return true;
  if (normalized === "0" || normalized === "false" || normalized === "no") return false;
  throw new Error(`${name}=${raw} must be one of true/false/1/0/yes/no`);
};

const parseList = (env: NodeJS.ProcessEnv, name: string): string[] =>
  (env[name] ?? "")
    .split(",")
    .map((value) => value.trim())
    .filter((value) => value !== "");

export const loadRuntimeConfigFromEnv = (env: NodeJS.ProcessEnv = process.env): RuntimeConfig => {
  const associationTypes = parseList(env, "EXTRACT_ASSOCIATIONS");

  const filters = resolveExtractionFilters({
    properties: parseList(env, "EXTRACT_PROPERTIES"),
    associationTypes,
    includeAssociations: associationTypes.length > 0,
    includeArchived: parseOptionalBoolean(env, "EXTRACT_INCLUDE_ARCHIVED") ?? defaultExtractionFilters.includeArchived,
    batchSize: parseOptionalIntInRange(env, "EXTRACT_BATCH_SIZE", runtimeCaps.batchSize) ?? defaultExtractionFilters.batchSize,
    maxPages: parseOptionalIntInRange(env, "EXTRACT_MAX_PAGES", runtimeCaps.maxPages) ?? defaultExtractionFilters.maxPages,
    checkpointInterval:
      parseOptionalIntInRange(env, "EXTRACT_CHECKPOINT_INTERVAL", runtimeCaps.checkpointInterval) ??
      defaultExtractionFilters.checkpointInterval
  });

  const retryPolicy: RetryPolicy = {
    maxRetries: parseOptionalIntInRange(env, "CRM_MAX_RETRIES", runtimeCaps.maxRetries) ?? defaultRetryPolicy.maxRetries,
    baseBackoffMs:
      parseOptionalIntInRange(env, "CRM_BACKOFF_BASE_MS", runtimeCaps.baseBackoffMs) ?? defaultRetryPolicy.baseBackoffMs,
    timeoutMs: parseOptionalIntInRange(env, "CRM_TIMEOUT_MS", runtimeCaps.timeoutMs) ?? defaultRetryPolicy.timeoutMs
  };

  const rateLimit = {
    maxRequests:
      parseOptionalIntInRange(env, "CRM_RATE_LIMIT_MAX_REQUESTS", runtimeCaps.rateLimitMaxRequests) ??
      defaultRateLimit.maxRequests,
    windowMs:
      parseOptionalIntInRange(env, "CRM_RATE_LIMIT_WINDOW_MS", runtimeCaps.rateLimitWindowMs) ?? defaultRateLimit.windowMs
  };

  const objectType = env.CRM_OBJECT_TYPE?.trim() || "deals";

  return { objectType, retryPolicy, rateLimit, filters };
};

export const loadExtractionJobFromEnv = (
  env: NodeJS.ProcessEnv = process.env,
  newScanId: () => string = randomUUID
): ExtractionJobConfig => {
  const organizationId = env.EXTRACT_ORGANIZATION_ID?.trim() ?? "";
  if (organizationId === "") {
    throw new Error("EXTRACT_ORGANIZATION_ID is required");
  }

  const resume = parseOptionalBoolean(env, "EXTRACT_RESUME") ?? false;
  const scanId = env.EXTRACT_SCAN_ID?.trim() || newScanId();
  if (resume && !env.EXTRACT_SCAN_ID?.trim()) {
    throw new Error("EXTRACT_RESUME requires EXTRACT_SCAN_ID");
  }

  const portalId = env.CRM_PORTAL_ID?.trim() || null;
  if (portalId !== null && !/^\d+$/.test(portalId)) {
    throw new Error(`CRM_PORTAL_ID must be a numeric portal id. Received: ${portalId}`);
  }

  return { organizationId, scanId, resume, portalId };
};
