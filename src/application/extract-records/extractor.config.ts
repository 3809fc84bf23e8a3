import type { ExtraParams } from "../../ports/CrmRecordsClient";

export type ExtractionFilters = {
  properties: string[];
  associationTypes: string[];
  includeAssociations: boolean;
  includeArchived: boolean;
  batchSize: number;
  checkpointInterval: number;
  maxPages: number;
  extraParams: ExtraParams;
};

export type ExtractionFiltersInput = Partial<ExtractionFilters>;

/** Largest page the list endpoint serves; bigger requests are clamped. */
export const crmBatchSizeLimit = 100;

export const defaultExtractionFilters: ExtractionFilters = {
  properties: [],
  associationTypes: [],
  includeAssociations: false,
  includeArchived: false,
  batchSize: 100,
  checkpointInterval: 5,
  maxPages: 10000,
  extraParams: {}
};

export const extractionCaps = {
  batchSize: { min: 1, max: Number.MAX_SAFE_INTEGER },
  checkpointInterval: { min: 1, max: 10000 },
  maxPages: { min: 1, max: 1000000 }
} as const;

const assertIntegerInRange = (name: string, value: number, min: number, max: number) => {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new Error(`${name}=${String(value)} is out of allowed range [${min}..${max}]`);
  }
};

export const validateExtractionFilters = (filters: ExtractionFilters): ExtractionFilters => {
  assertIntegerInRange("batchSize", filters.batchSize, extractionCaps.batchSize.min, extractionCaps.batchSize.max);
  assertIntegerInRange(
    "checkpointInterval",
    filters.checkpointInterval,
    extractionCaps.checkpointInterval.min,
    extractionCaps.checkpointInterval.max
  );
  assertIntegerInRange("maxPages", filters.maxPages, extractionCaps.maxPages.min, extractionCaps.maxPages.max);
  return filters;
};

const normalizeNameList = (values: readonly string[] | undefined): string[] => {
  const seen = new Set<string>();
  for (const value of values ?? []) {
    const normalized = value.trim();
    if (normalized !== "") seen.add(normalized);
  }
  return Array.from(seen);
};

export const resolveExtractionFilters = (input: ExtractionFiltersInput = {}): ExtractionFilters => {
  const filters = validateExtractionFilters({
    ...defaultExtractionFilters,
    ...input,
    properties: normalizeNameList(input.properties),
    associationTypes: normalizeNameList(input.associationTypes),
    extraParams: { ...input.extraParams }
  });

  return { ...filters, batchSize: Math.min(filters.batchSize, crmBatchSizeLimit) };
};

/** Association types are only requested when associations are switched on. */
export const associationsFor = (filters: ExtractionFilters): string[] =>
  filters.includeAssociations ? filters.associationTypes : [];
