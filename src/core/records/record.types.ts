/**
 * One item of a list page, reduced to the envelope every CRM object shares.
 * Property values are left exactly as the API sent them.
 */
export type RawRecord = {
  id: string | null;
  properties: Record<string, unknown>;
  associations: Record<string, unknown>;
  createdAt: string | null;
  updatedAt: string | null;
  archived: boolean;
};

export type ExtractionMetadata = {
  extractedAt: string;
  scanId: string;
  organizationId: string;
  pageNumber: number;
  sourceService: string;
};

export type NormalizedRecord = {
  recordId: string | null;
  name: string | null;
  amount: number | null;
  currency: string;
  stage: string | null;
  stageLabel: string | null;
  pipelineId: string | null;
  pipelineLabel: string | null;
  closeDate: string | null;
  createdAt: string | null;
  updatedAt: string | null;
  ownerId: string | null;
  ownerEmail: string | null;
  recordType: string | null;
  /** Link to the record in the CRM web app, when the portal is known. */
  recordUrl: string | null;
  isArchived: boolean;
  properties: Record<string, unknown>;
  associations: Record<string, unknown>;
  extraction: ExtractionMetadata;
};

export type IdentifiedRecord = NormalizedRecord & { recordId: string };

export const hasRecordId = (record: NormalizedRecord): record is IdentifiedRecord =>
  typeof record.recordId === "string" && record.recordId.length > 0;
