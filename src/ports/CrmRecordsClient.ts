import type { RawRecord } from "../core/records/record.types";

export type { RawRecord };

export type ExtraParams = Record<string, string | number | boolean>;

export type FetchPageParams = {
  cursor: string | null;
  batchSize: number;
  properties: readonly string[];
  associations: readonly string[];
  includeArchived: boolean;
  extraParams?: ExtraParams;
};

export type PageResult = {
  records: RawRecord[];
  nextCursor: string | null;
  rawTotal: number | null;
};

export interface CrmRecordsClient {
  fetchPage(params: FetchPageParams): Promise<PageResult>;
}
