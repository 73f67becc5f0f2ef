import type { FrequencyTable } from "./frequency";

/**
 * Column order of the CSV export.
 */
export const EXPORT_COLUMNS = [
  "ts",
  "admin",
  "adminId",
  "method",
  "host",
  "path",
  "queryString",
  "operationId",
  "responseCode",
  "latencyMs",
  "sourceIp",
  "userAgent",
  "version",
] as const;

export type ExportColumn = (typeof EXPORT_COLUMNS)[number];

export type ExportRow = Record<ExportColumn, string | number | null>;

export interface Report {
  rows: ExportRow[];
  methods: FrequencyTable<string>;
  statuses: FrequencyTable<number>;
  endpoints: FrequencyTable<string>;
  total: number;
}
