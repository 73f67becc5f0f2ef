import type { EndpointKeyPolicy } from "../config";
import type { Admin, UsageRecord } from "../dashboard/types";
import { endpointKey } from "./endpoint";
import { countInto, type FrequencyTable } from "./frequency";
import type { ExportRow, Report } from "./types";

export interface AggregateOptions {
  endpointKeys: EndpointKeyPolicy;
  adminNames?: ReadonlyMap<string, string>;
}

export function adminNameMap(admins: Admin[]): Map<string, string> {
  return new Map(admins.map((admin) => [admin.id, admin.name || admin.email || admin.id]));
}

export function toExportRow(
  record: UsageRecord,
  adminNames?: ReadonlyMap<string, string>,
): ExportRow {
  return {
    ts: record.ts,
    admin: adminNames?.get(record.adminId) ?? record.adminId,
    adminId: record.adminId,
    method: record.method,
    host: record.host,
    path: record.path,
    queryString: record.queryString,
    operationId: record.operationId,
    responseCode: record.responseCode,
    latencyMs: record.latencyMs,
    sourceIp: record.sourceIp,
    userAgent: record.userAgent,
    version: record.version,
  };
}

/**
 * Fold usage records into the three frequency tables and the export rows.
 */
export function aggregate(records: UsageRecord[], options: AggregateOptions): Report {
  const methods: FrequencyTable<string> = new Map();
  const statuses: FrequencyTable<number> = new Map();
  const endpoints: FrequencyTable<string> = new Map();
  const rows: ExportRow[] = [];

  for (const record of records) {
    countInto(methods, record.method.toUpperCase());
    countInto(statuses, record.responseCode);
    countInto(endpoints, endpointKey(record.path, options.endpointKeys));
    rows.push(toExportRow(record, options.adminNames));
  }

  return { rows, methods, statuses, endpoints, total: records.length };
}
