import { adminNameMap, aggregate } from "./aggregation/aggregator";
import type { Report } from "./aggregation/types";
import type { Config } from "./config";
import { createDashboardClient } from "./dashboard/client";
import type { FetchFn, Sleep, UsageRecord } from "./dashboard/types";
import { renderReport, type Colors } from "./report/console";
import { writeReport } from "./report/writer";
import { resolveTimeWindow, type TimeWindow } from "./window";

export interface RunDependencies {
  fetchFn?: FetchFn;
  sleep?: Sleep;
  now?: () => Date;
  print?: (line: string) => void;
  colors?: Colors;
}

export interface UsageResult {
  window: TimeWindow;
  report: Report;
}

export interface ReportResult extends UsageResult {
  filePath: string;
}

/**
 * Fetch every usage record in the window and aggregate it. Admin ids are
 * resolved to names before any usage page is requested.
 */
export async function collectUsage(
  config: Config,
  days: number,
  deps: RunDependencies = {},
): Promise<UsageResult> {
  const print = deps.print ?? console.log;
  const window = resolveTimeWindow(days, deps.now?.() ?? new Date());
  const client = createDashboardClient(config, {
    fetchFn: deps.fetchFn,
    sleep: deps.sleep,
  });

  const adminNames = adminNameMap(await client.listAdmins());

  const records: UsageRecord[] = [];
  let pageNumber = 0;
  for await (const page of client.pages(window)) {
    pageNumber++;
    records.push(...page.records);
    print(`Fetched page ${pageNumber} (${page.records.length} records)`);
  }

  const report = aggregate(records, {
    endpointKeys: config.ENDPOINT_KEYS,
    adminNames,
  });
  return { window, report };
}

/**
 * Full run: collect, write the CSV export, then print the summary tables.
 * Nothing is printed as a summary unless the export was written.
 */
export async function runReport(
  config: Config,
  days: number,
  deps: RunDependencies = {},
): Promise<ReportResult> {
  const print = deps.print ?? console.log;
  const { window, report } = await collectUsage(config, days, deps);

  const filePath = await writeReport(report, {
    outputDir: config.OUTPUT_DIR,
    now: deps.now?.(),
  });
  print(`Saved ${report.total} API requests to ${filePath}`);
  print("");
  for (const line of renderReport(report, window, deps.colors)) {
    print(line);
  }

  return { window, report, filePath };
}
