import pc from "picocolors";
import type { Report } from "../aggregation/types";
import { rankEntries, type FrequencyTable } from "../aggregation/frequency";
import type { TimeWindow } from "../window";

export type Colors = ReturnType<typeof pc.createColors>;

/**
 * Two-column ranked table, highest count first.
 *
 *   Summary Statistics for Request Type
 *   Request Type  Count
 *   ------------  -----
 *   GET               2
 */
export function renderFrequencyTable<K extends string | number>(
  column: string,
  table: FrequencyTable<K>,
  colors: Colors = pc,
): string[] {
  const entries = rankEntries(table).map(({ key, count }) => ({
    key: String(key),
    count: String(count),
  }));
  const keyWidth = Math.max(column.length, ...entries.map((e) => e.key.length));
  const countWidth = Math.max("Count".length, ...entries.map((e) => e.count.length));

  const lines = [
    colors.bold(`Summary Statistics for ${column}`),
    `${column.padEnd(keyWidth)}  ${"Count".padStart(countWidth)}`,
    `${"-".repeat(keyWidth)}  ${"-".repeat(countWidth)}`,
  ];
  for (const entry of entries) {
    lines.push(
      `${colors.cyan(entry.key.padEnd(keyWidth))}  ${colors.magenta(entry.count.padStart(countWidth))}`,
    );
  }
  return lines;
}

export function renderSummary(report: Report, window: TimeWindow, colors: Colors = pc): string {
  return colors.green(
    `Total API calls: ${report.total} from ${window.start.toISOString()} to ${window.end.toISOString()}`,
  );
}

export function renderReport(report: Report, window: TimeWindow, colors: Colors = pc): string[] {
  return [
    ...renderFrequencyTable("Request Type", report.methods, colors),
    "",
    ...renderFrequencyTable("Response Code", report.statuses, colors),
    "",
    ...renderFrequencyTable("API Call", report.endpoints, colors),
    "",
    renderSummary(report, window, colors),
  ];
}
