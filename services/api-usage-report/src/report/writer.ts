import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { EXPORT_COLUMNS, type Report } from "../aggregation/types";
import { IOError } from "../errors";
import { toCsv } from "./csv";

export interface WriteOptions {
  outputDir: string;
  now?: Date;
}

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/**
 * Local-time stamp used in export file names, e.g. 2026-10-19_09-05-03.
 */
export function fileTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
    `_${pad(date.getHours())}-${pad(date.getMinutes())}-${pad(date.getSeconds())}`
  );
}

export function exportFileName(date: Date): string {
  return `api_requests_${fileTimestamp(date)}.csv`;
}

/**
 * Write the export rows to a new timestamped CSV file and return its path.
 * An existing file of the same name is left untouched and reported as an
 * IOError.
 */
export async function writeReport(report: Report, options: WriteOptions): Promise<string> {
  const filePath = path.join(options.outputDir, exportFileName(options.now ?? new Date()));
  try {
    await mkdir(options.outputDir, { recursive: true });
    await writeFile(filePath, toCsv(EXPORT_COLUMNS, report.rows), { flag: "wx" });
  } catch (err) {
    throw new IOError(filePath, err);
  }
  return filePath;
}
