/**
 * Change reports in structured (JSON) and tabular (CSV) form
 */

import fs from "node:fs";
import path from "node:path";
import { stringify } from "csv-stringify/sync";
import { REPORT_CONSTANTS } from "../constants/index";
import type { ChangeRecord, ChangeValue, ReportFormat } from "../types";
import { fileTimestamp } from "../utils/date";

export interface ChangeReportEntry {
  change_type: string;
  book_url: string;
  old_value: ChangeValue;
  new_value: ChangeValue;
  changed_at: string;
}

export interface ChangeReport {
  generated_at: string;
  total_changes: number;
  changes: ChangeReportEntry[];
}

function newestFirst(changes: readonly ChangeRecord[]): ChangeRecord[] {
  return [...changes].sort(
    (a, b) => b.changedAt.localeCompare(a.changedAt) || b.id - a.id,
  );
}

export function buildChangeReport(
  changes: readonly ChangeRecord[],
  now: Date = new Date(),
): ChangeReport {
  const ordered = newestFirst(changes);
  return {
    generated_at: now.toISOString(),
    total_changes: ordered.length,
    changes: ordered.map((c) => ({
      change_type: c.changeType,
      book_url: c.entityUrl,
      old_value: c.oldValue,
      new_value: c.newValue,
      changed_at: c.changedAt,
    })),
  };
}

function csvCell(value: ChangeValue): string {
  if (value === null) return "";
  if (typeof value === "object") return JSON.stringify(value);
  return String(value);
}

/**
 * Renders changes most recent first
 */
export function generateChangeReport(
  changes: readonly ChangeRecord[],
  format: ReportFormat,
  now: Date = new Date(),
): string {
  const report = buildChangeReport(changes, now);
  if (format === "json") return JSON.stringify(report, null, 2);

  return stringify([
    [...REPORT_CONSTANTS.CSV_HEADER],
    ...report.changes.map((c) => [
      c.change_type,
      c.book_url,
      csvCell(c.old_value),
      csvCell(c.new_value),
      c.changed_at,
    ]),
  ]);
}

/**
 * Writes JSON and CSV reports as change_report_<YYYYMMDD_HHMMSS>.<ext>
 * @returns Paths written
 */
export function writeChangeReports(
  changes: readonly ChangeRecord[],
  reportsDir: string,
  now: Date = new Date(),
): string[] {
  fs.mkdirSync(reportsDir, { recursive: true });
  const stamp = fileTimestamp(now);
  const formats: ReportFormat[] = ["json", "csv"];
  return formats.map((format) => {
    const file = path.join(reportsDir, `change_report_${stamp}.${format}`);
    fs.writeFileSync(file, generateChangeReport(changes, format, now), "utf8");
    return file;
  });
}
