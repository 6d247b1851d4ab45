import chalk from "chalk";
import Table from "cli-table3";
import type { MomentSummary, ReportConfig, StatisticName } from "@streamstat/core";

export interface ReportRow {
  label: string;
  summary: MomentSummary;
}

const SUMMARY_FIELD: Record<StatisticName, keyof MomentSummary> = {
  count: "count",
  mean: "mean",
  variance: "variance",
  sample_variance: "sampleVariance",
  standard_deviation: "standardDeviation",
  sample_standard_deviation: "sampleStandardDeviation",
  skewness: "skewness",
  kurtosis: "kurtosis"
};

export function formatStatistic(value: number | null, precision: number): string {
  if (value === null) return "n/a";
  if (!Number.isFinite(value)) return String(value);
  return value.toFixed(precision);
}

/** JSON-ready statistics; non-finite values become strings so NaN stays distinct from undefined (null). */
export function selectStatistics(
  summary: MomentSummary,
  statistics: readonly StatisticName[]
): Record<string, number | string | null> {
  const out: Record<string, number | string | null> = {};
  for (const name of statistics) {
    const value = summary[SUMMARY_FIELD[name]];
    out[name] = value === null || Number.isFinite(value) ? value : String(value);
  }
  return out;
}

export function reportCells(row: ReportRow, report: ReportConfig): string[] {
  return [
    row.label,
    ...report.statistics.map((name) =>
      name === "count" ? String(row.summary.count) : formatStatistic(row.summary[SUMMARY_FIELD[name]], report.precision)
    )
  ];
}

export function renderReport(rows: ReportRow[], report: ReportConfig): string {
  if (report.format === "json") {
    if (rows.length === 1 && rows[0]!.label === "") {
      return JSON.stringify(selectStatistics(rows[0]!.summary, report.statistics), null, 2);
    }
    const byLabel = Object.fromEntries(rows.map((row) => [row.label, selectStatistics(row.summary, report.statistics)]));
    return JSON.stringify(byLabel, null, 2);
  }

  const table = new Table({
    head: ["Series", ...report.statistics],
    style: { head: ["cyan"] }
  });
  for (const row of rows) {
    table.push(reportCells({ ...row, label: row.label || "all" }, report));
  }
  return table.toString();
}

export function printReport(rows: ReportRow[], report: ReportConfig): void {
  if (rows.length === 0) {
    console.log(chalk.yellow("No observations"));
    return;
  }
  console.log(renderReport(rows, report));
}
