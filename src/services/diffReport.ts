import { env } from "../config/env.js";
import type { CellValue, DataTable, DiffResult, DiffSummary, ExportShape } from "../types/diff.js";

export type ReportSectionKind = "changed" | "added" | "removed";

export interface ReportSection {
  kind: ReportSectionKind;
  title: string;
  columns: string[];
  rows: string[][];
  /** Rows left out beyond the display cap. */
  remaining: number;
}

export interface DiffReport {
  summary: DiffSummary;
  dimensionColumns: string[];
  measureColumns: string[];
  shape?: ExportShape;
  sections: ReportSection[];
}

const sectionTitles: Record<ReportSectionKind, string> = {
  changed: "Changed",
  added: "Added",
  removed: "Removed"
};

export function summarizeDiff(result: DiffResult): DiffSummary {
  return {
    totalBaseline: result.totalBaseline,
    totalComparison: result.totalComparison,
    unchanged: result.unchanged.rows.length,
    changed: result.changed.rows.length,
    added: result.added.rows.length,
    removed: result.removed.rows.length,
    totalChanges: result.totalChanges
  };
}

function formatNumber(value: number): string {
  if (Number.isInteger(value) || !Number.isFinite(value)) return String(value);
  return String(Number(value.toPrecision(12)));
}

export function formatCell(column: string, value: CellValue): string {
  if (value === null) return "";
  if (typeof value !== "number") return String(value);
  if (column === "change_percent") return `${value >= 0 ? "+" : ""}${value.toFixed(1)}%`;
  if (column === "change") return `${value > 0 ? "+" : ""}${formatNumber(value)}`;
  return formatNumber(value);
}

function buildSection(kind: ReportSectionKind, table: DataTable, rowLimit: number): ReportSection {
  const limit = Math.max(0, rowLimit);
  return {
    kind,
    title: sectionTitles[kind],
    columns: [...table.columns],
    rows: table.rows.slice(0, limit).map((row) => table.columns.map((column) => formatCell(column, row[column] ?? null))),
    remaining: Math.max(0, table.rows.length - limit)
  };
}

export function buildDiffReport(result: DiffResult, options: { rowLimit?: number } = {}): DiffReport {
  const rowLimit = options.rowLimit ?? env.displayRowLimit;
  const tables: Record<ReportSectionKind, DataTable> = {
    changed: result.changed,
    added: result.added,
    removed: result.removed
  };
  const kinds: ReportSectionKind[] = ["changed", "added", "removed"];
  return {
    summary: summarizeDiff(result),
    dimensionColumns: [...result.dimensionColumns],
    measureColumns: [...result.measureColumns],
    ...(result.shape ? { shape: result.shape } : {}),
    sections: kinds
      .filter((kind) => tables[kind].rows.length > 0)
      .map((kind) => buildSection(kind, tables[kind], rowLimit))
  };
}

function renderTable(columns: readonly string[], rows: readonly string[][]): string[] {
  const widths = columns.map((column, idx) => Math.max(column.length, ...rows.map((row) => row[idx].length)));
  const line = (cells: readonly string[]) =>
    cells
      .map((cell, idx) => cell.padEnd(widths[idx]))
      .join("  ")
      .trimEnd();
  return [line(columns), ...rows.map(line)];
}

export function renderDiffReport(report: DiffReport): string {
  const { summary } = report;
  const lines = [
    `Baseline rows: ${summary.totalBaseline}  Comparison rows: ${summary.totalComparison}`,
    `Dimensions: ${report.dimensionColumns.join(", ")}`,
    `Measures: ${report.measureColumns.join(", ")}`,
    `Unchanged: ${summary.unchanged}  Changed: ${summary.changed}  Added: ${summary.added}  Removed: ${summary.removed}`
  ];

  if (!report.sections.length) {
    lines.push("", "No differences found.");
    return lines.join("\n");
  }

  for (const section of report.sections) {
    lines.push("", `${section.title} (${section.rows.length + section.remaining})`);
    lines.push(...renderTable(section.columns, section.rows));
    if (section.remaining > 0) lines.push(`... and ${section.remaining} more`);
  }
  return lines.join("\n");
}
