import type { CellValue, DataTable, DiffResult, ExportShape, TableRow } from "../types/diff.js";
import {
  ComparisonFailedError,
  EmptyInputError,
  InvalidToleranceError,
  NoDimensionsError,
  NoMeasuresError,
  SchemaMismatchError,
  UnknownDimensionError,
  type DiffError
} from "../utils/errors.js";
import { andThen, err, ok, type Result } from "../utils/result.js";
import { keyPart, valuesEqual } from "../utils/values.js";

export const DEFAULT_TOLERANCE = 1e-10;
export const KEY_SEPARATOR = "||";

export type CompareOptions = {
  tolerance?: number;
  shape?: ExportShape;
};

function validateInputs(
  baseline: DataTable,
  comparison: DataTable,
  dimensionColumns: readonly string[],
  tolerance: number
): Result<string[], DiffError> {
  if (!Number.isFinite(tolerance) || tolerance <= 0) return err(new InvalidToleranceError(tolerance));
  if (!dimensionColumns.length) return err(new NoDimensionsError());
  if (!baseline.rows.length) return err(new EmptyInputError("baseline"));
  if (!comparison.rows.length) return err(new EmptyInputError("comparison"));

  const baselineSet = new Set(baseline.columns);
  const comparisonSet = new Set(comparison.columns);
  const missingFromComparison = baseline.columns.filter((column) => !comparisonSet.has(column));
  const missingFromBaseline = comparison.columns.filter((column) => !baselineSet.has(column));
  if (missingFromComparison.length || missingFromBaseline.length) {
    return err(new SchemaMismatchError(missingFromComparison, missingFromBaseline));
  }

  const unknown = dimensionColumns.filter((column) => !baselineSet.has(column));
  if (unknown.length) return err(new UnknownDimensionError(unknown));

  const dimensionSet = new Set(dimensionColumns);
  const measures = baseline.columns.filter((column) => !dimensionSet.has(column));
  if (!measures.length) return err(new NoMeasuresError());
  return ok(measures);
}

export function compositeKey(row: TableRow, dimensionColumns: readonly string[]): string {
  return dimensionColumns.map((column) => keyPart(row[column] ?? null)).join(KEY_SEPARATOR);
}

function isNumericMeasure(tables: readonly DataTable[], column: string): boolean {
  return tables.every((table) =>
    table.rows.every((row) => {
      const value = row[column];
      return value === null || typeof value === "number";
    })
  );
}

function pickDimensions(row: TableRow, dimensionColumns: readonly string[]): TableRow {
  const picked: TableRow = {};
  for (const column of dimensionColumns) picked[column] = row[column] ?? null;
  return picked;
}

function numericChange(before: CellValue, after: CellValue): { change: number | null; changePercent: number | null } {
  if (typeof before !== "number" || typeof after !== "number") return { change: null, changePercent: null };
  const change = after - before;
  return { change, changePercent: before === 0 ? null : (change / before) * 100 };
}

type ChangedLayout = {
  columns: string[];
  build: (baselineRow: TableRow, comparisonRow: TableRow) => TableRow;
};

function changedLayout(
  dimensionColumns: readonly string[],
  measureColumns: readonly string[],
  numeric: boolean
): ChangedLayout {
  if (measureColumns.length > 1) {
    return {
      columns: [
        ...dimensionColumns,
        ...measureColumns.flatMap((measure) => [`${measure}_baseline`, `${measure}_comparison`])
      ],
      build: (baselineRow, comparisonRow) => {
        const row = pickDimensions(baselineRow, dimensionColumns);
        for (const measure of measureColumns) {
          row[`${measure}_baseline`] = baselineRow[measure] ?? null;
          row[`${measure}_comparison`] = comparisonRow[measure] ?? null;
        }
        return row;
      }
    };
  }

  const [measure] = measureColumns;
  return {
    columns: [
      ...dimensionColumns,
      "baseline_value",
      "comparison_value",
      ...(numeric ? ["change", "change_percent"] : [])
    ],
    build: (baselineRow, comparisonRow) => {
      const row = pickDimensions(baselineRow, dimensionColumns);
      const before = baselineRow[measure] ?? null;
      const after = comparisonRow[measure] ?? null;
      row.baseline_value = before;
      row.comparison_value = after;
      if (numeric) {
        const { change, changePercent } = numericChange(before, after);
        row.change = change;
        row.change_percent = changePercent;
      }
      return row;
    }
  };
}

function freezeTable(columns: readonly string[], rows: readonly TableRow[]): DataTable {
  return Object.freeze({ columns: Object.freeze([...columns]), rows: Object.freeze([...rows]) });
}

function classifyRows(
  baseline: DataTable,
  comparison: DataTable,
  dimensionColumns: readonly string[],
  measureColumns: readonly string[],
  tolerance: number,
  shape: ExportShape | undefined
): DiffResult {
  const numeric = measureColumns.length === 1 && isNumericMeasure([baseline, comparison], measureColumns[0]);
  const layout = changedLayout(dimensionColumns, measureColumns, numeric);

  // rows sharing a key pair up in file order
  const pendingByKey = new Map<string, TableRow[]>();
  for (const row of comparison.rows) {
    const key = compositeKey(row, dimensionColumns);
    const pending = pendingByKey.get(key);
    if (pending) pending.push(row);
    else pendingByKey.set(key, [row]);
  }

  const matched = new Set<TableRow>();
  const unchanged: TableRow[] = [];
  const changed: TableRow[] = [];
  const removed: TableRow[] = [];

  for (const row of baseline.rows) {
    const partner = pendingByKey.get(compositeKey(row, dimensionColumns))?.shift();
    if (!partner) {
      removed.push(row);
      continue;
    }
    matched.add(partner);
    if (measureColumns.every((measure) => valuesEqual(row[measure] ?? null, partner[measure] ?? null, tolerance))) {
      unchanged.push(row);
    } else {
      changed.push(layout.build(row, partner));
    }
  }

  const added = comparison.rows.filter((row) => !matched.has(row));
  const totalChanges = changed.length + added.length + removed.length;

  return Object.freeze({
    unchanged: freezeTable(baseline.columns, unchanged),
    changed: freezeTable(layout.columns, changed),
    added: freezeTable(comparison.columns, added),
    removed: freezeTable(baseline.columns, removed),
    dimensionColumns: Object.freeze([...dimensionColumns]),
    measureColumns: Object.freeze([...measureColumns]),
    totalBaseline: baseline.rows.length,
    totalComparison: comparison.rows.length,
    ...(shape ? { shape } : {}),
    hasChanges: totalChanges > 0,
    totalChanges
  });
}

export function compareTables(
  baseline: DataTable,
  comparison: DataTable,
  dimensionColumns: readonly string[],
  options: CompareOptions = {}
): Result<DiffResult, DiffError> {
  const tolerance = options.tolerance ?? DEFAULT_TOLERANCE;
  return andThen(validateInputs(baseline, comparison, dimensionColumns, tolerance), (measureColumns) => {
    try {
      return ok(classifyRows(baseline, comparison, dimensionColumns, measureColumns, tolerance, options.shape));
    } catch (error) {
      return err(new ComparisonFailedError(error));
    }
  });
}
