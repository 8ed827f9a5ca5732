export type CellValue = string | number | boolean | null;

export type TableRow = Record<string, CellValue>;

export type ExportShape = "tabular_single_column" | "tabular_multi_column";

export interface FormatDescriptor {
  readonly encoding: string;
  readonly delimiter: string;
  readonly hasHeader: boolean;
  /** Leading non-data lines (blank, page selector, totals) dropped before parsing. */
  readonly skipRows: number;
  readonly shape: ExportShape;
}

export interface DataTable {
  readonly columns: readonly string[];
  readonly rows: readonly TableRow[];
}

export interface LoadedTable extends DataTable {
  readonly rowCount: number;
}

export interface DiffResult {
  readonly unchanged: DataTable;
  readonly changed: DataTable;
  readonly added: DataTable;
  readonly removed: DataTable;
  readonly dimensionColumns: readonly string[];
  readonly measureColumns: readonly string[];
  readonly totalBaseline: number;
  readonly totalComparison: number;
  readonly shape?: ExportShape;
  readonly hasChanges: boolean;
  readonly totalChanges: number;
}

export interface DiffSummary {
  totalBaseline: number;
  totalComparison: number;
  unchanged: number;
  changed: number;
  added: number;
  removed: number;
  totalChanges: number;
}
