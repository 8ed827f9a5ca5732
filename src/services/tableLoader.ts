import fs from "fs";
import type { CellValue, FormatDescriptor, LoadedTable, TableRow } from "../types/diff.js";
import { buildColumnNames, dropLeadingLines, parseRecords } from "../utils/delimited.js";
import { decodeBuffer } from "../utils/encoding.js";
import { LoadError, type DiffError } from "../utils/errors.js";
import { logger } from "../utils/logger.js";
import { err, map, ok, type Result } from "../utils/result.js";
import { coerceNumericColumn, typeColumn } from "../utils/values.js";

export type RawTable = {
  readonly columns: readonly string[];
  readonly records: readonly string[][];
};

export type TableSource = {
  path: string;
  descriptor: FormatDescriptor;
};

export type TypingOptions = {
  /** Columns read as numbers whatever their content; unparseable cells become null. */
  numericColumns?: readonly string[];
};

export function buildTable(columns: readonly string[], rows: readonly TableRow[]): LoadedTable {
  return Object.freeze({
    columns: Object.freeze([...columns]),
    rows: Object.freeze(rows.map((row) => Object.freeze({ ...row }))),
    rowCount: rows.length
  });
}

function typeNumericColumn(column: string, cells: readonly string[]): CellValue[] {
  const { values, rejected } = coerceNumericColumn(cells);
  if (rejected.length) {
    logger.warn(`Read ${rejected.length} non-numeric value(s) in '${column}' as empty, first '${rejected[0]}'`);
  }
  return values;
}

/**
 * Types several raw tables together. Each column name is typed once over the cells of
 * every table holding it, so the same text gets the same value on every side.
 */
export function typeTables(tables: readonly RawTable[], options: TypingOptions = {}): LoadedTable[] {
  const numeric = new Set(options.numericColumns ?? []);
  const typed = tables.map(() => new Map<string, CellValue[]>());
  const names = [...new Set(tables.flatMap((table) => table.columns))];

  for (const name of names) {
    const slices = tables.flatMap((table, tableIdx) => {
      const colIdx = table.columns.indexOf(name);
      return colIdx < 0 ? [] : [{ tableIdx, cells: table.records.map((record) => record[colIdx]) }];
    });
    const cells = slices.flatMap((slice) => slice.cells);
    const values = numeric.has(name) ? typeNumericColumn(name, cells) : typeColumn(cells);

    let offset = 0;
    for (const slice of slices) {
      typed[slice.tableIdx].set(name, values.slice(offset, offset + slice.cells.length));
      offset += slice.cells.length;
    }
  }

  return tables.map((table, tableIdx) => {
    const rows = table.records.map((_, rowIdx) => {
      const row: TableRow = {};
      for (const column of table.columns) row[column] = typed[tableIdx].get(column)?.[rowIdx] ?? null;
      return row;
    });
    return buildTable(table.columns, rows);
  });
}

/** Builds a typed table from raw string records of equal width. */
export function tableFromRecords(columns: readonly string[], records: readonly string[][]): LoadedTable {
  const [table] = typeTables([{ columns, records }]);
  return table;
}

export function readRecords(filePath: string, descriptor: FormatDescriptor): Result<RawTable, DiffError> {
  try {
    const text = dropLeadingLines(decodeBuffer(fs.readFileSync(filePath), descriptor.encoding), descriptor.skipRows);
    const records = parseRecords(text, descriptor.delimiter);
    if (!records.length) return ok({ columns: [], records: [] });

    const width = records[0].length;
    const columns = buildColumnNames(descriptor.hasHeader ? records[0] : null, width);
    const body = descriptor.hasHeader ? records.slice(1) : records;
    const wellFormed = body.filter((record) => record.length === width);
    if (wellFormed.length < body.length) {
      logger.warn(`Dropped ${body.length - wellFormed.length} malformed record(s) from ${filePath}`);
    }
    return ok({ columns, records: wellFormed });
  } catch (error) {
    return err(new LoadError(error));
  }
}

export function loadTable(filePath: string, descriptor: FormatDescriptor): Result<LoadedTable, DiffError> {
  return map(readRecords(filePath, descriptor), (raw) => tableFromRecords(raw.columns, raw.records));
}

/**
 * Loads exports that are compared with each other. Columns are typed across all of
 * them; when every export ends in the same column, that measure is read as numeric.
 */
export function loadTables(sources: readonly TableSource[]): Result<LoadedTable[], DiffError> {
  const raws: RawTable[] = [];
  for (const source of sources) {
    const raw = readRecords(source.path, source.descriptor);
    if (!raw.ok) return raw;
    raws.push(raw.value);
  }
  const lastColumns = raws.map((raw) => raw.columns.slice(-1).join());
  const shared = lastColumns.every((column) => column !== "" && column === lastColumns[0]);
  return ok(typeTables(raws, { numericColumns: shared ? lastColumns.slice(0, 1) : [] }));
}
