import type { DataTable } from "../types/diff.js";
import { InsufficientColumnsError, type DiffError } from "../utils/errors.js";
import { err, ok, type Result } from "../utils/result.js";

/**
 * Positional split for single-column exports: the last column holds the value,
 * every column before it (the line item included) identifies the record.
 * Column content plays no part.
 */
export function classifyDimensions(table: DataTable): Result<string[], DiffError> {
  if (table.columns.length < 2) return err(new InsufficientColumnsError(table.columns.length));
  return ok(table.columns.slice(0, -1));
}
