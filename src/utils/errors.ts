export type DiffErrorCode =
  | "FILE_NOT_FOUND"
  | "ENCODING_DETECTION_FAILED"
  | "READ_FAILED"
  | "NO_DATA"
  | "INSUFFICIENT_COLUMNS"
  | "UNSUPPORTED_SHAPE"
  | "LOAD_FAILED"
  | "INVALID_TOLERANCE"
  | "NO_DIMENSIONS"
  | "EMPTY_INPUT"
  | "SCHEMA_MISMATCH"
  | "UNKNOWN_DIMENSION"
  | "NO_MEASURES"
  | "COMPARISON_FAILED";

export class DiffError extends Error {
  constructor(
    public code: DiffErrorCode,
    message: string,
    public statusCode: number = 422,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "DiffError";
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

// Input errors

export class FileNotFoundError extends DiffError {
  constructor(filePath: string) {
    super("FILE_NOT_FOUND", `Could not find '${filePath}'`);
  }
}

export class EncodingDetectionError extends DiffError {
  constructor(cause: unknown) {
    super("ENCODING_DETECTION_FAILED", `Could not detect encoding: ${describeCause(cause)}`, 422, cause);
  }
}

export class ReadError extends DiffError {
  constructor(cause: unknown) {
    super("READ_FAILED", `Could not read file: ${describeCause(cause)}`, 422, cause);
  }
}

export class NoDataError extends DiffError {
  constructor() {
    super("NO_DATA", "No data lines found after page selectors");
  }
}

export class InsufficientColumnsError extends DiffError {
  constructor(found: number) {
    super("INSUFFICIENT_COLUMNS", `File must have at least 2 columns (found ${found})`);
  }
}

export class UnsupportedShapeError extends DiffError {
  constructor(column: string, value: string) {
    super("UNSUPPORTED_SHAPE", `Last column must be numeric: '${column}' contains '${value}'`);
  }
}

export class LoadError extends DiffError {
  constructor(cause: unknown) {
    super("LOAD_FAILED", `Could not load CSV file: ${describeCause(cause)}`, 422, cause);
  }
}

// Schema errors

function mismatchMessage(missingFromComparison: string[], missingFromBaseline: string[]): string {
  const parts: string[] = [];
  if (missingFromComparison.length) {
    parts.push(`missing from comparison: ${missingFromComparison.join(", ")}`);
  }
  if (missingFromBaseline.length) {
    parts.push(`missing from baseline: ${missingFromBaseline.join(", ")}`);
  }
  return `Column mismatch between files (${parts.join("; ")})`;
}

export class SchemaMismatchError extends DiffError {
  constructor(
    public missingFromComparison: string[],
    public missingFromBaseline: string[]
  ) {
    super("SCHEMA_MISMATCH", mismatchMessage(missingFromComparison, missingFromBaseline));
  }
}

export class UnknownDimensionError extends DiffError {
  constructor(columns: string[]) {
    super("UNKNOWN_DIMENSION", `Dimension columns not found in data: ${columns.join(", ")}`);
  }
}

export class NoMeasuresError extends DiffError {
  constructor() {
    super("NO_MEASURES", "No measure columns found: every column is a dimension");
  }
}

export class NoDimensionsError extends DiffError {
  constructor() {
    super("NO_DIMENSIONS", "At least one dimension column is required", 400);
  }
}

export class EmptyInputError extends DiffError {
  constructor(side: "baseline" | "comparison") {
    super("EMPTY_INPUT", `The ${side} file contains no data rows`);
  }
}

// Parameter errors

export class InvalidToleranceError extends DiffError {
  constructor(tolerance: number) {
    super("INVALID_TOLERANCE", `Tolerance must be a positive number (got ${tolerance})`, 400);
  }
}

// Computation errors

export class ComparisonFailedError extends DiffError {
  constructor(cause: unknown) {
    super("COMPARISON_FAILED", `Comparison failed: ${describeCause(cause)}`, 500, cause);
  }
}
