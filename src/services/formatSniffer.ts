import fs from "fs";
import jschardet from "jschardet";
import type { ExportShape, FormatDescriptor } from "../types/diff.js";
import { buildColumnNames, parseRecords, splitLines } from "../utils/delimited.js";
import { decodeBuffer, normalizeEncoding, UTF8_SIG } from "../utils/encoding.js";
import {
  DiffError,
  EncodingDetectionError,
  FileNotFoundError,
  InsufficientColumnsError,
  NoDataError,
  ReadError,
  UnsupportedShapeError
} from "../utils/errors.js";
import { logger } from "../utils/logger.js";
import { andThen, err, ok, type Result } from "../utils/result.js";
import { isFloatLike } from "../utils/values.js";

const ENCODING_SAMPLE_BYTES = 10000;
const LINE_SAMPLE_BYTES = 64 * 1024;
const SHAPE_SAMPLE_BYTES = 1024 * 1024;
const SAMPLE_LINES = 10;
const SHAPE_SAMPLE_ROWS = 100;

const DELIMITER_CANDIDATES = [",", "\t", ";", "|"];
const PAGE_SELECTOR_MARKERS = ["Page Selectors:", "Page Selector:"];
const TOTAL_PREFIX = "Total:";

export function createFormatDescriptor(fields: FormatDescriptor): FormatDescriptor {
  if (!Number.isInteger(fields.skipRows) || fields.skipRows < 0) {
    throw new Error("skipRows must be a non-negative integer");
  }
  if (!fields.encoding) throw new Error("encoding must be non-empty");
  if (!fields.delimiter) throw new Error("delimiter must be non-empty");
  return Object.freeze({ ...fields });
}

type Sample = { bytes: Buffer; truncated: boolean };

function readSample(filePath: string, limit: number): Sample {
  const fd = fs.openSync(filePath, "r");
  try {
    const buffer = Buffer.alloc(limit);
    const bytesRead = fs.readSync(fd, buffer, 0, limit, 0);
    return { bytes: buffer.subarray(0, bytesRead), truncated: bytesRead === limit };
  } finally {
    fs.closeSync(fd);
  }
}

/** Decoded lines of a sample; the last one is dropped when the sample cut it short. */
function sampleLines(filePath: string, encoding: string, limit: number): string[] {
  const sample = readSample(filePath, limit);
  const lines = splitLines(decodeBuffer(sample.bytes, encoding));
  if (sample.truncated && lines.length > 1) lines.pop();
  return lines;
}

export function detectEncoding(filePath: string): Result<string, DiffError> {
  try {
    const { bytes } = readSample(filePath, ENCODING_SAMPLE_BYTES);
    if (!bytes.length) return ok(UTF8_SIG);
    const detected = jschardet.detect(bytes);
    return ok(normalizeEncoding(detected.encoding));
  } catch (error) {
    return err(new EncodingDetectionError(error));
  }
}

function readSampleLines(filePath: string, encoding: string): Result<string[], DiffError> {
  try {
    return ok(
      sampleLines(filePath, encoding, LINE_SAMPLE_BYTES)
        .slice(0, SAMPLE_LINES)
        .map((line) => line.trim())
    );
  } catch (error) {
    return err(new ReadError(error));
  }
}

function isMarkerLine(line: string): boolean {
  return (
    line === "" ||
    PAGE_SELECTOR_MARKERS.some((marker) => line.includes(marker)) ||
    line.startsWith(TOTAL_PREFIX)
  );
}

export function countSkipRows(lines: readonly string[]): number {
  let count = 0;
  for (const line of lines) {
    if (!isMarkerLine(line)) break;
    count += 1;
  }
  return count;
}

function countOccurrences(line: string, needle: string): number {
  return line.split(needle).length - 1;
}

export function detectDelimiter(lines: readonly string[]): string {
  const nonBlank = lines.filter((line) => line.trim() !== "");
  for (const candidate of DELIMITER_CANDIDATES) {
    const counts = nonBlank.map((line) => countOccurrences(line, candidate));
    if (counts.length && counts.every((count) => count > 0) && new Set(counts).size <= 2) {
      return candidate;
    }
  }
  return ",";
}

function lastField(line: string, delimiter: string): string {
  const fields = line.split(delimiter);
  return fields[fields.length - 1] ?? "";
}

export function detectHeader(lines: readonly string[], delimiter: string): boolean {
  if (lines.length < 2) return true;
  if (isFloatLike(lastField(lines[0], delimiter))) return false;
  return true;
}

function isNumericColumn(rows: readonly string[][], index: number): boolean {
  const values = rows.map((row) => row[index] ?? "").filter((value) => value.trim() !== "");
  return values.length > 0 && values.every(isFloatLike);
}

function validateShape(
  filePath: string,
  encoding: string,
  delimiter: string,
  skipRows: number,
  hasHeader: boolean
): Result<ExportShape, DiffError> {
  let records: string[][];
  try {
    const text = sampleLines(filePath, encoding, SHAPE_SAMPLE_BYTES).slice(skipRows).join("\n");
    records = parseRecords(text, delimiter, SHAPE_SAMPLE_ROWS + (hasHeader ? 1 : 0));
  } catch (error) {
    return err(new ReadError(error));
  }

  const width = records[0]?.length ?? 0;
  if (width < 2) return err(new InsufficientColumnsError(width));

  const columns = buildColumnNames(hasHeader ? records[0] : null, width);
  const rows = (hasHeader ? records.slice(1) : records).filter((row) => row.length === width);
  const measure = columns[width - 1];
  const offending = rows.map((row) => row[width - 1]).find((value) => value.trim() !== "" && !isFloatLike(value));
  if (offending !== undefined) return err(new UnsupportedShapeError(measure, offending));

  let trailingNumeric = 0;
  for (let idx = width - 1; idx >= 0 && isNumericColumn(rows, idx); idx--) trailingNumeric += 1;
  return ok(trailingNumeric >= 2 && trailingNumeric < width ? "tabular_multi_column" : "tabular_single_column");
}

function analyzeStructure(filePath: string, encoding: string, lines: string[]): Result<FormatDescriptor, DiffError> {
  const skipRows = countSkipRows(lines);
  const dataLines = lines.slice(skipRows);
  if (!dataLines.length) return err(new NoDataError());

  const delimiter = detectDelimiter(dataLines);
  const hasHeader = detectHeader(dataLines, delimiter);

  return andThen(validateShape(filePath, encoding, delimiter, skipRows, hasHeader), (shape) =>
    ok(createFormatDescriptor({ encoding, delimiter, hasHeader, skipRows, shape }))
  );
}

export function analyzeFile(filePath: string): Result<FormatDescriptor, DiffError> {
  if (!fs.existsSync(filePath)) return err(new FileNotFoundError(filePath));

  const result = andThen(detectEncoding(filePath), (encoding) =>
    andThen(readSampleLines(filePath, encoding), (lines) => analyzeStructure(filePath, encoding, lines))
  );
  if (result.ok) logger.debug("analyzed", filePath, result.value);
  return result;
}
