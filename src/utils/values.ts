import type { CellValue } from "../types/diff.js";

const decimalRegex = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;
const specialFloatRegex = /^[+-]?(inf|infinity|nan)$/i;
const booleanRegex = /^(true|false)$/i;
const integerRegex = /^[+-]?\d+$/;

export function isFloatLike(raw: string): boolean {
  const text = raw.trim();
  return decimalRegex.test(text) || specialFloatRegex.test(text);
}

export function parseFloatLike(raw: string): number | null {
  const text = raw.trim();
  if (decimalRegex.test(text)) return Number(text);
  if (!specialFloatRegex.test(text)) return null;
  const lowered = text.toLowerCase();
  if (lowered.endsWith("nan")) return Number.NaN;
  return lowered.startsWith("-") ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY;
}

/** Float-like text whose number keeps every digit; integers past 2^53 do not. */
export function isExactNumber(raw: string): boolean {
  const text = raw.trim();
  if (!isFloatLike(text)) return false;
  return !integerRegex.test(text) || Number.isSafeInteger(Number(text));
}

export function isBooleanLike(raw: string): boolean {
  return booleanRegex.test(raw.trim());
}

/**
 * Types one column of raw cells. Empty cells become null; the rest become numbers
 * when every non-empty cell converts exactly, booleans when all are true/false, and
 * stay text otherwise.
 */
export function typeColumn(raw: readonly string[]): CellValue[] {
  const present = raw.filter((cell) => cell.trim() !== "");
  if (present.length > 0 && present.every(isExactNumber)) {
    return raw.map((cell) => (cell.trim() === "" ? null : parseFloatLike(cell)));
  }
  if (present.length > 0 && present.every(isBooleanLike)) {
    return raw.map((cell) => (cell.trim() === "" ? null : cell.trim().toLowerCase() === "true"));
  }
  return raw.map((cell) => (cell === "" ? null : cell));
}

/** Reads a column known to be numeric; cells that do not parse come back null and are listed. */
export function coerceNumericColumn(raw: readonly string[]): { values: CellValue[]; rejected: string[] } {
  const rejected: string[] = [];
  const values = raw.map((cell) => {
    if (cell.trim() === "") return null;
    const parsed = parseFloatLike(cell);
    if (parsed === null) rejected.push(cell);
    return parsed;
  });
  return { values, rejected };
}

export function keyPart(value: CellValue): string {
  return value === null ? "" : String(value);
}

export function valuesEqual(a: CellValue, b: CellValue, tolerance: number): boolean {
  if (Object.is(a, b)) return true;
  if (typeof a === "number" && typeof b === "number") {
    return Math.abs(a - b) < tolerance;
  }
  return a === b;
}

/** JSON replacer keeping NaN and the infinities, which JSON itself would turn into null. */
export function jsonReplacer(_key: string, value: unknown): unknown {
  return typeof value === "number" && !Number.isFinite(value) ? String(value) : value;
}
