import Papa from "papaparse";

const lineBreak = /\r\n|\n|\r/;

export function splitLines(text: string): string[] {
  return text.split(lineBreak);
}

export function dropLeadingLines(text: string, count: number): string {
  if (count <= 0) return text;
  return splitLines(text).slice(count).join("\n");
}

/**
 * Parses delimited text into records. Blank records and records the parser flags
 * as malformed are left out; `preview` caps the number of records read.
 */
export function parseRecords(text: string, delimiter: string, preview?: number): string[][] {
  const parsed = Papa.parse<string[]>(text, {
    delimiter,
    skipEmptyLines: "greedy",
    preview: preview ?? 0
  });
  const badRows = new Set<number>();
  for (const error of parsed.errors) {
    if (typeof error.row === "number") badRows.add(error.row);
  }
  return parsed.data.filter((_, idx) => !badRows.has(idx));
}

/** Header names made unique with a `_<n>` suffix; blank names get a positional one. */
export function buildColumnNames(header: readonly string[] | null, width: number): string[] {
  if (!header) {
    return Array.from({ length: width }, (_, idx) => `column_${idx + 1}`);
  }
  const used = new Set<string>();
  return header.map((raw, idx) => {
    const base = raw.trim() || `column_${idx + 1}`;
    let name = base;
    for (let n = 1; used.has(name); n++) name = `${base}_${n}`;
    used.add(name);
    return name;
  });
}
