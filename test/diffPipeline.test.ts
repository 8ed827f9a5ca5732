import path from "path";
import { describe, expect, it } from "vitest";
import { runDiffPipeline, validateFilePaths } from "../src/services/diffPipeline.js";
import { csv, tempDir, writeFile } from "./helpers/files.js";

const salesRows = ["North,Widget A,1000", "South,Widget B,2000", "East,Widget C,1500"];

function writePair(baseline: string, comparison: string) {
  const dir = tempDir();
  return {
    baseline: writeFile(dir, "baseline.csv", baseline),
    comparison: writeFile(dir, "comparison.csv", comparison)
  };
}

describe("validateFilePaths", () => {
  it("returns both paths when they exist", () => {
    const files = writePair(csv("A,B", "x,1"), csv("A,B", "x,1"));

    expect(validateFilePaths(files.baseline, files.comparison)).toEqual({
      ok: true,
      value: { baseline: files.baseline, comparison: files.comparison }
    });
  });

  it("names whichever file is missing", () => {
    const dir = tempDir();
    const present = writeFile(dir, "present.csv", csv("A,B", "x,1"));
    const missing = path.join(dir, "missing.csv");

    const first = validateFilePaths(missing, present);
    const second = validateFilePaths(present, missing);

    expect(first.ok).toBe(false);
    expect(second.ok).toBe(false);
    if (first.ok || second.ok) return;
    expect(first.error.message).toBe(`Could not find '${missing}'`);
    expect(second.error.code).toBe("FILE_NOT_FOUND");
  });
});

describe("runDiffPipeline", () => {
  it("finds nothing between identical exports", () => {
    const content = csv("Region,Product,Sales", ...salesRows);
    const files = writePair(content, content);

    const result = runDiffPipeline(files.baseline, files.comparison);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.hasChanges).toBe(false);
    expect(result.value.unchanged.rows).toHaveLength(3);
    expect(result.value.dimensionColumns).toEqual(["Region", "Product"]);
    expect(result.value.measureColumns).toEqual(["Sales"]);
    expect(result.value.shape).toBe("tabular_single_column");
  });

  it("reports a single changed value with its delta", () => {
    const files = writePair(
      csv("Region,Product,Sales", ...salesRows),
      csv("Region,Product,Sales", "North,Widget A,1000", "South,Widget B,2500", "East,Widget C,1500")
    );

    const result = runDiffPipeline(files.baseline, files.comparison);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.changed.rows).toEqual([
      {
        Region: "South",
        Product: "Widget B",
        baseline_value: 2000,
        comparison_value: 2500,
        change: 500,
        change_percent: 25
      }
    ]);
    expect(result.value.unchanged.rows).toHaveLength(2);
    expect(result.value.totalChanges).toBe(1);
  });

  it("keys on every column but the last, so an earlier numeric column acts as a dimension", () => {
    const files = writePair(
      csv("Region,Product,Sales,Quantity", "North,Widget A,1000,10", "South,Widget B,2000,20"),
      csv("Region,Product,Sales,Quantity", "North,Widget A,1000,10", "South,Widget B,2500,20")
    );

    const result = runDiffPipeline(files.baseline, files.comparison);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.dimensionColumns).toEqual(["Region", "Product", "Sales"]);
    expect(result.value.shape).toBe("tabular_multi_column");
    expect(result.value.removed.rows).toEqual([{ Region: "South", Product: "Widget B", Sales: 2000, Quantity: 20 }]);
    expect(result.value.added.rows).toEqual([{ Region: "South", Product: "Widget B", Sales: 2500, Quantity: 20 }]);
    expect(result.value.changed.rows).toHaveLength(0);
  });

  it("reports a row present only in the comparison as added", () => {
    const files = writePair(
      csv("Region,Product,Sales", "North,Widget A,1000", "South,Widget B,2000"),
      csv("Region,Product,Sales", ...salesRows)
    );

    const result = runDiffPipeline(files.baseline, files.comparison);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.added.rows).toEqual([{ Region: "East", Product: "Widget C", Sales: 1500 }]);
    expect(result.value.totalBaseline).toBe(2);
    expect(result.value.totalComparison).toBe(3);
  });

  it("compares exports that differ only in layout", () => {
    const files = writePair(
      csv("Region,Product,Sales", ...salesRows),
      csv(
        "Page Selectors: Version 2",
        "Region;Product;Sales",
        "North;Widget A;1000",
        "South;Widget B;2000",
        "East;Widget C;1500"
      )
    );

    const result = runDiffPipeline(files.baseline, files.comparison);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.unchanged.rows).toHaveLength(3);
    expect(result.value.hasChanges).toBe(false);
  });

  it("applies the tolerance option", () => {
    const files = writePair(csv("Item,Value", "a,100"), csv("Item,Value", "a,100.4"));

    const loose = runDiffPipeline(files.baseline, files.comparison, { tolerance: 0.5 });
    const strict = runDiffPipeline(files.baseline, files.comparison);

    expect(loose.ok && loose.value.unchanged.rows.length).toBe(1);
    expect(strict.ok && strict.value.changed.rows.length).toBe(1);
  });

  it("stops at a missing file", () => {
    const dir = tempDir();
    const present = writeFile(dir, "present.csv", csv("A,B", "x,1"));
    const missing = path.join(dir, "nope.csv");

    const result = runDiffPipeline(present, missing);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe("FILE_NOT_FOUND");
  });

  it("reports mismatched columns", () => {
    const files = writePair(
      csv("Region,Product,Sales", "North,Widget A,1000"),
      csv("Region,Product,Revenue", "North,Widget A,1000")
    );

    const result = runDiffPipeline(files.baseline, files.comparison);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe("SCHEMA_MISMATCH");
    expect(result.error.message).toBe(
      "Column mismatch between files (missing from comparison: Sales; missing from baseline: Revenue)"
    );
  });

  it("rejects an export whose last column is text", () => {
    const files = writePair(csv("LineItem,Status", "Project A,Complete"), csv("LineItem,Value", "Project A,1"));

    const result = runDiffPipeline(files.baseline, files.comparison);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe("UNSUPPORTED_SHAPE");
  });

  it("rejects a comparison with a header and no rows", () => {
    const files = writePair(csv("Region,Product,Sales", ...salesRows), csv("Region,Product,Sales"));

    const result = runDiffPipeline(files.baseline, files.comparison);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe("EMPTY_INPUT");
    expect(result.error.message).toBe("The comparison file contains no data rows");
  });

  it("rejects a non-positive tolerance", () => {
    const content = csv("Item,Value", "a,1");
    const files = writePair(content, content);

    const result = runDiffPipeline(files.baseline, files.comparison, { tolerance: 0 });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe("INVALID_TOLERANCE");
  });

  it("matches keys when a dimension column reads as numbers in only one file", () => {
    const files = writePair(csv("Month,Value", "01,10", "02,20"), csv("Month,Value", "01,10", "02,20", "Q1,30"));

    const result = runDiffPipeline(files.baseline, files.comparison);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.unchanged.rows).toEqual([
      { Month: "01", Value: 10 },
      { Month: "02", Value: 20 }
    ]);
    expect(result.value.added.rows).toEqual([{ Month: "Q1", Value: 30 }]);
    expect(result.value.removed.rows).toEqual([]);
  });

  it("keeps integer ids past 2^53 distinct", () => {
    const content = csv("Id,Value", "9007199254740992,1", "9007199254740993,2");
    const files = writePair(content, content);

    const result = runDiffPipeline(files.baseline, files.comparison);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.totalChanges).toBe(0);
    expect(result.value.unchanged.rows).toEqual([
      { Id: "9007199254740992", Value: 1 },
      { Id: "9007199254740993", Value: 2 }
    ]);
  });

  it("reads a bad measure cell past the sampled rows as empty", () => {
    const rows = Array.from({ length: 150 }, (_, idx) => `Item ${idx + 1},${idx + 1}`);
    const edited = [...rows.slice(0, 149), "Item 150,N/A"];
    const files = writePair(csv("Item,Value", ...rows), csv("Item,Value", ...edited));

    const result = runDiffPipeline(files.baseline, files.comparison);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.unchanged.rows).toHaveLength(149);
    expect(result.value.changed.rows).toEqual([
      { Item: "Item 150", baseline_value: 150, comparison_value: null, change: null, change_percent: null }
    ]);
  });

  it("finds no changes in an export holding nan and inf", () => {
    const content = csv("Item,Value", "a,nan", "b,inf", "c,-inf");
    const files = writePair(content, content);

    const result = runDiffPipeline(files.baseline, files.comparison);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.unchanged.rows).toHaveLength(3);
    expect(result.value.totalChanges).toBe(0);
  });
});
