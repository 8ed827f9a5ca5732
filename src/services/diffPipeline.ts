import fs from "fs";
import { env } from "../config/env.js";
import type { DiffResult, ExportShape, FormatDescriptor, LoadedTable } from "../types/diff.js";
import { FileNotFoundError, type DiffError } from "../utils/errors.js";
import { logger } from "../utils/logger.js";
import { andThen, err, map, ok, type Result } from "../utils/result.js";
import { compareTables } from "./comparisonEngine.js";
import { classifyDimensions } from "./dimensionClassifier.js";
import { analyzeFile } from "./formatSniffer.js";
import { loadTables } from "./tableLoader.js";

export type DiffPipelineOptions = {
  tolerance?: number;
};

type FilePair = { baseline: string; comparison: string };

type LoadedPair = {
  baseline: LoadedTable;
  comparison: LoadedTable;
  shape: ExportShape;
};

export function validateFilePaths(baselinePath: string, comparisonPath: string): Result<FilePair, DiffError> {
  if (!fs.existsSync(baselinePath)) return err(new FileNotFoundError(baselinePath));
  if (!fs.existsSync(comparisonPath)) return err(new FileNotFoundError(comparisonPath));
  return ok({ baseline: baselinePath, comparison: comparisonPath });
}

function analyzeFiles(paths: FilePair): Result<[FormatDescriptor, FormatDescriptor], DiffError> {
  return andThen(analyzeFile(paths.baseline), (baselineInfo) =>
    map(analyzeFile(paths.comparison), (comparisonInfo): [FormatDescriptor, FormatDescriptor] => [
      baselineInfo,
      comparisonInfo
    ])
  );
}

function loadFiles(paths: FilePair): Result<LoadedPair, DiffError> {
  return andThen(analyzeFiles(paths), ([baselineInfo, comparisonInfo]) =>
    map(
      loadTables([
        { path: paths.baseline, descriptor: baselineInfo },
        { path: paths.comparison, descriptor: comparisonInfo }
      ]),
      ([baseline, comparison]) => ({ baseline, comparison, shape: baselineInfo.shape })
    )
  );
}

export function runDiffPipeline(
  baselinePath: string,
  comparisonPath: string,
  options: DiffPipelineOptions = {}
): Result<DiffResult, DiffError> {
  const tolerance = options.tolerance ?? env.tolerance;
  const result = andThen(validateFilePaths(baselinePath, comparisonPath), (paths) =>
    andThen(loadFiles(paths), (loaded) =>
      andThen(classifyDimensions(loaded.baseline), (dimensions) =>
        compareTables(loaded.baseline, loaded.comparison, dimensions, { tolerance, shape: loaded.shape })
      )
    )
  );

  if (result.ok) {
    logger.info(`Compared ${baselinePath} and ${comparisonPath}: ${result.value.totalChanges} change(s)`);
  } else {
    logger.debug(`Diff pipeline stopped: ${result.error.code}`);
  }
  return result;
}
