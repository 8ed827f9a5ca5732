export { analyzeFile, createFormatDescriptor } from "./services/formatSniffer.js";
export { loadTable, loadTables, readRecords, tableFromRecords, typeTables } from "./services/tableLoader.js";
export type { RawTable, TableSource, TypingOptions } from "./services/tableLoader.js";
export { classifyDimensions } from "./services/dimensionClassifier.js";
export { compareTables, compositeKey, DEFAULT_TOLERANCE, KEY_SEPARATOR } from "./services/comparisonEngine.js";
export type { CompareOptions } from "./services/comparisonEngine.js";
export { runDiffPipeline, validateFilePaths } from "./services/diffPipeline.js";
export type { DiffPipelineOptions } from "./services/diffPipeline.js";
export { buildDiffReport, renderDiffReport, summarizeDiff } from "./services/diffReport.js";
export type { DiffReport, ReportSection } from "./services/diffReport.js";
export * from "./utils/errors.js";
export * from "./utils/result.js";
export type * from "./types/diff.js";
