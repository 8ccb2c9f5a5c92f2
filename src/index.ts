export type {
  AggregatedRecord,
  AggregatedTable,
  AggregateMetric,
  BenchmarkThresholds,
  CellValue,
  CompoundTable,
  DelimitedFormat,
  PairAggregates,
  TableRow,
} from "./types/compound-table";
export * from "./lib/compound-columns";
export * from "./lib/errors";
export { assertRequiredColumns, findMissingColumns } from "./lib/schema-validation";
export {
  aggregatePairs,
  computePairAggregates,
  groupByIdentifier,
  readExistingAggregates,
  toCompoundTable,
} from "./lib/pair-aggregation";
export { applyColumnTemplate, arrangeColumns } from "./lib/column-arrangement";
export { aggregateValue, rankByAggregate } from "./lib/ranking";
export {
  buildBenchmarkView,
  filterAboveBenchmark,
  resolveBenchmark,
  selectBenchmark,
  type BenchmarkResolution,
  type BenchmarkView,
} from "./lib/benchmark-filter";
export {
  formatReportLines,
  summarizeThresholds,
  type ReportLine,
  type ThresholdSummary,
} from "./lib/report-summary";
export {
  runPairReport,
  type BenchmarkOutcome,
  type PairReportResult,
} from "./lib/pair-report-pipeline";
export {
  parseCompoundTable,
  readCompoundTable,
  serializeCompoundTable,
  writeCompoundTable,
  type LoadedTable,
} from "./lib/compound-table-io";
export { reportFilePaths, writePairReport, type ReportFilePaths } from "./lib/report-files";
