/** A single cell: verbatim text from the input file, a derived number, or empty. */
export type CellValue = string | number | null;

export type TableRow = Readonly<Record<string, CellValue>>;

export interface CompoundTable {
  columns: readonly string[];
  rows: readonly TableRow[];
}

/** Mean and absolute difference of both pair metrics. null when a member's metric is blank. */
export interface PairAggregates {
  avgMpo: number | null;
  deltaMpo: number | null;
  avgNormDocking: number | null;
  deltaNormDocking: number | null;
}

export type AggregateMetric = keyof PairAggregates;

export interface AggregatedRecord {
  identifier: string;
  /** Input fields plus the derived columns (pairs only). */
  cells: TableRow;
  /** null unless the identifier's group had exactly two members. */
  aggregates: PairAggregates | null;
  groupSize: number;
  sourceIndex: number;   // position in the input table
}

export interface AggregatedTable {
  columns: readonly string[];
  records: readonly AggregatedRecord[];
}

export interface BenchmarkThresholds {
  avgMpo: number;
  avgNormDocking: number;
}

export type DelimitedFormat = "," | "\t" | ";" | "|";
