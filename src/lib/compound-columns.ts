/**
 * Column vocabulary of the compound scoring table and the presentation
 * templates applied to each output.
 */

import type { AggregateMetric } from "@/types/compound-table";

// ─── Input columns ──────────────────────────────────────────────────────────

export const TITLE = "Title";
export const MPO_SCORE = "MPO_score";
export const NORM_DOCKING_SCORE = "norm_docking_score";
export const DOCKING_SCORE = "docking score";

export const REQUIRED_COLUMNS: readonly string[] = [
  TITLE,
  MPO_SCORE,
  NORM_DOCKING_SCORE,
  DOCKING_SCORE,
];

// ─── Derived columns ────────────────────────────────────────────────────────

export const AVG_MPO = "Avg_MPO";
export const DELTA_MPO = "Delta_MPO";
export const AVG_NORM_DOCKING = "Avg_norm_docking";
export const DELTA_NORM_DOCKING = "Delta_norm_docking";

/** Derived column name for each aggregate, in the order they are appended to the table. */
export const AGGREGATE_COLUMNS: Readonly<Record<AggregateMetric, string>> = {
  avgMpo: AVG_MPO,
  deltaMpo: DELTA_MPO,
  avgNormDocking: AVG_NORM_DOCKING,
  deltaNormDocking: DELTA_NORM_DOCKING,
};

// ─── Presentation templates ─────────────────────────────────────────────────

/**
 * Strip `strip` (and `insert`) from the current order, then splice `insert`
 * right after `anchor`. A null anchor inserts at the front.
 */
export interface ColumnTemplate {
  name: string;
  strip: readonly string[];
  insert: readonly string[];
  anchor: string | null;
}

const AGGREGATE_AND_SCORE_COLUMNS = [
  AVG_MPO,
  DELTA_MPO,
  AVG_NORM_DOCKING,
  DELTA_NORM_DOCKING,
  MPO_SCORE,
  NORM_DOCKING_SCORE,
];

export const MPO_FIRST_TEMPLATE: ColumnTemplate = {
  name: "mpo-first",
  strip: AGGREGATE_AND_SCORE_COLUMNS,
  insert: [AVG_MPO, DELTA_MPO, MPO_SCORE, AVG_NORM_DOCKING, DELTA_NORM_DOCKING, NORM_DOCKING_SCORE],
  anchor: TITLE,
};

export const DOCKING_FIRST_TEMPLATE: ColumnTemplate = {
  name: "docking-first",
  strip: [...AGGREGATE_AND_SCORE_COLUMNS, DOCKING_SCORE],
  insert: [
    AVG_NORM_DOCKING,
    DELTA_NORM_DOCKING,
    NORM_DOCKING_SCORE,
    DOCKING_SCORE,
    AVG_MPO,
    DELTA_MPO,
    MPO_SCORE,
  ],
  anchor: TITLE,
};

// Key fields lead; everything else keeps its prior relative order.
export const BENCHMARK_TEMPLATE: ColumnTemplate = {
  name: "benchmark-first",
  strip: [],
  insert: [TITLE, AVG_MPO, AVG_NORM_DOCKING, NORM_DOCKING_SCORE, DOCKING_SCORE],
  anchor: null,
};
