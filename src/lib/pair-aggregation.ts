/**
 * Pair grouping and aggregation for enantiomer/analog compound records.
 *
 * Rows sharing a Title form a group. A group of exactly two members is a pair:
 * both rows get the same mean and absolute difference of MPO and normalized
 * docking score. Any other group size passes through untouched; its aggregates
 * are read back from derived cells already on the row (a re-run over a written
 * report), and are unset when there are none.
 */

import type {
  AggregatedRecord,
  AggregatedTable,
  CompoundTable,
  PairAggregates,
  TableRow,
} from "@/types/compound-table";
import {
  AGGREGATE_COLUMNS,
  MPO_SCORE,
  NORM_DOCKING_SCORE,
  TITLE,
} from "@/lib/compound-columns";
import { parseMetric, readIdentifier } from "@/lib/metric-values";
import { absoluteDifference, pairMean } from "@/lib/statistics";

// ─── Grouping ───────────────────────────────────────────────────────────────

interface IndexedRow {
  row: TableRow;
  sourceIndex: number;
}

/**
 * Partition rows by identifier. Map iteration order is insertion order, so
 * groups come out in first-seen order with members in input order.
 */
export function groupByIdentifier(rows: readonly TableRow[]): Map<string, IndexedRow[]> {
  const groups = new Map<string, IndexedRow[]>();
  rows.forEach((row, sourceIndex) => {
    const key = readIdentifier(row[TITLE]);
    const list = groups.get(key);
    if (list) list.push({ row, sourceIndex });
    else groups.set(key, [{ row, sourceIndex }]);
  });
  return groups;
}

// ─── Pair statistics ────────────────────────────────────────────────────────

export function computePairAggregates(first: TableRow, second: TableRow): PairAggregates {
  const mpo1 = parseMetric(first[MPO_SCORE]);
  const mpo2 = parseMetric(second[MPO_SCORE]);
  const dock1 = parseMetric(first[NORM_DOCKING_SCORE]);
  const dock2 = parseMetric(second[NORM_DOCKING_SCORE]);
  return {
    avgMpo: pairMean(mpo1, mpo2),
    deltaMpo: absoluteDifference(mpo1, mpo2),
    avgNormDocking: pairMean(dock1, dock2),
    deltaNormDocking: absoluteDifference(dock1, dock2),
  };
}

/** Derived cells a row already carries, or null when all four are blank. */
export function readExistingAggregates(row: TableRow): PairAggregates | null {
  const aggregates: PairAggregates = {
    avgMpo: parseMetric(row[AGGREGATE_COLUMNS.avgMpo]),
    deltaMpo: parseMetric(row[AGGREGATE_COLUMNS.deltaMpo]),
    avgNormDocking: parseMetric(row[AGGREGATE_COLUMNS.avgNormDocking]),
    deltaNormDocking: parseMetric(row[AGGREGATE_COLUMNS.deltaNormDocking]),
  };
  return Object.values(aggregates).some((v) => v !== null) ? aggregates : null;
}

/** New row: every input field, then the four derived columns. */
function withAggregateCells(row: TableRow, aggregates: PairAggregates): TableRow {
  return {
    ...row,
    [AGGREGATE_COLUMNS.avgMpo]: aggregates.avgMpo,
    [AGGREGATE_COLUMNS.deltaMpo]: aggregates.deltaMpo,
    [AGGREGATE_COLUMNS.avgNormDocking]: aggregates.avgNormDocking,
    [AGGREGATE_COLUMNS.deltaNormDocking]: aggregates.deltaNormDocking,
  };
}

/** Input column order with any derived column not already present appended. */
export function aggregatedColumnOrder(columns: readonly string[]): string[] {
  const present = new Set(columns);
  const appended = Object.values(AGGREGATE_COLUMNS).filter((c) => !present.has(c));
  return [...columns, ...appended];
}

// ─── Aggregation ────────────────────────────────────────────────────────────

/**
 * Group rows by identifier and tag both members of every exact pair with the
 * same aggregates. Output is group by group in first-seen order.
 */
export function aggregatePairs(table: CompoundTable): AggregatedTable {
  const groups = groupByIdentifier(table.rows);
  const records: AggregatedRecord[] = [];

  for (const [identifier, members] of groups) {
    if (members.length !== 2) {
      for (const m of members) {
        records.push({
          identifier,
          cells: m.row,
          aggregates: readExistingAggregates(m.row),
          groupSize: members.length,
          sourceIndex: m.sourceIndex,
        });
      }
      continue;
    }

    const [first, second] = members;
    const aggregates = computePairAggregates(first.row, second.row);
    for (const m of members) {
      records.push({
        identifier,
        cells: withAggregateCells(m.row, aggregates),
        aggregates,
        groupSize: 2,
        sourceIndex: m.sourceIndex,
      });
    }
  }

  return { columns: aggregatedColumnOrder(table.columns), records };
}

/** Flatten back to a plain table (used for writing and for re-running). */
export function toCompoundTable(table: AggregatedTable): CompoundTable {
  return { columns: table.columns, rows: table.records.map((r) => r.cells) };
}
