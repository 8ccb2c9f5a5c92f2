/**
 * Pair aggregation: exact-pair detection, mean/absolute difference, and
 * pass-through of groups that are not pairs.
 */
import { describe, test, expect } from "vitest";
import {
  aggregatePairs,
  aggregatedColumnOrder,
  computePairAggregates,
  groupByIdentifier,
  readExistingAggregates,
} from "@/lib/pair-aggregation";
import type { CompoundTable, TableRow } from "@/types/compound-table";

// ─── Helpers ─────────────────────────────────────────────

const COLUMNS = ["ID", "Title", "MPO_score", "norm_docking_score", "docking score"];

function row(id: string, title: string, mpo: string, dock: string, raw = "-8.0"): TableRow {
  return { ID: id, Title: title, MPO_score: mpo, norm_docking_score: dock, "docking score": raw };
}

function makeTable(rows: TableRow[], columns: string[] = COLUMNS): CompoundTable {
  return { columns, rows };
}

// ─── Pairs ───────────────────────────────────────────────

describe("aggregatePairs — exact pairs", () => {
  const a1 = row("1", "A", "0.8", "0.6", "-9.1");
  const a2 = row("2", "A", "0.6", "0.4", "-8.7");
  const b1 = row("3", "B", "0.5", "0.5", "-7.0");
  const result = aggregatePairs(makeTable([a1, a2, b1]));
  const [ra1, ra2, rb1] = result.records;

  test("mean and absolute difference of both metrics", () => {
    expect(ra1.aggregates).not.toBeNull();
    expect(ra1.aggregates!.avgMpo).toBeCloseTo(0.7, 12);
    expect(ra1.aggregates!.deltaMpo).toBeCloseTo(0.2, 12);
    expect(ra1.aggregates!.avgNormDocking).toBe(0.5);
    expect(ra1.aggregates!.deltaNormDocking).toBeCloseTo(0.2, 12);
  });

  test("both members carry identical aggregates", () => {
    expect(ra2.aggregates).toEqual(ra1.aggregates);
    expect(ra1.groupSize).toBe(2);
    expect(ra2.groupSize).toBe(2);
  });

  test("derived cells mirror the aggregates and input cells are copied", () => {
    expect(ra1.cells.Avg_MPO).toBe(ra1.aggregates!.avgMpo);
    expect(ra1.cells.Delta_MPO).toBe(ra1.aggregates!.deltaMpo);
    expect(ra1.cells.Avg_norm_docking).toBe(0.5);
    expect(ra1.cells.Delta_norm_docking).toBe(ra1.aggregates!.deltaNormDocking);
    expect(ra1.cells.ID).toBe("1");
    expect(ra2.cells["docking score"]).toBe("-8.7");
  });

  test("input rows are not mutated", () => {
    expect(Object.keys(a1)).toEqual(["ID", "Title", "MPO_score", "norm_docking_score", "docking score"]);
    expect(ra1.cells).not.toBe(a1);
  });

  test("singleton passes through unchanged with aggregates unset", () => {
    expect(rb1.aggregates).toBeNull();
    expect(rb1.cells).toBe(b1);
    expect(rb1.cells.Avg_MPO).toBeUndefined();
    expect(rb1.groupSize).toBe(1);
  });

  test("swapping the two members does not change the aggregates", () => {
    const swapped = aggregatePairs(makeTable([a2, a1, b1]));
    expect(swapped.records[0].aggregates).toEqual(ra1.aggregates);
  });

  test("derived columns are appended after the input columns", () => {
    expect(result.columns).toEqual([
      ...COLUMNS,
      "Avg_MPO",
      "Delta_MPO",
      "Avg_norm_docking",
      "Delta_norm_docking",
    ]);
  });
});

// ─── Non-pairs ───────────────────────────────────────────

describe("aggregatePairs — groups that are not pairs", () => {
  const c1 = row("1", "C", "0.1", "0.1");
  const d1 = row("2", "D", "0.2", "0.2");
  const c2 = row("3", "C", "0.3", "0.3");
  const c3 = row("4", "C", "0.4", "0.4");
  const result = aggregatePairs(makeTable([c1, d1, c2, c3]));

  test("row count is preserved", () => {
    expect(result.records).toHaveLength(4);
  });

  test("groups come out in first-seen order, members in input order", () => {
    expect(result.records.map((r) => r.sourceIndex)).toEqual([0, 2, 3, 1]);
    expect(result.records.map((r) => r.identifier)).toEqual(["C", "C", "C", "D"]);
  });

  test("triplet and singleton rows are identical to their inputs", () => {
    expect(result.records.map((r) => r.cells)).toEqual([c1, c2, c3, d1]);
    for (const r of result.records) expect(r.aggregates).toBeNull();
    expect(result.records[0].groupSize).toBe(3);
    expect(result.records[3].groupSize).toBe(1);
  });

  test("interleaved pair members are gathered into their group", () => {
    const a1 = row("1", "A", "0.8", "0.6");
    const b1 = row("2", "B", "0.5", "0.5");
    const a2 = row("3", "A", "0.6", "0.4");
    const out = aggregatePairs(makeTable([a1, b1, a2]));
    expect(out.records.map((r) => r.identifier)).toEqual(["A", "A", "B"]);
    expect(out.records[1].aggregates).toEqual(out.records[0].aggregates);
  });
});

// ─── Edge cases ──────────────────────────────────────────

describe("aggregatePairs — edge cases", () => {
  test("blank metric leaves that metric unset but still computes the other", () => {
    const agg = computePairAggregates(row("1", "E", "", "0.9"), row("2", "E", "0.4", "0.5"));
    expect(agg.avgMpo).toBeNull();
    expect(agg.deltaMpo).toBeNull();
    expect(agg.avgNormDocking).toBeCloseTo(0.7, 12);
    expect(agg.deltaNormDocking).toBeCloseTo(0.4, 12);
  });

  test("non-numeric metric text is missing, never zero", () => {
    const agg = computePairAggregates(row("1", "E", "n/a", "0.9"), row("2", "E", "0.4", "0.5"));
    expect(agg.avgMpo).toBeNull();
  });

  test("identifiers are grouped after trimming", () => {
    const groups = groupByIdentifier([row("1", "A ", "0.1", "0.1"), row("2", " A", "0.3", "0.3")]);
    expect([...groups.keys()]).toEqual(["A"]);
    expect(groups.get("A")).toHaveLength(2);
  });

  test("existing derived columns are not duplicated", () => {
    expect(aggregatedColumnOrder(["Title", "Avg_MPO", "Delta_MPO"])).toEqual([
      "Title",
      "Avg_MPO",
      "Delta_MPO",
      "Avg_norm_docking",
      "Delta_norm_docking",
    ]);
  });

  test("singleton carrying derived cells keeps them as its aggregates", () => {
    const rerun = { ...row("1", "F", "0.2", "0.2"), Avg_MPO: "0.75", Avg_norm_docking: "0.4" };
    const out = aggregatePairs(makeTable([rerun]));
    expect(out.records[0].aggregates).toEqual({
      avgMpo: 0.75,
      deltaMpo: null,
      avgNormDocking: 0.4,
      deltaNormDocking: null,
    });
    expect(out.records[0].cells).toBe(rerun);
  });

  test("blank derived cells leave a singleton unset", () => {
    const blank = { ...row("1", "F", "0.2", "0.2"), Avg_MPO: "", Delta_MPO: " " };
    expect(readExistingAggregates(blank)).toBeNull();
  });

  test("empty table aggregates to no records", () => {
    expect(aggregatePairs(makeTable([])).records).toEqual([]);
  });
});
