import { describe, test, expect } from "vitest";
import { assertRequiredColumns, findMissingColumns } from "@/lib/schema-validation";
import { REQUIRED_COLUMNS } from "@/lib/compound-columns";
import { SchemaError } from "@/lib/errors";
import type { CompoundTable } from "@/types/compound-table";

const table = (columns: string[]): CompoundTable => ({ columns, rows: [] });

describe("findMissingColumns", () => {
  test("none missing when every required column is present", () => {
    expect(findMissingColumns(["Smiles", ...REQUIRED_COLUMNS])).toEqual([]);
  });

  test("lists every missing column in required order, not just the first", () => {
    expect(findMissingColumns(["docking score", "Title"])).toEqual([
      "MPO_score",
      "norm_docking_score",
    ]);
  });

  test("column names are matched exactly (case and spacing)", () => {
    expect(findMissingColumns(["title", "MPO_score", "norm_docking_score", "docking_score"])).toEqual([
      "Title",
      "docking score",
    ]);
  });
});

describe("assertRequiredColumns", () => {
  test("returns the same table object when valid", () => {
    const t = table([...REQUIRED_COLUMNS]);
    expect(assertRequiredColumns(t)).toBe(t);
  });

  test("throws SchemaError naming all missing columns", () => {
    let caught: unknown = null;
    try {
      assertRequiredColumns(table(["Title", "norm_docking_score"]));
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(SchemaError);
    if (!(caught instanceof SchemaError)) return;
    const err = caught;
    expect(err.missingColumns).toEqual(["MPO_score", "docking score"]);
    expect(err.message).toBe('Missing required columns: "MPO_score", "docking score"');
    expect(err.name).toBe("SchemaError");
  });

  test("custom required set", () => {
    expect(() => assertRequiredColumns(table(["a"]), ["a", "b"])).toThrow(SchemaError);
  });
});
