/**
 * Required-column check for the compound scoring table.
 */

import type { CompoundTable } from "@/types/compound-table";
import { REQUIRED_COLUMNS } from "@/lib/compound-columns";
import { SchemaError } from "@/lib/errors";

/** Required columns absent from `columns`, in required-list order. */
export function findMissingColumns(
  columns: readonly string[],
  required: readonly string[] = REQUIRED_COLUMNS,
): string[] {
  const present = new Set(columns);
  return required.filter((c) => !present.has(c));
}

/**
 * Returns the table unchanged when every required column is present.
 * Throws SchemaError listing all missing columns otherwise.
 */
export function assertRequiredColumns<T extends CompoundTable>(
  table: T,
  required: readonly string[] = REQUIRED_COLUMNS,
): T {
  const missing = findMissingColumns(table.columns, required);
  if (missing.length > 0) throw new SchemaError(missing);
  return table;
}
