/** Pair statistics for enantiomer/analog score comparison. */

// ─── Mean / absolute difference ─────────────────────────────────────────────

/** Arithmetic mean of two scores. null if either is missing. */
export function pairMean(a: number | null, b: number | null): number | null {
  if (a === null || b === null) return null;
  return (a + b) / 2;
}

/** |a − b|, symmetric in its arguments. null if either is missing. */
export function absoluteDifference(a: number | null, b: number | null): number | null {
  if (a === null || b === null) return null;
  return Math.abs(a - b);
}
