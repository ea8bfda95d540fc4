export interface GridLevel {
  readonly index: number;
  readonly price: number;
}

/**
 * Evenly spaced, ascending price levels from lower to upper (both included).
 *
 * Returns [] when lower <= 0, upper <= lower, count < 2 or any input is not
 * finite. An empty result means "grid generation failed"; callers abort the
 * placement attempt.
 */
export function generateGrid(lower: number, upper: number, count: number): GridLevel[] {
  if (!Number.isFinite(lower) || !Number.isFinite(upper)) return [];
  if (!Number.isInteger(count) || count < 2) return [];
  if (lower <= 0 || upper <= lower) return [];

  const step = (upper - lower) / (count - 1);
  const levels: GridLevel[] = [];
  for (let i = 0; i < count; i++) {
    // pin the top rung so float drift never overshoots the configured bound
    const price = i === count - 1 ? upper : lower + i * step;
    levels.push({ index: i, price });
  }
  return levels;
}

/**
 * Offset between a filled order and its opposite-side replacement.
 * Divides by count (not count - 1), so a replacement lands slightly inside
 * the neighbouring rung.
 */
export function gridSpacing(lower: number, upper: number, count: number): number {
  if (count <= 0 || upper <= lower) return 0;
  return (upper - lower) / count;
}
