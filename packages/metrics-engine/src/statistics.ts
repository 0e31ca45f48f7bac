const ZERO_TOLERANCE = 1e-12;

export function isEffectivelyZero(value: number): boolean {
  return Math.abs(value) < ZERO_TOLERANCE;
}

export function sum(values: readonly number[]): number {
  let total = 0;
  for (const value of values) total += value;
  return total;
}

export function mean(values: readonly number[]): number {
  return values.length === 0 ? Number.NaN : sum(values) / values.length;
}

/** Sample standard deviation (n - 1 denominator). */
export function sampleStdDev(values: readonly number[]): number {
  if (values.length < 2) return Number.NaN;
  const avg = mean(values);
  let squares = 0;
  for (const value of values) squares += (value - avg) ** 2;
  return Math.sqrt(squares / (values.length - 1));
}

/**
 * Quantile of an ascending-sorted series with linear interpolation between
 * the closest ranks. `q` is a fraction in [0, 1].
 */
export function quantileSorted(sorted: ArrayLike<number>, q: number): number {
  if (sorted.length === 0) return Number.NaN;
  const position = (sorted.length - 1) * Math.min(Math.max(q, 0), 1);
  const lower = Math.floor(position);
  const upper = Math.ceil(position);
  const low = sorted[lower] ?? Number.NaN;
  const high = sorted[upper] ?? Number.NaN;
  return low + (high - low) * (position - lower);
}

export function quantile(values: readonly number[], q: number): number {
  return quantileSorted(
    [...values].sort((a, b) => a - b),
    q,
  );
}
