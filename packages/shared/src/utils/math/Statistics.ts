/**
 * Statistics.ts
 *
 * Descriptive statistics shared by the detectors. Unknown observations are
 * `null` (or NaN) and are left out of every aggregate rather than read as 0.
 */

export type MaybeNumber = number | null;

const finiteValues = (values: readonly MaybeNumber[]): number[] =>
  values.filter((value): value is number => value !== null && Number.isFinite(value));

export function mean(values: readonly MaybeNumber[]): number | null {
  const finite = finiteValues(values);
  if (finite.length === 0) return null;
  return finite.reduce((sum, value) => sum + value, 0) / finite.length;
}

/**
 * Sample standard deviation (n - 1). A single observation has no spread and
 * yields 0; an empty input yields null.
 */
export function sampleStdDev(values: readonly MaybeNumber[]): number | null {
  const finite = finiteValues(values);
  if (finite.length === 0) return null;
  if (finite.length === 1) return 0;

  const avg = finite.reduce((sum, value) => sum + value, 0) / finite.length;
  const squared = finite.reduce((sum, value) => sum + (value - avg) ** 2, 0);
  return Math.sqrt(squared / (finite.length - 1));
}

export function median(values: readonly MaybeNumber[]): number | null {
  const sorted = finiteValues(values).sort((a, b) => a - b);
  if (sorted.length === 0) return null;

  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
}

/**
 * Z-scores of every element against the mean and sample standard deviation
 * of the whole sequence.
 *
 * - empty input is returned as an (empty) copy
 * - unknown entries stay `null`
 * - zero or undefined spread (constant series, a single observation) gives 0
 *   at every known position
 */
export function zScores(values: readonly MaybeNumber[]): MaybeNumber[] {
  if (values.length === 0) return [];

  const scoreKnown = (score: (value: number) => number): MaybeNumber[] =>
    values.map((value) => (value === null || !Number.isFinite(value) ? null : score(value)));

  const finite = finiteValues(values);
  if (finite.every((value) => value === finite[0])) {
    return scoreKnown(() => 0);
  }

  const avg = mean(values);
  const sd = sampleStdDev(values);
  if (avg === null || sd === null || sd === 0 || !Number.isFinite(sd)) {
    return scoreKnown(() => 0);
  }

  return scoreKnown((value) => (value - avg) / sd);
}

/**
 * Most frequent value. Ties resolve to the smallest value so the result does
 * not depend on row order.
 */
export function mode<T extends number | string>(values: readonly T[]): T | null {
  if (values.length === 0) return null;

  const counts = new Map<T, number>();
  for (const value of values) {
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }

  // eslint-disable-next-line functional/no-let
  let best: T | null = null;
  // eslint-disable-next-line functional/no-let
  let bestCount = 0;
  for (const [value, count] of counts) {
    if (count > bestCount || (count === bestCount && best !== null && value < best)) {
      best = value;
      bestCount = count;
    }
  }
  return best;
}
