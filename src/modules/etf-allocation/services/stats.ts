/**
 * Column statistics. Null entries are missing values and are skipped.
 */

function present(values: readonly (number | null)[]): number[] {
  return values.filter((v): v is number => v !== null && Number.isFinite(v));
}

export function median(values: readonly (number | null)[]): number | null {
  const xs = present(values).sort((a, b) => a - b);
  if (xs.length === 0) return null;
  const mid = Math.floor(xs.length / 2);
  return xs.length % 2 === 1 ? xs[mid] : (xs[mid - 1] + xs[mid]) / 2;
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((a, b) => a + b, 0) / values.length;
}

export function populationStdDev(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const m = mean(values);
  const variance = values.reduce((sum, v) => sum + (v - m) ** 2, 0) / values.length;
  return Math.sqrt(variance);
}

/**
 * Population z-scores; a zero-variance column maps to all zeros.
 * Variance below float noise of the mean counts as zero.
 */
export function zScores(values: readonly number[]): number[] {
  const m = mean(values);
  const sd = populationStdDev(values);
  if (sd <= 1e-12 * Math.max(1, Math.abs(m))) return values.map(() => 0);
  return values.map(v => (v - m) / sd);
}
