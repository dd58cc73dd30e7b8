/**
 * COMPOSITE SCORE SERVICE
 *
 * Median imputation → population z-score per column → mean z-score per
 * country → keep positive scores → normalize to weights summing to 1.
 */

import type {
  PricedCountryRow,
  ScoringKey,
  WeightRow,
} from '../contracts/etf.contracts.js';
import { mean, median, zScores } from './stats.js';

export interface CompositeScoreResult {
  /** Final allocation, weight > 0, sum = 1 */
  weights: WeightRow[];
  /** Every input country with its composite score */
  scores: Array<{ country: string; compositeScore: number }>;
  scoringColumns: ScoringKey[];
  droppedColumns: ScoringKey[];
  positiveScores: number;
  positivityFallback: boolean;
  equalWeightFallback: boolean;
  warnings: string[];
}

export function scoringValue(row: PricedCountryRow, key: ScoringKey): number | null {
  const value = key === 'fxChange' ? row.fxChange : row.indicators[key];
  return value !== null && Number.isFinite(value) ? value : null;
}

export function computeCompositeScores(
  rows: readonly PricedCountryRow[],
  columns: readonly ScoringKey[]
): CompositeScoreResult {
  const warnings: string[] = [];
  const scoringColumns: ScoringKey[] = [];
  const droppedColumns: ScoringKey[] = [];
  const zColumns: number[][] = [];

  for (const key of columns) {
    const raw = rows.map(r => scoringValue(r, key));
    const fill = median(raw);

    if (fill === null) {
      droppedColumns.push(key);
      warnings.push(`Scoring column "${key}" has no values among ${rows.length} countries; excluded`);
      continue;
    }

    zColumns.push(zScores(raw.map(v => v ?? fill)));
    scoringColumns.push(key);
  }

  const scores = rows.map((row, i) => ({
    country: row.country,
    compositeScore: zColumns.length > 0 ? mean(zColumns.map(col => col[i])) : 0,
  }));

  const positive = scores.filter(s => s.compositeScore > 0);
  const positivityFallback = positive.length === 0 && scores.length > 0;
  if (positivityFallback) {
    warnings.push(`No positive composite score among ${scores.length} countries; using the full scored set`);
  }

  const retained = positivityFallback ? scores : positive;
  const total = retained.reduce((sum, s) => sum + s.compositeScore, 0);

  // Fallback scores are all <= 0, so score / sum has no meaningful sign
  const equalWeightFallback =
    retained.length > 0 && (positivityFallback || !(Number.isFinite(total) && total > 0));
  if (equalWeightFallback) {
    warnings.push(`Score sum ${total} is not positive; assigning equal weights`);
  }

  const weights: WeightRow[] = retained.map(s => ({
    country: s.country,
    compositeScore: s.compositeScore,
    weight: equalWeightFallback ? 1 / retained.length : s.compositeScore / total,
  }));

  for (const w of warnings) console.warn(`[ETF Score] ${w}`);

  return {
    weights,
    scores,
    scoringColumns,
    droppedColumns,
    positiveScores: positive.length,
    positivityFallback,
    equalWeightFallback,
    warnings,
  };
}
