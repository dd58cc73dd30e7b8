/**
 * VALUATION SERVICE
 *
 * USD value of one allocation unit and the top-N projection for display.
 */

import { AppError } from '../../../common/errors.js';
import type {
  PricedCountryRow,
  SummaryRow,
  WeightRow,
} from '../contracts/etf.contracts.js';

export const DEFAULT_TOP_N = 10;

function round2(x: number): number {
  return Math.round(x * 100) / 100;
}

function indexWide(wide: readonly PricedCountryRow[]): Map<string, PricedCountryRow> {
  return new Map(wide.map(row => [row.country, row] as const));
}

function requireWideRow(index: Map<string, PricedCountryRow>, country: string): PricedCountryRow {
  const row = index.get(country);
  if (!row) {
    // Scored rows are always a subset of the FX-joined rows
    throw new AppError('INVARIANT_VIOLATION', `Weighted country "${country}" has no FX rate in the wide table`);
  }
  return row;
}

/**
 * Σ weight × (1 / fxRate): dollars bought by one unit spread over the basket.
 */
export function computeEtfValue(
  weights: readonly WeightRow[],
  wide: readonly PricedCountryRow[]
): number {
  const index = indexWide(wide);
  return weights.reduce((sum, w) => sum + w.weight * (1 / requireWideRow(index, w.country).fxRate), 0);
}

/**
 * Weight descending, ties by country name ascending.
 */
export function compareByWeight(a: WeightRow, b: WeightRow): number {
  if (b.weight !== a.weight) return b.weight - a.weight;
  return a.country.localeCompare(b.country, 'en');
}

export function buildTopSummary(
  weights: readonly WeightRow[],
  wide: readonly PricedCountryRow[],
  n: number = DEFAULT_TOP_N
): SummaryRow[] {
  const index = indexWide(wide);

  return [...weights]
    .sort(compareByWeight)
    .slice(0, Math.max(0, n))
    .map(w => {
      const row = requireWideRow(index, w.country);
      return {
        country: w.country,
        currency: row.currency,
        weightPct: round2(w.weight * 100),
        usdPerUnit: round2(1 / row.fxRate),
        gdp: row.indicators.gdp,
        unemployment: row.indicators.unemployment,
        inflation: row.indicators.inflation,
      };
    });
}
