/**
 * FX JOIN SERVICE
 *
 * Fetches the USD rate tables once per run and merges them into the
 * currency-resolved rows. Countries without a current rate are dropped.
 */

import type { FxRateSource } from '../ingest/fx.client.js';
import type {
  CurrencyCountryRow,
  FxRates,
  FxRateTable,
  PricedCountryRow,
} from '../contracts/etf.contracts.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface FxJoinResult {
  priced: PricedCountryRow[];
  missingRate: string[];
}

/**
 * UTC calendar date exactly `days` before `now`, as YYYY-MM-DD.
 */
export function isoDateDaysBefore(now: Date, days: number): string {
  return new Date(now.getTime() - days * DAY_MS).toISOString().slice(0, 10);
}

/**
 * One latest query and, optionally, one query for the same day a year ago.
 * Both run concurrently; either failing fails the run.
 */
export async function fetchFxRates(
  source: FxRateSource,
  now: Date,
  includeHistorical: boolean
): Promise<FxRates> {
  const historicalDate = includeHistorical ? isoDateDaysBefore(now, 365) : null;

  const [latest, historical] = await Promise.all([
    source.getLatestRates(),
    historicalDate ? source.getHistoricalRates(historicalDate) : Promise.resolve(null),
  ]);

  return { base: 'USD', latest, historical, historicalDate };
}

export function relativeChange(current: number, previous: number | null): number | null {
  if (previous === null || previous <= 0) return null;
  return (current - previous) / previous;
}

export function joinFxRates(
  rows: readonly CurrencyCountryRow[],
  rates: FxRates
): FxJoinResult {
  const priced: PricedCountryRow[] = [];
  const missingRate: string[] = [];

  for (const row of rows) {
    const fxRate = lookupRate(rates.latest, row.currency);
    if (fxRate === null) {
      missingRate.push(row.country);
      continue;
    }

    const fxRate1y = rates.historical ? lookupRate(rates.historical, row.currency) : null;

    priced.push({
      ...row,
      fxRate,
      fxRate1y,
      fxChange: relativeChange(fxRate, fxRate1y),
    });
  }

  if (missingRate.length > 0) {
    console.log(`[FX] No rate for ${missingRate.length} countries: ${missingRate.join(', ')}`);
  }

  return { priced, missingRate };
}

function lookupRate(table: FxRateTable, currency: string): number | null {
  const rate = table[currency.toUpperCase()];
  return rate !== undefined && Number.isFinite(rate) && rate > 0 ? rate : null;
}
