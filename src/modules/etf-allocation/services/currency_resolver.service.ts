/**
 * CURRENCY RESOLVER SERVICE
 *
 * Maps country names to ISO-4217 codes with a three-tier name strategy:
 * full name, then the part before "(", then the part before ",".
 * Expected misses are explicit `unresolved` results; upstream failures
 * propagate and abort the run.
 */

import type { CurrencyLookup } from '../ingest/country.client.js';
import type { CountryRow, CurrencyCountryRow } from '../contracts/etf.contracts.js';

export type CurrencyResolution =
  | { status: 'resolved'; country: string; currency: string; matchedName: string }
  | { status: 'unresolved'; country: string; triedNames: string[] };

export interface CurrencyResolutionResult {
  resolved: CurrencyCountryRow[];
  unresolved: string[];
}

/**
 * Name variants to try, in order, without duplicates or blanks.
 */
export function candidateNames(country: string): string[] {
  const full = country.trim();
  const beforeParen = full.split('(')[0].trim();
  const beforeComma = full.split(',')[0].trim();

  const names: string[] = [];
  for (const name of [full, beforeParen, beforeComma]) {
    if (name && !names.includes(name)) names.push(name);
  }
  return names;
}

export async function resolveCurrency(
  country: string,
  lookup: CurrencyLookup
): Promise<CurrencyResolution> {
  const tried = candidateNames(country);

  for (const name of tried) {
    const codes = await lookup.lookupCurrencies(name);
    if (codes.length > 0) {
      return { status: 'resolved', country, currency: codes[0], matchedName: name };
    }
  }

  return { status: 'unresolved', country, triedNames: tried };
}

/**
 * Attach a currency to every row that resolves; unresolved countries are
 * dropped and reported.
 */
export async function resolveCurrencies(
  rows: readonly CountryRow[],
  lookup: CurrencyLookup
): Promise<CurrencyResolutionResult> {
  const resolutions = await Promise.all(rows.map(row => resolveCurrency(row.country, lookup)));

  const resolved: CurrencyCountryRow[] = [];
  const unresolved: string[] = [];

  rows.forEach((row, i) => {
    const res = resolutions[i];
    if (res.status === 'resolved') {
      resolved.push({ ...row, currency: res.currency });
    } else {
      console.warn(`[Currency] No currency for "${row.country}" (tried: ${res.triedNames.join(' | ')})`);
      unresolved.push(row.country);
    }
  });

  if (unresolved.length > 0) {
    console.log(`[Currency] Resolved ${resolved.length}/${rows.length}, dropped ${unresolved.length}`);
  }

  return { resolved, unresolved };
}
