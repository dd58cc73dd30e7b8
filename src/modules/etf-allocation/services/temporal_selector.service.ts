/**
 * TEMPORAL SELECTOR SERVICE
 *
 * Collapses the panel to one value per (country, indicator): the current-year
 * value if present, else the latest earlier year. Future-dated estimates are
 * never selected.
 */

import { INDICATOR_REGISTRY, type IndicatorSpec } from '../data/indicator.registry.js';
import type {
  CountryRow,
  IndicatorPanel,
  IndicatorValues,
} from '../contracts/etf.contracts.js';

interface Observation {
  year: number;
  value: number;
}

/**
 * Pick the value to use from one series' observations.
 * Returns null when nothing at or before `currentYear` is available.
 */
export function selectLatestValue(
  observations: readonly Observation[],
  currentYear: number
): number | null {
  let best: Observation | null = null;

  for (const obs of observations) {
    if (obs.year > currentYear) continue;
    if (obs.year === currentYear) return obs.value;
    if (!best || obs.year > best.year) best = obs;
  }

  return best ? best.value : null;
}

export function nullIndicatorValues(): IndicatorValues {
  return {
    gdp: null,
    unemployment: null,
    inflation: null,
    govDebt: null,
    currentAccount: null,
    externalDebt: null,
    exports: null,
  };
}

/**
 * Pivot the panel into one row per country with one column per registered
 * indicator. Countries are ordered by name; a country appears when the panel
 * carries at least one registered indicator series for it.
 */
export function selectIndicatorValues(
  panel: IndicatorPanel,
  currentYear: number,
  specs: readonly IndicatorSpec[] = INDICATOR_REGISTRY
): CountryRow[] {
  const codes = new Set(specs.map(s => s.panelCode));

  // country → panel code → non-missing observations
  const series = new Map<string, Map<string, Observation[]>>();

  for (const rec of panel.records) {
    if (!codes.has(rec.indicator)) continue;

    let perCountry = series.get(rec.country);
    if (!perCountry) {
      perCountry = new Map();
      series.set(rec.country, perCountry);
    }

    let observations = perCountry.get(rec.indicator);
    if (!observations) {
      observations = [];
      perCountry.set(rec.indicator, observations);
    }

    if (rec.value !== null) {
      observations.push({ year: rec.year, value: rec.value });
    }
  }

  const countries = Array.from(series.keys()).sort((a, b) => a.localeCompare(b, 'en'));

  return countries.map(country => {
    const perCountry = series.get(country) ?? new Map<string, Observation[]>();
    const indicators = nullIndicatorValues();

    for (const spec of specs) {
      indicators[spec.key] = selectLatestValue(perCountry.get(spec.panelCode) ?? [], currentYear);
    }

    return { country, indicators };
  });
}
