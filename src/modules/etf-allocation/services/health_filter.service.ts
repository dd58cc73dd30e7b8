/**
 * HEALTH FILTER SERVICE
 *
 * Applies the active profile's conjunction of thresholds. When nothing
 * passes, the filter is skipped and the input is returned unchanged.
 */

import {
  describeCondition,
  type HealthProfile,
  type ThresholdCondition,
} from '../data/health_profiles.js';
import type { IndicatorKey } from '../data/indicator.registry.js';
import type { CountryRow } from '../contracts/etf.contracts.js';
import { median } from './stats.js';

export interface HealthFilterResult<R extends CountryRow> {
  rows: R[];
  inputCount: number;
  matched: number;
  skipped: boolean;
}

type Medians = Partial<Record<IndicatorKey, number | null>>;

function computeMedians<R extends CountryRow>(
  rows: readonly R[],
  conditions: readonly ThresholdCondition[]
): Medians {
  const medians: Medians = {};
  for (const c of conditions) {
    if (c.kind !== 'atLeastMedian' || c.indicator in medians) continue;
    medians[c.indicator] = median(rows.map(r => r.indicators[c.indicator]));
  }
  return medians;
}

export function passesCondition(
  row: CountryRow,
  condition: ThresholdCondition,
  medians: Medians = {}
): boolean {
  const value = row.indicators[condition.indicator];
  if (value === null) return false;

  switch (condition.kind) {
    case 'below':
      return value < condition.limit;
    case 'above':
      return value > condition.limit;
    case 'between':
      return value >= condition.min && value <= condition.max;
    case 'atLeastMedian': {
      const m = medians[condition.indicator];
      return m !== undefined && m !== null && value >= m;
    }
  }
}

export function applyHealthFilter<R extends CountryRow>(
  rows: readonly R[],
  profile: HealthProfile
): HealthFilterResult<R> {
  const medians = computeMedians(rows, profile.conditions);
  const eligible = rows.filter(row =>
    profile.conditions.every(c => passesCondition(row, c, medians))
  );

  if (eligible.length === 0) {
    console.warn(
      `[ETF Health] Profile "${profile.name}" matched 0 of ${rows.length} countries ` +
      `(${profile.conditions.map(describeCondition).join(' AND ')}); filter skipped`
    );
    return { rows: [...rows], inputCount: rows.length, matched: 0, skipped: true };
  }

  console.log(`[ETF Health] Profile "${profile.name}": ${eligible.length}/${rows.length} countries eligible`);
  return { rows: eligible, inputCount: rows.length, matched: eligible.length, skipped: false };
}
