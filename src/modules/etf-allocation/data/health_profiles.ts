/**
 * HEALTH PROFILES
 *
 * Macro-eligibility thresholds. Exactly one profile is active per deployment
 * (HEALTH_PROFILE). A missing indicator value fails its condition.
 */

import type { IndicatorKey } from './indicator.registry.js';

export type HealthProfileName = 'strict' | 'relaxed';

export type ThresholdCondition =
  | { kind: 'below'; indicator: IndicatorKey; limit: number }        // value < limit
  | { kind: 'above'; indicator: IndicatorKey; limit: number }        // value > limit
  | { kind: 'between'; indicator: IndicatorKey; min: number; max: number } // inclusive
  | { kind: 'atLeastMedian'; indicator: IndicatorKey };             // value >= median of input set

export interface HealthProfile {
  name: HealthProfileName;
  description: string;
  conditions: readonly ThresholdCondition[];
}

export const HEALTH_PROFILES: Record<HealthProfileName, HealthProfile> = {
  strict: {
    name: 'strict',
    description: 'Seven conditions including external debt and above-median GDP/exports',
    conditions: [
      { kind: 'below', indicator: 'unemployment', limit: 10 },
      { kind: 'below', indicator: 'govDebt', limit: 100 },
      { kind: 'between', indicator: 'inflation', min: 0, max: 6 },
      { kind: 'above', indicator: 'currentAccount', limit: -5 },
      { kind: 'below', indicator: 'externalDebt', limit: 80 },
      { kind: 'atLeastMedian', indicator: 'gdp' },
      { kind: 'atLeastMedian', indicator: 'exports' },
    ],
  },
  relaxed: {
    name: 'relaxed',
    description: 'Four fixed-bound conditions',
    conditions: [
      { kind: 'below', indicator: 'unemployment', limit: 15 },
      { kind: 'below', indicator: 'govDebt', limit: 150 },
      { kind: 'between', indicator: 'inflation', min: -2, max: 15 },
      { kind: 'above', indicator: 'currentAccount', limit: -10 },
    ],
  },
};

/**
 * Indicators a profile reads, in condition order, without duplicates.
 * These are also the profile's scoring columns.
 */
export function profileIndicators(profile: HealthProfile): IndicatorKey[] {
  const keys: IndicatorKey[] = [];
  for (const c of profile.conditions) {
    if (!keys.includes(c.indicator)) keys.push(c.indicator);
  }
  return keys;
}

export function describeCondition(c: ThresholdCondition): string {
  switch (c.kind) {
    case 'below':
      return `${c.indicator} < ${c.limit}`;
    case 'above':
      return `${c.indicator} > ${c.limit}`;
    case 'between':
      return `${c.min} <= ${c.indicator} <= ${c.max}`;
    case 'atLeastMedian':
      return `${c.indicator} >= median`;
  }
}
