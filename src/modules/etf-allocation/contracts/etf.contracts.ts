/**
 * ETF ALLOCATION CONTRACTS
 *
 * Data structures flowing through the allocation pipeline:
 * panel → country rows → priced rows → scored weights → snapshot.
 */

import type { IndicatorKey } from '../data/indicator.registry.js';
import type { HealthProfileName } from '../data/health_profiles.js';

// ═══════════════════════════════════════════════════════════════
// PANEL: raw (country, indicator, year) observations
// ═══════════════════════════════════════════════════════════════

export interface PanelRecord {
  country: string;
  indicator: string;  // panel indicator code
  year: number;
  value: number | null;
}

export interface IndicatorPanel {
  records: readonly PanelRecord[];
  years: readonly number[];
  source: string;
}

export interface PanelSchema {
  countryColumn: string;
  indicatorColumn: string;
  firstYear: number;
  lastYear: number;
}

// ═══════════════════════════════════════════════════════════════
// COUNTRY ROWS: one per country after temporal collapse
// ═══════════════════════════════════════════════════════════════

export type IndicatorValues = Record<IndicatorKey, number | null>;

export interface CountryRow {
  country: string;
  indicators: IndicatorValues;
}

export interface CurrencyCountryRow extends CountryRow {
  currency: string;
}

export interface PricedCountryRow extends CurrencyCountryRow {
  fxRate: number;            // units of currency per 1 USD, > 0
  fxRate1y: number | null;
  fxChange: number | null;   // (current - 1y) / 1y
}

/** Columns the composite scorer can read */
export type ScoringKey = IndicatorKey | 'fxChange';

// ═══════════════════════════════════════════════════════════════
// FX: currency code → units per 1 USD
// ═══════════════════════════════════════════════════════════════

export type FxRateTable = Record<string, number>;

export interface FxRates {
  base: 'USD';
  latest: FxRateTable;
  historical: FxRateTable | null;
  historicalDate: string | null;
}

// ═══════════════════════════════════════════════════════════════
// SCORING
// ═══════════════════════════════════════════════════════════════

export interface WeightRow {
  country: string;
  compositeScore: number;
  weight: number;
}

export interface SummaryRow {
  country: string;
  currency: string;
  weightPct: number;      // 2 decimals
  usdPerUnit: number;     // 1 / fxRate, 2 decimals
  gdp: number | null;
  unemployment: number | null;
  inflation: number | null;
}

// ═══════════════════════════════════════════════════════════════
// SNAPSHOT: one complete pipeline run
// ═══════════════════════════════════════════════════════════════

export interface EtfDiagnostics {
  panelCountries: number;
  unresolvedCurrency: string[];
  missingFxRate: string[];
  healthFilter: {
    profile: HealthProfileName;
    inputCount: number;
    matched: number;
    skipped: boolean;
  };
  scoringColumns: ScoringKey[];
  droppedScoringColumns: ScoringKey[];
  positiveScores: number;
  positivityFallback: boolean;
  equalWeightFallback: boolean;
  warnings: string[];
}

export interface EtfSnapshot {
  runId: string;
  builtAt: string;
  currentYear: number;
  profile: HealthProfileName;
  usdValue: number;
  weights: readonly WeightRow[];
  wide: readonly PricedCountryRow[];
  summary: readonly SummaryRow[];
  fx: {
    historicalDate: string | null;
    currencies: number;
  };
  diagnostics: EtfDiagnostics;
  processingTimeMs: number;
}
