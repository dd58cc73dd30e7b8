/**
 * ETF PIPELINE SERVICE
 *
 * One complete allocation run:
 *   panel → FX rates → temporal selection → currency resolution → FX join
 *   → health filter → composite scoring → valuation → top-N summary
 *
 * Any stage failure rejects the run; no partial snapshot is produced.
 */

import { v4 as uuidv4 } from 'uuid';
import { AppError } from '../../../common/errors.js';
import { HEALTH_PROFILES, profileIndicators, type HealthProfileName } from '../data/health_profiles.js';
import type { PanelSource } from '../ingest/panel.loader.js';
import type { CurrencyLookup } from '../ingest/country.client.js';
import type { FxRateSource } from '../ingest/fx.client.js';
import type {
  EtfSnapshot,
  PricedCountryRow,
  ScoringKey,
} from '../contracts/etf.contracts.js';
import { selectIndicatorValues } from './temporal_selector.service.js';
import { resolveCurrencies } from './currency_resolver.service.js';
import { fetchFxRates, joinFxRates } from './fx_join.service.js';
import { applyHealthFilter } from './health_filter.service.js';
import { computeCompositeScores } from './composite_score.service.js';
import { buildTopSummary, computeEtfValue, DEFAULT_TOP_N } from './valuation.service.js';

export interface EtfPipelineDeps {
  panel: PanelSource;
  currencies: CurrencyLookup;
  fx: FxRateSource;
  now?: () => Date;
}

export interface EtfPipelineOptions {
  profile: HealthProfileName;
  includeHistoricalFx: boolean;
  topN?: number;
}

const WEIGHT_SUM_TOLERANCE = 1e-9;

function freezeRow(row: PricedCountryRow): PricedCountryRow {
  Object.freeze(row.indicators);
  return Object.freeze(row);
}

export function scoringColumnsFor(options: EtfPipelineOptions): ScoringKey[] {
  const columns: ScoringKey[] = profileIndicators(HEALTH_PROFILES[options.profile]);
  if (options.includeHistoricalFx) columns.push('fxChange');
  return columns;
}

export async function runEtfPipeline(
  deps: EtfPipelineDeps,
  options: EtfPipelineOptions
): Promise<EtfSnapshot> {
  const start = Date.now();
  const runId = uuidv4();
  const now = deps.now ? deps.now() : new Date();
  const currentYear = now.getUTCFullYear();
  const profile = HEALTH_PROFILES[options.profile];

  console.log(`[ETF] Run ${runId} started (profile=${profile.name}, year=${currentYear})`);

  const panel = await deps.panel.load();
  const fxRates = await fetchFxRates(deps.fx, now, options.includeHistoricalFx);

  const countries = selectIndicatorValues(panel, currentYear);
  const { resolved, unresolved } = await resolveCurrencies(countries, deps.currencies);
  const { priced, missingRate } = joinFxRates(resolved, fxRates);

  if (priced.length === 0) {
    throw new AppError(
      'EMPTY_ALLOCATION',
      `No country left after currency resolution and FX join (${countries.length} in panel)`
    );
  }

  const health = applyHealthFilter(priced, profile);
  const wide = Object.freeze(health.rows.map(freezeRow));

  const scoring = computeCompositeScores(wide, scoringColumnsFor(options));

  const weightSum = scoring.weights.reduce((sum, w) => sum + w.weight, 0);
  if (Math.abs(weightSum - 1) > WEIGHT_SUM_TOLERANCE || scoring.weights.some(w => !(w.weight > 0))) {
    throw new AppError('INVARIANT_VIOLATION', `Weights do not form an allocation (sum=${weightSum})`);
  }

  const usdValue = computeEtfValue(scoring.weights, wide);
  const summary = buildTopSummary(scoring.weights, wide, options.topN ?? DEFAULT_TOP_N);

  const warnings = [...scoring.warnings];
  if (health.skipped) {
    warnings.unshift(`Health profile "${profile.name}" matched no country; filter skipped`);
  }

  const processingTimeMs = Date.now() - start;
  console.log(
    `[ETF] Run ${runId} complete: ${scoring.weights.length} weighted countries, ` +
    `value=${usdValue.toFixed(4)} USD, ${processingTimeMs}ms`
  );

  return {
    runId,
    builtAt: now.toISOString(),
    currentYear,
    profile: profile.name,
    usdValue,
    weights: scoring.weights,
    wide,
    summary,
    fx: {
      historicalDate: fxRates.historicalDate,
      currencies: Object.keys(fxRates.latest).length,
    },
    diagnostics: {
      panelCountries: countries.length,
      unresolvedCurrency: unresolved,
      missingFxRate: missingRate,
      healthFilter: {
        profile: profile.name,
        inputCount: health.inputCount,
        matched: health.matched,
        skipped: health.skipped,
      },
      scoringColumns: scoring.scoringColumns,
      droppedScoringColumns: scoring.droppedColumns,
      positiveScores: scoring.positiveScores,
      positivityFallback: scoring.positivityFallback,
      equalWeightFallback: scoring.equalWeightFallback,
      warnings,
    },
    processingTimeMs,
  };
}
