/**
 * ETF ALLOCATION MODULE
 *
 * Macro-health weighted currency basket: panel ingestion, currency and FX
 * resolution, eligibility filtering, composite scoring and USD valuation.
 */

import type { FastifyInstance } from 'fastify';
import type { Env } from '../../config/env.js';
import type { RetryPolicy } from '../network/httpClient.factory.js';
import { registerEtfRoutes, type EtfRoutesDeps } from './api/etf.routes.js';
import { CsvPanelSource } from './ingest/panel.loader.js';
import { RestCountriesClient } from './ingest/country.client.js';
import { FreeCurrencyApiClient } from './ingest/fx.client.js';
import { runEtfPipeline } from './services/etf_pipeline.service.js';
import { EtfSnapshotCache } from './services/snapshot_cache.service.js';

// ═══════════════════════════════════════════════════════════════
// WIRING
// ═══════════════════════════════════════════════════════════════

export function createEtfAllocationRuntime(env: Env): EtfRoutesDeps {
  const retry: RetryPolicy = {
    attempts: env.HTTP_RETRY_ATTEMPTS,
    backoffMs: env.HTTP_RETRY_BACKOFF_MS,
    maxBackoffMs: env.HTTP_RETRY_MAX_BACKOFF_MS,
  };
  const http = {
    timeout: env.HTTP_TIMEOUT_MS,
    proxyUrl: env.HTTPS_PROXY_URL,
    retry,
  };

  const panel = new CsvPanelSource(env.PANEL_CSV_PATH, {
    countryColumn: env.PANEL_COUNTRY_COLUMN,
    indicatorColumn: env.PANEL_INDICATOR_COLUMN,
    firstYear: env.PANEL_FIRST_YEAR,
    lastYear: env.PANEL_LAST_YEAR,
  });
  const countries = new RestCountriesClient({ ...http, baseURL: env.COUNTRY_API_BASE });
  const fx = new FreeCurrencyApiClient(env.FREECURRENCY_API_KEY, { ...http, baseURL: env.FX_API_BASE });

  const cache = new EtfSnapshotCache(() =>
    runEtfPipeline(
      { panel, currencies: countries, fx },
      {
        profile: env.HEALTH_PROFILE,
        includeHistoricalFx: env.FX_HISTORICAL_ENABLED,
        topN: env.SUMMARY_TOP_N,
      }
    )
  );

  return {
    cache,
    fx,
    settings: {
      profile: env.HEALTH_PROFILE,
      maxAgeMs: env.SNAPSHOT_MAX_AGE_MS,
      topN: env.SUMMARY_TOP_N,
    },
  };
}

// ═══════════════════════════════════════════════════════════════
// REGISTER MODULE
// ═══════════════════════════════════════════════════════════════

export async function registerEtfAllocationModule(
  fastify: FastifyInstance,
  deps: EtfRoutesDeps
): Promise<void> {
  console.log('[ETF] Registering ETF Allocation Module');
  await registerEtfRoutes(fastify, deps);
  console.log('[ETF] ✅ ETF Allocation Module registered');
}

export * from './contracts/etf.contracts.js';
export { runEtfPipeline } from './services/etf_pipeline.service.js';
export { EtfSnapshotCache } from './services/snapshot_cache.service.js';
export { HEALTH_PROFILES } from './data/health_profiles.js';
export { INDICATOR_REGISTRY } from './data/indicator.registry.js';
