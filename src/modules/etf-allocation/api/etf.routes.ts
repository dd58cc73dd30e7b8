/**
 * ETF API ROUTES
 *
 * JSON endpoints over the cached allocation snapshot.
 */

import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { AppError } from '../../../common/errors.js';
import type { HealthProfileName } from '../data/health_profiles.js';
import type { EtfSnapshotCache } from '../services/snapshot_cache.service.js';
import { buildTopSummary } from '../services/valuation.service.js';
import type { EtfSnapshot } from '../contracts/etf.contracts.js';

export interface FxQuoteSource {
  hasApiKey(): boolean;
  getUsdRate(currency: string): Promise<number>;
}

export interface EtfRoutesDeps {
  cache: EtfSnapshotCache;
  fx: FxQuoteSource;
  settings: {
    profile: HealthProfileName;
    maxAgeMs: number;
    topN: number;
  };
}

const SnapshotQuerySchema = z.object({
  maxAgeMs: z.coerce.number().int().min(0).optional(),
  includeWide: z.enum(['true', 'false']).optional(),
});

const SummaryQuerySchema = z.object({
  maxAgeMs: z.coerce.number().int().min(0).optional(),
  limit: z.coerce.number().int().min(1).max(50).optional(),
});

const CurrencyParamsSchema = z.object({
  currency: z.string().regex(/^[A-Za-z]{3}$/, 'expected a 3-letter ISO-4217 code'),
});

function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.infer<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const message = parsed.error.issues
      .map(i => `${i.path.join('.') || 'input'}: ${i.message}`)
      .join('; ');
    throw new AppError('VALIDATION_ERROR', message, 400);
  }
  return parsed.data;
}

function snapshotMeta(snapshot: EtfSnapshot) {
  return {
    runId: snapshot.runId,
    builtAt: snapshot.builtAt,
    profile: snapshot.profile,
    currentYear: snapshot.currentYear,
  };
}

// ═══════════════════════════════════════════════════════════════
// REGISTER ROUTES
// ═══════════════════════════════════════════════════════════════

export async function registerEtfRoutes(
  fastify: FastifyInstance,
  deps: EtfRoutesDeps
): Promise<void> {
  const prefix = '/api/etf';
  const { cache, fx, settings } = deps;

  // ─────────────────────────────────────────────────────────────
  // Health check
  // ─────────────────────────────────────────────────────────────

  fastify.get(`${prefix}/health`, async () => {
    return {
      ok: true,
      module: 'etf-allocation',
      profile: settings.profile,
      fx: {
        hasApiKey: fx.hasApiKey(),
      },
      snapshot: cache.status(),
    };
  });

  // ─────────────────────────────────────────────────────────────
  // GET /snapshot: full allocation run
  // ─────────────────────────────────────────────────────────────

  fastify.get(`${prefix}/snapshot`, async (req) => {
    const query = parseInput(SnapshotQuerySchema, req.query);
    const snapshot = await cache.getOrRefresh(query.maxAgeMs ?? settings.maxAgeMs);

    return {
      ok: true,
      ...snapshotMeta(snapshot),
      usdValue: snapshot.usdValue,
      weights: snapshot.weights,
      summary: snapshot.summary,
      fx: snapshot.fx,
      diagnostics: snapshot.diagnostics,
      processingTimeMs: snapshot.processingTimeMs,
      ...(query.includeWide === 'true' ? { wide: snapshot.wide } : {}),
    };
  });

  // ─────────────────────────────────────────────────────────────
  // GET /summary: top-N rows
  // ─────────────────────────────────────────────────────────────

  fastify.get(`${prefix}/summary`, async (req) => {
    const query = parseInput(SummaryQuerySchema, req.query);
    const snapshot = await cache.getOrRefresh(query.maxAgeMs ?? settings.maxAgeMs);
    const limit = query.limit ?? settings.topN;

    // The snapshot carries the configured top-N; larger limits rebuild from weights
    const rows = limit <= snapshot.summary.length
      ? snapshot.summary.slice(0, limit)
      : buildTopSummary(snapshot.weights, snapshot.wide, limit);

    return {
      ok: true,
      ...snapshotMeta(snapshot),
      usdValue: snapshot.usdValue,
      count: rows.length,
      rows,
    };
  });

  // ─────────────────────────────────────────────────────────────
  // GET /value: USD value of one allocation unit
  // ─────────────────────────────────────────────────────────────

  fastify.get(`${prefix}/value`, async () => {
    const snapshot = await cache.getOrRefresh(settings.maxAgeMs);
    return {
      ok: true,
      usdValue: snapshot.usdValue,
      builtAt: snapshot.builtAt,
    };
  });

  // ─────────────────────────────────────────────────────────────
  // GET /weights: full weight table
  // ─────────────────────────────────────────────────────────────

  fastify.get(`${prefix}/weights`, async () => {
    const snapshot = await cache.getOrRefresh(settings.maxAgeMs);
    return {
      ok: true,
      ...snapshotMeta(snapshot),
      count: snapshot.weights.length,
      weights: snapshot.weights,
    };
  });

  // ─────────────────────────────────────────────────────────────
  // GET /fx/:currency: single latest USD rate
  // ─────────────────────────────────────────────────────────────

  fastify.get(`${prefix}/fx/:currency`, async (req) => {
    const params = parseInput(CurrencyParamsSchema, req.params);
    const currency = params.currency.toUpperCase();
    const rate = await fx.getUsdRate(currency);

    return {
      ok: true,
      base: 'USD',
      currency,
      rate,
      usdPerUnit: 1 / rate,
    };
  });

  // ─────────────────────────────────────────────────────────────
  // POST /admin/refresh: force a rebuild
  // ─────────────────────────────────────────────────────────────

  fastify.post(`${prefix}/admin/refresh`, async () => {
    console.log('[ETF API] Forced refresh requested');
    const snapshot = await cache.refresh();

    return {
      ok: true,
      ...snapshotMeta(snapshot),
      usdValue: snapshot.usdValue,
      countries: snapshot.weights.length,
      processingTimeMs: snapshot.processingTimeMs,
    };
  });

  console.log(`[ETF] Routes registered at ${prefix}/*`);
}
