import { describe, it, expect, vi } from 'vitest';
import { ConfigError } from '../../../common/errors.js';
import { parsePanelCsv, type PanelSource } from '../ingest/panel.loader.js';
import type { CurrencyLookup } from '../ingest/country.client.js';
import type { FxRateSource } from '../ingest/fx.client.js';
import { runEtfPipeline, scoringColumnsFor, type EtfPipelineDeps } from '../services/etf_pipeline.service.js';
import type { FxRateTable } from '../contracts/etf.contracts.js';

// ═══════════════════════════════════════════════════════════════
// Fixtures
// ═══════════════════════════════════════════════════════════════

const NOW = new Date('2026-03-01T00:00:00Z');

// LUR, GGXWDG_NGDP, PCPIPCH, BCA_NGDPD, NGDPD as of 2025
const MACRO: Record<string, [number, number, number, number, number]> = {
  Alpha: [4, 60, 2, 1, 500],
  Beta: [6, 90, 3, -1, 800],
  Gamma: [5, 50, 2, 0, 100],
  Delta: [5, 50, 2, 0, 100],
  Epsilon: [3, 40, 1, 5, 300],
  Zeta: [5, 30, 2.5, 3, 200],
};

const CODES = ['LUR', 'GGXWDG_NGDP', 'PCPIPCH', 'BCA_NGDPD', 'NGDPD'];

function panelCsv(): string {
  const lines = ['COUNTRY,INDICATOR,2024,2025,2026'];
  for (const [country, values] of Object.entries(MACRO)) {
    CODES.forEach((code, i) => lines.push(`${country},${code},,${values[i]},`));
  }
  return lines.join('\n');
}

const panel: PanelSource = {
  load: async () =>
    parsePanelCsv(panelCsv(), {
      countryColumn: 'COUNTRY',
      indicatorColumn: 'INDICATOR',
      firstYear: 2024,
      lastYear: 2026,
    }),
};

const CURRENCIES: Record<string, string[]> = {
  Alpha: ['AAA'],
  Beta: ['BBB'],
  Delta: ['XXX'],
  Epsilon: ['EEE'],
  Zeta: ['ZZZ'],
};

const LATEST: FxRateTable = { AAA: 0.9, BBB: 150, EEE: 0.88, ZZZ: 10.5 };
const HISTORICAL: FxRateTable = { AAA: 1.0, BBB: 140, EEE: 0.9, ZZZ: 10 };

function makeDeps(overrides: Partial<EtfPipelineDeps> = {}) {
  const lookupCurrencies = vi.fn(async (name: string) => CURRENCIES[name] ?? []);
  const getLatestRates = vi.fn(async () => LATEST);
  const getHistoricalRates = vi.fn(async (_date: string) => HISTORICAL);

  const currencies: CurrencyLookup = { lookupCurrencies };
  const fx: FxRateSource = { getLatestRates, getHistoricalRates };

  const deps: EtfPipelineDeps = { panel, currencies, fx, now: () => NOW, ...overrides };
  return { deps, lookupCurrencies, getLatestRates, getHistoricalRates };
}

// ═══════════════════════════════════════════════════════════════
// Tests
// ═══════════════════════════════════════════════════════════════

describe('runEtfPipeline', () => {
  it('builds an allocation over the healthy, priced countries', async () => {
    const { deps } = makeDeps();

    const snapshot = await runEtfPipeline(deps, { profile: 'relaxed', includeHistoricalFx: true });

    expect(snapshot.builtAt).toBe('2026-03-01T00:00:00.000Z');
    expect(snapshot.currentYear).toBe(2026);
    expect(snapshot.profile).toBe('relaxed');
    expect(snapshot.wide.map(r => r.country)).toEqual(['Alpha', 'Beta', 'Epsilon', 'Zeta']);

    const sum = snapshot.weights.reduce((s, w) => s + w.weight, 0);
    expect(Math.abs(sum - 1)).toBeLessThan(1e-9);
    expect(snapshot.weights.every(w => w.weight > 0)).toBe(true);
    expect(snapshot.weights.every(w => ['Alpha', 'Beta', 'Epsilon', 'Zeta'].includes(w.country))).toBe(true);
  });

  it('reports dropped countries in the diagnostics', async () => {
    const { deps } = makeDeps();

    const { diagnostics } = await runEtfPipeline(deps, { profile: 'relaxed', includeHistoricalFx: true });

    expect(diagnostics.panelCountries).toBe(6);
    expect(diagnostics.unresolvedCurrency).toEqual(['Gamma']);
    expect(diagnostics.missingFxRate).toEqual(['Delta']);
    expect(diagnostics.healthFilter).toEqual({ profile: 'relaxed', inputCount: 4, matched: 4, skipped: false });
    expect(diagnostics.scoringColumns).toEqual(['unemployment', 'govDebt', 'inflation', 'currentAccount', 'fxChange']);
  });

  it('values one unit as the weighted sum of USD per currency unit', async () => {
    const { deps } = makeDeps();

    const snapshot = await runEtfPipeline(deps, { profile: 'relaxed', includeHistoricalFx: true });
    const expected = snapshot.weights.reduce((sum, w) => sum + w.weight / LATEST[
      snapshot.wide.find(r => r.country === w.country)?.currency ?? ''
    ], 0);

    expect(snapshot.usdValue).toBeCloseTo(expected, 12);
  });

  it('summarizes the weights in descending order', async () => {
    const { deps } = makeDeps();

    const snapshot = await runEtfPipeline(deps, { profile: 'relaxed', includeHistoricalFx: false, topN: 2 });

    expect(snapshot.summary).toHaveLength(Math.min(2, snapshot.weights.length));
    const pcts = snapshot.summary.map(r => r.weightPct);
    expect([...pcts].sort((a, b) => b - a)).toEqual(pcts);
  });

  it('queries historical rates for the same day a year earlier', async () => {
    const { deps, getHistoricalRates } = makeDeps();

    const snapshot = await runEtfPipeline(deps, { profile: 'relaxed', includeHistoricalFx: true });

    expect(getHistoricalRates).toHaveBeenCalledWith('2025-03-01');
    expect(snapshot.fx).toEqual({ historicalDate: '2025-03-01', currencies: 4 });
    expect(snapshot.wide[0].fxChange).toBeCloseTo(-0.1, 12);
  });

  it('scores without FX change when historical rates are disabled', async () => {
    const { deps, getHistoricalRates } = makeDeps();

    const snapshot = await runEtfPipeline(deps, { profile: 'relaxed', includeHistoricalFx: false });

    expect(getHistoricalRates).not.toHaveBeenCalled();
    expect(snapshot.fx.historicalDate).toBeNull();
    expect(snapshot.diagnostics.scoringColumns).toEqual(['unemployment', 'govDebt', 'inflation', 'currentAccount']);
  });

  it('freezes the wide table', async () => {
    const { deps } = makeDeps();

    const snapshot = await runEtfPipeline(deps, { profile: 'relaxed', includeHistoricalFx: false });

    expect(Object.isFrozen(snapshot.wide)).toBe(true);
    expect(Object.isFrozen(snapshot.wide[0])).toBe(true);
    expect(Object.isFrozen(snapshot.wide[0].indicators)).toBe(true);
  });

  it('is deterministic for the same inputs and clock', async () => {
    const options = { profile: 'relaxed' as const, includeHistoricalFx: true };

    const first = await runEtfPipeline(makeDeps().deps, options);
    const second = await runEtfPipeline(makeDeps().deps, options);

    expect(second.runId).not.toBe(first.runId);
    expect(second.weights).toEqual(first.weights);
    expect(second.summary).toEqual(first.summary);
    expect(second.usdValue).toBe(first.usdValue);
    expect(second.diagnostics).toEqual(first.diagnostics);
  });

  it('skips the health filter when nothing passes and says so', async () => {
    const { deps } = makeDeps();

    // No external debt series in the panel: every strict check fails
    const snapshot = await runEtfPipeline(deps, { profile: 'strict', includeHistoricalFx: false });

    expect(snapshot.diagnostics.healthFilter).toEqual({ profile: 'strict', inputCount: 4, matched: 0, skipped: true });
    expect(snapshot.diagnostics.warnings[0]).toBe('Health profile "strict" matched no country; filter skipped');
    expect(snapshot.diagnostics.droppedScoringColumns).toEqual(['externalDebt', 'exports']);
    expect(snapshot.wide).toHaveLength(4);
  });

  it('fails on a missing FX credential before any country lookup', async () => {
    const { deps, lookupCurrencies } = makeDeps({
      fx: {
        getLatestRates: async () => {
          throw new ConfigError('FREECURRENCY_API_KEY not configured');
        },
        getHistoricalRates: async () => ({}),
      },
    });

    await expect(runEtfPipeline(deps, { profile: 'relaxed', includeHistoricalFx: false }))
      .rejects.toBeInstanceOf(ConfigError);
    expect(lookupCurrencies).not.toHaveBeenCalled();
  });

  it('fails when no country survives the FX join', async () => {
    const { deps } = makeDeps({ currencies: { lookupCurrencies: async () => [] } });

    await expect(runEtfPipeline(deps, { profile: 'relaxed', includeHistoricalFx: false }))
      .rejects.toMatchObject({ code: 'EMPTY_ALLOCATION' });
  });
});

describe('scoringColumnsFor', () => {
  it('appends FX change when historical rates are enabled', () => {
    expect(scoringColumnsFor({ profile: 'relaxed', includeHistoricalFx: true })).toEqual([
      'unemployment',
      'govDebt',
      'inflation',
      'currentAccount',
      'fxChange',
    ]);
  });
});
