/**
 * FX RATE CLIENT
 *
 * Client for freecurrencyapi.com. Rates are quoted against USD as
 * "units of currency per 1 USD". One batched request per call.
 */

import type { AxiosInstance } from 'axios';
import { z } from 'zod';
import { AppError, ConfigError, UpstreamError } from '../../../common/errors.js';
import { createHttpClient, toUpstreamError, type HttpClientOptions } from '../../network/httpClient.factory.js';
import type { FxRateTable } from '../contracts/etf.contracts.js';

// ═══════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════

export interface FxRateSource {
  getLatestRates(): Promise<FxRateTable>;
  /** Rates as of `date` (YYYY-MM-DD) */
  getHistoricalRates(date: string): Promise<FxRateTable>;
}

const LatestResponseSchema = z.object({
  data: z.record(z.string(), z.number()),
});

const HistoricalResponseSchema = z.object({
  data: z.record(z.string(), z.record(z.string(), z.number())),
});

const SERVICE = 'FreeCurrencyAPI';
const BASE_CURRENCY = 'USD';

/**
 * Keep only strictly positive, finite rates.
 */
export function sanitizeRates(raw: Record<string, number>): FxRateTable {
  const rates: FxRateTable = {};
  for (const [code, rate] of Object.entries(raw)) {
    if (Number.isFinite(rate) && rate > 0) {
      rates[code.toUpperCase()] = rate;
    }
  }
  return rates;
}

// ═══════════════════════════════════════════════════════════════
// CLIENT
// ═══════════════════════════════════════════════════════════════

export class FreeCurrencyApiClient implements FxRateSource {
  private readonly http: AxiosInstance;

  constructor(
    private readonly apiKey: string,
    options: Omit<HttpClientOptions, 'service'>
  ) {
    this.http = createHttpClient({ ...options, service: SERVICE });
  }

  hasApiKey(): boolean {
    return this.apiKey.trim().length > 0;
  }

  async getLatestRates(): Promise<FxRateTable> {
    const data = await this.request('/latest', { base_currency: BASE_CURRENCY }, LatestResponseSchema);
    const rates = sanitizeRates(data.data);
    console.log(`[FX] Latest USD rates: ${Object.keys(rates).length} currencies`);
    return rates;
  }

  async getHistoricalRates(date: string): Promise<FxRateTable> {
    const data = await this.request(
      '/historical',
      { base_currency: BASE_CURRENCY, date },
      HistoricalResponseSchema
    );

    // Keyed by date; some responses key by the closest published day
    const byDate = data.data[date] ?? Object.values(data.data)[0];
    if (!byDate) {
      throw new UpstreamError(SERVICE, `no historical rates returned for ${date}`);
    }

    const rates = sanitizeRates(byDate);
    console.log(`[FX] Historical USD rates for ${date}: ${Object.keys(rates).length} currencies`);
    return rates;
  }

  /**
   * Units of `currency` per 1 USD right now.
   */
  async getUsdRate(currency: string): Promise<number> {
    const code = currency.trim().toUpperCase();
    const data = await this.request(
      '/latest',
      { base_currency: BASE_CURRENCY, currencies: code },
      LatestResponseSchema
    );

    const rate = sanitizeRates(data.data)[code];
    if (rate === undefined) {
      throw new AppError('NOT_FOUND', `No USD rate for currency ${code}`, 404);
    }
    return rate;
  }

  private async request<S extends z.ZodTypeAny>(
    url: string,
    params: Record<string, string>,
    schema: S
  ): Promise<z.infer<S>> {
    // Checked before any network call
    if (!this.hasApiKey()) {
      throw new ConfigError('FREECURRENCY_API_KEY not configured');
    }

    let payload: unknown;
    try {
      const response = await this.http.get<unknown>(url, {
        params,
        headers: { apikey: this.apiKey },
      });
      payload = response.data;
    } catch (error) {
      const upstream = toUpstreamError(SERVICE, error);
      console.error(`[FX] ${url} failed: ${upstream.message}`);
      throw upstream;
    }

    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      throw new UpstreamError(SERVICE, `unexpected payload from ${url}: ${parsed.error.message}`);
    }
    return parsed.data;
  }
}
