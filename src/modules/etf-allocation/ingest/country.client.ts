/**
 * COUNTRY METADATA CLIENT
 *
 * Resolves a country name to its ISO-4217 currency codes through the
 * REST Countries API. An unknown name (404) is an empty result, any other
 * failure is an UpstreamError.
 */

import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import { createHttpClient, toUpstreamError, type HttpClientOptions } from '../../network/httpClient.factory.js';
import { schedule } from '../../network/rateLimiter.js';
import { TtlCache } from '../../shared/runtime/ttl-cache.js';

export interface CurrencyLookup {
  /** ISO-4217 codes for a country name; empty when the name is unknown */
  lookupCurrencies(countryName: string): Promise<string[]>;
}

const SERVICE = 'RestCountries';
const LOOKUP_TTL_MS = 24 * 60 * 60 * 1000;

const CountryEntrySchema = z.object({
  name: z.object({
    common: z.string(),
    official: z.string().optional(),
  }),
  currencies: z.record(z.string(), z.unknown()).optional(),
});

const CountryResponseSchema = z.array(CountryEntrySchema);

type CountryEntry = z.infer<typeof CountryEntrySchema>;

/**
 * Among several matches prefer an exact (case-insensitive) common or official
 * name, else the first entry.
 */
export function pickCountryEntry(entries: CountryEntry[], query: string): CountryEntry | null {
  const q = query.trim().toLowerCase();
  const exact = entries.find(
    e => e.name.common.toLowerCase() === q || e.name.official?.toLowerCase() === q
  );
  return exact ?? entries[0] ?? null;
}

export class RestCountriesClient implements CurrencyLookup {
  private readonly http: AxiosInstance;
  private readonly cache = new TtlCache<string[]>(LOOKUP_TTL_MS);

  constructor(options: Omit<HttpClientOptions, 'service'>) {
    this.http = createHttpClient({ ...options, service: SERVICE });
  }

  async lookupCurrencies(countryName: string): Promise<string[]> {
    const key = countryName.trim().toLowerCase();
    const cached = this.cache.get(key);
    if (cached) return cached;

    const codes = await schedule('RESTCOUNTRIES', () => this.fetchCurrencies(countryName));
    this.cache.set(key, codes);
    return codes;
  }

  private async fetchCurrencies(countryName: string): Promise<string[]> {
    try {
      const response = await this.http.get<unknown>(
        `/name/${encodeURIComponent(countryName.trim())}`,
        { params: { fields: 'name,currencies' } }
      );

      const parsed = CountryResponseSchema.safeParse(response.data);
      if (!parsed.success) {
        throw toUpstreamError(SERVICE, `unexpected payload for "${countryName}": ${parsed.error.message}`);
      }

      const entry = pickCountryEntry(parsed.data, countryName);
      return entry ? Object.keys(entry.currencies ?? {}) : [];
    } catch (error) {
      if (axios.isAxiosError(error) && error.response?.status === 404) {
        return [];
      }
      throw toUpstreamError(SERVICE, error);
    }
  }
}
