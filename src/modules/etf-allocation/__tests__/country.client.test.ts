import { describe, it, expect } from 'vitest';
import { UpstreamError } from '../../../common/errors.js';
import { RestCountriesClient, pickCountryEntry } from '../ingest/country.client.js';
import { NO_RETRY, fakeTransport, type FakeReply } from './fixtures/builders.js';

function clientWith(replies: FakeReply[]) {
  const transport = fakeTransport(replies);
  const client = new RestCountriesClient({
    baseURL: 'http://countries.test/v3.1',
    adapter: transport.adapter,
    retry: NO_RETRY,
  });
  return { client, calls: transport.calls };
}

describe('pickCountryEntry', () => {
  const entries = [
    { name: { common: 'Equatorial Guinea' }, currencies: { XAF: {} } },
    { name: { common: 'Guinea', official: 'Republic of Guinea' }, currencies: { GNF: {} } },
  ];

  it('prefers an exact common or official name', () => {
    expect(pickCountryEntry(entries, 'guinea')?.name.common).toBe('Guinea');
    expect(pickCountryEntry(entries, 'Republic of Guinea')?.name.common).toBe('Guinea');
  });

  it('falls back to the first entry', () => {
    expect(pickCountryEntry(entries, 'Guin')?.name.common).toBe('Equatorial Guinea');
    expect(pickCountryEntry([], 'Guinea')).toBeNull();
  });
});

describe('RestCountriesClient', () => {
  it('returns the currency codes of the matched country', async () => {
    const { client, calls } = clientWith([
      {
        status: 200,
        data: [{ name: { common: 'South Korea', official: 'Republic of Korea' }, currencies: { KRW: { name: 'won' } } }],
      },
    ]);

    expect(await client.lookupCurrencies('Korea')).toEqual(['KRW']);
    expect(calls[0].url).toBe('/name/Korea');
    expect(calls[0].params).toEqual({ fields: 'name,currencies' });
  });

  it('encodes the name into the path', async () => {
    const { client, calls } = clientWith([{ status: 200, data: [] }]);

    await client.lookupCurrencies(' Czech Republic ');
    expect(calls[0].url).toBe('/name/Czech%20Republic');
  });

  it('treats an unknown name as no currencies', async () => {
    const { client } = clientWith([{ status: 404, data: { status: 404, message: 'Not Found' } }]);
    expect(await client.lookupCurrencies('Atlantis')).toEqual([]);
  });

  it('returns no codes for a country without currencies', async () => {
    const { client } = clientWith([{ status: 200, data: [{ name: { common: 'Antarctica' } }] }]);
    expect(await client.lookupCurrencies('Antarctica')).toEqual([]);
  });

  it('memoizes lookups by normalized name', async () => {
    const { client, calls } = clientWith([{ status: 200, data: [{ name: { common: 'Japan' }, currencies: { JPY: {} } }] }]);

    await client.lookupCurrencies('Japan');
    expect(await client.lookupCurrencies(' japan ')).toEqual(['JPY']);
    expect(calls).toHaveLength(1);
  });

  it('raises an upstream error on a server failure', async () => {
    const { client } = clientWith([{ status: 500, data: {} }]);

    await expect(client.lookupCurrencies('Japan')).rejects.toBeInstanceOf(UpstreamError);
    await expect(client.lookupCurrencies('Japan')).rejects.toMatchObject({ upstreamStatus: 500 });
  });

  it('raises an upstream error on an unexpected payload', async () => {
    const { client } = clientWith([{ status: 200, data: { name: 'Japan' } }]);
    await expect(client.lookupCurrencies('Japan')).rejects.toThrow(/^\[RestCountries\] unexpected payload for "Japan"/);
  });
});
