import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'url';
import { PanelSchemaError } from '../../../common/errors.js';
import {
  CsvPanelSource,
  loadPanel,
  parsePanelCsv,
  parsePanelValue,
} from '../ingest/panel.loader.js';
import type { PanelSchema } from '../contracts/etf.contracts.js';

const schema: PanelSchema = {
  countryColumn: 'COUNTRY',
  indicatorColumn: 'INDICATOR',
  firstYear: 2023,
  lastYear: 2025,
};

const fixturePath = fileURLToPath(new URL('./fixtures/panel.csv', import.meta.url));
const datasetPath = fileURLToPath(new URL('../../../../data/imf_dataset.csv', import.meta.url));

describe('parsePanelValue', () => {
  it('parses plain and thousands-separated numbers', () => {
    expect(parsePanelValue(' 12.5 ')).toBe(12.5);
    expect(parsePanelValue('1,000')).toBe(1000);
    expect(parsePanelValue('-3')).toBe(-3);
  });

  it('maps missing markers and garbage to null', () => {
    expect(parsePanelValue(undefined)).toBeNull();
    expect(parsePanelValue('')).toBeNull();
    expect(parsePanelValue('n/a')).toBeNull();
    expect(parsePanelValue('NA')).toBeNull();
    expect(parsePanelValue('--')).toBeNull();
    expect(parsePanelValue('..')).toBeNull();
    expect(parsePanelValue('abc')).toBeNull();
  });
});

describe('parsePanelCsv', () => {
  it('emits one record per series and year', () => {
    const csv = [
      'COUNTRY,INDICATOR,2023,2024,2025',
      'Alpha,LUR,5,n/a,7',
      '"Beta, Republic of",NGDPD,"1,234.5",--',
    ].join('\n');

    const panel = parsePanelCsv(csv, schema);

    expect(panel.years).toEqual([2023, 2024, 2025]);
    expect(panel.source).toBe('inline');
    expect(panel.records).toEqual([
      { country: 'Alpha', indicator: 'LUR', year: 2023, value: 5 },
      { country: 'Alpha', indicator: 'LUR', year: 2024, value: null },
      { country: 'Alpha', indicator: 'LUR', year: 2025, value: 7 },
      { country: 'Beta, Republic of', indicator: 'NGDPD', year: 2023, value: 1234.5 },
      { country: 'Beta, Republic of', indicator: 'NGDPD', year: 2024, value: null },
      { country: 'Beta, Republic of', indicator: 'NGDPD', year: 2025, value: null },
    ]);
  });

  it('ignores extra columns and rows without identifiers', () => {
    const csv = [
      'Notes,COUNTRY,INDICATOR,2023,2024,2025',
      'x,Alpha,LUR,1,2,3',
      'y,,LUR,4,5,6',
      'z,Gamma,,7,8,9',
    ].join('\n');

    const panel = parsePanelCsv(csv, schema);
    expect(panel.records.map(r => r.value)).toEqual([1, 2, 3]);
  });

  it('rejects a header without the identifier columns', () => {
    const csv = 'Country,INDICATOR,2023,2024,2025\nAlpha,LUR,1,2,3';
    expect(() => parsePanelCsv(csv, schema)).toThrow(PanelSchemaError);
    expect(() => parsePanelCsv(csv, schema)).toThrow('inline: missing identifier column(s): COUNTRY');
  });

  it('rejects a header without every configured year', () => {
    const csv = 'COUNTRY,INDICATOR,2023,2024\nAlpha,LUR,1,2';
    expect(() => parsePanelCsv(csv, schema)).toThrow('inline: missing year column(s): 2025');
  });

  it('rejects a repeated series', () => {
    const csv = [
      'COUNTRY,INDICATOR,2023,2024,2025',
      'Alpha,LUR,1,2,3',
      'Alpha,LUR,4,5,6',
    ].join('\n');
    expect(() => parsePanelCsv(csv, schema)).toThrow('inline: duplicate series Alpha / LUR at line 3');
  });

  it('rejects an empty file', () => {
    expect(() => parsePanelCsv('', schema)).toThrow('inline: empty panel file');
  });
});

describe('CsvPanelSource', () => {
  it('loads a panel file from disk', async () => {
    const panel = await new CsvPanelSource(fixturePath, schema).load();

    expect(panel.source).toBe(fixturePath);
    expect(panel.records).toHaveLength(9);
    expect(panel.records.filter(r => r.country === 'Alpha' && r.indicator === 'NGDPD').map(r => r.value))
      .toEqual([1250.5, 1300, null]);
    expect(panel.records.filter(r => r.indicator === 'PCPIPCH').map(r => r.value))
      .toEqual([2.1, null, 3.4]);
  });

  it('reports an unreadable file as a schema error', async () => {
    await expect(loadPanel('does/not/exist.csv', schema)).rejects.toBeInstanceOf(PanelSchemaError);
  });

  it('reads the bundled dataset with the default column layout', async () => {
    const panel = await loadPanel(datasetPath, { ...schema, firstYear: 2020, lastYear: 2026 });

    const countries = new Set(panel.records.map(r => r.country));
    expect(countries.size).toBe(13);
    expect(panel.records).toHaveLength(13 * 7 * 7);
  });
});
