/**
 * PANEL LOADER
 *
 * Reads the indicator panel CSV: one row per (country, indicator), one column
 * per year. The header is validated against an explicit PanelSchema.
 */

import { readFile } from 'fs/promises';
import path from 'path';
import { parse } from 'csv-parse/sync';
import { PanelSchemaError, errorMessage } from '../../../common/errors.js';
import type { IndicatorPanel, PanelRecord, PanelSchema } from '../contracts/etf.contracts.js';

export interface PanelSource {
  load(): Promise<IndicatorPanel>;
}

const MISSING_MARKERS = new Set(['', 'n/a', 'na', '--', '..', 'nan', 'null']);

// ═══════════════════════════════════════════════════════════════
// PARSING
// ═══════════════════════════════════════════════════════════════

export function parsePanelValue(raw: string | undefined): number | null {
  if (raw === undefined) return null;
  const cleaned = raw.trim();
  if (MISSING_MARKERS.has(cleaned.toLowerCase())) return null;

  const value = Number(cleaned.replace(/,/g, ''));
  return Number.isFinite(value) ? value : null;
}

export function schemaYears(schema: PanelSchema): number[] {
  const years: number[] = [];
  for (let y = schema.firstYear; y <= schema.lastYear; y++) years.push(y);
  return years;
}

/**
 * Parse panel CSV content. Throws PanelSchemaError when the header lacks an
 * identifier or year column, or when a (country, indicator) pair repeats.
 */
export function parsePanelCsv(
  content: string,
  schema: PanelSchema,
  source: string = 'inline'
): IndicatorPanel {
  let rows: string[][];
  try {
    rows = parse(content, {
      bom: true,
      trim: true,
      skip_empty_lines: true,
      relax_column_count: true,
    });
  } catch (error) {
    throw new PanelSchemaError(`${source}: unreadable CSV: ${errorMessage(error)}`);
  }

  const header = rows[0];
  if (!header) {
    throw new PanelSchemaError(`${source}: empty panel file`);
  }

  const countryIdx = header.indexOf(schema.countryColumn);
  const indicatorIdx = header.indexOf(schema.indicatorColumn);
  const missingIds = [
    countryIdx < 0 ? schema.countryColumn : null,
    indicatorIdx < 0 ? schema.indicatorColumn : null,
  ].filter((c): c is string => c !== null);
  if (missingIds.length > 0) {
    throw new PanelSchemaError(`${source}: missing identifier column(s): ${missingIds.join(', ')}`);
  }

  const years = schemaYears(schema);
  const yearColumns: Array<{ year: number; idx: number }> = [];
  const missingYears: number[] = [];
  for (const year of years) {
    const idx = header.indexOf(String(year));
    if (idx < 0) missingYears.push(year);
    else yearColumns.push({ year, idx });
  }
  if (missingYears.length > 0) {
    throw new PanelSchemaError(`${source}: missing year column(s): ${missingYears.join(', ')}`);
  }

  const records: PanelRecord[] = [];
  const seen = new Set<string>();

  for (let r = 1; r < rows.length; r++) {
    const row = rows[r];
    const country = row[countryIdx]?.trim() ?? '';
    const indicator = row[indicatorIdx]?.trim() ?? '';
    if (!country || !indicator) continue;

    const seriesKey = `${country}\u0000${indicator}`;
    if (seen.has(seriesKey)) {
      throw new PanelSchemaError(`${source}: duplicate series ${country} / ${indicator} at line ${r + 1}`);
    }
    seen.add(seriesKey);

    for (const { year, idx } of yearColumns) {
      records.push({
        country,
        indicator,
        year,
        value: parsePanelValue(row[idx]),
      });
    }
  }

  return { records, years, source };
}

// ═══════════════════════════════════════════════════════════════
// FILE SOURCE
// ═══════════════════════════════════════════════════════════════

export class CsvPanelSource implements PanelSource {
  private readonly filePath: string;

  constructor(filePath: string, private readonly schema: PanelSchema) {
    this.filePath = path.resolve(process.cwd(), filePath);
  }

  async load(): Promise<IndicatorPanel> {
    let content: string;
    try {
      content = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      throw new PanelSchemaError(`Panel file not readable at ${this.filePath}: ${errorMessage(error)}`);
    }

    const panel = parsePanelCsv(content, this.schema, this.filePath);
    console.log(`[ETF Panel] Loaded ${panel.records.length} observations from ${this.filePath}`);
    return panel;
  }
}

export function loadPanel(filePath: string, schema: PanelSchema): Promise<IndicatorPanel> {
  return new CsvPanelSource(filePath, schema).load();
}
