/**
 * CSV Price Series Loader
 *
 * Loads daily prices from a CSV file with a header row. The defaults match the
 * layout Yahoo Finance exports: `Date,Open,High,Low,Close,Adj Close,Volume`.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { parse } from 'csv-parse';
import { DateTime } from 'luxon';
import type { PriceSample } from '@retirecheck/core';
import { InputError } from '@retirecheck/utils';
import { logger } from '../logger.js';
import type { CsvPriceLoadParams, PriceSeriesLoader } from './types.js';

export const DEFAULT_DATE_COLUMN = 'Date';
export const DEFAULT_PRICE_COLUMN = 'High';

type CsvRow = Record<string, unknown>;

function isCsvRow(value: unknown): value is CsvRow {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class CsvPriceSeriesLoader implements PriceSeriesLoader<CsvPriceLoadParams> {
  public readonly name = 'csv-price-loader';

  canLoad(source: string): boolean {
    return source === 'csv';
  }

  async load(params: CsvPriceLoadParams): Promise<PriceSample[]> {
    if (!params.path) {
      throw new InputError('CSV loader requires a path parameter');
    }

    const filePath = path.isAbsolute(params.path)
      ? params.path
      : path.join(process.cwd(), params.path);

    let csvContent: string;
    try {
      csvContent = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      throw new InputError(
        `Cannot read price file ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
        { path: filePath }
      );
    }

    const samples = await parsePriceCsv(csvContent, {
      dateColumn: params.dateColumn ?? DEFAULT_DATE_COLUMN,
      priceColumn: params.priceColumn ?? DEFAULT_PRICE_COLUMN,
    });

    logger.debug('Loaded price series', {
      path: filePath,
      samples: samples.length,
      first: samples[0]?.date.toISODate(),
      last: samples[samples.length - 1]?.date.toISODate(),
    });

    return samples;
  }
}

export interface PriceCsvColumns {
  dateColumn: string;
  priceColumn: string;
}

/**
 * Parse CSV text into price samples.
 *
 * @throws InputError on a missing column, an unparsable date or price, or rows out of date order
 */
export async function parsePriceCsv(
  csvContent: string,
  columns: PriceCsvColumns = { dateColumn: DEFAULT_DATE_COLUMN, priceColumn: DEFAULT_PRICE_COLUMN }
): Promise<PriceSample[]> {
  const records = await parseRecords(csvContent);

  const samples: PriceSample[] = [];
  records.forEach((record, i) => {
    // Line 1 is the header
    const line = i + 2;
    const sample = toPriceSample(record, columns, line);

    const previous = samples[samples.length - 1];
    if (previous && sample.date.toMillis() < previous.date.toMillis()) {
      throw new InputError(
        `Price rows must be in ascending date order: line ${line} (${sample.date.toISODate()}) ` +
          `comes after ${previous.date.toISODate()}`,
        { line }
      );
    }
    samples.push(sample);
  });

  return samples;
}

function parseRecords(csvContent: string): Promise<CsvRow[]> {
  return new Promise((resolve, reject) => {
    parse(
      csvContent,
      {
        columns: true,
        skip_empty_lines: true,
        trim: true,
      },
      (err, records: unknown) => {
        if (err) {
          reject(new InputError(`Malformed CSV: ${err.message}`));
          return;
        }
        resolve(Array.isArray(records) ? records.filter(isCsvRow) : []);
      }
    );
  });
}

function toPriceSample(record: CsvRow, columns: PriceCsvColumns, line: number): PriceSample {
  const rawDate = record[columns.dateColumn];
  const rawPrice = record[columns.priceColumn];

  if (typeof rawDate !== 'string') {
    throw new InputError(`Missing column '${columns.dateColumn}' at line ${line}`, { line });
  }
  if (typeof rawPrice !== 'string') {
    throw new InputError(`Missing column '${columns.priceColumn}' at line ${line}`, { line });
  }

  const date = DateTime.fromISO(rawDate, { zone: 'utc' });
  if (!date.isValid) {
    throw new InputError(`Unparsable date '${rawDate}' at line ${line}`, {
      line,
      reason: date.invalidReason,
    });
  }

  const price = rawPrice === '' ? Number.NaN : Number(rawPrice);
  if (!Number.isFinite(price) || price <= 0) {
    throw new InputError(`Invalid price '${rawPrice}' at line ${line}`, { line });
  }

  return { date: date.startOf('day'), price };
}
