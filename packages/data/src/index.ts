/**
 * @retirecheck/data - Price series providers
 *
 * Turns external price files into the ascending series the engine consumes.
 */

export type { PriceLoadParams, PriceSeriesLoader, CsvPriceLoadParams } from './loaders/types.js';
export {
  CsvPriceSeriesLoader,
  parsePriceCsv,
  DEFAULT_DATE_COLUMN,
  DEFAULT_PRICE_COLUMN,
  type PriceCsvColumns,
} from './loaders/csv-price-loader.js';

// Package logger
export { logger } from './logger.js';
