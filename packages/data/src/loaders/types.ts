/**
 * Price Series Loader Types and Interfaces
 *
 * A loader turns some external source into an ascending `PriceSample[]`.
 */

import type { PriceSample } from '@retirecheck/core';

/**
 * Parameters for loading a price series
 */
export interface PriceLoadParams {
  source: string;
}

/**
 * Base interface for all price series loaders
 */
export interface PriceSeriesLoader<P extends PriceLoadParams = PriceLoadParams> {
  /**
   * Load samples sorted ascending by date
   */
  load(params: P): Promise<PriceSample[]>;

  /**
   * Check if this loader can handle the given source
   */
  canLoad(source: string): boolean;

  /**
   * Get loader name for identification
   */
  readonly name: string;
}

/**
 * CSV-specific load parameters
 */
export interface CsvPriceLoadParams extends PriceLoadParams {
  source: 'csv';
  /** File path; relative paths resolve against the working directory */
  path: string;
  /** Header of the date column (default `Date`) */
  dateColumn?: string;
  /** Header of the price column (default `High`) */
  priceColumn?: string;
}
