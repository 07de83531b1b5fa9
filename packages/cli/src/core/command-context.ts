/**
 * Command Context - Lazy service creation
 *
 * This is NOT a framework - just an object that knows how to create services.
 * Removes service instantiation from command files and lets tests swap them.
 */

import { CsvPriceSeriesLoader, type CsvPriceLoadParams, type PriceSeriesLoader } from '@retirecheck/data';
import type { TraceOutput } from '@retirecheck/backtest';

/**
 * Services available in command context
 */
export interface CommandServices {
  priceSeriesLoader(): PriceSeriesLoader<CsvPriceLoadParams>;
  /** Where verbose simulation traces are written */
  traceOutput(): TraceOutput;
}

/**
 * Options for creating a CommandContext with service overrides
 */
export interface CommandContextOptions {
  priceSeriesLoaderOverride?: PriceSeriesLoader<CsvPriceLoadParams>;
  traceOutputOverride?: TraceOutput;
}

export class CommandContext {
  private _services: CommandServices | null = null;
  private readonly _options: CommandContextOptions;

  constructor(options: CommandContextOptions = {}) {
    this._options = options;
  }

  /**
   * Get services (lazy creation)
   */
  get services(): CommandServices {
    if (!this._services) {
      this._services = this._createServices();
    }
    return this._services;
  }

  /**
   * Uses overrides from options if provided, otherwise creates default instances
   */
  private _createServices(): CommandServices {
    let loader: PriceSeriesLoader<CsvPriceLoadParams> | undefined;
    return {
      priceSeriesLoader: () => {
        loader ??= this._options.priceSeriesLoaderOverride ?? new CsvPriceSeriesLoader();
        return loader;
      },
      traceOutput: () => this._options.traceOutputOverride ?? process.stdout,
    };
  }
}
