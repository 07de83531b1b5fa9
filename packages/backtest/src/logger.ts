/**
 * Backtest Package Logger
 * =======================
 * Centralized logger for the backtest package with namespace '@retirecheck/backtest'
 */

import { createPackageLogger } from '@retirecheck/utils';

export const logger = createPackageLogger('@retirecheck/backtest');
