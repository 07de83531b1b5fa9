/**
 * Data Package Logger
 * ===================
 * Centralized logger for the data package with namespace '@retirecheck/data'
 */

import { createPackageLogger } from '@retirecheck/utils';

export const logger = createPackageLogger('@retirecheck/data');
