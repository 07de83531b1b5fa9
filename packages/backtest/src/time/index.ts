/**
 * Time and calendar utilities for the backtest engine.
 */

export { addCalendarYears, formatDay } from './calendar.js';
export { locateDay } from './day-locator.js';
