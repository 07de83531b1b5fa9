/**
 * Output Formatter - JSON, table, CSV formats
 */

import type { BacktestReport, OutputFormat } from '../types/index.js';

export function formatJSON(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

/**
 * Convert a value to a displayable string, handling nested objects
 */
function valueToString(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function detectColumns(data: unknown[], columns?: string[]): string[] {
  if (columns) {
    return columns;
  }
  const first = data[0];
  return isRecord(first) ? Object.keys(first) : [];
}

function cell(row: unknown, col: string): unknown {
  return isRecord(row) ? row[col] : undefined;
}

/**
 * Format output as a simple table
 */
export function formatTable(data: unknown[], columns?: string[]): string {
  if (data.length === 0) {
    return 'No data to display';
  }

  const detectedColumns = detectColumns(data, columns);
  if (detectedColumns.length === 0) {
    return formatJSON(data);
  }

  const widths = new Map<string, number>();
  for (const col of detectedColumns) {
    widths.set(
      col,
      Math.max(col.length, ...data.map((row) => valueToString(cell(row, col)).length))
    );
  }
  const widthOf = (col: string): number => widths.get(col) ?? col.length;

  const lines: string[] = [];
  lines.push(detectedColumns.map((col) => col.padEnd(widthOf(col))).join(' | '));
  lines.push(detectedColumns.map((col) => '-'.repeat(widthOf(col))).join('-|-'));

  for (const row of data) {
    lines.push(
      detectedColumns.map((col) => valueToString(cell(row, col)).padEnd(widthOf(col))).join(' | ')
    );
  }

  return lines.join('\n');
}

/**
 * Format output as CSV
 */
export function formatCSV(data: unknown[], columns?: string[]): string {
  if (data.length === 0) {
    return '';
  }

  const detectedColumns = detectColumns(data, columns);
  if (detectedColumns.length === 0) {
    return '';
  }

  const lines: string[] = [];
  lines.push(detectedColumns.join(','));

  for (const row of data) {
    const values = detectedColumns.map((col) => {
      const str = valueToString(cell(row, col));
      if (str.includes(',') || str.includes('"') || str.includes('\n')) {
        return `"${str.replace(/"/g, '""')}"`;
      }
      return str;
    });
    lines.push(values.join(','));
  }

  return lines.join('\n');
}

function isBacktestReport(data: unknown): data is BacktestReport {
  return (
    isRecord(data) &&
    typeof data.successCount === 'number' &&
    typeof data.failedCount === 'number' &&
    typeof data.naCount === 'number' &&
    typeof data.summary === 'string'
  );
}

function formatRate(rate: number | null): string {
  return rate === null ? 'N/A' : `${(rate * 100).toFixed(2)}%`;
}

/**
 * Compact block for backtest reports in table format
 */
export function formatBacktestReport(report: BacktestReport): string {
  const range =
    report.firstDate && report.lastDate ? ` (${report.firstDate} to ${report.lastDate})` : '';
  const lines: string[] = [];
  lines.push('=== Backtest Summary ===');
  lines.push('');
  lines.push(`Price file: ${report.file}`);
  lines.push(`Samples: ${report.samples}${range}`);
  lines.push(
    `Strategy: capital ${report.initialCapital}, ${report.numRuns} runs x ${report.yearsPerRun} years, ` +
      `inflation ${report.inflationRate}, cost of living ${report.annualCostOfLiving}/year`
  );
  lines.push('');
  lines.push(`Success: ${report.successCount}`);
  lines.push(`Failed: ${report.failedCount}`);
  lines.push(`N/A: ${report.naCount}`);
  lines.push(`Success Rate: ${formatRate(report.successRate)}`);
  lines.push('');
  lines.push(report.summary);
  return lines.join('\n');
}

/**
 * Format output based on format type
 */
export function formatOutput(data: unknown, format: OutputFormat = 'table'): string {
  if (format === 'table' && isBacktestReport(data)) {
    return formatBacktestReport(data);
  }

  if (Array.isArray(data)) {
    switch (format) {
      case 'json':
        return formatJSON(data);
      case 'csv':
        return formatCSV(data);
      case 'table':
        return formatTable(data);
    }
  }

  if (isRecord(data)) {
    switch (format) {
      case 'json':
        return formatJSON(data);
      case 'csv':
        return formatCSV([data]);
      case 'table':
        return formatTable([data]);
    }
  }

  return String(data);
}
