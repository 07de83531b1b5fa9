import { formatDay } from '../time/calendar.js';
import type { BacktestTraceSink, TraceEvent } from './types.js';

/**
 * Minimal writable target; `process.stdout` satisfies it.
 */
export interface TraceOutput {
  write(chunk: string): unknown;
}

/**
 * Renders trace events as human-readable lines, one simulation after another.
 * Money and capital figures are truncated to whole units.
 */
export class ConsoleTraceSink implements BacktestTraceSink {
  public readonly name = 'console-trace-sink';

  constructor(private readonly output: TraceOutput = process.stdout) {}

  handle(event: TraceEvent): void {
    const text = formatTraceEvent(event);
    if (text !== null) {
      this.output.write(text);
    }
  }
}

/**
 * Format one event, or null for events that print nothing.
 */
export function formatTraceEvent(event: TraceEvent): string | null {
  switch (event.type) {
    case 'simulation_start':
      return (
        `start ${formatDay(event.startDate)}: capital ${Math.trunc(event.capital)}, ` +
        `it can buy ${event.heldShares} shares\n\n`
      );
    case 'period_target':
      return (
        `${formatDay(event.periodStart)} to ${formatDay(event.periodEnd)}, ` +
        `target capital ${Math.trunc(event.targetCapital)}, ` +
        `prepared cost of living ${Math.trunc(event.costOfLiving)}\n`
      );
    case 'liquidation':
      return (
        `${formatDay(event.date)} sell ${event.soldShares} shares in ${event.price.toFixed(6)}, ` +
        `earn ${Math.trunc(event.proceeds)}, remained shares ${event.heldShares}\n` +
        `new capital ${Math.trunc(event.capitalAfter)}\n\n`
      );
    case 'period_unsatisfied':
      return 'not satisfied\n';
    case 'data_exhausted':
      return 'no more available date to test\n';
    case 'simulation_end':
      return null;
    default: {
      const unreachable: never = event;
      return unreachable;
    }
  }
}
