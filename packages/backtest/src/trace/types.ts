/**
 * Trace events emitted while simulating one starting date.
 *
 * Tracing is a presentation concern: the engine only forwards events to a
 * sink when one is supplied.
 */

import type { DateTime } from 'luxon';
import type { Outcome } from '@retirecheck/core';

export type TraceEvent =
  | {
      type: 'simulation_start';
      startDate: DateTime;
      capital: number;
      heldShares: number;
    }
  | {
      type: 'period_target';
      run: number;
      /** Date of the first sample in the period window */
      periodStart: DateTime;
      /** Date of the sample that closes the window (exclusive) */
      periodEnd: DateTime;
      targetCapital: number;
      costOfLiving: number;
    }
  | {
      type: 'liquidation';
      run: number;
      date: DateTime;
      soldShares: number;
      price: number;
      proceeds: number;
      heldShares: number;
      capitalAfter: number;
    }
  | { type: 'period_unsatisfied'; run: number }
  | { type: 'data_exhausted'; run: number }
  | { type: 'simulation_end'; startDate: DateTime; outcome: Outcome };

export type TraceEventType = TraceEvent['type'];

export interface BacktestTraceSink {
  handle(event: TraceEvent): void;
}
