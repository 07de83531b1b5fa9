export type { TraceEvent, TraceEventType, BacktestTraceSink } from './types.js';
export { ConsoleTraceSink, formatTraceEvent, type TraceOutput } from './console-sink.js';
