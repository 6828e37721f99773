export {
  QueryLaneLogger,
  createLogger,
  isDebugMode,
  setDebugMode,
  type LogEntry,
  type LogLevel,
  type QueryLaneLoggerConfig,
} from './logger.js';

export {
  OperationProfiler,
  type OperationProfilerOptions,
  type PerfSummary,
  type TimingRecord,
} from './perf.js';
