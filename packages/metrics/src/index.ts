export {
  DEFAULT_INTERVAL_MS,
  DEFAULT_PROBE_TIMEOUT_MS,
  DEFAULT_STOP_TIMEOUT_MS,
  MetricsCollector,
} from './collector';
export { probeFailures, sampleDuration, samplesCollected, telemetryRegistry } from './observability';
export { emptySummary, flattenSample, summarizeSamples } from './summary';
export { settleWithin, sleep } from './timing';
export type { Settled } from './timing';
export type {
  CollectorOptions,
  CollectorProbes,
  FieldStats,
  MetricSample,
  MetricsSummary,
  ProbeName,
} from './types';
