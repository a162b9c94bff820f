export {
  benchmarkEntrySchema,
  metricsTimings,
  parseRunConfig,
  runConfigSchema,
  toErrors,
} from './config';
export type { BenchmarkEntry, BenchmarkGroup, ConfigParseResult, MetricsTimings, RunConfig } from './config';
export { BenchmarkOrchestrator, finiteMetrics } from './orchestrator';
export type { OrchestratorOptions } from './orchestrator';
export { benchRegistry, benchTracer, benchUnitDuration, benchUnitRuns } from './observability';
export { ANY_KIND, createRegistry } from './registry';
export type { BenchmarkRegistry, RegistryOptions, UnitTable } from './registry';
export {
  builtinUnits,
  commandUnit,
  cpuThroughputUnit,
  createCommandUnit,
  DEFAULT_COMMAND_TIMEOUT_SECONDS,
  diskIoUnit,
  memoryBandwidthUnit,
  parseMetricsLine,
  parseSize,
} from './units';
export { BENCHMARK_KINDS, isBenchmarkKind, isBenchmarkSelection } from './types';
export type {
  BenchmarkContext,
  BenchmarkKind,
  BenchmarkOutcome,
  BenchmarkResult,
  BenchmarkSelection,
  BenchmarkStatus,
  BenchmarkUnit,
  CollectorHandle,
} from './types';
