import type { MetricSample } from '@xpu-bench/metrics';
import type { BenchmarkEntry } from './config';

export const BENCHMARK_KINDS = ['training', 'inference', 'stress'] as const;

export type BenchmarkKind = (typeof BENCHMARK_KINDS)[number];

export type BenchmarkSelection = BenchmarkKind | 'all';

export type BenchmarkStatus = 'success' | 'failed';

export type BenchmarkResult = {
  name: string;
  kind: BenchmarkKind;
  status: BenchmarkStatus;
  metrics: Record<string, number>;
  /** Present only on failed results. */
  error?: string;
  durationMs: number;
  timestamp: string;
};

/** What a unit reports back. Metric values that are not finite numbers are dropped. */
export type BenchmarkOutcome =
  | { ok: true; metrics: Record<string, unknown> }
  | { ok: false; error: string };

export type BenchmarkContext = {
  kind: BenchmarkKind;
  latestSample?: () => MetricSample | undefined;
};

export type BenchmarkUnit = (
  name: string,
  config: BenchmarkEntry,
  context: BenchmarkContext,
) => Promise<BenchmarkOutcome> | BenchmarkOutcome;

export type CollectorHandle = {
  startCollection: () => void;
  stopCollection: () => Promise<void>;
  getLatest: () => MetricSample | undefined;
};

export const isBenchmarkKind = (value: string): value is BenchmarkKind => {
  return BENCHMARK_KINDS.some((kind) => kind === value);
};

export const isBenchmarkSelection = (value: string): value is BenchmarkSelection => {
  return value === 'all' || isBenchmarkKind(value);
};
