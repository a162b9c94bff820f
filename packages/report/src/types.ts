import type { BenchmarkResult } from '@xpu-bench/bench';
import type { MetricsSummary } from '@xpu-bench/metrics';

export type RunSummary = {
  total: number;
  successful: number;
  failed: number;
  /** Percentage, 0 when nothing ran. */
  successRate: number;
  hardwareType: string;
  timestamp: string;
};

export type RunReport = {
  readonly summary: Readonly<RunSummary>;
  readonly results: ReadonlyArray<Readonly<BenchmarkResult>>;
  readonly telemetry: Readonly<MetricsSummary>;
};

export type BuildReportInput = {
  results: readonly BenchmarkResult[];
  telemetry: MetricsSummary;
  hardwareType: string;
  now?: Date;
};

export type ReportPaths = {
  json?: string;
  html?: string;
};

export type WriteReportOptions = {
  outDir: string;
  stamp: string;
  prefix?: string;
};
