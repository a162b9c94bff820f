import type {
  AcceleratorStats,
  AcceleratorVendor,
  Probe,
  SystemStats,
} from '@xpu-bench/profiler';

export type MetricSample = {
  readonly timestamp: string;
  /** Monotonic milliseconds since the session started. */
  readonly elapsedMs: number;
  readonly system: Readonly<SystemStats>;
  readonly accelerators: Readonly<Record<AcceleratorVendor, ReadonlyArray<Readonly<AcceleratorStats>>>>;
};

export type FieldStats = {
  mean: number;
  max: number;
  count: number;
};

export type MetricsSummary = {
  totalSamples: number;
  collectionDurationMs: number;
  /** Keyed by flattened path, e.g. `system.cpuPercent` or `nvidia.0.utilizationPercent`. */
  fields: Record<string, FieldStats>;
};

export type ProbeName = 'system' | 'gpu' | 'npu';

export type CollectorProbes = {
  system: Probe<SystemStats>;
  gpu: Probe<AcceleratorStats[]>;
  npu: Probe<AcceleratorStats[]>;
};

export type CollectorOptions = {
  intervalMs?: number;
  stopTimeoutMs?: number;
  /** Upper bound for one probe call; a slower probe counts as failed for that sample. */
  probeTimeoutMs?: number;
  /** Timeout handed to the default accelerator probes for their CLI tools. */
  toolTimeoutMs?: number;
  probes?: Partial<CollectorProbes>;
};
