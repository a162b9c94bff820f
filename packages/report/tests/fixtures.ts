import type { BenchmarkResult } from '@xpu-bench/bench';
import type { MetricsSummary } from '@xpu-bench/metrics';

export const sampleResults = (): BenchmarkResult[] => [
  {
    name: 'resnet50',
    kind: 'training',
    status: 'success',
    metrics: { throughput: 1234.5678, epochs: 2 },
    durationMs: 1500,
    timestamp: '2026-02-01T08:00:00.000Z',
  },
  {
    name: 'bert <base>',
    kind: 'inference',
    status: 'failed',
    metrics: {},
    error: 'exit 1: "quoted" & <tag>',
    durationMs: 250,
    timestamp: '2026-02-01T08:00:02.000Z',
  },
  {
    name: 'memory_bandwidth',
    kind: 'stress',
    status: 'success',
    metrics: { bandwidthMBps: 2048 },
    durationMs: 3000,
    timestamp: '2026-02-01T08:00:03.000Z',
  },
];

export const sampleTelemetry = (): MetricsSummary => ({
  totalSamples: 4,
  collectionDurationMs: 4000,
  fields: {
    'system.cpuPercent': { mean: 42.25, max: 80, count: 4 },
  },
});
