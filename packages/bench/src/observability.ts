import { Counter, Histogram, Registry } from 'prom-client';
import { trace } from '@opentelemetry/api';

export const benchRegistry = new Registry();

export const benchUnitRuns = new Counter({
  name: 'xpu_bench_units_total',
  help: 'Benchmark unit invocations by group and outcome',
  labelNames: ['kind', 'status'],
  registers: [benchRegistry],
});

export const benchUnitDuration = new Histogram({
  name: 'xpu_bench_unit_duration_seconds',
  help: 'Wall time of one benchmark unit invocation',
  labelNames: ['kind'],
  buckets: [0.1, 1, 10, 60, 300, 1800, 3600],
  registers: [benchRegistry],
});

export const benchTracer = trace.getTracer('bench');
