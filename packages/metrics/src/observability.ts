import { Counter, Histogram, Registry } from 'prom-client';

export const telemetryRegistry = new Registry();

export const samplesCollected = new Counter({
  name: 'xpu_bench_samples_total',
  help: 'Telemetry samples appended by the metrics collector',
  registers: [telemetryRegistry],
});

export const probeFailures = new Counter({
  name: 'xpu_bench_probe_failures_total',
  help: 'Probe calls that threw or timed out and were replaced by an empty reading',
  labelNames: ['probe'],
  registers: [telemetryRegistry],
});

export const sampleDuration = new Histogram({
  name: 'xpu_bench_sample_duration_seconds',
  help: 'Time spent acquiring one telemetry sample',
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 5, 10],
  registers: [telemetryRegistry],
});
