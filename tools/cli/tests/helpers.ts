import type { CollectorProbes } from '@xpu-bench/metrics';

export const fakeProbes = (): CollectorProbes => ({
  system: async () => ({ cpuPercent: 20, memoryPercent: 40 }),
  gpu: async () => [{ index: 0, name: 'Test GPU', utilizationPercent: 75, source: 'cli' }],
  npu: async () => [],
});
