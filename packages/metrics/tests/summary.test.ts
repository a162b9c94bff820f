import { test } from 'node:test';
import assert from 'node:assert/strict';
import { emptySummary, flattenSample, summarizeSamples } from '../src/summary';
import type { MetricSample } from '../src/types';

const first: MetricSample = {
  timestamp: '2026-01-05T10:00:00.000Z',
  elapsedMs: 0,
  system: { cpuPercent: 10, memoryPercent: 50 },
  accelerators: {
    nvidia: [{ index: 0, name: 'Test GPU', utilizationPercent: 20, source: 'cli' }],
    ascend: [],
  },
};

const second: MetricSample = {
  timestamp: '2026-01-05T10:00:01.000Z',
  elapsedMs: 1000,
  system: { cpuPercent: 30, memoryPercent: Number.NaN },
  accelerators: {
    nvidia: [{ index: 0, name: 'Test GPU', utilizationPercent: 60, temperatureC: 70, source: 'cli' }],
    ascend: [],
  },
};

test('flattenSample keeps finite numeric readings under dotted paths', () => {
  assert.deepEqual(Object.fromEntries(flattenSample(second)), {
    'system.cpuPercent': 30,
    'nvidia.0.utilizationPercent': 60,
    'nvidia.0.temperatureC': 70,
  });
});

test('summarizeSamples averages each field over the samples that carry it', () => {
  const summary = summarizeSamples([first, second], 1500);
  assert.equal(summary.totalSamples, 2);
  assert.equal(summary.collectionDurationMs, 1500);
  assert.deepEqual(summary.fields, {
    'system.cpuPercent': { mean: 20, max: 30, count: 2 },
    'system.memoryPercent': { mean: 50, max: 50, count: 1 },
    'nvidia.0.utilizationPercent': { mean: 40, max: 60, count: 2 },
    'nvidia.0.temperatureC': { mean: 70, max: 70, count: 1 },
  });
});

test('summarizeSamples of no samples is the empty summary', () => {
  assert.deepEqual(summarizeSamples([], 250), { totalSamples: 0, collectionDurationMs: 0, fields: {} });
  assert.deepEqual(emptySummary(), { totalSamples: 0, collectionDurationMs: 0, fields: {} });
});
