import { ACCELERATOR_VENDORS } from '@xpu-bench/profiler';
import type { FieldStats, MetricSample, MetricsSummary } from './types';

const isReading = (value: unknown): value is number => {
  return typeof value === 'number' && Number.isFinite(value);
};

/** Flatten the numeric readings of one sample into `path -> value`. */
export const flattenSample = (sample: MetricSample): Map<string, number> => {
  const values = new Map<string, number>();
  for (const [key, value] of Object.entries(sample.system)) {
    if (isReading(value)) {
      values.set(`system.${key}`, value);
    }
  }
  for (const vendor of ACCELERATOR_VENDORS) {
    for (const device of sample.accelerators[vendor]) {
      for (const [key, value] of Object.entries(device)) {
        if (key !== 'index' && isReading(value)) {
          values.set(`${vendor}.${device.index}.${key}`, value);
        }
      }
    }
  }
  return values;
};

export const emptySummary = (): MetricsSummary => ({
  totalSamples: 0,
  collectionDurationMs: 0,
  fields: {},
});

/**
 * Mean and max of every reading, over the samples in which it was present.
 * Readings absent from all samples do not appear.
 */
export const summarizeSamples = (
  samples: readonly MetricSample[],
  collectionDurationMs: number,
): MetricsSummary => {
  if (samples.length === 0) {
    return emptySummary();
  }

  const totals = new Map<string, { sum: number; max: number; count: number }>();
  for (const sample of samples) {
    for (const [key, value] of flattenSample(sample)) {
      const entry = totals.get(key);
      if (entry) {
        entry.sum += value;
        entry.max = Math.max(entry.max, value);
        entry.count += 1;
      } else {
        totals.set(key, { sum: value, max: value, count: 1 });
      }
    }
  }

  const fields: Record<string, FieldStats> = {};
  for (const [key, entry] of totals) {
    fields[key] = { mean: entry.sum / entry.count, max: entry.max, count: entry.count };
  }

  return {
    totalSamples: samples.length,
    collectionDurationMs,
    fields,
  };
};
