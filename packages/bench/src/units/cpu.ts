import { z } from 'zod';
import type { BenchmarkUnit } from '../types';
import { elapsedMs, parseParams, yieldToLoop } from './params';

const CHUNK_ITERATIONS = 250_000;

const cpuParamsSchema = z
  .object({
    iterations: z.coerce.number().int().positive().default(5_000_000),
  })
  .passthrough();

/** Integer-mix loop, run in chunks so the event loop keeps turning. */
export const cpuThroughputUnit: BenchmarkUnit = async (_name, config) => {
  const params = parseParams(cpuParamsSchema, config);
  if (!params.ok) {
    return params;
  }
  const { iterations } = params.value;
  const start = process.hrtime.bigint();
  let acc = 0;
  for (let done = 0; done < iterations; done += CHUNK_ITERATIONS) {
    const end = Math.min(iterations, done + CHUNK_ITERATIONS);
    for (let i = done; i < end; i += 1) {
      acc = (acc + ((i * 31) % 97)) % 1_000_003;
    }
    await yieldToLoop();
  }
  const durationMs = elapsedMs(start);
  return {
    ok: true,
    metrics: {
      opsPerSecond: Math.round((iterations / Math.max(durationMs, 0.001)) * 1000),
      iterations,
      durationMs,
      checksum: acc,
    },
  };
};
