import { z } from 'zod';
import type { BenchmarkUnit } from '../types';
import { elapsedMs, parseParams, sizeSchema, yieldToLoop } from './params';

const memoryParamsSchema = z
  .object({
    memory_size: sizeSchema('1GB'),
    block_size: sizeSchema('64MB'),
    test_duration: z.coerce.number().positive().default(10),
  })
  .passthrough();

/**
 * Copies one block into another until `memory_size` bytes have moved or
 * `test_duration` seconds have passed, yielding between copies.
 */
export const memoryBandwidthUnit: BenchmarkUnit = async (_name, config) => {
  const params = parseParams(memoryParamsSchema, config);
  if (!params.ok) {
    return params;
  }
  const { memory_size: totalBytes, test_duration: durationSeconds } = params.value;
  const blockBytes = Math.min(params.value.block_size, totalBytes);
  const src = Buffer.alloc(blockBytes, 1);
  const dest = Buffer.alloc(blockBytes, 0);
  const deadlineMs = durationSeconds * 1000;

  const start = process.hrtime.bigint();
  let bytesCopied = 0;
  while (bytesCopied < totalBytes && elapsedMs(start) < deadlineMs) {
    const length = Math.min(blockBytes, totalBytes - bytesCopied);
    bytesCopied += src.copy(dest, 0, 0, length);
    await yieldToLoop();
  }
  const durationMs = elapsedMs(start);
  return {
    ok: true,
    metrics: {
      bandwidthMBps: bytesCopied / (1024 * 1024) / (Math.max(durationMs, 0.001) / 1000),
      bytesCopied,
      durationMs,
    },
  };
};
