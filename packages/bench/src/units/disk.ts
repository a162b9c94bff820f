import fs from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { z } from 'zod';
import type { BenchmarkUnit } from '../types';
import { elapsedMs, parseParams } from './params';

const diskParamsSchema = z
  .object({
    file_size: z.coerce.number().positive().default(64),
    directory: z.string().min(1).optional(),
  })
  .passthrough();

/** Benchmark names become one plain path segment. */
const fileSafe = (name: string): string => name.replace(/[^\w.-]/g, '_');

const toMBps = (bytes: number, durationMs: number): number => {
  return bytes / (1024 * 1024) / (Math.max(durationMs, 0.001) / 1000);
};

/** Write, read back and remove a temporary file of `file_size` MB. */
export const diskIoUnit: BenchmarkUnit = async (name, config) => {
  const params = parseParams(diskParamsSchema, config);
  if (!params.ok) {
    return params;
  }
  const size = Math.round(params.value.file_size * 1024 * 1024);
  const buffer = Buffer.alloc(size, 7);
  const directory = params.value.directory ?? tmpdir();
  const filePath = path.join(directory, `xpu-bench-${fileSafe(name)}-${process.pid}-${Date.now()}.bin`);

  const start = process.hrtime.bigint();
  try {
    await fs.mkdir(directory, { recursive: true });
    const writeStart = process.hrtime.bigint();
    await fs.writeFile(filePath, buffer);
    const writeMs = elapsedMs(writeStart);
    const readStart = process.hrtime.bigint();
    const readBack = await fs.readFile(filePath);
    const readMs = elapsedMs(readStart);
    if (readBack.length !== size) {
      return { ok: false, error: `read back ${readBack.length} of ${size} bytes` };
    }
    return {
      ok: true,
      metrics: {
        writeMBps: toMBps(size, writeMs),
        readMBps: toMBps(size, readMs),
        fileSizeMb: params.value.file_size,
        durationMs: elapsedMs(start),
      },
    };
  } finally {
    await fs.rm(filePath, { force: true });
  }
};
