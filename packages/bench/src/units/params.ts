import { z } from 'zod';
import { toErrors } from '../config';
import type { BenchmarkEntry } from '../config';

export type ParamsResult<T> = { ok: true; value: T } | { ok: false; error: string };

/** Validate a unit's parameters from its configuration entry. */
export const parseParams = <T extends z.ZodTypeAny>(schema: T, entry: BenchmarkEntry): ParamsResult<z.infer<T>> => {
  const result = schema.safeParse(entry);
  if (result.success) {
    return { ok: true, value: result.data };
  }
  return { ok: false, error: `invalid parameters: ${toErrors(result.error.issues).join('; ')}` };
};

/** Resolve on the next turn of the event loop so timers (the sampler) get to run. */
export const yieldToLoop = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

const SIZE_PATTERN = /^(\d+(?:\.\d+)?)\s*(B|KB|MB|GB|TB)?$/i;

const SIZE_UNITS: Record<string, number> = {
  B: 1,
  KB: 1024,
  MB: 1024 ** 2,
  GB: 1024 ** 3,
  TB: 1024 ** 4,
};

/** Parse `"8GB"`, `"512MB"` or a bare number (megabytes) into bytes. */
export const parseSize = (value: string | number): number | undefined => {
  if (typeof value === 'number') {
    return Number.isFinite(value) && value > 0 ? Math.round(value * SIZE_UNITS.MB) : undefined;
  }
  const match = SIZE_PATTERN.exec(value.trim());
  if (!match) {
    return undefined;
  }
  const amount = Number.parseFloat(match[1]);
  const unit = SIZE_UNITS[(match[2] ?? 'MB').toUpperCase()];
  const bytes = Math.round(amount * unit);
  return bytes > 0 ? bytes : undefined;
};

export const sizeSchema = (fallback: string) =>
  z
    .union([z.number(), z.string()])
    .default(fallback)
    .transform((value, ctx) => {
      const bytes = parseSize(value);
      if (bytes === undefined) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `not a size: ${value}` });
        return z.NEVER;
      }
      return bytes;
    });

export const elapsedMs = (startedAt: bigint): number => Number(process.hrtime.bigint() - startedAt) / 1_000_000;
