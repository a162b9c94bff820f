import { z } from 'zod';

export type ConfigParseResult =
  | { ok: true; config: RunConfig }
  | { ok: false; errors: string[] };

export const toErrors = (issues: z.ZodIssue[]): string[] => {
  return issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : 'value';
    return `${path}: ${issue.message}`;
  });
};

/** YAML leaves an empty mapping as null; treat it like an absent one. */
const orEmpty = <T extends z.ZodTypeAny>(schema: T) => z.preprocess((value) => value ?? {}, schema);

const FLAG_WORDS: Record<string, boolean> = {
  true: true,
  yes: true,
  on: true,
  false: false,
  no: false,
  off: false,
};

/** Switch spellings from older YAML dialects. An empty value or 0 switches off. */
const toFlag = (value: unknown): unknown => {
  if (value === null || value === 0 || value === '') {
    return false;
  }
  if (value === 1) {
    return true;
  }
  if (typeof value === 'string') {
    const word = value.trim().toLowerCase();
    if (Object.hasOwn(FLAG_WORDS, word)) {
      return FLAG_WORDS[word];
    }
  }
  return value;
};

export const benchmarkEntrySchema = z
  .object({
    enabled: z.preprocess(toFlag, z.boolean()).optional(),
  })
  .passthrough();

// Objects iterate integer-like keys first, in numeric order.
const INTEGER_KEY = /^(0|[1-9]\d*)$/;

const benchmarkGroupSchema = orEmpty(
  z.record(orEmpty(benchmarkEntrySchema)).superRefine((group, ctx) => {
    for (const name of Object.keys(group)) {
      if (INTEGER_KEY.test(name) && Number(name) < 2 ** 32 - 1) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [name],
          message: `benchmark name "${name}" looks like an integer and would not keep its configured order; use a name such as "run_${name}"`,
        });
      }
    }
  }),
);

const secondsSchema = (fallback: number) => z.number().positive().default(fallback);

export const runConfigSchema = z
  .object({
    hardware: orEmpty(
      z
        .object({
          type: z.string().min(1).default('auto'),
        })
        .passthrough(),
    ),
    benchmarks: orEmpty(
      z
        .object({
          training: benchmarkGroupSchema,
          inference: benchmarkGroupSchema,
          stress: benchmarkGroupSchema,
        })
        .passthrough(),
    ),
    metrics: orEmpty(
      z
        .object({
          collection_interval: secondsSchema(1),
          stop_timeout: secondsSchema(5),
          probe_timeout: secondsSchema(10),
        })
        .passthrough(),
    ),
    reporting: orEmpty(
      z
        .object({
          output_dir: z.string().min(1).optional(),
        })
        .passthrough(),
    ),
  })
  .passthrough();

export type RunConfig = z.infer<typeof runConfigSchema>;
export type BenchmarkEntry = z.infer<typeof benchmarkEntrySchema>;
export type BenchmarkGroup = Record<string, BenchmarkEntry>;

export const parseRunConfig = (value: unknown): ConfigParseResult => {
  const result = runConfigSchema.safeParse(value ?? {});
  if (result.success) {
    return { ok: true, config: result.data };
  }
  return { ok: false, errors: toErrors(result.error.issues) };
};

export type MetricsTimings = {
  intervalMs: number;
  stopTimeoutMs: number;
  toolTimeoutMs: number;
  probeTimeoutMs: number;
};

/**
 * The `metrics` section in milliseconds. `probe_timeout` bounds each diagnostic tool;
 * the collector's own guard waits a little longer so the tool's timeout fires first.
 */
export const metricsTimings = (config: RunConfig): MetricsTimings => {
  const toolTimeoutMs = config.metrics.probe_timeout * 1000;
  return {
    intervalMs: config.metrics.collection_interval * 1000,
    stopTimeoutMs: config.metrics.stop_timeout * 1000,
    toolTimeoutMs,
    probeTimeoutMs: toolTimeoutMs + 5_000,
  };
};
