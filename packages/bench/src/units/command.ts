import { z } from 'zod';
import { logDebug } from '@xpu-bench/logging';
import { runTool } from '@xpu-bench/profiler';
import type { ToolRunner } from '@xpu-bench/profiler';
import type { BenchmarkUnit } from '../types';
import { parseParams } from './params';

export const DEFAULT_COMMAND_TIMEOUT_SECONDS = 3600;

const commandParamsSchema = z
  .object({
    command: z.string().min(1),
    args: z.array(z.coerce.string()).default([]),
    timeout: z.coerce.number().positive().default(DEFAULT_COMMAND_TIMEOUT_SECONDS),
    cwd: z.string().min(1).optional(),
    env: z.record(z.coerce.string()).optional(),
  })
  .passthrough();

const isRecord = (value: unknown): value is Record<string, unknown> => {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
};

/** The last stdout line holding a JSON object, if any. */
export const parseMetricsLine = (stdout: string): Record<string, unknown> | undefined => {
  const lines = stdout.split('\n').map((line) => line.trim()).filter(Boolean);
  for (const line of lines.reverse()) {
    if (!line.startsWith('{')) {
      continue;
    }
    try {
      const parsed: unknown = JSON.parse(line);
      if (isRecord(parsed)) {
        return parsed;
      }
    } catch (error) {
      logDebug('[bench] ignoring unparsable metrics line', { error });
    }
  }
  return undefined;
};

/**
 * Runs an external workload. The process must exit 0 within `timeout` seconds;
 * its metrics are the last JSON object it printed on stdout.
 */
export const createCommandUnit = (run: ToolRunner = runTool): BenchmarkUnit => {
  return async (name, config) => {
    const params = parseParams(commandParamsSchema, config);
    if (!params.ok) {
      return params;
    }
    const { command, args, timeout, cwd, env } = params.value;
    logDebug('[bench] running benchmark command', { name, command, args });
    const result = await run(command, args, {
      timeoutMs: timeout * 1000,
      cwd,
      env: env ? { ...process.env, ...env } : undefined,
    });
    if (!result.ok) {
      return { ok: false, error: result.detail };
    }
    return { ok: true, metrics: parseMetricsLine(result.stdout) ?? {} };
  };
};

export const commandUnit = createCommandUnit();
