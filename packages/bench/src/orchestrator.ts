import { performance } from 'node:perf_hooks';
import { errorMessage, logError, logInfo } from '@xpu-bench/logging';
import type { BenchmarkEntry, BenchmarkGroup, RunConfig } from './config';
import { benchTracer, benchUnitDuration, benchUnitRuns } from './observability';
import type { BenchmarkRegistry } from './registry';
import { BENCHMARK_KINDS } from './types';
import type {
  BenchmarkKind,
  BenchmarkOutcome,
  BenchmarkResult,
  BenchmarkSelection,
  CollectorHandle,
} from './types';

export type OrchestratorOptions = {
  config: RunConfig;
  registry: BenchmarkRegistry;
  collector?: CollectorHandle;
  now?: () => Date;
};

const FALLBACK_ERROR = 'benchmark unit failed without an error message';

export const finiteMetrics = (metrics: Record<string, unknown>): Record<string, number> => {
  const kept: Record<string, number> = {};
  for (const [key, value] of Object.entries(metrics)) {
    if (typeof value === 'number' && Number.isFinite(value)) {
      kept[key] = value;
    }
  }
  return kept;
};

export class BenchmarkOrchestrator {
  private config: RunConfig;
  private registry: BenchmarkRegistry;
  private collector?: CollectorHandle;
  private now: () => Date;

  constructor(options: OrchestratorOptions) {
    this.config = options.config;
    this.registry = options.registry;
    this.collector = options.collector;
    this.now = options.now ?? (() => new Date());
  }

  /** Run one group in mapping order. Failing units never stop the group. */
  async runGroup(kind: BenchmarkKind, group: BenchmarkGroup = this.config.benchmarks[kind]): Promise<BenchmarkResult[]> {
    const entries = Object.entries(group);
    if (entries.length === 0) {
      logInfo('[bench] no benchmarks configured', { kind });
      return [];
    }
    const results: BenchmarkResult[] = [];
    for (const [name, entry] of entries) {
      if (entry.enabled === false) {
        logInfo('[bench] benchmark disabled, skipping', { kind, name });
        continue;
      }
      results.push(await this.runUnit(kind, name, entry));
    }
    return results;
  }

  async runAll(): Promise<BenchmarkResult[]> {
    const results: BenchmarkResult[] = [];
    for (const kind of BENCHMARK_KINDS) {
      results.push(...(await this.runGroup(kind)));
    }
    return results;
  }

  runSelection(selection: BenchmarkSelection): Promise<BenchmarkResult[]> {
    return selection === 'all' ? this.runAll() : this.runGroup(selection);
  }

  /** Run the selection with telemetry collected around it. */
  async run(selection: BenchmarkSelection = 'all'): Promise<BenchmarkResult[]> {
    this.collector?.startCollection();
    try {
      return await this.runSelection(selection);
    } finally {
      await this.collector?.stopCollection();
    }
  }

  private async invoke(kind: BenchmarkKind, name: string, entry: BenchmarkEntry): Promise<BenchmarkOutcome> {
    const unit = this.registry.resolve(kind, name, entry);
    if (!unit) {
      return { ok: false, error: `no benchmark unit registered for ${kind}/${name}` };
    }
    const collector = this.collector;
    try {
      return await unit(name, entry, {
        kind,
        latestSample: collector ? () => collector.getLatest() : undefined,
      });
    } catch (error) {
      return { ok: false, error: errorMessage(error) };
    }
  }

  private async runUnit(kind: BenchmarkKind, name: string, entry: BenchmarkEntry): Promise<BenchmarkResult> {
    const span = benchTracer.startSpan('bench.unit', {
      attributes: { component: 'bench', 'bench.kind': kind, 'bench.name': name },
    });
    const timer = benchUnitDuration.startTimer({ kind });
    const timestamp = this.now().toISOString();
    const startedAt = performance.now();
    logInfo('[bench] running benchmark', { kind, name });

    const outcome = await this.invoke(kind, name, entry);
    const durationMs = performance.now() - startedAt;
    let result: BenchmarkResult;
    if (outcome.ok) {
      result = { name, kind, status: 'success', metrics: finiteMetrics(outcome.metrics), durationMs, timestamp };
      logInfo('[bench] benchmark completed', { kind, name, durationMs });
    } else {
      const error = outcome.error.trim() || FALLBACK_ERROR;
      result = { name, kind, status: 'failed', metrics: {}, error, durationMs, timestamp };
      logError('[bench] benchmark failed', { kind, name, error });
    }

    timer();
    benchUnitRuns.labels(kind, result.status).inc();
    span.setAttribute('bench.status', result.status);
    span.end();
    return result;
  }
}
