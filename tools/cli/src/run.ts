import path from 'node:path';
import { performance } from 'node:perf_hooks';
import { Registry } from 'prom-client';
import { configureLogging, errorMessage, logInfo, logWarn } from '@xpu-bench/logging';
import { detectHardware } from '@xpu-bench/profiler';
import type { HardwareDetector } from '@xpu-bench/profiler';
import { MetricsCollector, telemetryRegistry } from '@xpu-bench/metrics';
import type { CollectorProbes } from '@xpu-bench/metrics';
import {
  benchRegistry,
  BenchmarkOrchestrator,
  createRegistry,
  metricsTimings,
} from '@xpu-bench/bench';
import type {
  BenchmarkResult,
  BenchmarkSelection,
  BenchmarkUnit,
  RunConfig,
  UnitTable,
} from '@xpu-bench/bench';
import { artifactName, buildReport, formatStamp, writeArtifact, writeReport } from '@xpu-bench/report';
import type { ReportPaths } from '@xpu-bench/report';

export const DEFAULT_OUTPUT_DIR = 'reports';

export type RunOptions = {
  config: RunConfig;
  selection: BenchmarkSelection;
  /** Overrides `reporting.output_dir`. */
  outputDir?: string;
};

export type RunDeps = {
  probes?: Partial<CollectorProbes>;
  detectors?: HardwareDetector[];
  units?: UnitTable;
  commandUnit?: BenchmarkUnit;
  now?: () => Date;
  /** Mirror the run log on stdout (default true). */
  console?: boolean;
};

export type ArtifactPaths = ReportPaths & {
  metrics?: string;
  prometheus?: string;
  log?: string;
};

export type RunOutcome = {
  hardwareType: string;
  totalTimeMs: number;
  total: number;
  successful: number;
  failed: number;
  reportPaths: ArtifactPaths;
  results: ReadonlyArray<Readonly<BenchmarkResult>>;
};

const openRunLog = (logFile: string, consoleOutput: boolean): string | undefined => {
  try {
    configureLogging({ logFile, console: consoleOutput });
    return logFile;
  } catch (error) {
    configureLogging({ console: consoleOutput });
    logWarn('[cli] cannot open run log, logging to the console only', { logFile, error: errorMessage(error) });
    return undefined;
  }
};

const writePrometheus = async (filePath: string): Promise<string | undefined> => {
  const merged = Registry.merge([telemetryRegistry, benchRegistry]);
  return writeArtifact(filePath, await merged.metrics());
};

/**
 * One full run: detect hardware, collect telemetry around the selected groups,
 * then write the report, the raw metrics and the Prometheus exposition under one stamp.
 */
export const runCommand = async (options: RunOptions, deps: RunDeps = {}): Promise<RunOutcome> => {
  const now = deps.now ?? (() => new Date());
  const { config, selection } = options;
  const outDir = options.outputDir ?? config.reporting.output_dir ?? DEFAULT_OUTPUT_DIR;
  const stamp = formatStamp(now());
  const log = openRunLog(path.join(outDir, artifactName('benchmark', stamp, 'log')), deps.console ?? true);

  const startedAt = performance.now();
  logInfo('[cli] benchmark run started', { selection, outDir });

  const hardwareType = await detectHardware(config.hardware.type, { detectors: deps.detectors });
  const timings = metricsTimings(config);
  const collector = new MetricsCollector({
    intervalMs: timings.intervalMs,
    stopTimeoutMs: timings.stopTimeoutMs,
    probeTimeoutMs: timings.probeTimeoutMs,
    toolTimeoutMs: timings.toolTimeoutMs,
    probes: deps.probes,
  });
  const registry = createRegistry(config, { units: deps.units, commandUnit: deps.commandUnit });
  const orchestrator = new BenchmarkOrchestrator({ config, registry, collector, now });

  const results = await orchestrator.run(selection);
  const totalTimeMs = performance.now() - startedAt;

  const report = buildReport({ results, telemetry: collector.getSummary(), hardwareType, now: now() });
  const written = await writeReport(report, { outDir, stamp });
  const metricsPath = path.join(outDir, artifactName('metrics', stamp, 'json'));
  const metrics = (await collector.save(metricsPath)) ? metricsPath : undefined;
  const prometheus = await writePrometheus(path.join(outDir, artifactName('metrics', stamp, 'prom')));

  const { total, successful, failed } = report.summary;
  logInfo('[cli] benchmark run finished', { hardwareType, total, successful, failed, totalTimeMs });

  return {
    hardwareType,
    totalTimeMs,
    total,
    successful,
    failed,
    reportPaths: { ...written, metrics, prometheus, log },
    results: report.results,
  };
};
