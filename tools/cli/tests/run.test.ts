import { test } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtemp, readdir, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { parseRunConfig } from '@xpu-bench/bench';
import type { BenchmarkUnit, RunConfig } from '@xpu-bench/bench';
import { configureLogging } from '@xpu-bench/logging';
import { runCommand } from '../src/run';
import { fakeProbes } from './helpers';

const configFrom = (value: unknown): RunConfig => {
  const result = parseRunConfig(value);
  assert.ok(result.ok, 'expected a valid configuration');
  return result.config;
};

const now = () => new Date(2026, 1, 3, 4, 5, 6);

/** Waits long enough for the sampler to take a few samples. */
const slowUnit: BenchmarkUnit = async () => {
  await new Promise((resolve) => setTimeout(resolve, 60));
  return { ok: true, metrics: { throughput: 42 } };
};

const failingUnit: BenchmarkUnit = () => ({ ok: false, error: 'device lost' });

const stressConfig = (outputDir: string): RunConfig =>
  configFrom({
    hardware: { type: 'nvidia' },
    benchmarks: {
      training: { never_run: {} },
      stress: { slow: {}, skipped: { enabled: false }, broken: {} },
    },
    metrics: { collection_interval: 0.01, stop_timeout: 1 },
    reporting: { output_dir: outputDir },
  });

test('runCommand writes every artifact under one stamp', async () => {
  const dir = await mkdtemp(join(tmpdir(), 'xpu-run-'));
  try {
    const outDir = join(dir, 'reports');
    const outcome = await runCommand(
      { config: stressConfig(outDir), selection: 'stress' },
      {
        probes: fakeProbes(),
        units: { stress: { slow: slowUnit, broken: failingUnit } },
        now,
        console: false,
      },
    );

    assert.equal(outcome.hardwareType, 'nvidia');
    assert.equal(outcome.total, 2);
    assert.equal(outcome.successful, 1);
    assert.equal(outcome.failed, 1);
    assert.ok(outcome.totalTimeMs >= 50);
    assert.deepEqual(
      outcome.results.map((result) => [result.name, result.status]),
      [
        ['slow', 'success'],
        ['broken', 'failed'],
      ],
    );
    assert.deepEqual(outcome.reportPaths, {
      json: join(outDir, 'benchmark_report_20260203_040506.json'),
      html: join(outDir, 'benchmark_report_20260203_040506.html'),
      metrics: join(outDir, 'metrics_20260203_040506.json'),
      prometheus: join(outDir, 'metrics_20260203_040506.prom'),
      log: join(outDir, 'benchmark_20260203_040506.log'),
    });
    assert.deepEqual((await readdir(outDir)).sort(), [
      'benchmark_20260203_040506.log',
      'benchmark_report_20260203_040506.html',
      'benchmark_report_20260203_040506.json',
      'metrics_20260203_040506.json',
      'metrics_20260203_040506.prom',
    ]);

    const report: { summary: { total: number; failed: number; hardwareType: string }; telemetry: { totalSamples: number } } =
      JSON.parse(await readFile(join(outDir, 'benchmark_report_20260203_040506.json'), 'utf8'));
    assert.equal(report.summary.total, 2);
    assert.equal(report.summary.failed, 1);
    assert.equal(report.summary.hardwareType, 'nvidia');
    assert.ok(report.telemetry.totalSamples >= 1);

    const metrics: { summary: { totalSamples: number }; rawSamples: unknown[] } = JSON.parse(
      await readFile(join(outDir, 'metrics_20260203_040506.json'), 'utf8'),
    );
    assert.equal(metrics.summary.totalSamples, metrics.rawSamples.length);
    assert.equal(metrics.summary.totalSamples, report.telemetry.totalSamples);

    const prom = await readFile(join(outDir, 'metrics_20260203_040506.prom'), 'utf8');
    assert.ok(prom.includes('xpu_bench_units_total{kind="stress",status="failed"}'));
    assert.ok(prom.includes('# TYPE xpu_bench_samples_total counter'));

    const log = await readFile(join(outDir, 'benchmark_20260203_040506.log'), 'utf8');
    assert.match(log, /ERROR.*\[bench\] benchmark failed/);
    assert.match(log, /INFO.*\[cli\] benchmark run finished/);
  } finally {
    configureLogging({ console: false });
    await rm(dir, { recursive: true, force: true });
  }
});

test('runCommand prefers the explicit output directory and detects hardware when set to auto', async () => {
  const dir = await mkdtemp(join(tmpdir(), 'xpu-run-'));
  try {
    const config = configFrom({
      benchmarks: { inference: { echo: {} } },
      metrics: { collection_interval: 0.01 },
      reporting: { output_dir: join(dir, 'ignored') },
    });
    const outDir = join(dir, 'explicit');
    const outcome = await runCommand(
      { config, selection: 'all', outputDir: outDir },
      {
        probes: fakeProbes(),
        detectors: [
          { kind: 'nvidia', detect: async () => false },
          { kind: 'ascend', detect: async () => true },
        ],
        units: { '*': { echo: () => ({ ok: true, metrics: { latencyMs: 3 } }) } },
        now,
        console: false,
      },
    );
    assert.equal(outcome.hardwareType, 'ascend');
    assert.equal(outcome.total, 1);
    assert.equal(outcome.reportPaths.json, join(outDir, 'benchmark_report_20260203_040506.json'));
    await assert.rejects(readdir(join(dir, 'ignored')), { code: 'ENOENT' });
  } finally {
    configureLogging({ console: false });
    await rm(dir, { recursive: true, force: true });
  }
});

test('an empty selection still produces a report with no results', async () => {
  const dir = await mkdtemp(join(tmpdir(), 'xpu-run-'));
  try {
    const outcome = await runCommand(
      { config: configFrom({ hardware: { type: 'cpu' }, metrics: { collection_interval: 0.01 } }), selection: 'training', outputDir: dir },
      { probes: fakeProbes(), now, console: false },
    );
    assert.equal(outcome.total, 0);
    assert.equal(outcome.failed, 0);
    assert.equal(outcome.hardwareType, 'cpu');
    const html = await readFile(join(dir, 'benchmark_report_20260203_040506.html'), 'utf8');
    assert.ok(html.includes('<td data-field="successRate">0.0%</td>'));
  } finally {
    configureLogging({ console: false });
    await rm(dir, { recursive: true, force: true });
  }
});
