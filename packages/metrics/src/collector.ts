import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { performance } from 'node:perf_hooks';
import { logDebug, logError, logInfo, logWarn } from '@xpu-bench/logging';
import { createGpuProbe, createNpuProbe, createSystemProbe } from '@xpu-bench/profiler';
import type { AcceleratorStats, Probe, ProbeContext, SystemStats } from '@xpu-bench/profiler';
import { probeFailures, sampleDuration, samplesCollected } from './observability';
import { emptySummary, summarizeSamples } from './summary';
import { settleWithin, sleep } from './timing';
import type { CollectorOptions, CollectorProbes, MetricSample, MetricsSummary, ProbeName } from './types';

export const DEFAULT_INTERVAL_MS = 1_000;
export const DEFAULT_STOP_TIMEOUT_MS = 5_000;
export const DEFAULT_PROBE_TIMEOUT_MS = 15_000;

type Session = {
  controller: AbortController;
  loop: Promise<void>;
};

const freezeSample = (sample: MetricSample): MetricSample => {
  Object.freeze(sample.system);
  for (const devices of Object.values(sample.accelerators)) {
    devices.forEach((device) => Object.freeze(device));
    Object.freeze(devices);
  }
  Object.freeze(sample.accelerators);
  return Object.freeze(sample);
};

export class MetricsCollector {
  private samples: MetricSample[] = [];
  private session: Session | null = null;
  private startedAt = 0;
  private startedWallMs = 0;
  private stoppedAt: number | null = null;
  private intervalMs: number;
  private stopTimeoutMs: number;
  private probeTimeoutMs: number;
  private probes: CollectorProbes;

  constructor(options: CollectorOptions = {}) {
    this.intervalMs = options.intervalMs ?? DEFAULT_INTERVAL_MS;
    this.stopTimeoutMs = options.stopTimeoutMs ?? DEFAULT_STOP_TIMEOUT_MS;
    this.probeTimeoutMs = options.probeTimeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS;
    this.probes = {
      system: options.probes?.system ?? createSystemProbe(),
      gpu: options.probes?.gpu ?? createGpuProbe({ timeoutMs: options.toolTimeoutMs }),
      npu: options.probes?.npu ?? createNpuProbe({ timeoutMs: options.toolTimeoutMs }),
    };
  }

  get isRunning(): boolean {
    return this.session !== null;
  }

  startCollection(): void {
    if (this.session) {
      logWarn('[collector] metrics collection already running');
      return;
    }
    const samples: MetricSample[] = [];
    const controller = new AbortController();
    this.samples = samples;
    this.startedAt = performance.now();
    this.startedWallMs = Date.now();
    this.stoppedAt = null;
    this.session = {
      controller,
      loop: this.runLoop(controller.signal, samples),
    };
    logInfo('[collector] metrics collection started', { intervalMs: this.intervalMs });
  }

  async stopCollection(): Promise<void> {
    const session = this.session;
    if (!session) {
      logWarn('[collector] metrics collection is not running');
      return;
    }
    this.session = null;
    session.controller.abort();
    this.stoppedAt = performance.now();

    const joined = await settleWithin(session.loop, this.stopTimeoutMs);
    if (!joined.settled) {
      logWarn('[collector] sampling loop did not stop in time; abandoning it', {
        stopTimeoutMs: this.stopTimeoutMs,
      });
    }
    logInfo('[collector] metrics collection stopped', { samples: this.samples.length });
  }

  /** Take one guarded sample outside any session. */
  async sampleOnce(): Promise<MetricSample> {
    const startedAt = performance.now();
    return this.takeSample({}, startedAt, Date.now());
  }

  getSummary(): MetricsSummary {
    if (this.samples.length === 0) {
      return emptySummary();
    }
    const endedAt = this.stoppedAt ?? performance.now();
    return summarizeSamples(this.samples, endedAt - this.startedAt);
  }

  getLatest(): MetricSample | undefined {
    return this.samples.at(-1);
  }

  getSamples(): readonly MetricSample[] {
    return this.samples.slice();
  }

  clear(): void {
    if (this.session) {
      logWarn('[collector] cannot clear samples while collection is running');
      return;
    }
    this.samples = [];
    this.stoppedAt = null;
  }

  /** Write `{summary, rawSamples}` as JSON. Failures are logged and reported as `false`. */
  async save(path: string): Promise<boolean> {
    try {
      const payload = JSON.stringify({ summary: this.getSummary(), rawSamples: this.samples }, null, 2);
      await mkdir(dirname(path), { recursive: true });
      await writeFile(path, `${payload}\n`, 'utf8');
      logInfo('[collector] metrics saved', { path, samples: this.samples.length });
      return true;
    } catch (error) {
      logError('[collector] failed to save metrics', { path, error });
      return false;
    }
  }

  private async runLoop(signal: AbortSignal, samples: MetricSample[]): Promise<void> {
    while (!signal.aborted) {
      try {
        const sample = await this.takeSample({ signal }, this.startedAt, this.startedWallMs);
        // A sample finished after stop belongs to no session.
        if (signal.aborted) {
          break;
        }
        samples.push(sample);
        samplesCollected.inc();
      } catch (error) {
        logError('[collector] sampling iteration failed', { error });
      }
      await sleep(this.intervalMs, signal);
    }
    logDebug('[collector] sampling loop exited', { samples: samples.length });
  }

  private async takeSample(context: ProbeContext, startedAt: number, startedWallMs: number): Promise<MetricSample> {
    const endTimer = sampleDuration.startTimer();
    const [system, gpu, npu] = await Promise.all([
      this.guard<SystemStats>('system', this.probes.system, context, {}),
      this.guard<AcceleratorStats[]>('gpu', this.probes.gpu, context, []),
      this.guard<AcceleratorStats[]>('npu', this.probes.npu, context, []),
    ]);
    endTimer();
    const elapsedMs = performance.now() - startedAt;
    return freezeSample({
      timestamp: new Date(startedWallMs + elapsedMs).toISOString(),
      elapsedMs,
      system,
      accelerators: { nvidia: gpu, ascend: npu },
    });
  }

  private async guard<T>(name: ProbeName, probe: Probe<T>, context: ProbeContext, empty: T): Promise<T> {
    try {
      const result = await settleWithin(
        Promise.resolve().then(() => probe(context)),
        this.probeTimeoutMs,
        { unref: true },
      );
      if (result.settled) {
        return result.value;
      }
      logWarn('[collector] probe timed out', { probe: name, probeTimeoutMs: this.probeTimeoutMs });
    } catch (error) {
      logWarn('[collector] probe failed', { probe: name, error });
    }
    probeFailures.inc({ probe: name });
    return empty;
  }
}
