import si from 'systeminformation';
import { logDebug, logInfo } from '@xpu-bench/logging';
import { runTool } from './exec';
import type { ToolRunner } from './exec';
import type { GraphicsSource } from './types';

export const AUTO_HARDWARE = 'auto';
export const UNKNOWN_HARDWARE = 'unknown';
export const DEFAULT_DETECT_TIMEOUT_MS = 5_000;

export type HardwareDetector = {
  kind: string;
  detect: (signal: AbortSignal) => Promise<boolean>;
};

export type DetectorDeps = {
  runTool?: ToolRunner;
  graphics?: GraphicsSource;
};

export type DetectOptions = {
  detectors?: HardwareDetector[];
  timeoutMs?: number;
};

export const createDefaultDetectors = (deps: DetectorDeps = {}): HardwareDetector[] => {
  const run = deps.runTool ?? runTool;
  const graphics = deps.graphics ?? si.graphics;

  return [
    {
      kind: 'nvidia',
      detect: async (signal) => {
        const listing = await run('nvidia-smi', ['-L'], { signal });
        if (listing.ok && /\bGPU \d+/.test(listing.stdout)) {
          return true;
        }
        const data = await graphics();
        return data.controllers.some((controller) => /nvidia/i.test(controller.vendor));
      },
    },
    {
      kind: 'ascend',
      detect: async (signal) => {
        const info = await run('npu-smi', ['info'], { signal });
        if (info.ok) {
          return true;
        }
        const pci = await run('lspci', [], { signal });
        return pci.ok && /ascend/i.test(pci.stdout);
      },
    },
  ];
};

const runDetector = async (detector: HardwareDetector, timeoutMs: number): Promise<boolean> => {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<boolean>((resolve) => {
    timer = setTimeout(() => {
      controller.abort();
      logDebug('[profiler] hardware detector timed out', { kind: detector.kind, timeoutMs });
      resolve(false);
    }, timeoutMs);
  });
  const detected = Promise.resolve()
    .then(() => detector.detect(controller.signal))
    .catch((error: unknown) => {
      logDebug('[profiler] hardware detector failed', { kind: detector.kind, error });
      return false;
    });
  try {
    return await Promise.race([detected, expired]);
  } finally {
    clearTimeout(timer);
  }
};

/**
 * Resolve the hardware kind. An explicit configured value wins; `auto` (or nothing)
 * runs the detectors in order and returns the first match, else `unknown`.
 */
export const detectHardware = async (configured?: string, options: DetectOptions = {}): Promise<string> => {
  const value = configured?.trim();
  if (configured && value && value.toLowerCase() !== AUTO_HARDWARE) {
    return configured;
  }
  const detectors = options.detectors ?? createDefaultDetectors();
  const timeoutMs = options.timeoutMs ?? DEFAULT_DETECT_TIMEOUT_MS;
  for (const detector of detectors) {
    if (await runDetector(detector, timeoutMs)) {
      logInfo('[profiler] detected hardware', { kind: detector.kind });
      return detector.kind;
    }
  }
  logInfo('[profiler] no accelerator detected');
  return UNKNOWN_HARDWARE;
};
