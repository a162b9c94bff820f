import si from 'systeminformation';
import { logDebug } from '@xpu-bench/logging';
import { DEFAULT_TOOL_TIMEOUT_MS, runTool } from './exec';
import type { ToolRunner } from './exec';
import type { AcceleratorStats, GraphicsControllerLike, GraphicsSource, Probe } from './types';

export const NVIDIA_SMI = 'nvidia-smi';

export const NVIDIA_QUERY_FIELDS = [
  'index',
  'name',
  'utilization.gpu',
  'memory.used',
  'memory.total',
  'temperature.gpu',
  'power.draw',
] as const;

export type AcceleratorProbeOptions = {
  runTool?: ToolRunner;
  graphics?: GraphicsSource;
  timeoutMs?: number;
};

/** Parse a reading such as `45`, `71.3` or `[N/A]`; unavailable values become undefined. */
export const parseReading = (raw: string | undefined): number | undefined => {
  const value = raw?.trim();
  if (!value || /^\[?n\/?a\]?$/i.test(value)) {
    return undefined;
  }
  const parsed = Number.parseFloat(value);
  return Number.isFinite(parsed) ? parsed : undefined;
};

export const parseNvidiaSmiCsv = (stdout: string): AcceleratorStats[] => {
  const devices: AcceleratorStats[] = [];
  for (const line of stdout.split('\n')) {
    if (!line.trim()) {
      continue;
    }
    const parts = line.split(',').map((part) => part.trim());
    if (parts.length < NVIDIA_QUERY_FIELDS.length) {
      continue;
    }
    const [index, name, utilization, memoryUsed, memoryTotal, temperature, power] = parts;
    devices.push({
      index: parseReading(index) ?? devices.length,
      name: name || undefined,
      utilizationPercent: parseReading(utilization),
      memoryUsedMb: parseReading(memoryUsed),
      memoryTotalMb: parseReading(memoryTotal),
      temperatureC: parseReading(temperature),
      powerDrawW: parseReading(power),
      source: 'cli',
    });
  }
  return devices;
};

/** Map systeminformation controllers of one vendor into accelerator readings. */
export const controllersToStats = (
  controllers: GraphicsControllerLike[],
  vendorPattern: RegExp,
): AcceleratorStats[] => {
  return controllers
    .filter((controller) => vendorPattern.test(controller.vendor) || vendorPattern.test(controller.model))
    .map((controller, index): AcceleratorStats => ({
      index,
      name: controller.model || undefined,
      utilizationPercent: controller.utilizationGpu,
      memoryUsedMb: controller.memoryUsed,
      memoryTotalMb: controller.memoryTotal ?? controller.vram ?? undefined,
      temperatureC: controller.temperatureGpu,
      powerDrawW: controller.powerDraw,
      source: 'library',
    }));
};

export const readLibraryDevices = async (
  graphics: GraphicsSource,
  vendorPattern: RegExp,
): Promise<AcceleratorStats[]> => {
  try {
    const data = await graphics();
    return controllersToStats(data.controllers, vendorPattern);
  } catch (error) {
    logDebug('[profiler] graphics library query failed', { error });
    return [];
  }
};

/**
 * GPU probe: nvidia-smi first, systeminformation's controller list when the tool
 * is missing, hangs or fails. Resolves with an empty list when neither answers.
 */
export const createGpuProbe = (options: AcceleratorProbeOptions = {}): Probe<AcceleratorStats[]> => {
  const run = options.runTool ?? runTool;
  const graphics = options.graphics ?? si.graphics;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TOOL_TIMEOUT_MS;

  return async (context = {}) => {
    const result = await run(
      NVIDIA_SMI,
      [`--query-gpu=${NVIDIA_QUERY_FIELDS.join(',')}`, '--format=csv,noheader,nounits'],
      { timeoutMs, signal: context.signal },
    );
    if (result.ok) {
      return parseNvidiaSmiCsv(result.stdout);
    }
    if (result.reason === 'aborted') {
      return [];
    }
    logDebug('[profiler] nvidia-smi unavailable, falling back to systeminformation', {
      reason: result.reason,
      detail: result.detail,
    });
    return readLibraryDevices(graphics, /nvidia/i);
  };
};
