import si from 'systeminformation';
import { logDebug } from '@xpu-bench/logging';
import { DEFAULT_TOOL_TIMEOUT_MS, runTool } from './exec';
import { parseReading, readLibraryDevices } from './gpu';
import type { AcceleratorProbeOptions } from './gpu';
import type { AcceleratorStats, Probe } from './types';

export const NPU_SMI = 'npu-smi';

const DEVICE_ROW = /^(\d+)\s+(\S.*)$/;
const CHIP_ROW = /^\d+(?:\s+\d+)?$/;
const BUS_ID = /^[0-9a-f]{4}:[0-9a-f]{2}:[0-9a-f]{2}\.[0-9a-f]$/i;
const USAGE_PAIR = /(\d+(?:\.\d+)?)\s*\/\s*(\d+(?:\.\d+)?)/g;

const tableCells = (line: string): string[] | undefined => {
  const trimmed = line.trim();
  if (!trimmed.startsWith('|') || !trimmed.endsWith('|')) {
    return undefined;
  }
  return trimmed
    .slice(1, -1)
    .split('|')
    .map((cell) => cell.trim());
};

const usagePairs = (text: string): Array<{ used: number; total: number }> => {
  return Array.from(text.matchAll(USAGE_PAIR), (match) => ({
    used: Number.parseFloat(match[1]),
    total: Number.parseFloat(match[2]),
  }));
};

const applyChipRow = (device: AcceleratorStats, readings: string): void => {
  device.utilizationPercent = parseReading(readings.split(/\s+/)[0]);
  // HBM is listed after DDR; a 0 total means the memory kind is absent on this chip.
  const memory = usagePairs(readings).filter((pair) => pair.total > 0).pop();
  if (memory) {
    device.memoryUsedMb = memory.used;
    device.memoryTotalMb = memory.total;
  }
};

/**
 * Parse the device table printed by `npu-smi info`. Each NPU spans two rows:
 * `<npu> <name> | <health> | <power> <temp> ...` then
 * `<chip> | <bus-id> | <aicore%> <used> / <total> ...`.
 */
export const parseNpuSmiInfo = (stdout: string): AcceleratorStats[] => {
  const devices: AcceleratorStats[] = [];
  let pending: AcceleratorStats | undefined;

  for (const line of stdout.split('\n')) {
    const cells = tableCells(line);
    if (!cells || cells.length !== 3) {
      continue;
    }
    const [first, second, third] = cells;
    const deviceMatch = DEVICE_ROW.exec(first);
    if (deviceMatch && !BUS_ID.test(second)) {
      const [power, temperature] = third.split(/\s+/);
      pending = {
        index: Number.parseInt(deviceMatch[1], 10),
        name: deviceMatch[2].trim(),
        powerDrawW: parseReading(power),
        temperatureC: parseReading(temperature),
        source: 'cli',
      };
      devices.push(pending);
      continue;
    }
    if (pending && CHIP_ROW.test(first) && BUS_ID.test(second)) {
      applyChipRow(pending, third);
      pending = undefined;
    }
  }

  return devices;
};

/**
 * NPU probe: npu-smi first, systeminformation controllers from a Huawei vendor
 * otherwise. Resolves with an empty list when neither answers.
 */
export const createNpuProbe = (options: AcceleratorProbeOptions = {}): Probe<AcceleratorStats[]> => {
  const run = options.runTool ?? runTool;
  const graphics = options.graphics ?? si.graphics;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TOOL_TIMEOUT_MS;

  return async (context = {}) => {
    const result = await run(NPU_SMI, ['info'], { timeoutMs, signal: context.signal });
    if (result.ok) {
      return parseNpuSmiInfo(result.stdout);
    }
    if (result.reason === 'aborted') {
      return [];
    }
    logDebug('[profiler] npu-smi unavailable, falling back to systeminformation', {
      reason: result.reason,
      detail: result.detail,
    });
    return readLibraryDevices(graphics, /huawei|ascend/i);
  };
};
