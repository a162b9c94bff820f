import type { BenchmarkUnit } from '../types';
import type { UnitTable } from '../registry';
import { cpuThroughputUnit } from './cpu';
import { diskIoUnit } from './disk';
import { memoryBandwidthUnit } from './memory';

export { commandUnit, createCommandUnit, DEFAULT_COMMAND_TIMEOUT_SECONDS, parseMetricsLine } from './command';
export { cpuThroughputUnit } from './cpu';
export { diskIoUnit } from './disk';
export { memoryBandwidthUnit } from './memory';
export { parseSize } from './params';

const stressUnits: Record<string, BenchmarkUnit> = {
  cpu_throughput: cpuThroughputUnit,
  memory_bandwidth: memoryBandwidthUnit,
  disk_io: diskIoUnit,
};

export const builtinUnits: UnitTable = {
  stress: stressUnits,
};
