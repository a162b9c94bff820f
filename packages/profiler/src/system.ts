import si from 'systeminformation';
import { logDebug } from '@xpu-bench/logging';
import type { Probe, SystemStats } from './types';

/** The systeminformation calls the system probe depends on. */
export type SystemSource = {
  currentLoad: () => Promise<{ currentLoad: number; cpus: unknown[] }>;
  mem: () => Promise<{ total: number; active: number }>;
  fsSize: () => Promise<Array<{ mount: string; size: number; used: number }>>;
  networkStats: (ifaces: string) => Promise<Array<{ rx_bytes: number; tx_bytes: number }>>;
};

export type SystemProbeOptions = {
  source?: SystemSource;
  /** Filesystem whose usage is reported. */
  mount?: string;
};

const finite = (value: number | null | undefined): number | undefined => {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
};

const percentOf = (part: number | undefined, total: number | undefined): number | undefined => {
  if (part === undefined || total === undefined || total <= 0) {
    return undefined;
  }
  return (part / total) * 100;
};

const attempt = async <T>(label: string, read: () => Promise<T>): Promise<T | undefined> => {
  try {
    return await read();
  } catch (error) {
    logDebug('[profiler] system probe query failed', { query: label, error });
    return undefined;
  }
};

export const createSystemProbe = (options: SystemProbeOptions = {}): Probe<SystemStats> => {
  const source = options.source ?? si;
  const mount = options.mount ?? '/';

  return async () => {
    const [load, mem, filesystems, network] = await Promise.all([
      attempt('currentLoad', () => source.currentLoad()),
      attempt('mem', () => source.mem()),
      attempt('fsSize', () => source.fsSize()),
      attempt('networkStats', () => source.networkStats('*')),
    ]);

    const stats: SystemStats = {};

    if (load) {
      stats.cpuPercent = finite(load.currentLoad);
      stats.cpuCount = load.cpus.length > 0 ? load.cpus.length : undefined;
    }

    if (mem) {
      stats.memoryTotalBytes = finite(mem.total);
      stats.memoryUsedBytes = finite(mem.active);
      stats.memoryPercent = percentOf(stats.memoryUsedBytes, stats.memoryTotalBytes);
    }

    const disk = filesystems?.find((entry) => entry.mount === mount) ?? filesystems?.[0];
    if (disk) {
      stats.diskTotalBytes = finite(disk.size);
      stats.diskUsedBytes = finite(disk.used);
      stats.diskPercent = percentOf(stats.diskUsedBytes, stats.diskTotalBytes);
    }

    if (network && network.length > 0) {
      stats.networkBytesReceived = network.reduce((sum, entry) => sum + (finite(entry.rx_bytes) ?? 0), 0);
      stats.networkBytesSent = network.reduce((sum, entry) => sum + (finite(entry.tx_bytes) ?? 0), 0);
    }

    return stats;
  };
};
