export type AcceleratorVendor = 'nvidia' | 'ascend';

export const ACCELERATOR_VENDORS: readonly AcceleratorVendor[] = ['nvidia', 'ascend'];

export type SystemStats = {
  cpuPercent?: number;
  cpuCount?: number;
  memoryPercent?: number;
  memoryUsedBytes?: number;
  memoryTotalBytes?: number;
  diskPercent?: number;
  diskUsedBytes?: number;
  diskTotalBytes?: number;
  networkBytesSent?: number;
  networkBytesReceived?: number;
};

export type AcceleratorStats = {
  index: number;
  name?: string;
  utilizationPercent?: number;
  memoryUsedMb?: number;
  memoryTotalMb?: number;
  temperatureC?: number;
  powerDrawW?: number;
  /** Which tier produced the reading. */
  source: 'cli' | 'library';
};

export type AcceleratorReadings = Record<AcceleratorVendor, AcceleratorStats[]>;

export type ProbeContext = {
  signal?: AbortSignal;
};

/** A best-effort telemetry source. Implementations resolve with an empty value instead of rejecting. */
export type Probe<T> = (context?: ProbeContext) => Promise<T>;

/** The slice of a systeminformation graphics controller the accelerator probes read. */
export type GraphicsControllerLike = {
  vendor: string;
  model: string;
  vram?: number | null;
  utilizationGpu?: number;
  memoryUsed?: number;
  memoryTotal?: number;
  temperatureGpu?: number;
  powerDraw?: number;
};

export type GraphicsSource = () => Promise<{ controllers: GraphicsControllerLike[] }>;
