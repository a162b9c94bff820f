export { runTool, DEFAULT_TOOL_TIMEOUT_MS } from './exec';
export type { ToolFailureReason, ToolResult, ToolRunOptions, ToolRunner } from './exec';
export { createSystemProbe } from './system';
export type { SystemProbeOptions, SystemSource } from './system';
export {
  NVIDIA_QUERY_FIELDS,
  NVIDIA_SMI,
  controllersToStats,
  createGpuProbe,
  parseNvidiaSmiCsv,
  parseReading,
} from './gpu';
export type { AcceleratorProbeOptions } from './gpu';
export { NPU_SMI, createNpuProbe, parseNpuSmiInfo } from './npu';
export {
  AUTO_HARDWARE,
  DEFAULT_DETECT_TIMEOUT_MS,
  UNKNOWN_HARDWARE,
  createDefaultDetectors,
  detectHardware,
} from './detect';
export type { DetectOptions, DetectorDeps, HardwareDetector } from './detect';
export { ACCELERATOR_VENDORS } from './types';
export type {
  AcceleratorReadings,
  AcceleratorStats,
  AcceleratorVendor,
  GraphicsControllerLike,
  GraphicsSource,
  Probe,
  ProbeContext,
  SystemStats,
} from './types';
