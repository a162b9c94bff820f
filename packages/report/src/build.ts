import type { BuildReportInput, RunReport } from './types';

const deepFreeze = <T>(value: T): T => {
  if (value !== null && typeof value === 'object') {
    for (const entry of Object.values(value)) {
      deepFreeze(entry);
    }
    Object.freeze(value);
  }
  return value;
};

export const successRateOf = (successful: number, total: number): number => {
  return total > 0 ? (successful / total) * 100 : 0;
};

/** Aggregate results and telemetry into one immutable report. */
export const buildReport = (input: BuildReportInput): RunReport => {
  const results = structuredClone([...input.results]);
  const total = results.length;
  const successful = results.filter((result) => result.status === 'success').length;
  return deepFreeze({
    summary: {
      total,
      successful,
      failed: total - successful,
      successRate: successRateOf(successful, total),
      hardwareType: input.hardwareType,
      timestamp: (input.now ?? new Date()).toISOString(),
    },
    results,
    telemetry: structuredClone(input.telemetry),
  });
};
