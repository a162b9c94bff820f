import type { RunOutcome } from './run';

export const usage = (): string => {
  return `xpu-bench <command>

Commands:
  run --config <file> [--benchmark training|inference|stress|all] [--output <dir>]
  detect [--config <file>]
  probe
`;
};

export const parseArgs = (args: string[]): Record<string, string> => {
  const result: Record<string, string> = {};
  for (let i = 0; i < args.length; i += 1) {
    const token = args[i];
    if (!token.startsWith('--')) {
      continue;
    }
    const key = token.slice(2);
    const value = args[i + 1];
    if (value === undefined || value.startsWith('--')) {
      result[key] = 'true';
    } else {
      result[key] = value;
      i += 1;
    }
  }
  return result;
};

/** A flag given without a value parses as `'true'`; treat that as missing for path arguments. */
export const pathArg = (value?: string): string | undefined => {
  return value && value !== 'true' ? value : undefined;
};

export const formatRunSummary = (outcome: RunOutcome): string => {
  const seconds = (outcome.totalTimeMs / 1000).toFixed(1);
  const report = outcome.reportPaths.html ?? outcome.reportPaths.json ?? 'not written';
  return `Completed ${outcome.total} benchmarks on ${outcome.hardwareType} in ${seconds}s: ${outcome.successful} succeeded, ${outcome.failed} failed. Report: ${report}`;
};
