import { configureLogging, resolveLogLevel } from '@xpu-bench/logging';
import { detectHardware } from '@xpu-bench/profiler';
import { MetricsCollector } from '@xpu-bench/metrics';
import { isBenchmarkSelection } from '@xpu-bench/bench';
import type { RunConfig } from '@xpu-bench/bench';
import { ConfigError, loadRunConfig } from './config';
import { formatRunSummary, parseArgs, pathArg, usage } from './lib';
import { runCommand } from './run';
import type { RunDeps } from './run';

export type CliIo = {
  out: (text: string) => void;
  err: (text: string) => void;
};

export type MainDeps = RunDeps & {
  io?: CliIo;
};

const consoleIo: CliIo = {
  out: (text) => console.log(text),
  err: (text) => console.error(text),
};

type Loaded = { ok: true; config: RunConfig } | { ok: false };

const loadOrReport = async (filePath: string, io: CliIo): Promise<Loaded> => {
  try {
    return { ok: true, config: await loadRunConfig(filePath) };
  } catch (error) {
    if (error instanceof ConfigError) {
      io.err(error.message);
      return { ok: false };
    }
    throw error;
  }
};

/** Dispatch one command line. Resolves with the process exit code. */
export const main = async (argv: string[], deps: MainDeps = {}): Promise<number> => {
  const io = deps.io ?? consoleIo;
  const [command, ...rest] = argv;
  if (!command) {
    io.err(usage());
    return 1;
  }
  const args = parseArgs(rest);

  if (command === 'help' || command === '--help') {
    io.out(usage());
    return 0;
  }

  if (command === 'run') {
    const configPath = pathArg(args.config);
    if (!configPath) {
      io.err('Missing --config');
      io.err(usage());
      return 1;
    }
    const selection = args.benchmark ?? 'all';
    if (!isBenchmarkSelection(selection)) {
      io.err(`Invalid --benchmark ${selection}: expected training, inference, stress or all`);
      return 1;
    }
    const loaded = await loadOrReport(configPath, io);
    if (!loaded.ok) {
      return 1;
    }
    const outcome = await runCommand({ config: loaded.config, selection, outputDir: pathArg(args.output) }, deps);
    io.out(formatRunSummary(outcome));
    return 0;
  }

  if (command === 'detect' || command === 'probe') {
    configureLogging({ level: resolveLogLevel(process.env.LOG_LEVEL, 'warn'), console: deps.console });
  }

  if (command === 'detect') {
    const configPath = pathArg(args.config);
    let configured: string | undefined;
    if (configPath) {
      const loaded = await loadOrReport(configPath, io);
      if (!loaded.ok) {
        return 1;
      }
      configured = loaded.config.hardware.type;
    }
    io.out(await detectHardware(configured, { detectors: deps.detectors }));
    return 0;
  }

  if (command === 'probe') {
    const collector = new MetricsCollector({ probes: deps.probes });
    io.out(JSON.stringify(await collector.sampleOnce(), null, 2));
    return 0;
  }

  io.err(`Unknown command: ${command}`);
  io.err(usage());
  return 1;
};
