import { logInfo, logWarn } from '@xpu-bench/logging';
import type { BenchmarkEntry, RunConfig } from './config';
import { BENCHMARK_KINDS } from './types';
import type { BenchmarkKind, BenchmarkUnit } from './types';
import { builtinUnits, commandUnit } from './units';

/** Units under this key serve every group. */
export const ANY_KIND = '*';

export type UnitTable = Partial<Record<BenchmarkKind | typeof ANY_KIND, Record<string, BenchmarkUnit>>>;

export type RegistryOptions = {
  units?: UnitTable;
  /** Bound to entries that carry a `command` parameter. */
  commandUnit?: BenchmarkUnit;
};

export type BenchmarkRegistry = {
  resolve: (kind: BenchmarkKind, name: string, entry: BenchmarkEntry) => BenchmarkUnit | undefined;
  /** `kind/name` of every configured entry with a unit. */
  bound: () => string[];
};

const keyOf = (kind: BenchmarkKind, name: string): string => `${kind}/${name}`;

const lookup = (units: UnitTable, kind: BenchmarkKind, name: string): BenchmarkUnit | undefined => {
  const own = units[kind];
  if (own && Object.hasOwn(own, name)) {
    return own[name];
  }
  const shared = units[ANY_KIND];
  if (shared && Object.hasOwn(shared, name)) {
    return shared[name];
  }
  return undefined;
};

/**
 * Bind every configured entry to its unit once. An entry with a `command`
 * parameter runs through the command unit; otherwise the unit is looked up by
 * group and name, then among the units shared by all groups.
 */
export const createRegistry = (config: RunConfig, options: RegistryOptions = {}): BenchmarkRegistry => {
  const units = options.units ?? builtinUnits;
  const command = options.commandUnit ?? commandUnit;

  const bind = (kind: BenchmarkKind, name: string, entry: BenchmarkEntry): BenchmarkUnit | undefined => {
    if (typeof entry.command === 'string') {
      return command;
    }
    return lookup(units, kind, name);
  };

  const bindings = new Map<string, BenchmarkUnit>();
  for (const kind of BENCHMARK_KINDS) {
    for (const [name, entry] of Object.entries(config.benchmarks[kind])) {
      const unit = bind(kind, name, entry);
      if (unit) {
        bindings.set(keyOf(kind, name), unit);
      } else if (entry.enabled !== false) {
        logWarn('[bench] no unit registered for benchmark', { kind, name });
      }
    }
  }
  logInfo('[bench] benchmark registry ready', { units: bindings.size });

  return {
    resolve: (kind, name, entry) => bindings.get(keyOf(kind, name)) ?? bind(kind, name, entry),
    bound: () => Array.from(bindings.keys()),
  };
};
