import assert from 'node:assert/strict';
import { parseRunConfig } from '../src/config';
import type { RunConfig } from '../src/config';
import type { BenchmarkOutcome, BenchmarkUnit } from '../src/types';

export const configFrom = (value: unknown): RunConfig => {
  const result = parseRunConfig(value);
  assert.ok(result.ok, 'expected a valid configuration');
  return result.config;
};

export type RecordingUnit = BenchmarkUnit & { calls: string[] };

/** A unit that records the names it ran and answers with a fixed outcome. */
export const recordingUnit = (outcome: BenchmarkOutcome): RecordingUnit => {
  const calls: string[] = [];
  const unit: BenchmarkUnit = (name) => {
    calls.push(name);
    return outcome;
  };
  return Object.assign(unit, { calls });
};
