import { readFile } from 'node:fs/promises';
import path from 'node:path';
import yaml from 'js-yaml';
import { errorMessage } from '@xpu-bench/logging';
import { parseRunConfig } from '@xpu-bench/bench';
import type { RunConfig } from '@xpu-bench/bench';

export class ConfigError extends Error {
  public path: string;

  constructor(filePath: string, message: string) {
    super(message);
    this.name = 'ConfigError';
    this.path = filePath;
  }
}

const parseDocument = (filePath: string, raw: string): unknown => {
  if (path.extname(filePath).toLowerCase() === '.json') {
    return JSON.parse(raw);
  }
  return yaml.load(raw, { filename: filePath });
};

/** Read and validate a YAML or JSON run configuration. Every failure is a ConfigError. */
export const loadRunConfig = async (filePath: string): Promise<RunConfig> => {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf8');
  } catch (error) {
    throw new ConfigError(filePath, `cannot read configuration ${filePath}: ${errorMessage(error)}`);
  }

  let document: unknown;
  try {
    document = parseDocument(filePath, raw);
  } catch (error) {
    throw new ConfigError(filePath, `cannot parse configuration ${filePath}: ${errorMessage(error)}`);
  }

  const result = parseRunConfig(document);
  if (!result.ok) {
    throw new ConfigError(filePath, `invalid configuration ${filePath}:\n${result.errors.map((line) => `  - ${line}`).join('\n')}`);
  }
  return result.config;
};
