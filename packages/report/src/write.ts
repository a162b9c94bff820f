import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { logError, logInfo } from '@xpu-bench/logging';
import { renderHtmlReport } from './render/html';
import { renderJsonReport } from './render/json';
import { artifactName } from './stamp';
import type { ReportPaths, RunReport, WriteReportOptions } from './types';

export const DEFAULT_REPORT_PREFIX = 'benchmark_report';

/** Write one artifact; resolves with its path, or undefined when the write failed. */
export const writeArtifact = async (filePath: string, content: string): Promise<string | undefined> => {
  try {
    await mkdir(path.dirname(filePath), { recursive: true });
    await writeFile(filePath, content, 'utf8');
    return filePath;
  } catch (error) {
    logError('[report] failed to write artifact', { path: filePath, error });
    return undefined;
  }
};

/** Persist the JSON and HTML encodings of one report under the same stamp. */
export const writeReport = async (report: RunReport, options: WriteReportOptions): Promise<ReportPaths> => {
  const prefix = options.prefix ?? DEFAULT_REPORT_PREFIX;
  const jsonPath = path.join(options.outDir, artifactName(prefix, options.stamp, 'json'));
  const htmlPath = path.join(options.outDir, artifactName(prefix, options.stamp, 'html'));

  const paths: ReportPaths = {
    json: await writeArtifact(jsonPath, renderJsonReport(report)),
    html: await writeArtifact(htmlPath, renderHtmlReport(report)),
  };
  logInfo('[report] report written', { json: paths.json, html: paths.html });
  return paths;
};
