export { buildReport, successRateOf } from './build';
export { escapeHtml, formatValue, renderHtmlReport } from './render/html';
export { renderJsonReport } from './render/json';
export { artifactName, formatStamp } from './stamp';
export { DEFAULT_REPORT_PREFIX, writeArtifact, writeReport } from './write';
export type { BuildReportInput, ReportPaths, RunReport, RunSummary, WriteReportOptions } from './types';
