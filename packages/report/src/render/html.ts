import type { BenchmarkResult } from '@xpu-bench/bench';
import type { FieldStats } from '@xpu-bench/metrics';
import type { RunReport } from '../types';

export const escapeHtml = (value: unknown): string => {
  return String(value)
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
};

export const formatValue = (value: number): string => {
  return Number.isInteger(value) ? value.toString() : value.toFixed(2);
};

const styles = `body{font-family:system-ui,Segoe UI,sans-serif;margin:0;padding:2rem;background:#f7f7f8;color:#111}
header.hero{margin-bottom:2rem}
section{background:#fff;border-radius:0.75rem;padding:1.5rem;margin-bottom:1.5rem;box-shadow:0 1px 4px rgba(15,23,42,.08)}
h1{margin:0 0 .5rem 0;font-size:2rem}
.badge{display:inline-flex;align-items:center;padding:0.2rem 0.6rem;border-radius:999px;font-size:0.85rem;font-weight:600;text-transform:capitalize}
.badge-success{background:#d1fae5;color:#047857}
.badge-failed{background:#fee2e2;color:#b91c1c}
table{width:100%;border-collapse:collapse;margin-top:0.5rem}
th,td{border:1px solid #e5e7eb;padding:0.5rem;text-align:left;font-size:0.9rem}
pre{background:#0f172a;color:#e0e7ff;padding:0.75rem;border-radius:0.5rem;overflow:auto;font-size:0.85rem}
.results{display:grid;gap:1rem}
@media(min-width:900px){.results{grid-template-columns:repeat(2,minmax(0,1fr));}}
.empty{color:#6b7280;font-style:italic}
`;

const renderTelemetryTable = (fields: Readonly<Record<string, FieldStats>>): string => {
  const entries = Object.entries(fields);
  if (entries.length === 0) {
    return '<p class="empty">No telemetry samples collected.</p>';
  }
  const rows = entries
    .map(
      ([field, stats]) =>
        `<tr><td>${escapeHtml(field)}</td><td>${escapeHtml(formatValue(stats.mean))}</td><td>${escapeHtml(
          formatValue(stats.max),
        )}</td><td>${escapeHtml(stats.count)}</td></tr>`,
    )
    .join('');
  return `<table><thead><tr><th>Field</th><th>Mean</th><th>Max</th><th>Samples</th></tr></thead><tbody>${rows}</tbody></table>`;
};

const renderMetricsTable = (metrics: Readonly<Record<string, number>>): string => {
  const entries = Object.entries(metrics);
  if (entries.length === 0) {
    return '<p class="empty">No metrics reported.</p>';
  }
  const rows = entries
    .map(([name, value]) => `<tr><td>${escapeHtml(name)}</td><td>${escapeHtml(formatValue(value))}</td></tr>`)
    .join('');
  return `<table><thead><tr><th>Metric</th><th>Value</th></tr></thead><tbody>${rows}</tbody></table>`;
};

const renderResult = (result: Readonly<BenchmarkResult>): string => {
  return `<article class="result" data-status="${escapeHtml(result.status)}">
    <header>
      <h3>${escapeHtml(result.name)}</h3>
      <span class="badge badge-${escapeHtml(result.status)}">${escapeHtml(result.status)}</span>
    </header>
    <p class="stats">kind: ${escapeHtml(result.kind)} · duration: ${escapeHtml(
      (result.durationMs / 1000).toFixed(2),
    )} s · started: ${escapeHtml(result.timestamp)}</p>
    ${result.error ? `<pre class="error">${escapeHtml(result.error)}</pre>` : ''}
    ${renderMetricsTable(result.metrics)}
  </article>`;
};

/** Standalone page; every interpolated value is escaped. */
export const renderHtmlReport = (report: RunReport): string => {
  const { summary, telemetry } = report;
  const cards = report.results.length > 0
    ? report.results.map(renderResult).join('')
    : '<p class="empty">No benchmarks ran.</p>';

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="utf-8" />
  <title>XPU Benchmark Report – ${escapeHtml(summary.hardwareType)}</title>
  <style>${styles}</style>
</head>
<body>
  <header class="hero">
    <h1>XPU Benchmark Report</h1>
    <p>Timestamp ${escapeHtml(summary.timestamp)} · Hardware ${escapeHtml(summary.hardwareType)}</p>
  </header>

  <section>
    <h2>Summary</h2>
    <table>
      <tbody>
        <tr><th>Total</th><td data-field="total">${escapeHtml(summary.total)}</td></tr>
        <tr><th>Successful</th><td data-field="successful">${escapeHtml(summary.successful)}</td></tr>
        <tr><th>Failed</th><td data-field="failed">${escapeHtml(summary.failed)}</td></tr>
        <tr><th>Success rate</th><td data-field="successRate">${escapeHtml(summary.successRate.toFixed(1))}%</td></tr>
      </tbody>
    </table>
  </section>

  <section>
    <h2>Telemetry</h2>
    <p>${escapeHtml(telemetry.totalSamples)} samples over ${escapeHtml(
      (telemetry.collectionDurationMs / 1000).toFixed(1),
    )} s</p>
    ${renderTelemetryTable(telemetry.fields)}
  </section>

  <section>
    <h2>Results</h2>
    <div class="results">
      ${cards}
    </div>
  </section>
</body>
</html>
`;
};
