import type { RunReport } from '../types';

export const renderJsonReport = (report: RunReport): string => `${JSON.stringify(report, null, 2)}\n`;
