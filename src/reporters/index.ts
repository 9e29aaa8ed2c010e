import type { LintReport } from '../types/diagnostic.types.js';
import { formatJson } from './json.reporter.js';
import { formatText, type TextReportOptions } from './text.reporter.js';

export { formatText, formatJson };
export type { TextReportOptions };

export type ReportFormat = 'text' | 'json';

/**
 * Render a report in the requested format
 */
export function formatReport(report: LintReport, format: ReportFormat, options: TextReportOptions = {}): string {
    return format === 'json' ? formatJson(report) : formatText(report, options);
}
