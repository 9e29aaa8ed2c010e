import type { LintReport } from '../types/diagnostic.types.js';

/**
 * Render a report as pretty-printed JSON
 */
export function formatJson(report: LintReport): string {
    return `${JSON.stringify(report, null, 2)}\n`;
}
