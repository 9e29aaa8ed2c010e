import type { Diagnostic, LintReport } from '../types/diagnostic.types.js';

export interface TextReportOptions {
    /** Only show errors */
    quiet?: boolean;
}

/**
 * Render a report grouped by file:
 *
 * ```
 * tr/getting-started.md
 *   12  error    Broken link "{{ site.baseurl }}/tr/missing": no page or file at /tr/missing  links/broken
 *
 * ✖ 1 problem (1 error, 0 warnings, 0 infos)
 * ```
 */
export function formatText(report: LintReport, options: TextReportOptions = {}): string {
    const diagnostics = options.quiet
        ? report.diagnostics.filter((diagnostic) => diagnostic.severity === 'error')
        : report.diagnostics;

    if (diagnostics.length === 0) {
        return `✔ No problems found in ${report.pagesChecked} ${plural(report.pagesChecked, 'page')}\n`;
    }

    const byFile = new Map<string, Diagnostic[]>();
    for (const diagnostic of diagnostics) {
        const list = byFile.get(diagnostic.file) ?? [];
        list.push(diagnostic);
        byFile.set(diagnostic.file, list);
    }

    const lineWidth = Math.max(...diagnostics.map((d) => String(d.line ?? '').length));
    const lines: string[] = [];

    for (const [file, fileDiagnostics] of byFile) {
        lines.push(file);
        for (const diagnostic of fileDiagnostics) {
            const line = String(diagnostic.line ?? '').padStart(lineWidth);
            lines.push(`  ${line}  ${diagnostic.severity.padEnd(7)}  ${diagnostic.message}  ${diagnostic.ruleId}`);
        }
        lines.push('');
    }

    const counts = options.quiet
        ? { error: report.counts.error, warning: 0, info: 0 }
        : report.counts;
    const total = counts.error + counts.warning + counts.info;
    lines.push(
        `✖ ${total} ${plural(total, 'problem')} (` +
        `${counts.error} ${plural(counts.error, 'error')}, ` +
        `${counts.warning} ${plural(counts.warning, 'warning')}, ` +
        `${counts.info} ${plural(counts.info, 'info')})`
    );

    return `${lines.join('\n')}\n`;
}

function plural(count: number, word: string): string {
    return count === 1 ? word : `${word}s`;
}
