import type { RuleIdEnumType, SeverityEnumType } from './enums.js';

/**
 * A single lint finding
 */
export interface Diagnostic {
    ruleId: RuleIdEnumType;
    severity: SeverityEnumType;
    /** POSIX path relative to the docs root */
    file: string;
    /** 1-based line, when the finding points at one */
    line?: number;
    message: string;
    details?: Record<string, unknown>;
}

/**
 * Diagnostic as produced by a rule, before severity resolution
 */
export type RuleFinding = Omit<Diagnostic, 'severity' | 'ruleId'>;

/**
 * Per-severity counts
 */
export interface DiagnosticCounts {
    error: number;
    warning: number;
    info: number;
}

/**
 * Result of a lint run
 */
export interface LintReport {
    runId: string;
    root: string;
    pagesChecked: number;
    diagnostics: Diagnostic[];
    counts: DiagnosticCounts;
    durationMs: number;
}
