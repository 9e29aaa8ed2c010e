import { InvalidArgumentError } from 'commander';
import * as path from 'path';
import type { DocsiteLintConfig, DocsiteLintConfigFile } from '../types/config.types.js';
import type { LintReport } from '../types/diagnostic.types.js';
import { parseEnv, type Env } from '../config/env.js';
import { fileExists, loadConfigFile } from '../config/loader.js';
import { DEFAULT_CONFIG_FILE, DEFAULT_DOCS_ROOT } from '../config/constants.js';
import { createDocsiteLinter, type DocsiteLinter, type DocsiteLintDependencies } from '../docsite-lint.js';
import { formatReport, type ReportFormat } from '../reporters/index.js';

export interface CommonOptions {
    config?: string;
}

export interface CheckOptions extends CommonOptions {
    format: ReportFormat;
    lang?: string[];
    maxWarnings?: number;
    quiet?: boolean;
}

/**
 * Process state the commands read, replaceable in tests
 */
export interface CommandContext extends DocsiteLintDependencies {
    env?: Env;
    cwd?: string;
}

export interface CheckResult {
    report: LintReport;
    output: string;
    exitCode: number;
    tooManyWarnings: boolean;
}

// ============================================
// Argument parsers
// ============================================

export function parseInteger(value: string): number {
    const parsed = Number.parseInt(value, 10);
    if (Number.isNaN(parsed) || parsed < 0) {
        throw new InvalidArgumentError('Expected a non-negative integer.');
    }
    return parsed;
}

export function parseList(value: string): string[] {
    return value
        .split(',')
        .map((item) => item.trim())
        .filter((item) => item.length > 0);
}

// ============================================
// Config assembly
// ============================================

/**
 * Explicit --config path, else ./docsite-lint.config.json when it exists
 */
export async function readConfigFile(
    configPath: string | undefined,
    cwd: string = process.cwd()
): Promise<DocsiteLintConfigFile> {
    if (configPath) {
        return loadConfigFile(path.resolve(cwd, configPath));
    }
    const defaultPath = path.join(cwd, DEFAULT_CONFIG_FILE);
    return (await fileExists(defaultPath)) ? loadConfigFile(defaultPath) : {};
}

/**
 * Merge the root argument, config file and environment.
 *
 * Root: argument, then the file's `root`, then DOCSITE_ROOT, then ./docs.
 * Logging: the file's `logging` over LOG_LEVEL and LOG_PRETTY.
 */
export function buildLinterConfig(
    root: string | undefined,
    fileConfig: DocsiteLintConfigFile,
    env: Env
): DocsiteLintConfig {
    const envRoot = env.DOCSITE_ROOT === '' ? undefined : env.DOCSITE_ROOT;
    return {
        ...fileConfig,
        root: root ?? fileConfig.root ?? envRoot ?? DEFAULT_DOCS_ROOT,
        logging: {
            level: env.LOG_LEVEL,
            structured: !env.LOG_PRETTY,
            ...fileConfig.logging,
        },
    };
}

export async function buildLinter(
    root: string | undefined,
    options: CommonOptions,
    context: CommandContext = {}
): Promise<DocsiteLinter> {
    const { env = parseEnv(), cwd, ...deps } = context;
    const fileConfig = await readConfigFile(options.config, cwd);
    return createDocsiteLinter(buildLinterConfig(root, fileConfig, env), deps);
}

// ============================================
// check
// ============================================

/**
 * 1 when the report has errors or more warnings than allowed, else 0
 */
export function checkExitCode(report: LintReport, maxWarnings: number | undefined): number {
    return report.counts.error > 0 || exceedsWarningLimit(report, maxWarnings) ? 1 : 0;
}

function exceedsWarningLimit(report: LintReport, maxWarnings: number | undefined): boolean {
    return maxWarnings !== undefined && report.counts.warning > maxWarnings;
}

export async function runCheck(
    root: string | undefined,
    options: CheckOptions,
    context: CommandContext = {}
): Promise<CheckResult> {
    const linter = await buildLinter(root, options, context);
    const report = await linter.lint({ languages: options.lang });

    return {
        report,
        output: formatReport(report, options.format, { quiet: options.quiet }),
        exitCode: checkExitCode(report, options.maxWarnings),
        tooManyWarnings: exceedsWarningLimit(report, options.maxWarnings),
    };
}
