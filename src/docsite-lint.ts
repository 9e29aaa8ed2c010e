import type { DocsiteLintConfig, ResolvedConfig } from './types/config.types.js';
import type { Diagnostic, DiagnosticCounts, LintReport } from './types/diagnostic.types.js';
import type { DocPage, Site } from './types/page.types.js';
import type { IPageSource } from './types/source.types.js';
import type { LintRule } from './types/rule.types.js';
import type { SeverityEnumType } from './types/enums.js';
import { resolveConfig } from './config/loader.js';
import {
    LintRunError,
    ValidationError,
    clearCorrelationId,
    generateCorrelationId,
    setCorrelationId,
    wrapError,
} from './errors/index.js';
import { createLogger, type Logger } from './utils/logger.js';
import { DocsiteLintEventEmitter, type DocsiteLintEvents } from './utils/events.js';
import { FileSystemPageSource } from './sources/file-system.source.js';
import { SiteLoader } from './engines/site-loader.engine.js';
import { LintEngine } from './engines/lint.engine.js';
import { createDefaultRuleRegistry, type RuleRegistry } from './rules/rule-registry.js';
import { createDefaultValidatorRegistry, type CodeValidatorRegistry } from './validators/validator-registry.js';

/**
 * Collaborators that can be swapped out, e.g. for an in-memory tree in tests
 */
export interface DocsiteLintDependencies {
    source?: IPageSource;
    logger?: Logger;
    rules?: RuleRegistry;
    validators?: CodeValidatorRegistry;
}

/**
 * Options for a single lint run
 */
export interface LintOptions {
    /**
     * Only report diagnostics for pages in these language directories,
     * plus findings about these languages filed elsewhere (missing translations)
     */
    languages?: string[];
}

/**
 * Main docsite-lint class
 *
 * @example
 * ```typescript
 * import { DocsiteLinter } from 'docsite-lint';
 *
 * const linter = new DocsiteLinter({ root: './docs' });
 * const report = await linter.lint();
 * console.log(report.counts);
 * ```
 */
export class DocsiteLinter {
    private readonly config: ResolvedConfig;
    private readonly logger: Logger;
    private readonly source: IPageSource;
    private readonly events = new DocsiteLintEventEmitter();
    private readonly loader: SiteLoader;
    private readonly engine: LintEngine;

    constructor(userConfig: DocsiteLintConfig, deps: DocsiteLintDependencies = {}) {
        this.config = resolveConfig(userConfig);
        this.logger = deps.logger ?? createLogger(this.config.logging);
        this.source = deps.source ?? new FileSystemPageSource(this.config.root, this.config.exclude);

        this.loader = new SiteLoader({
            source: this.source,
            config: this.config,
            logger: this.logger,
            events: this.events,
        });
        this.engine = new LintEngine({
            config: this.config,
            logger: this.logger,
            rules: deps.rules ?? createDefaultRuleRegistry(),
            validators: deps.validators ?? createDefaultValidatorRegistry(),
            events: this.events,
        });

        this.logger.debug('docsite-lint initialized', {
            root: this.source.root,
            languages: this.config.languages,
        });
    }

    /**
     * Load and check the documentation tree
     */
    async lint(options: LintOptions = {}): Promise<LintReport> {
        const runId = generateCorrelationId();
        setCorrelationId(runId);
        const startTime = Date.now();

        this.events.emit('lint:start', { root: this.source.root, correlationId: runId });

        try {
            const languages = this.checkLanguages(options.languages);
            const site = await this.loader.load();
            const diagnostics = this.filterByLanguage(site, this.engine.run(site), languages);
            const pagesChecked = languages
                ? site.pages.filter((page) => page.language !== undefined && languages.includes(page.language)).length
                : site.pages.length;

            const report: LintReport = {
                runId,
                root: this.source.root,
                pagesChecked,
                diagnostics,
                counts: countBySeverity(diagnostics),
                durationMs: Date.now() - startTime,
            };

            this.logger.info('Lint complete', {
                pages: report.pagesChecked,
                ...report.counts,
                durationMs: report.durationMs,
            });
            this.events.emit('lint:complete', report);
            return report;
        } catch (error) {
            const wrapped = wrapError(error, LintRunError, 'lint');
            this.logger.error('Lint failed', { error: wrapped.message, code: wrapped.code });
            this.events.emit('lint:error', { root: this.source.root, error: wrapped });
            throw wrapped;
        } finally {
            clearCorrelationId();
        }
    }

    /**
     * Load the tree without running rules
     */
    async loadSite(): Promise<Site> {
        return this.loader.load();
    }

    /**
     * Pages of the tree, sorted by path
     */
    async listPages(): Promise<DocPage[]> {
        const site = await this.loader.load();
        return site.pages;
    }

    /**
     * Rules that will run, with their effective severity
     */
    listRules(): Array<{ rule: LintRule; severity: SeverityEnumType }> {
        return this.engine.enabledRules();
    }

    getConfig(): Readonly<ResolvedConfig> {
        return this.config;
    }

    on<K extends keyof DocsiteLintEvents>(event: K, listener: (data: DocsiteLintEvents[K]) => void): this {
        this.events.on(event, listener);
        return this;
    }

    off<K extends keyof DocsiteLintEvents>(event: K, listener: (data: DocsiteLintEvents[K]) => void): this {
        this.events.off(event, listener);
        return this;
    }

    private checkLanguages(languages: string[] | undefined): string[] | undefined {
        if (!languages || languages.length === 0) return undefined;
        const unknown = languages.filter((lang) => !this.config.languages.includes(lang));
        if (unknown.length > 0) {
            throw new ValidationError(`Unknown language: ${unknown.join(', ')}`, 'languages', {
                configured: this.config.languages,
            });
        }
        return languages;
    }

    private filterByLanguage(site: Site, diagnostics: Diagnostic[], languages: string[] | undefined): Diagnostic[] {
        if (!languages) return diagnostics;
        const languageOf = new Map(site.pages.map((page) => [page.path, page.language]));
        return diagnostics.filter((diagnostic) => {
            const language = languageOf.get(diagnostic.file);
            if (language !== undefined && languages.includes(language)) return true;
            // Missing translations are filed under the default-language page they lack
            const reported = diagnostic.details?.['language'];
            return typeof reported === 'string' && languages.includes(reported);
        });
    }
}

/**
 * Create a linter with default collaborators, overridable per dependency
 */
export function createDocsiteLinter(config: DocsiteLintConfig, deps: DocsiteLintDependencies = {}): DocsiteLinter {
    return new DocsiteLinter(config, deps);
}

export function countBySeverity(diagnostics: Diagnostic[]): DiagnosticCounts {
    const counts: DiagnosticCounts = { error: 0, warning: 0, info: 0 };
    for (const diagnostic of diagnostics) {
        counts[diagnostic.severity]++;
    }
    return counts;
}
