import type { Diagnostic, RuleFinding } from '../types/diagnostic.types.js';
import type { ResolvedConfig } from '../types/config.types.js';
import type { Site } from '../types/page.types.js';
import type { LintRule, RuleContext } from '../types/rule.types.js';
import type { SeverityEnumType } from '../types/enums.js';
import { RuleExecutionError } from '../errors/index.js';
import type { RuleRegistry } from '../rules/rule-registry.js';
import type { CodeValidatorRegistry } from '../validators/validator-registry.js';
import type { Logger } from '../utils/logger.js';
import type { DocsiteLintEventEmitter } from '../utils/events.js';

/**
 * Dependencies for LintEngine
 */
export interface LintEngineDependencies {
    config: ResolvedConfig;
    logger: Logger;
    rules: RuleRegistry;
    validators: CodeValidatorRegistry;
    events?: DocsiteLintEventEmitter;
}

/**
 * Runs the enabled rules over a loaded site
 */
export class LintEngine {
    private readonly config: ResolvedConfig;
    private readonly logger: Logger;
    private readonly rules: RuleRegistry;
    private readonly context: RuleContext;
    private readonly events?: DocsiteLintEventEmitter;

    constructor(deps: LintEngineDependencies) {
        this.config = deps.config;
        this.logger = deps.logger;
        this.rules = deps.rules;
        this.events = deps.events;
        this.context = {
            config: deps.config,
            logger: deps.logger,
            validators: deps.validators,
        };
    }

    /**
     * Rules that will run, with the severity each reports at
     */
    enabledRules(): Array<{ rule: LintRule; severity: SeverityEnumType }> {
        const enabled: Array<{ rule: LintRule; severity: SeverityEnumType }> = [];
        for (const rule of this.rules.all()) {
            const setting = this.config.rules[rule.id] ?? rule.defaultSeverity;
            if (setting === 'off') continue;
            enabled.push({ rule, severity: setting });
        }
        return enabled;
    }

    /**
     * Run every enabled rule; diagnostics come back sorted by file, line, rule id
     */
    run(site: Site): Diagnostic[] {
        const diagnostics: Diagnostic[] = [];

        for (const { rule, severity } of this.enabledRules()) {
            const startTime = Date.now();

            const findings = this.check(rule, site);

            for (const finding of findings) {
                diagnostics.push({ ...finding, ruleId: rule.id, severity });
            }

            const durationMs = Date.now() - startTime;
            this.logger.debug('Rule complete', { ruleId: rule.id, findings: findings.length, durationMs });
            this.events?.emit('rule:complete', { ruleId: rule.id, findings: findings.length, durationMs });
        }

        return diagnostics.sort(compareDiagnostics);
    }

    private check(rule: LintRule, site: Site): RuleFinding[] {
        try {
            return rule.check(site, this.context);
        } catch (error) {
            const cause = error instanceof Error ? error : new Error(String(error));
            this.logger.error('Rule failed', { ruleId: rule.id, error: cause.message });
            throw new RuleExecutionError(rule.id, cause.message, { cause, operation: 'run' });
        }
    }
}

export function compareDiagnostics(a: Diagnostic, b: Diagnostic): number {
    return a.file.localeCompare(b.file)
        || (a.line ?? 0) - (b.line ?? 0)
        || a.ruleId.localeCompare(b.ruleId);
}
