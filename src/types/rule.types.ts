import type { ResolvedConfig } from './config.types.js';
import type { RuleFinding } from './diagnostic.types.js';
import type { RuleIdEnumType, SeverityEnumType } from './enums.js';
import type { Site } from './page.types.js';
import type { Logger } from '../utils/logger.js';
import type { CodeValidatorRegistry } from '../validators/validator-registry.js';

/**
 * Everything a rule may consult besides the site itself
 */
export interface RuleContext {
    config: ResolvedConfig;
    logger: Logger;
    validators: CodeValidatorRegistry;
}

/**
 * A single lint rule
 */
export interface LintRule {
    readonly id: RuleIdEnumType;
    readonly defaultSeverity: SeverityEnumType;
    readonly description: string;
    check(site: Site, context: RuleContext): RuleFinding[];
}
