/**
 * Rule Registry
 *
 * Holds the rules a lint run executes, keyed by rule id.
 */

import type { LintRule } from '../types/rule.types.js';
import type { RuleIdEnumType } from '../types/enums.js';
import { ConfigurationError } from '../errors/index.js';
import {
    FrontMatterMissingRule,
    FrontMatterInvalidYamlRule,
    FrontMatterRequiredKeyRule,
    FrontMatterInvalidTypeRule,
    FrontMatterInvalidLangRule,
    FrontMatterLangMismatchRule,
    FrontMatterUnknownKeyRule,
    FrontMatterUnknownLayoutRule,
} from './front-matter.rules.js';
import { BrokenLinkRule, MissingBaseurlRule, CrossLanguageLinkRule } from './links.rules.js';
import { InvalidCodeSyntaxRule, EmptyCodeBlockRule, MissingCodeLanguageRule } from './code-samples.rules.js';
import { DuplicateNavOrderRule } from './navigation.rules.js';
import {
    MissingTranslationRule,
    OrphanTranslationRule,
    NavOrderMismatchRule,
    UntranslatedPageRule,
} from './translations.rules.js';

export class RuleRegistry {
    private readonly rules = new Map<RuleIdEnumType, LintRule>();

    register(rule: LintRule): this {
        if (this.rules.has(rule.id)) {
            throw new ConfigurationError(`Rule "${rule.id}" is already registered`, { ruleId: rule.id });
        }
        this.rules.set(rule.id, rule);
        return this;
    }

    get(id: RuleIdEnumType): LintRule | undefined {
        return this.rules.get(id);
    }

    /**
     * Rules in registration order
     */
    all(): LintRule[] {
        return [...this.rules.values()];
    }
}

/**
 * Registry with every built-in rule
 */
export function createDefaultRuleRegistry(): RuleRegistry {
    const rules: LintRule[] = [
        new FrontMatterMissingRule(),
        new FrontMatterInvalidYamlRule(),
        new FrontMatterRequiredKeyRule(),
        new FrontMatterInvalidTypeRule(),
        new FrontMatterInvalidLangRule(),
        new FrontMatterLangMismatchRule(),
        new FrontMatterUnknownKeyRule(),
        new FrontMatterUnknownLayoutRule(),
        new BrokenLinkRule(),
        new MissingBaseurlRule(),
        new CrossLanguageLinkRule(),
        new InvalidCodeSyntaxRule(),
        new EmptyCodeBlockRule(),
        new MissingCodeLanguageRule(),
        new DuplicateNavOrderRule(),
        new MissingTranslationRule(),
        new OrphanTranslationRule(),
        new NavOrderMismatchRule(),
        new UntranslatedPageRule(),
    ];

    const registry = new RuleRegistry();
    for (const rule of rules) {
        registry.register(rule);
    }
    return registry;
}
