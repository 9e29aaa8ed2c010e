import type { LintRule, RuleContext } from '../types/rule.types.js';
import type { RuleFinding } from '../types/diagnostic.types.js';
import type { DocPage, Site } from '../types/page.types.js';
import { PageKindEnum, RuleIdEnum, SeverityEnum } from '../types/enums.js';

/**
 * Pages whose front matter parsed cleanly
 */
function parsedPages(site: Site): DocPage[] {
    return site.pages.filter((page) => page.frontMatter.present && !page.frontMatter.error);
}

function keyLine(page: DocPage, key: string): number {
    return page.frontMatter.keyLines[key] ?? 1;
}

function isBlank(value: unknown): boolean {
    return value === undefined || value === null || (typeof value === 'string' && value.trim() === '');
}

export class FrontMatterMissingRule implements LintRule {
    readonly id = RuleIdEnum.FRONT_MATTER_MISSING;
    readonly defaultSeverity = SeverityEnum.ERROR;
    readonly description = 'Markdown page has no front matter block';

    check(site: Site): RuleFinding[] {
        return site.pages
            .filter((page) => page.kind === PageKindEnum.MARKDOWN && !page.frontMatter.present)
            .map((page) => ({
                file: page.path,
                line: 1,
                message: 'Page has no front matter block; the site generator will copy it verbatim',
            }));
    }
}

export class FrontMatterInvalidYamlRule implements LintRule {
    readonly id = RuleIdEnum.FRONT_MATTER_INVALID_YAML;
    readonly defaultSeverity = SeverityEnum.ERROR;
    readonly description = 'Front matter does not parse as a YAML mapping';

    check(site: Site): RuleFinding[] {
        const findings: RuleFinding[] = [];
        for (const page of site.pages) {
            const { error, errorLine } = page.frontMatter;
            if (error === undefined) continue;
            findings.push({
                file: page.path,
                line: errorLine ?? 1,
                message: `Invalid front matter: ${error}`,
            });
        }
        return findings;
    }
}

export class FrontMatterRequiredKeyRule implements LintRule {
    readonly id = RuleIdEnum.FRONT_MATTER_REQUIRED_KEY;
    readonly defaultSeverity = SeverityEnum.ERROR;
    readonly description = 'A required front matter key is absent or empty';

    check(site: Site, context: RuleContext): RuleFinding[] {
        const findings: RuleFinding[] = [];
        for (const page of parsedPages(site)) {
            for (const key of context.config.requiredKeys) {
                if (!isBlank(page.frontMatter.data[key])) continue;
                findings.push({
                    file: page.path,
                    line: keyLine(page, key),
                    message: `Missing required front matter key "${key}"`,
                    details: { key },
                });
            }
        }
        return findings;
    }
}

const STRING_KEYS = ['layout', 'title', 'description', 'lang', 'permalink'] as const;

export class FrontMatterInvalidTypeRule implements LintRule {
    readonly id = RuleIdEnum.FRONT_MATTER_INVALID_TYPE;
    readonly defaultSeverity = SeverityEnum.ERROR;
    readonly description = 'A recognized front matter key has the wrong type';

    check(site: Site): RuleFinding[] {
        const findings: RuleFinding[] = [];

        for (const page of parsedPages(site)) {
            const data = page.frontMatter.data;
            const report = (key: string, expected: string): void => {
                findings.push({
                    file: page.path,
                    line: keyLine(page, key),
                    message: `Front matter key "${key}" must be ${expected}, got ${describeValue(data[key])}`,
                    details: { key, expected },
                });
            };

            for (const key of STRING_KEYS) {
                const value = data[key];
                if (value !== undefined && value !== null && typeof value !== 'string') {
                    report(key, 'a string');
                }
            }
            if (data.nav_order !== undefined && data.nav_order !== null && !Number.isInteger(data.nav_order)) {
                report('nav_order', 'an integer');
            }
            if (data.hide_title !== undefined && data.hide_title !== null && typeof data.hide_title !== 'boolean') {
                report('hide_title', 'a boolean');
            }
        }
        return findings;
    }
}

export class FrontMatterInvalidLangRule implements LintRule {
    readonly id = RuleIdEnum.FRONT_MATTER_INVALID_LANG;
    readonly defaultSeverity = SeverityEnum.ERROR;
    readonly description = 'Front matter lang is not a configured language';

    check(site: Site, context: RuleContext): RuleFinding[] {
        const languages = context.config.languages;
        return parsedPages(site)
            .filter((page) => {
                const lang = page.frontMatter.data.lang;
                return typeof lang === 'string' && !languages.includes(lang);
            })
            .map((page) => ({
                file: page.path,
                line: keyLine(page, 'lang'),
                message: `Unknown lang "${String(page.frontMatter.data.lang)}"; expected one of ${languages.join(', ')}`,
            }));
    }
}

export class FrontMatterLangMismatchRule implements LintRule {
    readonly id = RuleIdEnum.FRONT_MATTER_LANG_MISMATCH;
    readonly defaultSeverity = SeverityEnum.WARNING;
    readonly description = 'Front matter lang differs from the language directory';

    check(site: Site, context: RuleContext): RuleFinding[] {
        return parsedPages(site)
            .filter((page) => {
                const lang = page.frontMatter.data.lang;
                return page.language !== undefined
                    && typeof lang === 'string'
                    && context.config.languages.includes(lang)
                    && lang !== page.language;
            })
            .map((page) => ({
                file: page.path,
                line: keyLine(page, 'lang'),
                message: `lang is "${String(page.frontMatter.data.lang)}" but the page is in the "${page.language ?? ''}" directory`,
            }));
    }
}

export class FrontMatterUnknownKeyRule implements LintRule {
    readonly id = RuleIdEnum.FRONT_MATTER_UNKNOWN_KEY;
    readonly defaultSeverity = SeverityEnum.INFO;
    readonly description = 'Front matter key is not used by the site templates';

    check(site: Site, context: RuleContext): RuleFinding[] {
        const allowed = new Set(context.config.allowedKeys);
        const findings: RuleFinding[] = [];

        for (const page of parsedPages(site)) {
            for (const key of Object.keys(page.frontMatter.data)) {
                if (allowed.has(key)) continue;
                findings.push({
                    file: page.path,
                    line: keyLine(page, key),
                    message: `Unknown front matter key "${key}"`,
                    details: { key },
                });
            }
        }
        return findings;
    }
}

export class FrontMatterUnknownLayoutRule implements LintRule {
    readonly id = RuleIdEnum.FRONT_MATTER_UNKNOWN_LAYOUT;
    readonly defaultSeverity = SeverityEnum.WARNING;
    readonly description = 'Front matter layout has no template in _layouts/';

    check(site: Site): RuleFinding[] {
        const layouts = site.layouts;
        if (!layouts) return [];

        return parsedPages(site)
            .filter((page) => {
                const layout = page.frontMatter.data.layout;
                return typeof layout === 'string' && layout !== '' && !layouts.has(layout);
            })
            .map((page) => ({
                file: page.path,
                line: keyLine(page, 'layout'),
                message: `Layout "${String(page.frontMatter.data.layout)}" not found in _layouts/`,
            }));
    }
}

function describeValue(value: unknown): string {
    if (Array.isArray(value)) return 'a list';
    if (value instanceof Date) return 'a date';
    if (typeof value === 'object' && value !== null) return 'a mapping';
    return `${typeof value} ${JSON.stringify(value)}`;
}
