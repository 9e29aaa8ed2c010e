import type { LintRule, RuleContext } from '../types/rule.types.js';
import type { RuleFinding } from '../types/diagnostic.types.js';
import type { DocPage, Site } from '../types/page.types.js';
import { RuleIdEnum, SeverityEnum } from '../types/enums.js';
import { stripExtension } from '../utils/paths.js';
import { navOrderOf } from './navigation.rules.js';

/**
 * Pages grouped by language, keyed by extension-less local path
 */
interface TranslationIndex {
    byLanguage: Map<string, Map<string, DocPage>>;
    /** Configured languages that have at least one page, default language excluded */
    translatedLanguages: string[];
    source: Map<string, DocPage>;
}

function buildIndex(site: Site, context: RuleContext): TranslationIndex {
    const byLanguage = new Map<string, Map<string, DocPage>>();

    for (const page of site.pages) {
        if (page.language === undefined) continue;
        let pages = byLanguage.get(page.language);
        if (!pages) {
            pages = new Map();
            byLanguage.set(page.language, pages);
        }
        pages.set(stripExtension(page.localPath), page);
    }

    const { defaultLanguage, languages } = context.config;
    return {
        byLanguage,
        translatedLanguages: languages.filter((lang) => lang !== defaultLanguage && byLanguage.has(lang)),
        source: byLanguage.get(defaultLanguage) ?? new Map(),
    };
}

/**
 * Translation pairs (default-language page, translated page)
 */
function* pairs(index: TranslationIndex): Generator<[DocPage, DocPage]> {
    for (const lang of index.translatedLanguages) {
        const translated = index.byLanguage.get(lang);
        if (!translated) continue;
        for (const [key, page] of translated) {
            const source = index.source.get(key);
            if (source) yield [source, page];
        }
    }
}

export class MissingTranslationRule implements LintRule {
    readonly id = RuleIdEnum.TRANSLATIONS_MISSING;
    readonly defaultSeverity = SeverityEnum.WARNING;
    readonly description = 'Default-language page has no counterpart in a translated language';

    check(site: Site, context: RuleContext): RuleFinding[] {
        const index = buildIndex(site, context);
        const findings: RuleFinding[] = [];

        for (const [key, source] of index.source) {
            for (const lang of index.translatedLanguages) {
                if (index.byLanguage.get(lang)?.has(key)) continue;
                findings.push({
                    file: source.path,
                    message: `No "${lang}" translation (expected ${lang}/${source.localPath})`,
                    details: { language: lang },
                });
            }
        }
        return findings;
    }
}

export class OrphanTranslationRule implements LintRule {
    readonly id = RuleIdEnum.TRANSLATIONS_ORPHAN;
    readonly defaultSeverity = SeverityEnum.INFO;
    readonly description = 'Translated page has no default-language counterpart';

    check(site: Site, context: RuleContext): RuleFinding[] {
        const index = buildIndex(site, context);
        const findings: RuleFinding[] = [];
        const { defaultLanguage } = context.config;

        // Without any default-language pages every page would be an orphan
        if (index.source.size === 0) return findings;

        for (const lang of index.translatedLanguages) {
            for (const [key, page] of index.byLanguage.get(lang) ?? []) {
                if (index.source.has(key)) continue;
                findings.push({
                    file: page.path,
                    message: `No "${defaultLanguage}" page corresponds to this translation`,
                });
            }
        }
        return findings;
    }
}

export class NavOrderMismatchRule implements LintRule {
    readonly id = RuleIdEnum.TRANSLATIONS_NAV_ORDER_MISMATCH;
    readonly defaultSeverity = SeverityEnum.WARNING;
    readonly description = 'Translation nav_order differs from the default-language page';

    check(site: Site, context: RuleContext): RuleFinding[] {
        const findings: RuleFinding[] = [];

        for (const [source, page] of pairs(buildIndex(site, context))) {
            const expected = navOrderOf(source);
            const actual = navOrderOf(page);
            if (expected === undefined || actual === undefined || expected === actual) continue;
            findings.push({
                file: page.path,
                line: page.frontMatter.keyLines['nav_order'] ?? 1,
                message: `nav_order is ${actual} but ${source.path} uses ${expected}`,
                details: { expected, actual, source: source.path },
            });
        }
        return findings;
    }
}

export class UntranslatedPageRule implements LintRule {
    readonly id = RuleIdEnum.TRANSLATIONS_UNTRANSLATED;
    readonly defaultSeverity = SeverityEnum.WARNING;
    readonly description = 'Translated page body is identical to the default-language body';

    check(site: Site, context: RuleContext): RuleFinding[] {
        const findings: RuleFinding[] = [];

        for (const [source, page] of pairs(buildIndex(site, context))) {
            if (page.bodyHash === '' || page.bodyHash !== source.bodyHash) continue;
            findings.push({
                file: page.path,
                message: `Body is identical to ${source.path}; the page looks untranslated`,
                details: { source: source.path },
            });
        }
        return findings;
    }
}
