import type { LintRule } from '../types/rule.types.js';
import type { RuleFinding } from '../types/diagnostic.types.js';
import type { Site } from '../types/page.types.js';
import { LinkKindEnum, RuleIdEnum, SeverityEnum } from '../types/enums.js';
import { LinkResolver } from './link-resolver.js';

export class BrokenLinkRule implements LintRule {
    readonly id = RuleIdEnum.LINKS_BROKEN;
    readonly defaultSeverity = SeverityEnum.ERROR;
    readonly description = 'Internal or relative link does not resolve to a page or file';

    check(site: Site): RuleFinding[] {
        const resolver = new LinkResolver(site);
        const findings: RuleFinding[] = [];

        for (const page of site.pages) {
            for (const link of page.links) {
                const resolution = resolver.resolve(page, link);
                if (resolution.status !== 'broken') continue;
                findings.push({
                    file: page.path,
                    line: link.line,
                    message: `Broken link "${link.raw}": ${resolution.reason}`,
                    details: { href: link.href, target: resolution.target },
                });
            }
        }
        return findings;
    }
}

export class MissingBaseurlRule implements LintRule {
    readonly id = RuleIdEnum.LINKS_MISSING_BASEURL;
    readonly defaultSeverity = SeverityEnum.WARNING;
    readonly description = 'Root-relative link is written without {{ site.baseurl }}';

    check(site: Site): RuleFinding[] {
        const findings: RuleFinding[] = [];

        for (const page of site.pages) {
            for (const link of page.links) {
                if (link.kind !== LinkKindEnum.INTERNAL || link.usesBaseurl) continue;
                findings.push({
                    file: page.path,
                    line: link.line,
                    message: `Root-relative link "${link.raw}" should start with {{ site.baseurl }}`,
                    details: { href: link.href },
                });
            }
        }
        return findings;
    }
}

export class CrossLanguageLinkRule implements LintRule {
    readonly id = RuleIdEnum.LINKS_CROSS_LANGUAGE;
    readonly defaultSeverity = SeverityEnum.WARNING;
    readonly description = 'Page links to a page in another language';

    check(site: Site): RuleFinding[] {
        const resolver = new LinkResolver(site);
        const findings: RuleFinding[] = [];

        for (const page of site.pages) {
            if (page.language === undefined) continue;

            for (const link of page.links) {
                const resolution = resolver.resolve(page, link);
                if (resolution.status !== 'resolved') continue;

                const targetLanguage = resolution.page?.language;
                if (targetLanguage === undefined || targetLanguage === page.language) continue;

                findings.push({
                    file: page.path,
                    line: link.line,
                    message: `Link "${link.raw}" leads from a "${page.language}" page to a "${targetLanguage}" page`,
                    details: { target: resolution.target },
                });
            }
        }
        return findings;
    }
}
