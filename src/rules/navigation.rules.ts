import type { LintRule } from '../types/rule.types.js';
import type { RuleFinding } from '../types/diagnostic.types.js';
import type { DocPage, Site } from '../types/page.types.js';
import { RuleIdEnum, SeverityEnum } from '../types/enums.js';
import { posixDirname } from '../utils/paths.js';

/**
 * Integer nav_order of a page, if it has one
 */
export function navOrderOf(page: DocPage): number | undefined {
    const value = page.frontMatter.data.nav_order;
    return typeof value === 'number' && Number.isInteger(value) ? value : undefined;
}

export class DuplicateNavOrderRule implements LintRule {
    readonly id = RuleIdEnum.NAVIGATION_DUPLICATE_ORDER;
    readonly defaultSeverity = SeverityEnum.WARNING;
    readonly description = 'Two pages in one directory share a nav_order';

    check(site: Site): RuleFinding[] {
        // directory → nav_order → first page claiming it
        const claimed = new Map<string, Map<number, DocPage>>();
        const findings: RuleFinding[] = [];

        for (const page of site.pages) {
            const order = navOrderOf(page);
            if (order === undefined) continue;

            const dir = posixDirname(page.path);
            let orders = claimed.get(dir);
            if (!orders) {
                orders = new Map();
                claimed.set(dir, orders);
            }

            const first = orders.get(order);
            if (!first) {
                orders.set(order, page);
                continue;
            }
            findings.push({
                file: page.path,
                line: page.frontMatter.keyLines['nav_order'] ?? 1,
                message: `nav_order ${order} is already used by ${first.path}`,
                details: { navOrder: order, other: first.path },
            });
        }
        return findings;
    }
}
