import type { PageLink } from '../types/page.types.js';
import { LinkKindEnum, type LinkKindEnumType } from '../types/enums.js';
import { LIQUID } from '../config/constants.js';
import { containsLiquid, restoreLiquid } from './liquid.js';

/**
 * Classify a link target after Liquid stripping
 */
export function classifyLink(target: string): { kind: LinkKindEnumType; href: string; usesBaseurl: boolean } {
    const trimmed = target.trim();

    if (trimmed.startsWith(LIQUID.BASEURL_MARKER)) {
        const rest = trimmed.substring(LIQUID.BASEURL_MARKER.length);
        // `{{ site.baseurl }}{{ page.url }}` and similar are only known after rendering
        if (containsLiquid(rest)) {
            return { kind: LinkKindEnum.TEMPLATE, href: trimmed, usesBaseurl: true };
        }
        return { kind: LinkKindEnum.INTERNAL, href: rest === '' ? '/' : rest, usesBaseurl: true };
    }
    if (containsLiquid(trimmed)) {
        return { kind: LinkKindEnum.TEMPLATE, href: trimmed, usesBaseurl: false };
    }
    if (/^[a-z][a-z0-9+.-]*:/i.test(trimmed) || trimmed.startsWith('//')) {
        return { kind: LinkKindEnum.EXTERNAL, href: trimmed, usesBaseurl: false };
    }
    if (trimmed === '' || trimmed.startsWith('#')) {
        return { kind: LinkKindEnum.ANCHOR, href: trimmed, usesBaseurl: false };
    }
    if (trimmed.startsWith('/')) {
        return { kind: LinkKindEnum.INTERNAL, href: trimmed, usesBaseurl: false };
    }
    return { kind: LinkKindEnum.RELATIVE, href: trimmed, usesBaseurl: false };
}

/**
 * Build a PageLink from a target found in Liquid-stripped text
 */
export function buildLink(target: string, line: number): PageLink {
    const { kind, href, usesBaseurl } = classifyLink(target);
    return {
        raw: restoreLiquid(target.trim()),
        href,
        line,
        kind,
        usesBaseurl,
    };
}
