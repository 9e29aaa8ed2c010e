import type { DocPage, PageLink, Site } from '../types/page.types.js';
import { LinkKindEnum } from '../types/enums.js';
import { SITE_FILES } from '../config/constants.js';
import {
    normalizeSitePath,
    posixDirname,
    safeDecode,
    stripExtension,
    stripQueryAndFragment,
} from '../utils/paths.js';

/**
 * Outcome of resolving one link
 */
export type LinkResolution =
    | { status: 'skipped' }
    | { status: 'resolved'; target: string; page?: DocPage }
    | { status: 'broken'; target?: string; reason: string };

/**
 * Resolves internal and relative links against a loaded site
 */
export class LinkResolver {
    private readonly pagesByPath: Map<string, DocPage>;

    constructor(private readonly site: Site) {
        this.pagesByPath = new Map(site.pages.map((page) => [page.path, page]));
    }

    resolve(page: DocPage, link: PageLink): LinkResolution {
        if (link.kind !== LinkKindEnum.INTERNAL && link.kind !== LinkKindEnum.RELATIVE) {
            return { status: 'skipped' };
        }

        const pathPart = safeDecode(stripQueryAndFragment(link.href));
        if (link.kind === LinkKindEnum.RELATIVE && pathPart === '') {
            // "?query" or "#fragment" on the current page
            return { status: 'resolved', target: page.path, page };
        }

        const target = link.kind === LinkKindEnum.INTERNAL
            ? normalizeSitePath(this.stripSiteBaseurl(pathPart, link.usesBaseurl))
            : normalizeSitePath(`${posixDirname(page.path)}/${pathPart}`);

        if (target === undefined) {
            return { status: 'broken', reason: 'path escapes the site root' };
        }

        const hit = this.lookup(target);
        if (hit === undefined) {
            return { status: 'broken', target, reason: `no page or file at /${target}` };
        }
        return { status: 'resolved', target: hit, page: this.pagesByPath.get(hit) };
    }

    /**
     * Find the site file a normalized path refers to
     */
    lookup(target: string): string | undefined {
        const permalinkHit = this.site.permalinks.get(target);
        if (permalinkHit !== undefined) return permalinkHit;

        if (this.pagesByPath.has(target) || this.site.staticFiles.has(target)) {
            return target;
        }

        const candidates: string[] = [];
        for (const suffix of SITE_FILES.PAGE_SUFFIXES) {
            candidates.push(`${target}${suffix}`);
        }
        // Markdown pages are served as .html
        if (target.endsWith('.html')) {
            const base = stripExtension(target);
            candidates.push(`${base}.md`, `${base}.markdown`);
        }
        for (const index of SITE_FILES.INDEX_NAMES) {
            candidates.push(target === '' ? index : `${target}/${index}`);
        }

        return candidates.find((candidate) => this.pagesByPath.has(candidate));
    }

    /**
     * A hard-coded site baseurl ("/SmartRAG/tr/...") resolves like {{ site.baseurl }}
     */
    private stripSiteBaseurl(pathPart: string, usesBaseurl: boolean): string {
        const baseurl = this.site.settings.baseurl;
        if (usesBaseurl || baseurl === '') return pathPart;
        if (pathPart === baseurl) return '/';
        if (pathPart.startsWith(`${baseurl}/`)) return pathPart.substring(baseurl.length);
        return pathPart;
    }
}
