import * as yaml from 'js-yaml';
import pLimit from 'p-limit';
import type { ResolvedConfig } from '../types/config.types.js';
import type { CodeBlock, DocPage, PageLink, Site, SiteSettings } from '../types/page.types.js';
import type { IPageSource } from '../types/source.types.js';
import { PageKindEnum, type PageKindEnumType } from '../types/enums.js';
import { ParseError } from '../errors/index.js';
import { SITE_FILES } from '../config/constants.js';
import { parseFrontMatter } from '../parsers/front-matter.parser.js';
import { parseMarkdown } from '../parsers/markdown.parser.js';
import { parseHtml } from '../parsers/html.parser.js';
import { stripLiquid } from '../parsers/liquid.js';
import { hashNormalized } from '../utils/hash.js';
import { extensionOf, normalizeSitePath, stripExtension } from '../utils/paths.js';
import type { Logger } from '../utils/logger.js';
import type { DocsiteLintEventEmitter } from '../utils/events.js';

/**
 * Dependencies for SiteLoader
 */
export interface SiteLoaderDependencies {
    source: IPageSource;
    config: ResolvedConfig;
    logger: Logger;
    events?: DocsiteLintEventEmitter;
}

/**
 * Loads a documentation tree into a Site: pages parsed, static files and
 * permalinks indexed, layouts and _config.yml read
 */
export class SiteLoader {
    private readonly source: IPageSource;
    private readonly config: ResolvedConfig;
    private readonly logger: Logger;
    private readonly events?: DocsiteLintEventEmitter;
    private readonly limit: ReturnType<typeof pLimit>;

    constructor(deps: SiteLoaderDependencies) {
        this.source = deps.source;
        this.config = deps.config;
        this.logger = deps.logger;
        this.events = deps.events;
        this.limit = pLimit(deps.config.concurrency);
    }

    async load(): Promise<Site> {
        const startTime = Date.now();
        const files = await this.source.list();

        const settings = await this.loadSettings(files);
        const layouts = this.collectLayouts(files);

        // Underscore directories (_layouts, _includes, _sass, ...) are not published
        const published = files.filter((file) => !isUnpublished(file));
        const candidates = published.filter((file) => this.config.extensions.includes(extensionOf(file)));

        const loaded = await Promise.all(
            candidates.map((file) => this.limit(() => this.loadPage(file)))
        );
        const pages = loaded.filter((page): page is DocPage => page !== undefined);

        const pagePaths = new Set(pages.map((page) => page.path));
        const staticFiles = new Set(published.filter((file) => !pagePaths.has(file)));

        const permalinks = new Map<string, string>();
        for (const page of pages) {
            const permalink = page.frontMatter.data.permalink;
            if (typeof permalink !== 'string') continue;

            const normalized = normalizeSitePath(permalink);
            if (normalized === undefined) continue;
            if (permalinks.has(normalized)) {
                this.logger.warn('Duplicate permalink', {
                    permalink: normalized,
                    file: page.path,
                    other: permalinks.get(normalized),
                });
                continue;
            }
            permalinks.set(normalized, page.path);
        }

        this.logger.info('Site loaded', {
            root: this.source.root,
            pages: pages.length,
            staticFiles: staticFiles.size,
            layouts: layouts?.size ?? 0,
            durationMs: Date.now() - startTime,
        });

        return {
            root: this.source.root,
            pages: pages.sort((a, b) => a.path.localeCompare(b.path)),
            staticFiles,
            permalinks,
            layouts,
            settings,
        };
    }

    /**
     * Parse a single page. HTML files without front matter are static files, not pages.
     */
    async loadPage(file: string): Promise<DocPage | undefined> {
        const raw = await this.source.read(file);
        const kind = extensionOf(file) === '.html' ? PageKindEnum.HTML : PageKindEnum.MARKDOWN;
        const frontMatter = parseFrontMatter(raw);

        if (kind === PageKindEnum.HTML && !frontMatter.present) {
            this.logger.debug('Treating HTML without front matter as static file', { file });
            return undefined;
        }

        const parsed = this.parseBody(file, kind, frontMatter.body);
        const offset = frontMatter.bodyLineOffset;

        const { language, localPath } = this.locate(file);
        const normalizedBody = frontMatter.body.trim();

        const page: DocPage = {
            path: file,
            kind,
            language,
            localPath,
            frontMatter,
            links: parsed.links.map((link) => ({ ...link, line: link.line + offset })),
            codeBlocks: parsed.codeBlocks.map((block) => ({
                ...block,
                line: block.line + offset,
                codeLine: block.codeLine + offset,
            })),
            bodyHash: normalizedBody === '' ? '' : hashNormalized(normalizedBody),
        };

        this.logger.debug('Page loaded', {
            file,
            language,
            links: page.links.length,
            codeBlocks: page.codeBlocks.length,
        });
        this.events?.emit('page:loaded', { page });

        return page;
    }

    private parseBody(file: string, kind: PageKindEnumType, rawBody: string): { links: PageLink[]; codeBlocks: CodeBlock[] } {
        const body = stripLiquid(rawBody);
        try {
            return kind === PageKindEnum.MARKDOWN ? parseMarkdown(body) : parseHtml(body);
        } catch (error) {
            throw new ParseError(
                `Cannot parse ${file}: ${error instanceof Error ? error.message : String(error)}`,
                file,
                { kind }
            );
        }
    }

    /**
     * Split a path into its language directory and the rest
     */
    private locate(file: string): { language?: string; localPath: string } {
        const slash = file.indexOf('/');
        if (slash !== -1) {
            const first = file.substring(0, slash);
            if (this.config.languages.includes(first)) {
                return { language: first, localPath: file.substring(slash + 1) };
            }
        }
        return { localPath: file };
    }

    private collectLayouts(files: string[]): Set<string> | undefined {
        const prefix = `${SITE_FILES.LAYOUTS_DIR}/`;
        const layoutFiles = files.filter((file) => file.startsWith(prefix));
        if (layoutFiles.length === 0) {
            return undefined;
        }
        return new Set(layoutFiles.map((file) => stripExtension(file.substring(prefix.length))));
    }

    private async loadSettings(files: string[]): Promise<SiteSettings> {
        if (!files.includes(SITE_FILES.CONFIG)) {
            return { baseurl: '' };
        }

        const raw = await this.source.read(SITE_FILES.CONFIG);
        let data: unknown;
        try {
            data = yaml.load(raw);
        } catch (error) {
            this.logger.warn('Cannot parse site config, assuming empty baseurl', {
                file: SITE_FILES.CONFIG,
                error: error instanceof Error ? error.message : String(error),
            });
            return { baseurl: '' };
        }

        if (typeof data !== 'object' || data === null || Array.isArray(data)) {
            return { baseurl: '' };
        }

        const settings: Record<string, unknown> = { ...data };
        const baseurl = typeof settings['baseurl'] === 'string' ? settings['baseurl'] : '';
        return {
            ...settings,
            // '/' and '' both mean "served from the domain root"
            baseurl: baseurl.replace(/\/+$/, ''),
        };
    }
}

function isUnpublished(file: string): boolean {
    return file.split('/').some((segment) => segment.startsWith('_'));
}
