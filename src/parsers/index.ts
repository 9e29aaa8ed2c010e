export { parseFrontMatter } from './front-matter.parser.js';
export { parseMarkdown } from './markdown.parser.js';
export type { MarkdownParseResult } from './markdown.parser.js';
export { parseHtml, extractAttributeLinks, decodeEntities, lineOfIndex } from './html.parser.js';
export { stripLiquid, restoreLiquid, containsLiquid } from './liquid.js';
export { classifyLink, buildLink } from './links.js';
