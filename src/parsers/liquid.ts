import { LIQUID } from '../config/constants.js';

/**
 * Rewrite the Liquid URL expressions a link can contain so Markdown parses it,
 * keeping every line where it was.
 *
 * `{{ site.baseurl }}/tr/x` and `{{ '/tr/x' | relative_url }}` both become
 * `${BASEURL_MARKER}/tr/x`. `{% raw %}` and `{% endraw %}` tags are dropped.
 */
export function stripLiquid(text: string): string {
    return text
        .replace(LIQUID.BASEURL_PATTERN, LIQUID.BASEURL_MARKER)
        .replace(LIQUID.URL_FILTER_PATTERN, (_match, _quote: string, target: string) => {
            const normalized = target.startsWith('/') ? target : `/${target}`;
            return `${LIQUID.BASEURL_MARKER}${normalized}`;
        })
        .replace(/\{%-?\s*(?:end)?raw\s*-?%\}/g, '');
}

/**
 * Turn a marker-prefixed href back into the form an author wrote
 */
export function restoreLiquid(href: string): string {
    return href.split(LIQUID.BASEURL_MARKER).join('{{ site.baseurl }}');
}

/**
 * Whether text still holds a Liquid expression or tag
 */
export function containsLiquid(text: string): boolean {
    return /\{\{|\{%/.test(text);
}
