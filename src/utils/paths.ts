import * as path from 'path';

/**
 * Convert a platform path to a POSIX path
 */
export function toPosix(p: string): string {
    return p.split(path.sep).join('/');
}

/**
 * Strip query string and fragment from a URL path
 */
export function stripQueryAndFragment(href: string): string {
    const cut = href.search(/[?#]/);
    return cut === -1 ? href : href.substring(0, cut);
}

/**
 * Normalize a site path: collapse `.`/`..` segments, drop leading and trailing slashes.
 * Returns undefined when `..` escapes the root.
 */
export function normalizeSitePath(p: string): string | undefined {
    const segments: string[] = [];
    for (const segment of p.split('/')) {
        if (segment === '' || segment === '.') continue;
        if (segment === '..') {
            if (segments.length === 0) return undefined;
            segments.pop();
            continue;
        }
        segments.push(segment);
    }
    return segments.join('/');
}

/**
 * Directory part of a relative POSIX path ('' for root-level files)
 */
export function posixDirname(p: string): string {
    const index = p.lastIndexOf('/');
    return index === -1 ? '' : p.substring(0, index);
}

/**
 * Path without its file extension
 */
export function stripExtension(p: string): string {
    const base = p.lastIndexOf('/');
    const dot = p.lastIndexOf('.');
    return dot > base + 1 ? p.substring(0, dot) : p;
}

/**
 * Lower-cased extension including the dot ('' when none)
 */
export function extensionOf(p: string): string {
    return path.posix.extname(p).toLowerCase();
}

/**
 * Decode percent-escapes, leaving malformed sequences as written
 */
export function safeDecode(p: string): string {
    try {
        return decodeURIComponent(p);
    } catch {
        return p;
    }
}
