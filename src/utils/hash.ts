import { createHash } from 'crypto';

/**
 * Calculate SHA-256 hash of a string
 */
function hashText(text: string): string {
    return createHash('sha256').update(text, 'utf8').digest('hex');
}

/**
 * Hash a page body with whitespace runs collapsed,
 * so re-wrapped but otherwise identical text compares equal
 */
export function hashNormalized(text: string): string {
    return hashText(text.replace(/\s+/g, ' ').trim());
}
