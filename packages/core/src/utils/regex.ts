/**
 * Escape a literal string for use inside a RegExp source.
 */
export function escapeRegExp(literal: string): string {
    return literal.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

// Letters, digits and underscore in any script count as word characters.
// Plain \b only knows ASCII, so Cyrillic keywords need these lookarounds.
const WORD_START = '(?<![\\p{L}\\p{N}_])';
const WORD_END = '(?![\\p{L}\\p{N}_])';

/**
 * Build a global, case-insensitive, whole-word pattern for a keyword.
 */
export function wholeWordPattern(keyword: string): RegExp {
    return new RegExp(`${WORD_START}${escapeRegExp(keyword)}${WORD_END}`, 'giu');
}
