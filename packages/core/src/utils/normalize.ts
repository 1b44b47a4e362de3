/**
 * Message normalization for keyword matching.
 *
 * NOTE: This is for matching only. Descriptions are cut from the
 * original text so the user's casing survives.
 */

/**
 * Normalize a chat message for substring matching.
 *
 * Transformations:
 * - Convert to lowercase
 * - Collapse whitespace runs to a single space
 * - Trim leading/trailing whitespace
 */
export function normalizeMessage(raw: string): string {
    return raw
        .toLowerCase()
        .replace(/\s+/g, ' ')
        .trim();
}

/**
 * Count whitespace-separated words.
 */
export function countWords(text: string): number {
    return text.split(/\s+/).filter((word) => word.length > 0).length;
}
