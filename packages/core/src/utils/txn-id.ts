/**
 * Transaction ID generation and collision handling.
 *
 * ARCHITECTURAL NOTE: Uses js-sha256 so core stays free of node:crypto.
 */

import { sha256 } from 'js-sha256';
import { Decimal } from 'decimal.js';
import { TXN_ID } from '../types/index.js';

/**
 * Generate a deterministic transaction ID via SHA-256 hash.
 *
 * Payload format: "{created_at}|{description}|{amount}|{user_id}"
 *
 * - created_at: ISO 8601 timestamp as stored
 * - description: stored description, unmodified
 * - amount: plain decimal string, no trailing zeros
 *
 * @returns 16-character hex transaction ID
 */
export function generateTxnId(
    createdAt: string,
    description: string,
    amount: Decimal.Value,
    userId: string
): string {
    // Decimal.toFixed() without args removes trailing zeros
    const amountStr = new Decimal(amount).toFixed();

    const payload = `${createdAt}|${description}|${amountStr}|${userId}`;
    return sha256(payload).slice(0, TXN_ID.LENGTH);
}

/**
 * Pick a free ID for a new transaction.
 *
 * Returns the base ID when unused, otherwise the first free suffixed
 * form: -02, -03, ... up to -99.
 *
 * @throws Error when all 99 suffixes are taken
 */
export function resolveTxnIdCollision(baseId: string, existingIds: ReadonlySet<string>): string {
    if (!existingIds.has(baseId)) {
        return baseId;
    }

    for (let n = TXN_ID.COLLISION_SUFFIX_START; n <= TXN_ID.MAX_COLLISIONS; n++) {
        const candidate = `${baseId}-${String(n).padStart(2, '0')}`;
        if (!existingIds.has(candidate)) {
            return candidate;
        }
    }

    throw new Error(`Collision overflow: ${baseId} has reached max limit of ${TXN_ID.MAX_COLLISIONS} duplicates`);
}
