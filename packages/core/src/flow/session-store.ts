/**
 * In-process session store with expiry.
 * An expired session reads as absent, which the flow treats as a cancel.
 */

import type { FlowSession } from '../types/index.js';
import type { SessionStore } from './types.js';

interface StoredSession {
    session: FlowSession;
    expiresAt: number;
}

export interface MemorySessionStore extends SessionStore {
    /** Number of entries held, expired ones not yet swept included. */
    size(): number;
}

/**
 * Create a memory-backed SessionStore. Every write sweeps expired entries,
 * so users who never come back do not pin memory.
 *
 * @param ttlMs - Lifetime of a session after its last write
 * @param now - Clock, injectable for tests
 */
export function createMemorySessionStore(ttlMs: number, now: () => number = Date.now): MemorySessionStore {
    const entries = new Map<string, StoredSession>();

    return {
        async get(userId) {
            const entry = entries.get(userId);
            if (!entry) return null;
            if (entry.expiresAt <= now()) {
                entries.delete(userId);
                return null;
            }
            return entry.session;
        },

        async set(userId, session) {
            const at = now();
            for (const [key, entry] of entries) {
                if (entry.expiresAt <= at) entries.delete(key);
            }
            entries.set(userId, { session, expiresAt: at + ttlMs });
        },

        async clear(userId) {
            entries.delete(userId);
        },

        size() {
            return entries.size;
        },
    };
}
