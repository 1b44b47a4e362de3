import type { CategoryCandidate, CategoryStore, TransactionType } from '@chat-ledger/core';

/**
 * Category store over the categories loaded from the workspace config.
 * The CLI has a single user, so userId is not consulted.
 */
export function createCategoryStore(categories: readonly CategoryCandidate[]): CategoryStore {
    const ofType = (type?: TransactionType) =>
        categories.filter((category) => type === undefined || category.type === type);

    return {
        async list(_userId, type) {
            return ofType(type);
        },

        async findByName(_userId, name, type) {
            const wanted = name.trim().toLowerCase();
            return ofType(type).find((category) => category.name.toLowerCase() === wanted) ?? null;
        },
    };
}
