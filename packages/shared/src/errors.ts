/**
 * Raised by ledger implementations when a transaction cannot be stored.
 * The flow catches it and reports the transaction as not created.
 */
export class PersistenceError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'PersistenceError';
    }
}
