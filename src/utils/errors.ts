/**
 * Failure categories the sync pipeline distinguishes:
 * - io-transient: a single file operation failed; absorbed by the engine
 * - io-fatal: the output root or lock cannot be used; the pass stops
 * - parse: an input file (documents, cache, settings) is malformed
 */
export type SyncErrorKind = 'io-transient' | 'io-fatal' | 'parse';

export class SyncError extends Error {
    readonly kind: SyncErrorKind;
    readonly path?: string;

    constructor(kind: SyncErrorKind, message: string, options: { path?: string; cause?: unknown } = {}) {
        super(message, { cause: options.cause });
        this.name = 'SyncError';
        this.kind = kind;
        this.path = options.path;
    }
}

export function isSyncError(error: unknown, kind?: SyncErrorKind): error is SyncError {
    return error instanceof SyncError && (kind === undefined || error.kind === kind);
}

/**
 * Extract a printable message from anything thrown
 */
export function errorMessage(error: unknown): string {
    if (error instanceof Error) return error.message;
    return String(error);
}
