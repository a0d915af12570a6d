// =============================================================================
// CACHE STORAGE: abstracts where cached assets live behind a common interface
// =============================================================================

// -- Row types ----------------------------------------------------------------

export type CacheEntry = {
    key: string;
    bytes: string;
    /** false when `bytes` are the raw input, kept because minification fell back. */
    succeeded: boolean;
    /** ISO timestamp of the write that published this entry. */
    written_at: string;
};

export type CacheStats = {
    entry_count: number;
    total_bytes: number;
};

// -- Errors -------------------------------------------------------------------

export type CacheStorageErrorKind = 'StorageReadFailure' | 'StorageWriteFailure';

export class CacheStorageError extends Error {
    readonly kind: CacheStorageErrorKind;
    readonly key: string;

    constructor(kind: CacheStorageErrorKind, key: string, cause: unknown) {
        super(cause instanceof Error ? cause.message : String(cause), { cause });
        this.name = 'CacheStorageError';
        this.kind = kind;
        this.key = key;
    }
}

// -- Storage interface --------------------------------------------------------

/**
 * Entries are written whole and never updated in place: `write` either
 * publishes the complete bytes under `key` or leaves the previous state.
 */
export interface CacheStorage {
    read(key: string): Promise<CacheEntry | null>;
    write(key: string, bytes: string, succeeded: boolean): Promise<void>;
    remove(key: string): Promise<boolean>;
    clear(): Promise<void>;
    stats(): Promise<CacheStats>;
}
