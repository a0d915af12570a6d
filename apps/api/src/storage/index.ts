import type { ApiConfig } from '../types/api.js';
import { FileCacheStorage } from './file.js';
import { MemoryCacheStorage } from './memory.js';
import type { CacheStorage } from './types.js';

// =============================================================================
// STORAGE FACTORY: picks the cache driver based on config
// =============================================================================

export function createCacheStorage(config: ApiConfig): CacheStorage {
    if (config.CACHE_DRIVER === 'memory') {
        return new MemoryCacheStorage();
    }
    return new FileCacheStorage(config.CACHE_DIR);
}

// -- re-exports ---------------------------------------------------------------

export type { CacheEntry, CacheStats, CacheStorage, CacheStorageErrorKind } from './types.js';
export { CacheStorageError } from './types.js';
export { FileCacheStorage } from './file.js';
export { MemoryCacheStorage } from './memory.js';
