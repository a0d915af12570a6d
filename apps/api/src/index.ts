// Primary
export { AssetCache } from './cache/asset-cache.js';
export type { AssetCacheOptions, CachedAsset, CacheLogger, PutAssetInput } from './cache/asset-cache.js';
export { createAssetIdentity, deriveCacheKey, parseCacheKey } from './cache/identity.js';

// Storage drivers
export { createCacheStorage, CacheStorageError, FileCacheStorage, MemoryCacheStorage } from './storage/index.js';
export type { CacheEntry, CacheStats, CacheStorage, CacheStorageErrorKind } from './storage/index.js';

// HTTP
export { createApp, createAssetCache } from './app.js';
export type { AppDependencies } from './app.js';
export { getApiConfig, readApiConfig } from './config.js';
export type { ApiConfig, CacheDriver } from './types/api.js';
