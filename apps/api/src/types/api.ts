// =============================================================================
// API RESPONSE TYPES
// =============================================================================

export type AssetResponse = {
    key: string;
    succeeded: boolean;
    cached: boolean;
    bytes_saved: number;
    output: string;
};

export type DeleteAssetResponse = {
    key: string;
    deleted: boolean;
};

// =============================================================================
// APP CONFIGURATION TYPES
// =============================================================================

export type CacheDriver = 'file' | 'memory';

export type ApiConfig = {
    ASSET_MINIFY_ADMIN_KEY: string;
    CACHE_DRIVER: CacheDriver;
    CACHE_DIR: string;
    MINIFY_MAX_BYTES: number;
    MINIFY_EXCLUDE: string[];
    PORT: number;
};
