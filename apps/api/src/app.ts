import { Hono } from 'hono';

import { AssetCache } from './cache/asset-cache.js';
import { registerAuthMiddleware } from './middleware/auth.js';
import { contextMiddleware } from './middleware/context.js';
import { registerCorsMiddleware } from './middleware/cors.js';
import { registerAssetRoutes } from './routes/assets.js';
import { registerCacheRoutes } from './routes/cache.js';
import { registerRootRoutes } from './routes/root.js';
import { createCacheStorage } from './storage/index.js';
import type { ApiConfig } from './types/api.js';
import type { AppEnv } from './types/http.js';

export type AppDependencies = {
    config: ApiConfig;
    cache: AssetCache;
};

export function createApp(deps: AppDependencies) {
    const app = new Hono<AppEnv>();

    registerCorsMiddleware(app);
    app.use('*', contextMiddleware(deps));

    registerAuthMiddleware(app);
    registerRootRoutes(app);
    registerAssetRoutes(app);
    registerCacheRoutes(app);

    return app;
}

export function createAssetCache(config: ApiConfig): AssetCache {
    return new AssetCache({
        storage: createCacheStorage(config),
        minify: { maxBytes: config.MINIFY_MAX_BYTES, exclude: config.MINIFY_EXCLUDE },
    });
}
