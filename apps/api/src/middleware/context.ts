import type { AssetCache } from '../cache/asset-cache.js';
import type { ApiConfig } from '../types/api.js';
import type { HttpMiddleware } from '../types/http.js';

// one cache per app, shared by every request
export function contextMiddleware(deps: { config: ApiConfig; cache: AssetCache }): HttpMiddleware {
    return async (c, next) => {
        c.set('cache', deps.cache);
        c.set('config', deps.config);
        await next();
    };
}
