import type { Context, MiddlewareHandler } from 'hono';

import type { AssetCache } from '../cache/asset-cache.js';
import type { ApiConfig } from './api.js';

export type AppVariables = {
    cache: AssetCache;
    config: ApiConfig;
};

export type AppEnv = {
    Variables: AppVariables;
};

export type HttpContext = Context<AppEnv>;
export type HttpMiddleware = MiddlewareHandler<AppEnv>;
type HttpRouteHandler = (c: HttpContext) => Response | Promise<Response>;

export type HttpApp = {
    use(path: string, ...handlers: HttpMiddleware[]): unknown;
    get(path: string, handler: HttpRouteHandler): unknown;
    post(path: string, handler: HttpRouteHandler): unknown;
    delete(path: string, handler: HttpRouteHandler): unknown;
};
