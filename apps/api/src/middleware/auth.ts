import type { HttpApp, HttpContext, HttpMiddleware } from '../types/http.js';

function readBearerToken(c: HttpContext): string | null {
    const authorization = c.req.header('authorization');
    if (!authorization) return null;

    const [scheme, token] = authorization.split(' ');
    if (!scheme || !token || scheme.toLowerCase() !== 'bearer') return null;
    return token;
}

function unauthorized(c: HttpContext) {
    c.header('WWW-Authenticate', 'Bearer');
    return c.json({ error: 'Unauthorized' }, 401);
}

function bearerAuthMiddleware(verify: (token: string, c: HttpContext) => boolean): HttpMiddleware {
    return async (c, next) => {
        const token = readBearerToken(c);
        if (!token) return unauthorized(c);
        if (!verify(token, c)) return unauthorized(c);

        await next();
    };
}

function verifyAdminToken(token: string, c: HttpContext) {
    const expected = c.get('config').ASSET_MINIFY_ADMIN_KEY;
    if (!expected) return false;
    return token === expected;
}

/** Reads of published assets stay public; everything that computes or mutates needs the admin key. */
export function registerAuthMiddleware(app: HttpApp) {
    const adminOnly = bearerAuthMiddleware(verifyAdminToken);
    app.use('/v1/assets', adminOnly);
    app.use('/v1/cache', adminOnly);
    app.use('/v1/cache/stats', adminOnly);
}
