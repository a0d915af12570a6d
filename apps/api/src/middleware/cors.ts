import type { HttpApp, HttpMiddleware } from '../types/http.js';

type CorsPolicy = {
    methods: string[];
    headers: string[];
};

const PREFLIGHT_MAX_AGE = '86400';

// Published assets are fetched cross-origin by pages; nothing else is public.
const PUBLIC_READ: CorsPolicy = { methods: ['GET'], headers: [] };
const ADMIN_HEADERS = ['Authorization', 'Content-Type'];

function corsMiddleware(policy: CorsPolicy): HttpMiddleware {
    const methods = [...policy.methods, 'OPTIONS'].join(', ');
    const headers = policy.headers.join(', ');

    return async (c, next) => {
        c.header('Access-Control-Allow-Origin', '*');
        c.header('Access-Control-Allow-Methods', methods);
        if (headers) c.header('Access-Control-Allow-Headers', headers);
        c.header('Access-Control-Max-Age', PREFLIGHT_MAX_AGE);

        if (c.req.method === 'OPTIONS') return c.body(null, 204);
        await next();
    };
}

/** Must run before auth so preflight requests, which carry no token, are answered. */
export function registerCorsMiddleware(app: HttpApp) {
    app.use('/', corsMiddleware(PUBLIC_READ));
    app.use('/v1/assets/:language/:hash', corsMiddleware(PUBLIC_READ));
    app.use('/v1/assets', corsMiddleware({ methods: ['POST', 'DELETE'], headers: ADMIN_HEADERS }));
    app.use('/v1/cache', corsMiddleware({ methods: ['DELETE'], headers: ADMIN_HEADERS }));
    app.use('/v1/cache/stats', corsMiddleware({ methods: ['GET'], headers: ADMIN_HEADERS }));
}
