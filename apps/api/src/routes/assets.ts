import { createAssetIdentity, deriveCacheKey, parseCacheKey } from '../cache/identity.js';
import type { AssetResponse, DeleteAssetResponse } from '../types/api.js';
import type { HttpApp } from '../types/http.js';
import { parseAssetRequestBody } from '../utils/request-parsing.js';

const CONTENT_TYPES = {
    css: 'text/css; charset=utf-8',
    js: 'text/javascript; charset=utf-8',
} as const;

export function registerAssetRoutes(app: HttpApp) {
    app.post('/v1/assets', async (c) => {
        const body = await c.req.json().catch(() => ({}));
        const parsed = parseAssetRequestBody(body);
        if ('error' in parsed) return c.json({ error: parsed.error }, 400);

        const asset = await c.get('cache').putIfAbsent({
            identity: createAssetIdentity(parsed.handle, parsed.content, parsed.mtime),
            language: parsed.language,
            rawText: parsed.content,
            url: parsed.url,
        });

        const response: AssetResponse = {
            key: asset.key,
            succeeded: asset.succeeded,
            cached: asset.cached,
            bytes_saved: asset.bytes_saved,
            output: asset.output_text,
        };
        return c.json(response);
    });

    app.get('/v1/assets/:language/:hash', async (c) => {
        const key = `${c.req.param('language')}/${c.req.param('hash')}`;
        const parsed = parseCacheKey(key);
        if (!parsed) return c.json({ error: 'Asset not found' }, 404);

        const bytes = await c.get('cache').getByKey(key);
        if (bytes === null) return c.json({ error: 'Asset not found' }, 404);

        return c.body(bytes, 200, { 'Content-Type': CONTENT_TYPES[parsed.language] });
    });

    app.delete('/v1/assets', async (c) => {
        const body = await c.req.json().catch(() => ({}));
        const parsed = parseAssetRequestBody(body);
        if ('error' in parsed) return c.json({ error: parsed.error }, 400);

        const identity = createAssetIdentity(parsed.handle, parsed.content, parsed.mtime);
        try {
            const deleted = await c.get('cache').delete(identity, parsed.language);
            const response: DeleteAssetResponse = { key: deriveCacheKey(identity, parsed.language), deleted };
            return c.json(response);
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            console.error(`Asset delete failed for ${parsed.handle}: ${message}`);
            return c.json({ error: 'Failed to delete asset' }, 500);
        }
    });
}
