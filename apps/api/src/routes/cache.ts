import type { HttpApp } from '../types/http.js';

export function registerCacheRoutes(app: HttpApp) {
    app.delete('/v1/cache', async (c) => {
        try {
            await c.get('cache').clear();
            return c.json({ cleared: true });
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            console.error(`Cache clear failed: ${message}`);
            return c.json({ error: 'Failed to clear cache' }, 500);
        }
    });

    app.get('/v1/cache/stats', async (c) => {
        try {
            return c.json(await c.get('cache').stats());
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            console.error(`Cache stats failed: ${message}`);
            return c.json({ error: 'Failed to read cache stats' }, 500);
        }
    });
}
