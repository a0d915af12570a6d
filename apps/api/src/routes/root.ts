import type { HttpApp } from '../types/http.js';

export function registerRootRoutes(app: HttpApp) {
    app.get('/', (c) => {
        return c.json({
            message: 'Asset Minify API',
            languages: ['css', 'js'],
        });
    });
}
