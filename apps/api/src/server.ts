import { serve } from '@hono/node-server';

import { createApp, createAssetCache } from './app.js';
import { getApiConfig } from './config.js';

const config = getApiConfig();
const app = createApp({ config, cache: createAssetCache(config) });

serve({
    fetch: app.fetch,
    port: config.PORT,
});

console.log(`Asset Minify API listening on http://127.0.0.1:${config.PORT} (cache driver: ${config.CACHE_DRIVER})`);
