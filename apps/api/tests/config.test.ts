import os from 'node:os';
import path from 'node:path';

import { describe, it, expect } from 'vitest';

import { readApiConfig } from '../src/config.js';

describe('readApiConfig', () => {
    it('applies defaults', () => {
        expect(readApiConfig({ ASSET_MINIFY_ADMIN_KEY: 'test-secret' })).toEqual({
            ASSET_MINIFY_ADMIN_KEY: 'test-secret',
            CACHE_DRIVER: 'file',
            CACHE_DIR: path.join(os.tmpdir(), 'asset-minify-cache'),
            MINIFY_MAX_BYTES: 1048576,
            MINIFY_EXCLUDE: [],
            PORT: 8787,
        });
    });

    it('reads every variable', () => {
        const config = readApiConfig({
            ASSET_MINIFY_ADMIN_KEY: 'test-secret',
            CACHE_DRIVER: 'Memory',
            CACHE_DIR: '/var/cache/assets',
            MINIFY_MAX_BYTES: '2048',
            MINIFY_EXCLUDE: ' jquery* , , admin-bar ',
            PORT: '9000',
        });
        expect(config.CACHE_DRIVER).toBe('memory');
        expect(config.CACHE_DIR).toBe('/var/cache/assets');
        expect(config.MINIFY_MAX_BYTES).toBe(2048);
        expect(config.MINIFY_EXCLUDE).toEqual(['jquery*', 'admin-bar']);
        expect(config.PORT).toBe(9000);
    });

    it('requires the admin key', () => {
        expect(() => readApiConfig({})).toThrow('Missing required env var: ASSET_MINIFY_ADMIN_KEY');
    });

    it('rejects an unknown driver', () => {
        expect(() => readApiConfig({ ASSET_MINIFY_ADMIN_KEY: 'test-secret', CACHE_DRIVER: 'redis' })).toThrow(
            'Invalid env var: CACHE_DRIVER (expected "file" or "memory")',
        );
    });

    it('rejects a non-positive size limit', () => {
        expect(() => readApiConfig({ ASSET_MINIFY_ADMIN_KEY: 'test-secret', MINIFY_MAX_BYTES: '-1' })).toThrow(
            'Invalid env var: MINIFY_MAX_BYTES (expected a positive integer, got "-1")',
        );
    });
});
