import type { Language } from 'asset-minify-core';

import { isLanguage } from '../cache/identity.js';

export type AssetRequestInput = {
    handle: string;
    content: string;
    mtime: number;
    language: Language;
    url?: string;
};

export function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseAssetRequestBody(body: unknown): AssetRequestInput | { error: string } {
    if (!isPlainObject(body)) {
        return { error: 'Request body must be a JSON object' };
    }

    const { handle, content, mtime, language, url } = body;

    if (typeof handle !== 'string' || !handle.trim()) return { error: 'handle is required' };
    if (typeof content !== 'string') return { error: 'content must be a string' };
    if (typeof mtime !== 'number' || !Number.isFinite(mtime)) return { error: 'mtime must be a number' };
    if (typeof language !== 'string' || !isLanguage(language)) return { error: 'language must be "css" or "js"' };
    if (url !== undefined && typeof url !== 'string') return { error: 'url must be a string' };

    return { handle, content, mtime, language, url };
}
