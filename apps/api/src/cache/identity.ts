import { createHash } from 'node:crypto';

import type { AssetIdentity, Language } from 'asset-minify-core';

const CACHE_KEY_RE = /^(css|js)\/([0-9a-f]{64})$/;

export function sha256Hex(data: string): string {
    return createHash('sha256').update(data, 'utf8').digest('hex');
}

export function isLanguage(value: string): value is Language {
    return value === 'css' || value === 'js';
}

export function createAssetIdentity(handle: string, rawText: string, sourceMtime: number): AssetIdentity {
    return { handle, content_hash: sha256Hex(rawText), source_mtime: sourceMtime };
}

/**
 * `<language>/<sha256 hex>` over the language and every identity field,
 * NUL-separated. Depends on nothing but the identity, so a key derived before
 * a restart finds the entry written after it.
 */
export function deriveCacheKey(identity: AssetIdentity, language: Language): string {
    const material = [language, identity.handle, identity.content_hash, String(identity.source_mtime)].join('\0');
    return `${language}/${sha256Hex(material)}`;
}

export function parseCacheKey(key: string): { language: Language; hash: string } | null {
    const match = CACHE_KEY_RE.exec(key);
    if (!match) return null;
    const [, language, hash] = match;
    if (!isLanguage(language)) return null;
    return { language, hash };
}
