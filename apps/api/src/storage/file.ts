import { randomUUID } from 'node:crypto';
import { mkdir, readdir, readFile, rename, rm, stat, unlink, writeFile } from 'node:fs/promises';
import path from 'node:path';

import type { Language } from 'asset-minify-core';

import { parseCacheKey } from '../cache/identity.js';
import { CacheStorageError } from './types.js';
import type { CacheEntry, CacheStats, CacheStorage } from './types.js';

const LANGUAGES: Language[] = ['css', 'js'];
/** Marks an entry whose bytes are the unminified input. */
const FALLBACK_SUFFIX = '.raw';

function errorCode(error: unknown): unknown {
    return error instanceof Error && 'code' in error ? error.code : undefined;
}

function isNotFound(error: unknown): boolean {
    return errorCode(error) === 'ENOENT';
}

async function discard(filePath: string) {
    try {
        await unlink(filePath);
    } catch (error) {
        const code = errorCode(error);
        if (code !== 'ENOENT' && code !== 'ENOTDIR') throw error;
    }
}

async function exists(filePath: string): Promise<boolean> {
    try {
        await stat(filePath);
        return true;
    } catch (error) {
        if (isNotFound(error)) return false;
        throw error;
    }
}

/** Size of an entry listed by `readdir`, or null when it was removed since. */
async function entrySize(filePath: string): Promise<number | null> {
    try {
        return (await stat(filePath)).size;
    } catch (error) {
        if (isNotFound(error)) return null;
        throw error;
    }
}

/**
 * One file per entry at `<dir>/<language>/<hash>.<language>`. Writes go to a
 * temporary file in the same directory and are published with `rename`, so a
 * reader sees either the old state or the complete new entry. A fallback
 * entry has an empty `<hash>.<language>.raw` marker beside it, written
 * before the entry is published.
 */
export class FileCacheStorage implements CacheStorage {
    constructor(private readonly dir: string) {}

    private entryPath(key: string, kind: 'StorageReadFailure' | 'StorageWriteFailure'): string {
        const parsed = parseCacheKey(key);
        if (!parsed) throw new CacheStorageError(kind, key, 'malformed cache key');
        return path.join(this.dir, parsed.language, `${parsed.hash}.${parsed.language}`);
    }

    async read(key: string): Promise<CacheEntry | null> {
        const filePath = this.entryPath(key, 'StorageReadFailure');
        try {
            const [bytes, info, fallback] = await Promise.all([
                readFile(filePath, 'utf8'),
                stat(filePath),
                exists(`${filePath}${FALLBACK_SUFFIX}`),
            ]);
            return { key, bytes, succeeded: !fallback, written_at: info.mtime.toISOString() };
        } catch (error) {
            if (isNotFound(error)) return null;
            throw new CacheStorageError('StorageReadFailure', key, error);
        }
    }

    async write(key: string, bytes: string, succeeded: boolean): Promise<void> {
        const filePath = this.entryPath(key, 'StorageWriteFailure');
        const markerPath = `${filePath}${FALLBACK_SUFFIX}`;
        const tempPath = `${filePath}.${randomUUID()}.tmp`;
        try {
            await mkdir(path.dirname(filePath), { recursive: true });
            if (succeeded) {
                await discard(markerPath);
            } else {
                await writeFile(markerPath, '');
            }
            await writeFile(tempPath, bytes, 'utf8');
            await rename(tempPath, filePath);
        } catch (error) {
            await discard(tempPath);
            throw new CacheStorageError('StorageWriteFailure', key, error);
        }
    }

    async remove(key: string): Promise<boolean> {
        const filePath = this.entryPath(key, 'StorageWriteFailure');
        try {
            await unlink(filePath);
        } catch (error) {
            if (isNotFound(error)) return false;
            throw error;
        }
        await discard(`${filePath}${FALLBACK_SUFFIX}`);
        return true;
    }

    /** Removes the per-language directories only; `dir` itself may be shared. */
    async clear(): Promise<void> {
        await Promise.all(LANGUAGES.map((language) => rm(path.join(this.dir, language), { recursive: true, force: true })));
    }

    async stats(): Promise<CacheStats> {
        let entryCount = 0;
        let totalBytes = 0;

        for (const language of LANGUAGES) {
            const languageDir = path.join(this.dir, language);
            let names: string[];
            try {
                names = await readdir(languageDir);
            } catch (error) {
                if (isNotFound(error)) continue;
                throw error;
            }

            const entries = names.filter((name) => name.endsWith(`.${language}`));
            const sizes = await Promise.all(entries.map((name) => entrySize(path.join(languageDir, name))));
            for (const size of sizes) {
                if (size === null) continue;
                entryCount++;
                totalBytes += size;
            }
        }

        return { entry_count: entryCount, total_bytes: totalBytes };
    }
}
