import { minify } from 'asset-minify-core';
import type { AssetIdentity, Language, MinifyOptions, MinifyResult } from 'asset-minify-core';

import type { CacheEntry, CacheStats, CacheStorage } from '../storage/types.js';
import { deriveCacheKey } from './identity.js';

export type CacheLogger = Pick<Console, 'warn' | 'error'>;

export type AssetCacheOptions = {
    storage: CacheStorage;
    minify?: MinifyOptions;
    logger?: CacheLogger;
};

export type PutAssetInput = {
    identity: AssetIdentity;
    language: Language;
    rawText: string;
    url?: string;
};

export type CachedAsset = {
    key: string;
    output_text: string;
    /** false when the stored bytes are the raw input. */
    succeeded: boolean;
    /** true when the bytes came from storage rather than this call's pipeline run. */
    cached: boolean;
    bytes_saved: number;
};

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

function byteLength(text: string): number {
    return Buffer.byteLength(text, 'utf8');
}

/**
 * Content-addressed store of minified assets. A key is derived from the
 * asset identity alone, so an entry is never stale: a changed asset gets a
 * new key. Storage failures degrade to a miss (read) or an unstored result
 * (write); callers always get usable bytes.
 */
export class AssetCache {
    private readonly storage: CacheStorage;
    private readonly minifyOptions: MinifyOptions;
    private readonly logger: CacheLogger;
    private readonly inflight = new Map<string, Promise<CachedAsset>>();

    constructor(options: AssetCacheOptions) {
        this.storage = options.storage;
        this.minifyOptions = options.minify ?? {};
        this.logger = options.logger ?? console;
    }

    /** Stored bytes for `identity`, or null. Never runs the pipeline. */
    async get(identity: AssetIdentity, language: Language): Promise<string | null> {
        return this.getByKey(deriveCacheKey(identity, language));
    }

    async getByKey(key: string): Promise<string | null> {
        const entry = await this.readEntry(key);
        return entry ? entry.bytes : null;
    }

    /**
     * Stored bytes on a hit; otherwise run the pipeline, store its output (the
     * raw text when it fell back) and return it. Concurrent calls for one key
     * share a single computation.
     */
    putIfAbsent(input: PutAssetInput): Promise<CachedAsset> {
        const key = deriveCacheKey(input.identity, input.language);
        const pending = this.inflight.get(key);
        if (pending) return pending;

        const work = this.compute(key, input).finally(() => {
            this.inflight.delete(key);
        });
        this.inflight.set(key, work);
        return work;
    }

    async delete(identity: AssetIdentity, language: Language): Promise<boolean> {
        return this.storage.remove(deriveCacheKey(identity, language));
    }

    async clear(): Promise<void> {
        await this.storage.clear();
    }

    async stats(): Promise<CacheStats> {
        return this.storage.stats();
    }

    // -- internals --

    private async compute(key: string, input: PutAssetInput): Promise<CachedAsset> {
        const existing = await this.readEntry(key);
        if (existing) {
            return {
                key,
                output_text: existing.bytes,
                succeeded: existing.succeeded,
                cached: true,
                bytes_saved: byteLength(input.rawText) - byteLength(existing.bytes),
            };
        }

        const result = minify(
            { language: input.language, raw_text: input.rawText, identity: input.identity, url: input.url },
            this.minifyOptions,
        );

        if (result.failure?.kind === 'Excluded') {
            return { key, output_text: result.output_text, succeeded: false, cached: false, bytes_saved: 0 };
        }
        if (result.failure) this.logFallback(key, input, result);

        await this.writeEntry(key, result.output_text, result.succeeded);
        return {
            key,
            output_text: result.output_text,
            succeeded: result.succeeded,
            cached: false,
            bytes_saved: result.bytes_saved,
        };
    }

    private logFallback(key: string, input: PutAssetInput, result: MinifyResult) {
        const failure = result.failure;
        if (!failure) return;
        const where = failure.stage ? ` in ${failure.stage}` : '';
        this.logger.warn(`Minify fell back for ${input.identity.handle} (${key}): ${failure.kind}${where}: ${failure.message}`);
    }

    private async readEntry(key: string): Promise<CacheEntry | null> {
        try {
            return await this.storage.read(key);
        } catch (error) {
            this.logger.error(`Cache read failed for ${key}: ${errorMessage(error)}`);
            return null;
        }
    }

    private async writeEntry(key: string, bytes: string, succeeded: boolean): Promise<void> {
        try {
            await this.storage.write(key, bytes, succeeded);
        } catch (error) {
            this.logger.error(`Cache write failed for ${key}: ${errorMessage(error)}`);
        }
    }
}
