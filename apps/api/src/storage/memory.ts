import type { CacheEntry, CacheStats, CacheStorage } from './types.js';

export class MemoryCacheStorage implements CacheStorage {
    private readonly entries = new Map<string, CacheEntry>();

    async read(key: string): Promise<CacheEntry | null> {
        return this.entries.get(key) ?? null;
    }

    async write(key: string, bytes: string, succeeded: boolean): Promise<void> {
        this.entries.set(key, { key, bytes, succeeded, written_at: new Date().toISOString() });
    }

    async remove(key: string): Promise<boolean> {
        return this.entries.delete(key);
    }

    async clear(): Promise<void> {
        this.entries.clear();
    }

    async stats(): Promise<CacheStats> {
        let total = 0;
        for (const entry of this.entries.values()) total += Buffer.byteLength(entry.bytes, 'utf8');
        return { entry_count: this.entries.size, total_bytes: total };
    }
}
