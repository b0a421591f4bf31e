/**
 * LRU Translation Cache
 *
 * Bounded in-memory cache keyed by the normalized request. Lookups refresh
 * recency; inserting into a full cache evicts the least recently used entry.
 */

import { LRUCache } from 'lru-cache';
import { ITranslationCache } from '../../domain/ports/ITranslationCache';
import { TranslationKey, TranslationResult, keyToString } from '../../domain/entities/Translation';

export class LruTranslationCache implements ITranslationCache {
    readonly capacity: number;
    private readonly entries: LRUCache<string, TranslationResult>;

    constructor(capacity: number = 1000) {
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new Error(`Cache capacity must be a positive integer, got: ${capacity}`);
        }
        this.capacity = capacity;
        this.entries = new LRUCache<string, TranslationResult>({ max: capacity });
    }

    lookup(key: TranslationKey): TranslationResult | null {
        return this.entries.get(keyToString(key)) ?? null;
    }

    insert(key: TranslationKey, result: TranslationResult): void {
        this.entries.set(keyToString(key), result);
    }

    delete(key: TranslationKey): void {
        this.entries.delete(keyToString(key));
    }

    clear(): void {
        this.entries.clear();
    }

    size(): number {
        return this.entries.size;
    }

    /**
     * Serialized keys from most to least recently used.
     */
    keys(): string[] {
        return Array.from(this.entries.keys());
    }
}
