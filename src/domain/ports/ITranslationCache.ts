import { TranslationKey, TranslationResult } from '../entities/Translation';

/**
 * Bounded in-memory cache of translation results.
 * Absence is a normal outcome, never an error.
 */
export interface ITranslationCache {
    /** Maximum number of entries held */
    readonly capacity: number;

    /**
     * Returns the cached result and marks it most recently used.
     */
    lookup(key: TranslationKey): TranslationResult | null;

    /**
     * Adds or replaces an entry, evicting the least recently used one when full.
     */
    insert(key: TranslationKey, result: TranslationResult): void;

    delete(key: TranslationKey): void;

    clear(): void;

    size(): number;
}
