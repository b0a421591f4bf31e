import { TranslationKey, TranslationResult } from '../entities/Translation';

/**
 * A translation read back from durable storage.
 */
export interface PersistedTranslation {
    key: TranslationKey;
    result: TranslationResult;
    createdAt: Date;
}

/**
 * Durable key-value store of translation results.
 *
 * Rows are immutable: storing the same translation twice is a no-op, and a
 * different translation for an existing key throws PersistenceConflictError.
 * Backend failures surface as PersistenceUnavailableError.
 */
export interface ITranslationStore {
    store(key: TranslationKey, result: TranslationResult): Promise<void>;

    load(key: TranslationKey): Promise<TranslationResult | null>;

    /**
     * Newest rows first, used to warm the cache at startup.
     */
    loadRecent(limit: number): Promise<PersistedTranslation[]>;
}
