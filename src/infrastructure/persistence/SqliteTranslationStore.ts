import { ITranslationStore, PersistedTranslation } from '../../domain/ports/ITranslationStore';
import {
    TranslationKey,
    TranslationResult,
    createTranslationResult,
    isSameTranslation,
    keyToString,
} from '../../domain/entities/Translation';
import { PersistenceConflictError } from '../../domain/errors/TranslationErrors';
import { SqliteDatabase } from './SqliteDatabase';

interface TranslationRow {
    source_text: string;
    source_lang: string;
    target_lang: string;
    translated_text: string;
    detected_source_lang: string;
    provider: string | null;
    translated_at: string;
    created_at: string;
}

type KeyParams = [string, string, string];

/**
 * Insert-only translation store. The first result stored for a key wins;
 * a different result later raises PersistenceConflictError.
 */
export class SqliteTranslationStore implements ITranslationStore {
    constructor(
        private readonly database: SqliteDatabase,
        private readonly now: () => Date = () => new Date()
    ) { }

    async store(key: TranslationKey, result: TranslationResult): Promise<void> {
        this.database.run('store translation', (db) => {
            const select = db.prepare<KeyParams, TranslationRow>(
                `SELECT * FROM translations WHERE source_text = ? AND source_lang = ? AND target_lang = ?`
            );
            const insert = db.prepare(
                `INSERT INTO translations
                    (source_text, source_lang, target_lang, translated_text, detected_source_lang, provider, translated_at, created_at)
                 VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
            );

            db.transaction(() => {
                const existing = select.get(key.sourceText, key.sourceLang, key.targetLang);
                if (existing) {
                    const stored = toResult(existing);
                    if (!isSameTranslation(stored, result)) {
                        throw new PersistenceConflictError(keyToString(key), stored, result);
                    }
                    return;
                }
                insert.run(
                    key.sourceText,
                    key.sourceLang,
                    key.targetLang,
                    result.translatedText,
                    result.detectedSourceLang,
                    result.provider ?? null,
                    result.timestamp.toISOString(),
                    this.now().toISOString()
                );
            })();
        });
    }

    async load(key: TranslationKey): Promise<TranslationResult | null> {
        return this.database.run('load translation', (db) => {
            const row = db
                .prepare<KeyParams, TranslationRow>(
                    `SELECT * FROM translations WHERE source_text = ? AND source_lang = ? AND target_lang = ?`
                )
                .get(key.sourceText, key.sourceLang, key.targetLang);
            return row ? toResult(row) : null;
        });
    }

    async loadRecent(limit: number): Promise<PersistedTranslation[]> {
        return this.database.run('load recent translations', (db) => {
            const rows = db
                .prepare<[number], TranslationRow>(
                    `SELECT * FROM translations ORDER BY created_at DESC, rowid DESC LIMIT ?`
                )
                .all(limit);
            return rows.map((row) => ({
                key: {
                    sourceText: row.source_text,
                    sourceLang: row.source_lang,
                    targetLang: row.target_lang,
                },
                result: toResult(row),
                createdAt: new Date(row.created_at),
            }));
        });
    }

    async count(): Promise<number> {
        return this.database.run('count translations', (db) => {
            const row = db.prepare<[], { count: number }>(`SELECT COUNT(*) AS count FROM translations`).get();
            return row?.count ?? 0;
        });
    }
}

function toResult(row: TranslationRow): TranslationResult {
    return createTranslationResult(
        row.translated_text,
        row.detected_source_lang,
        row.provider ?? undefined,
        new Date(row.translated_at)
    );
}
