import { IUsageRepository } from '../../domain/ports/IUsageRepository';
import { ApiUsage, ChatStats, TranslationLogEntry } from '../../domain/entities/UsageStats';
import { SqliteDatabase } from './SqliteDatabase';

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Translation attempt log and provider usage counters.
 */
export class SqliteUsageRepository implements IUsageRepository {
    constructor(
        private readonly database: SqliteDatabase,
        private readonly now: () => Date = () => new Date()
    ) { }

    async logTranslation(entry: TranslationLogEntry): Promise<void> {
        this.database.run('log translation', (db) => {
            db.prepare(
                `INSERT INTO translation_log (chat_id, message_id, source_lang, target_lang, provider, success, timestamp)
                 VALUES (?, ?, ?, ?, ?, ?, ?)`
            ).run(
                entry.chatId,
                entry.messageId ?? null,
                entry.sourceLang ?? null,
                entry.targetLang,
                entry.provider,
                entry.success ? 1 : 0,
                this.now().toISOString()
            );
        });
    }

    async logApiUsage(provider: string, charsUsed: number): Promise<void> {
        const now = this.now();
        this.database.run('log api usage', (db) => {
            db.prepare(`INSERT INTO api_usage (provider, chars_used, date, timestamp) VALUES (?, ?, ?, ?)`)
                .run(provider, charsUsed, toDateString(now), now.toISOString());
        });
    }

    async getChatStats(chatId: string, days: number = 30): Promise<ChatStats> {
        const since = new Date(this.now().getTime() - days * DAY_MS).toISOString();

        return this.database.run('read chat stats', (db) => {
            const totals = db
                .prepare<[string, string], { total: number; success: number | null }>(
                    `SELECT COUNT(*) AS total, SUM(success) AS success
                     FROM translation_log
                     WHERE chat_id = ? AND timestamp >= ?`
                )
                .get(chatId, since);

            const languages = db
                .prepare<[string, string], { target_lang: string; count: number }>(
                    `SELECT target_lang, COUNT(*) AS count
                     FROM translation_log
                     WHERE chat_id = ? AND timestamp >= ?
                     GROUP BY target_lang
                     ORDER BY count DESC, target_lang ASC
                     LIMIT 5`
                )
                .all(chatId, since);

            const providers = db
                .prepare<[string, string], { provider: string; count: number }>(
                    `SELECT provider, COUNT(*) AS count
                     FROM translation_log
                     WHERE chat_id = ? AND success = 1 AND timestamp >= ?
                     GROUP BY provider
                     ORDER BY count DESC`
                )
                .all(chatId, since);

            const total = totals?.total ?? 0;
            const success = totals?.success ?? 0;

            return {
                total,
                success,
                successRate: total > 0 ? (success / total) * 100 : 0,
                topLanguages: languages.map((row) => ({ lang: row.target_lang, count: row.count })),
                providerDistribution: Object.fromEntries(providers.map((row) => [row.provider, row.count])),
            };
        });
    }

    async getApiUsageToday(): Promise<ApiUsage> {
        const today = toDateString(this.now());
        return this.database.run('read api usage', (db) => {
            const rows = db
                .prepare<[string], { provider: string; total: number }>(
                    `SELECT provider, SUM(chars_used) AS total
                     FROM api_usage
                     WHERE date = ?
                     GROUP BY provider
                     ORDER BY total DESC`
                )
                .all(today);
            return Object.fromEntries(rows.map((row) => [row.provider, row.total]));
        });
    }

    async cleanupOldLogs(days: number = 90): Promise<number> {
        const cutoff = new Date(this.now().getTime() - days * DAY_MS).toISOString();
        const deleted = this.database.run('cleanup translation log', (db) =>
            db.prepare(`DELETE FROM translation_log WHERE timestamp < ?`).run(cutoff).changes
        );
        console.log(`[Database] Cleaned up ${deleted} old translation logs`);
        return deleted;
    }
}

function toDateString(date: Date): string {
    return date.toISOString().slice(0, 10);
}
