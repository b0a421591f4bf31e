import { ApiUsage, ChatStats, TranslationLogEntry } from '../entities/UsageStats';

/**
 * Audit log of translation attempts and provider character usage.
 */
export interface IUsageRepository {
    logTranslation(entry: TranslationLogEntry): Promise<void>;

    logApiUsage(provider: string, charsUsed: number): Promise<void>;

    getChatStats(chatId: string, days?: number): Promise<ChatStats>;

    /** Characters per provider since midnight UTC */
    getApiUsageToday(): Promise<ApiUsage>;

    /**
     * Deletes log rows older than the given number of days.
     * @returns Number of rows removed
     */
    cleanupOldLogs(days?: number): Promise<number>;
}
