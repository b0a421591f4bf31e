/**
 * One translation attempt as recorded in the audit log.
 */
export interface TranslationLogEntry {
    chatId: string;
    messageId?: string;
    sourceLang?: string;
    targetLang: string;
    /** Provider name, or 'cache' / 'store' for hits, or the error code on failure */
    provider: string;
    success: boolean;
}

export interface LanguageCount {
    lang: string;
    count: number;
}

/**
 * Aggregated translation activity for a chat over a time window.
 */
export interface ChatStats {
    total: number;
    success: number;
    /** Percentage between 0 and 100 */
    successRate: number;
    topLanguages: LanguageCount[];
    providerDistribution: Record<string, number>;
}

/**
 * Characters sent to each provider today.
 */
export type ApiUsage = Record<string, number>;
