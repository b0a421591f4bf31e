import { normalizeLanguageCode } from './Translation';

/**
 * Per-chat translation preferences.
 */
export interface ChatSettings {
    chatId: string;
    /** Languages offered in this chat, in insertion order */
    enabledLanguages: string[];
    /** Flag overrides keyed by language code */
    customFlags: Record<string, string>;
    createdAt: Date;
    updatedAt: Date;
}

/**
 * Defaults applied when a chat is seen for the first time.
 */
export interface ChatDefaults {
    defaultLanguages: string[];
}

export function createChatSettings(chatId: string, defaults: ChatDefaults, now: Date = new Date()): ChatSettings {
    return {
        chatId,
        enabledLanguages: defaults.defaultLanguages.map(normalizeLanguageCode),
        customFlags: {},
        createdAt: now,
        updatedAt: now,
    };
}

/** Longest custom flag accepted; flags prefix every reply chunk */
export const MAX_FLAG_LENGTH = 16;

/**
 * Returns settings with the language enabled, or null if it already was.
 */
export function enableLanguage(settings: ChatSettings, lang: string, flag?: string): ChatSettings | null {
    const code = normalizeLanguageCode(lang);
    if (settings.enabledLanguages.includes(code)) {
        return null;
    }
    const customFlags = flag ? { ...settings.customFlags, [code]: flag } : settings.customFlags;
    return {
        ...settings,
        enabledLanguages: [...settings.enabledLanguages, code],
        customFlags,
        updatedAt: new Date(),
    };
}

/**
 * Returns settings without the language, or null if it was not enabled.
 */
export function disableLanguage(settings: ChatSettings, lang: string): ChatSettings | null {
    const code = normalizeLanguageCode(lang);
    if (!settings.enabledLanguages.includes(code)) {
        return null;
    }
    const { [code]: _removed, ...customFlags } = settings.customFlags;
    return {
        ...settings,
        enabledLanguages: settings.enabledLanguages.filter((l) => l !== code),
        customFlags,
        updatedAt: new Date(),
    };
}
