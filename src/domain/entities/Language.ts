import { AUTO_LANGUAGE, normalizeLanguageCode } from './Translation';

/**
 * Flag shown for languages that have no flag and no two-letter code.
 */
export const FALLBACK_FLAG = '🏳️';

/**
 * Built-in flags for the default language set.
 */
export const DEFAULT_FLAGS: Readonly<Record<string, string>> = {
    en: '🇬🇧',
    es: '🇪🇸',
    fr: '🇫🇷',
    de: '🇩🇪',
    ru: '🇷🇺',
    pt: '🇵🇹',
};

/** Rank given to languages missing from the priority list */
const UNRANKED = 999;

const LANGUAGE_CODE_PATTERN = /^[a-z]{2,3}(-[a-z0-9]{2,4})?$/;

const REGIONAL_INDICATOR_A = 0x1f1e6;

/**
 * Whether a code is usable as a translation target ('en', 'pt-br', 'zh-hans').
 */
export function isValidLanguageCode(code: string): boolean {
    const normalized = normalizeLanguageCode(code);
    return normalized !== AUTO_LANGUAGE && LANGUAGE_CODE_PATTERN.test(normalized);
}

/**
 * Spells a two-letter code with regional indicator symbols, which most
 * clients render as the matching country flag ('la' -> 🇱🇦).
 */
export function toRegionalIndicators(code: string): string | null {
    if (!/^[a-z]{2}$/.test(code)) {
        return null;
    }
    return Array.from(code)
        .map((letter) => String.fromCodePoint(REGIONAL_INDICATOR_A + letter.charCodeAt(0) - 'a'.charCodeAt(0)))
        .join('');
}

/**
 * Resolves the emoji for a language: chat override, built-in flag,
 * regional indicator letters, then the white flag.
 */
export function getFlagEmoji(langCode: string, customFlags: Record<string, string> = {}): string {
    const code = normalizeLanguageCode(langCode);
    return customFlags[code] ?? DEFAULT_FLAGS[code] ?? toRegionalIndicators(code) ?? FALLBACK_FLAG;
}

/**
 * Finds which enabled language an emoji stands for.
 */
export function findLanguageByFlag(
    emoji: string,
    enabledLanguages: string[],
    customFlags: Record<string, string> = {}
): string | null {
    const trimmed = emoji.trim();
    for (const lang of enabledLanguages) {
        if (getFlagEmoji(lang, customFlags) === trimmed) {
            return lang;
        }
    }
    return null;
}

/**
 * Orders languages by the configured priority list; unknown languages keep
 * their relative order at the end.
 */
export function sortByPriority(languages: string[], priority: string[], limit?: number): string[] {
    const rank = (lang: string): number => {
        const index = priority.indexOf(lang);
        return index === -1 ? UNRANKED : index;
    };
    const sorted = [...languages].sort((a, b) => rank(a) - rank(b));
    return limit === undefined ? sorted : sorted.slice(0, limit);
}
