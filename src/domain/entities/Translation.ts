/**
 * Source language used in keys when the request carries no hint.
 */
export const AUTO_LANGUAGE = 'auto';

/**
 * A single translation request, created per inbound message.
 */
export interface TranslationRequest {
    readonly sourceText: string;
    /** Optional hint; providers auto-detect when absent */
    readonly sourceLang?: string;
    readonly targetLang: string;
}

/**
 * Outcome of a translation, whether fresh from a provider or read back
 * from the cache or the database.
 */
export interface TranslationResult {
    readonly translatedText: string;
    readonly detectedSourceLang: string;
    readonly timestamp: Date;
    /** Service that produced the text (e.g. 'DeepL') */
    readonly provider?: string;
}

/**
 * Normalized identity of a request. Two requests with the same key are
 * answered by the same cached or stored result.
 */
export interface TranslationKey {
    readonly sourceText: string;
    readonly sourceLang: string;
    readonly targetLang: string;
}

/**
 * Creates an immutable translation request.
 */
export function createTranslationRequest(
    sourceText: string,
    targetLang: string,
    sourceLang?: string
): TranslationRequest {
    const request: TranslationRequest = sourceLang
        ? { sourceText, sourceLang, targetLang }
        : { sourceText, targetLang };
    return Object.freeze(request);
}

/**
 * Creates an immutable translation result.
 */
export function createTranslationResult(
    translatedText: string,
    detectedSourceLang: string,
    provider?: string,
    timestamp: Date = new Date()
): TranslationResult {
    const result: TranslationResult = provider
        ? { translatedText, detectedSourceLang, timestamp, provider }
        : { translatedText, detectedSourceLang, timestamp };
    return Object.freeze(result);
}

/**
 * Lower-cases a language code and unifies separators ('pt_BR' -> 'pt-br').
 */
export function normalizeLanguageCode(code: string): string {
    return code.trim().toLowerCase().replace(/_/g, '-');
}

/**
 * Collapses whitespace and folds case so that trivially different
 * messages share one entry.
 */
export function normalizeSourceText(text: string): string {
    return text.trim().replace(/\s+/g, ' ').toLowerCase();
}

/**
 * Derives the normalized key for a request.
 */
export function createTranslationKey(request: TranslationRequest): TranslationKey {
    const sourceLang = request.sourceLang && request.sourceLang.trim().length > 0
        ? normalizeLanguageCode(request.sourceLang)
        : AUTO_LANGUAGE;

    return Object.freeze({
        sourceText: normalizeSourceText(request.sourceText),
        sourceLang,
        targetLang: normalizeLanguageCode(request.targetLang),
    });
}

/**
 * Serializes a key for use in maps: "<source>:<target>:<text>".
 */
export function keyToString(key: TranslationKey): string {
    return `${key.sourceLang}:${key.targetLang}:${key.sourceText}`;
}

/**
 * Two results are the same translation when text and detected language
 * match. Timestamps and provider are metadata.
 */
export function isSameTranslation(a: TranslationResult, b: TranslationResult): boolean {
    return a.translatedText === b.translatedText && a.detectedSourceLang === b.detectedSourceLang;
}
