/**
 * Translation Port Interface
 *
 * Contract for external translation providers (DeepL, LibreTranslate, MyMemory).
 * Implementations throw TranslationUnavailableError for transient failures and
 * UnsupportedLanguageError when the provider rejects a language.
 */

export interface ProviderTranslation {
    translatedText: string;
    /** Lower-case language code the provider detected or was given */
    detectedSourceLanguage: string;
    /** Provider that produced the text; cascades report the inner provider */
    provider: string;
}

export interface TranslateOptions {
    /** Aborts the outbound request when the caller gives up */
    signal?: AbortSignal;
}

export interface ITranslationPort {
    /** Display name used in logs and usage accounting */
    readonly name: string;

    /**
     * Translates text to the target language.
     * @param text - The text to translate
     * @param targetLang - Lower-case target language code (e.g. 'de', 'pt-br')
     * @param sourceLang - Optional source language (auto-detected if not provided)
     */
    translate(
        text: string,
        targetLang: string,
        sourceLang?: string,
        options?: TranslateOptions
    ): Promise<ProviderTranslation>;
}
