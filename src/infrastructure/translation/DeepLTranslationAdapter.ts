/**
 * DeepL Translation Adapter
 *
 * Implements ITranslationPort using the DeepL API.
 * Keys ending in ':fx' belong to the free tier and use the free endpoint.
 */

import axios from 'axios';
import { ITranslationPort, ProviderTranslation, TranslateOptions } from '../../domain/ports/ITranslationPort';
import { TranslationUnavailableError } from '../../domain/errors/TranslationErrors';
import { isRecord, toProviderError } from './providerErrors';

const FREE_API_URL = 'https://api-free.deepl.com/v2';
const PRO_API_URL = 'https://api.deepl.com/v2';

/**
 * DeepL requires a regional variant for a few targets.
 */
const TARGET_VARIANTS: Readonly<Record<string, string>> = {
    EN: 'EN-US',
    PT: 'PT-PT',
};

export function toDeepLTarget(lang: string): string {
    const upper = lang.toUpperCase();
    return TARGET_VARIANTS[upper] ?? upper;
}

/**
 * Source languages are accepted without region ('en-us' -> 'EN').
 */
export function toDeepLSource(lang: string): string {
    return lang.split('-')[0].toUpperCase();
}

export class DeepLTranslationAdapter implements ITranslationPort {
    readonly name = 'DeepL';
    private readonly baseUrl: string;

    constructor(
        private readonly apiKey: string,
        private readonly timeoutMs: number = 10000,
        baseUrl?: string
    ) {
        if (!apiKey) {
            throw new Error('DeepL API key is required');
        }
        this.baseUrl = baseUrl ?? (apiKey.endsWith(':fx') ? FREE_API_URL : PRO_API_URL);
    }

    async translate(
        text: string,
        targetLang: string,
        sourceLang?: string,
        options: TranslateOptions = {}
    ): Promise<ProviderTranslation> {
        const params = new URLSearchParams();
        params.append('text', text);
        params.append('target_lang', toDeepLTarget(targetLang));
        if (sourceLang) {
            params.append('source_lang', toDeepLSource(sourceLang));
        }

        let data: unknown;
        try {
            const response = await axios.post(`${this.baseUrl}/translate`, params, {
                headers: {
                    'Authorization': `DeepL-Auth-Key ${this.apiKey}`,
                    'Content-Type': 'application/x-www-form-urlencoded',
                },
                timeout: this.timeoutMs,
                signal: options.signal,
            });
            data = response.data;
        } catch (error) {
            console.warn(`[DeepL] Request failed: ${error instanceof Error ? error.message : String(error)}`);
            throw toProviderError(this.name, error, targetLang);
        }

        const first = isRecord(data) && Array.isArray(data.translations) ? data.translations[0] : undefined;
        if (!isRecord(first) || typeof first.text !== 'string') {
            throw new TranslationUnavailableError('DeepL response missing translations');
        }

        const detected = typeof first.detected_source_language === 'string'
            ? first.detected_source_language.toLowerCase()
            : (sourceLang ?? 'auto');

        return {
            translatedText: first.text,
            detectedSourceLanguage: detected,
            provider: this.name,
        };
    }
}
