import axios from 'axios';
import { ITranslationPort, ProviderTranslation, TranslateOptions } from '../../domain/ports/ITranslationPort';
import { TranslationUnavailableError } from '../../domain/errors/TranslationErrors';
import { isRecord, toProviderError } from './providerErrors';

/**
 * Implements ITranslationPort against a LibreTranslate instance.
 */
export class LibreTranslateAdapter implements ITranslationPort {
    readonly name = 'LibreTranslate';

    constructor(
        private readonly baseUrl: string = 'https://libretranslate.com',
        private readonly apiKey?: string,
        private readonly timeoutMs: number = 10000
    ) { }

    async translate(
        text: string,
        targetLang: string,
        sourceLang?: string,
        options: TranslateOptions = {}
    ): Promise<ProviderTranslation> {
        const body: Record<string, string> = {
            q: text,
            source: sourceLang ?? 'auto',
            target: targetLang,
            format: 'text',
        };
        if (this.apiKey) {
            body.api_key = this.apiKey;
        }

        let data: unknown;
        try {
            const response = await axios.post(`${this.baseUrl.replace(/\/$/, '')}/translate`, body, {
                timeout: this.timeoutMs,
                signal: options.signal,
            });
            data = response.data;
        } catch (error) {
            console.warn(`[LibreTranslate] Request failed: ${error instanceof Error ? error.message : String(error)}`);
            throw toProviderError(this.name, error, targetLang);
        }

        if (!isRecord(data) || typeof data.translatedText !== 'string' || data.translatedText.length === 0) {
            throw new TranslationUnavailableError('LibreTranslate response missing translatedText');
        }

        const detected = isRecord(data.detectedLanguage) && typeof data.detectedLanguage.language === 'string'
            ? data.detectedLanguage.language.toLowerCase()
            : (sourceLang ?? 'auto');

        return {
            translatedText: data.translatedText,
            detectedSourceLanguage: detected,
            provider: this.name,
        };
    }
}
