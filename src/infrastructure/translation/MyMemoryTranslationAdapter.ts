import axios from 'axios';
import { ITranslationPort, ProviderTranslation, TranslateOptions } from '../../domain/ports/ITranslationPort';
import {
    TranslationUnavailableError,
    UnsupportedLanguageError,
} from '../../domain/errors/TranslationErrors';
import { isRecord, isTransientStatus, toProviderError } from './providerErrors';

/**
 * Implements ITranslationPort with the MyMemory public API.
 *
 * MyMemory answers HTTP 200 even on failure; the real outcome is in
 * `responseStatus`, which may be a number or a numeric string.
 */
export class MyMemoryTranslationAdapter implements ITranslationPort {
    readonly name = 'MyMemory';

    constructor(
        private readonly baseUrl: string = 'https://api.mymemory.translated.net',
        private readonly email?: string,
        private readonly timeoutMs: number = 10000
    ) { }

    async translate(
        text: string,
        targetLang: string,
        sourceLang?: string,
        options: TranslateOptions = {}
    ): Promise<ProviderTranslation> {
        const params: Record<string, string> = {
            q: text,
            langpair: `${sourceLang ?? 'auto'}|${targetLang}`,
        };
        if (this.email) {
            params.de = this.email;
        }

        let data: unknown;
        try {
            const response = await axios.get(`${this.baseUrl.replace(/\/$/, '')}/get`, {
                params,
                timeout: this.timeoutMs,
                signal: options.signal,
            });
            data = response.data;
        } catch (error) {
            console.warn(`[MyMemory] Request failed: ${error instanceof Error ? error.message : String(error)}`);
            throw toProviderError(this.name, error, targetLang);
        }

        if (!isRecord(data)) {
            throw new TranslationUnavailableError('MyMemory returned an empty response');
        }

        const status = Number(data.responseStatus);
        const details = typeof data.responseDetails === 'string' ? data.responseDetails : '';
        if (status !== 200) {
            if (/language/i.test(details)) {
                throw new UnsupportedLanguageError(targetLang, `MyMemory does not support language: ${targetLang}`);
            }
            const statusCode = Number.isNaN(status) ? undefined : status;
            throw new TranslationUnavailableError(
                `MyMemory responseStatus ${String(data.responseStatus)}${details ? `: ${details}` : ''}`,
                statusCode,
                undefined,
                isTransientStatus(statusCode)
            );
        }

        const responseData = data.responseData;
        if (!isRecord(responseData) || typeof responseData.translatedText !== 'string') {
            throw new TranslationUnavailableError('MyMemory response missing translatedText');
        }

        const detected = typeof responseData.detectedLanguage === 'string'
            ? responseData.detectedLanguage.toLowerCase()
            : (sourceLang ?? 'auto');

        return {
            translatedText: responseData.translatedText,
            detectedSourceLanguage: detected,
            provider: this.name,
        };
    }
}
