import { ITranslationPort, ProviderTranslation } from '../../domain/ports/ITranslationPort';

/**
 * Mock Translation Adapter for development without provider access.
 */
export class MockTranslationAdapter implements ITranslationPort {
    readonly name = 'Mock';

    async translate(text: string, targetLang: string, sourceLang?: string): Promise<ProviderTranslation> {
        console.log(`[MockTranslation] Would translate to ${targetLang}: "${text.substring(0, 50)}"`);
        return {
            translatedText: `[${targetLang.toUpperCase()}] ${text}`,
            detectedSourceLanguage: sourceLang ?? 'en',
            provider: this.name,
        };
    }
}
