import { ITranslationPort, ProviderTranslation, TranslateOptions } from '../../domain/ports/ITranslationPort';
import {
    isTransientTranslationError,
    TranslationUnavailableError,
    UnsupportedLanguageError,
} from '../../domain/errors/TranslationErrors';
import { withTimeout } from '../resilience/RetryUtils';

export interface CascadeOptions {
    /** Timeout for each provider call; the next provider gets a fresh one */
    providerTimeoutMs?: number;
}

/**
 * Cascade Translation Adapter
 *
 * Tries each provider in order and returns the first success.
 * Fails with UnsupportedLanguageError only when every provider rejected the
 * language; any other combination of failures is TranslationUnavailableError,
 * retryable only when at least one provider failed transiently.
 */
export class CascadeTranslationAdapter implements ITranslationPort {
    readonly name = 'Cascade';
    private readonly providerTimeoutMs?: number;

    constructor(private readonly providers: ITranslationPort[], options: CascadeOptions = {}) {
        if (providers.length === 0) {
            throw new Error('CascadeTranslationAdapter needs at least one provider');
        }
        this.providerTimeoutMs = options.providerTimeoutMs;
    }

    /** Worst-case time for one pass over every provider */
    get totalTimeoutMs(): number | undefined {
        return this.providerTimeoutMs === undefined ? undefined : this.providerTimeoutMs * this.providers.length;
    }

    async translate(
        text: string,
        targetLang: string,
        sourceLang?: string,
        options: TranslateOptions = {}
    ): Promise<ProviderTranslation> {
        const failures: unknown[] = [];

        for (const [index, provider] of this.providers.entries()) {
            if (options.signal?.aborted) {
                break;
            }
            try {
                const result = await this.callProvider(provider, text, targetLang, sourceLang, options);
                console.log(`[Cascade] ${provider.name} translation successful`);
                return result;
            } catch (error) {
                failures.push(error);
                const next = this.providers[index + 1];
                const reason = error instanceof Error ? error.message : String(error);
                if (next) {
                    console.warn(`[Cascade] ${provider.name} failed (${reason}), trying ${next.name}`);
                } else {
                    console.error(`[Cascade] ${provider.name} failed (${reason}), all services exhausted`);
                }
            }
        }

        if (failures.length === this.providers.length
            && failures.every((failure) => failure instanceof UnsupportedLanguageError)) {
            throw new UnsupportedLanguageError(targetLang);
        }

        const transient = failures.length === 0 || failures.some(isTransientFailure);
        throw new TranslationUnavailableError(
            'Translation failed, all services exhausted.',
            undefined,
            failures[failures.length - 1],
            transient
        );
    }

    private callProvider(
        provider: ITranslationPort,
        text: string,
        targetLang: string,
        sourceLang: string | undefined,
        options: TranslateOptions
    ): Promise<ProviderTranslation> {
        const timeoutMs = this.providerTimeoutMs;
        if (timeoutMs === undefined) {
            return provider.translate(text, targetLang, sourceLang, options);
        }
        return withTimeout(
            (signal) => provider.translate(text, targetLang, sourceLang, { ...options, signal }),
            timeoutMs,
            () => new TranslationUnavailableError(`${provider.name} timed out after ${timeoutMs}ms`),
            options.signal
        );
    }
}

/**
 * Errors outside the taxonomy (a provider bug, an unexpected rejection)
 * count as transient.
 */
function isTransientFailure(failure: unknown): boolean {
    if (failure instanceof UnsupportedLanguageError) {
        return false;
    }
    if (failure instanceof TranslationUnavailableError) {
        return isTransientTranslationError(failure);
    }
    return true;
}
