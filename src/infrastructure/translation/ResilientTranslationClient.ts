import { ITranslationClient } from '../../domain/ports/ITranslationClient';
import { ITranslationPort } from '../../domain/ports/ITranslationPort';
import {
    AUTO_LANGUAGE,
    TranslationRequest,
    TranslationResult,
    createTranslationResult,
    normalizeLanguageCode,
} from '../../domain/entities/Translation';
import { isValidLanguageCode } from '../../domain/entities/Language';
import {
    TranslationError,
    TranslationUnavailableError,
    UnsupportedLanguageError,
    isTransientTranslationError,
} from '../../domain/errors/TranslationErrors';
import { DEFAULT_RETRY_POLICY, RetryPolicy, withRetry, withTimeout } from '../resilience/RetryUtils';

export interface ResilientTranslationClientOptions {
    retryPolicy?: Partial<RetryPolicy>;
    /** Per-attempt timeout in milliseconds */
    timeoutMs?: number;
    /** Injectable for tests */
    sleep?: (ms: number) => Promise<void>;
}

/**
 * Wraps a translation provider with language validation, a per-call
 * timeout and retries for transient failures. Unsupported languages fail
 * on the first attempt.
 */
export class ResilientTranslationClient implements ITranslationClient {
    private readonly retryPolicy: RetryPolicy;
    private readonly timeoutMs: number;
    private readonly sleep?: (ms: number) => Promise<void>;

    constructor(
        private readonly provider: ITranslationPort,
        options: ResilientTranslationClientOptions = {}
    ) {
        this.retryPolicy = { ...DEFAULT_RETRY_POLICY, ...options.retryPolicy };
        this.timeoutMs = options.timeoutMs ?? 10000;
        this.sleep = options.sleep;
    }

    async translate(request: TranslationRequest): Promise<TranslationResult> {
        const targetLang = normalizeLanguageCode(request.targetLang);
        if (!isValidLanguageCode(targetLang)) {
            throw new UnsupportedLanguageError(request.targetLang);
        }

        let sourceLang: string | undefined;
        const requestedSource = request.sourceLang ? normalizeLanguageCode(request.sourceLang) : '';
        if (requestedSource.length > 0 && requestedSource !== AUTO_LANGUAGE) {
            if (!isValidLanguageCode(requestedSource)) {
                throw new UnsupportedLanguageError(requestedSource);
            }
            sourceLang = requestedSource;
        }

        const translated = await withRetry(
            () => withTimeout(
                (signal) => this.provider.translate(request.sourceText, targetLang, sourceLang, { signal }),
                this.timeoutMs,
                () => new TranslationUnavailableError(`${this.provider.name} timed out after ${this.timeoutMs}ms`)
            ).catch((error: unknown) => {
                throw normalizeError(error);
            }),
            {
                ...this.retryPolicy,
                isRetryable: isTransientTranslationError,
                sleep: this.sleep,
                onRetry: (attempt, error, nextDelayMs) => {
                    const reason = error instanceof Error ? error.message : String(error);
                    console.warn(
                        `[TranslationClient] Attempt ${attempt}/${this.retryPolicy.maxAttempts} failed (${reason}), retrying in ${Math.round(nextDelayMs)}ms`
                    );
                },
            }
        );

        return createTranslationResult(
            translated.translatedText,
            normalizeLanguageCode(translated.detectedSourceLanguage),
            translated.provider
        );
    }
}

function normalizeError(error: unknown): TranslationError {
    if (error instanceof TranslationError) {
        return error;
    }
    const message = error instanceof Error ? error.message : String(error);
    return new TranslationUnavailableError(message, undefined, error);
}
