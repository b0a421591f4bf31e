import { TranslationResult } from '../entities/Translation';

export type TranslationErrorCode =
    | 'TRANSLATION_UNAVAILABLE'
    | 'UNSUPPORTED_LANGUAGE'
    | 'PERSISTENCE_UNAVAILABLE'
    | 'PERSISTENCE_CONFLICT';

/**
 * Base class for failures raised by the translation pipeline.
 */
export class TranslationError extends Error {
    constructor(
        public readonly code: TranslationErrorCode,
        message: string,
        cause?: unknown
    ) {
        super(message, { cause });
        this.name = 'TranslationError';
    }
}

/**
 * External service error or timeout, surfaced as "try again later".
 * Only transient failures (network, timeout, 429, 5xx) are retried;
 * auth and quota rejections are not.
 */
export class TranslationUnavailableError extends TranslationError {
    constructor(
        message: string = 'Translation service unavailable',
        public readonly statusCode?: number,
        cause?: unknown,
        public readonly transient: boolean = true
    ) {
        super('TRANSLATION_UNAVAILABLE', message, cause);
        this.name = 'TranslationUnavailableError';
    }
}

/**
 * Invalid or unsupported language code. Permanent: never retried.
 */
export class UnsupportedLanguageError extends TranslationError {
    constructor(
        public readonly language: string,
        message: string = `Language not supported: ${language}`
    ) {
        super('UNSUPPORTED_LANGUAGE', message);
        this.name = 'UnsupportedLanguageError';
    }
}

/**
 * Storage backend could not be reached or failed mid-operation.
 */
export class PersistenceUnavailableError extends TranslationError {
    constructor(message: string = 'Persistence unavailable', cause?: unknown) {
        super('PERSISTENCE_UNAVAILABLE', message, cause);
        this.name = 'PersistenceUnavailableError';
    }
}

/**
 * A different translation was offered for a key that is already stored.
 * The stored value is kept.
 */
export class PersistenceConflictError extends TranslationError {
    constructor(
        public readonly key: string,
        public readonly existing: TranslationResult,
        public readonly rejected: TranslationResult
    ) {
        super('PERSISTENCE_CONFLICT', `Conflicting translation for key ${key}`);
        this.name = 'PersistenceConflictError';
    }
}

/**
 * Whether an error is worth another attempt.
 */
export function isTransientTranslationError(error: unknown): boolean {
    return error instanceof TranslationUnavailableError && error.transient;
}
