import {
    isTransientTranslationError,
    PersistenceConflictError,
    PersistenceUnavailableError,
    TranslationError,
    TranslationUnavailableError,
    UnsupportedLanguageError,
} from '../../../../src/domain/errors/TranslationErrors';
import { createTranslationResult } from '../../../../src/domain/entities/Translation';

describe('TranslationErrors', () => {
    it('should share the TranslationError base with a code', () => {
        const errors: TranslationError[] = [
            new TranslationUnavailableError(),
            new UnsupportedLanguageError('xx'),
            new PersistenceUnavailableError(),
            new PersistenceConflictError('auto:fr:hi', createTranslationResult('a', 'en'), createTranslationResult('b', 'en')),
        ];

        expect(errors.every((error) => error instanceof TranslationError && error instanceof Error)).toBe(true);
        expect(errors.map((error) => error.code)).toEqual([
            'TRANSLATION_UNAVAILABLE',
            'UNSUPPORTED_LANGUAGE',
            'PERSISTENCE_UNAVAILABLE',
            'PERSISTENCE_CONFLICT',
        ]);
    });

    it('should keep the status code and cause of provider failures', () => {
        const cause = new Error('ECONNRESET');
        const error = new TranslationUnavailableError('DeepL translation failed', 503, cause);

        expect(error.statusCode).toBe(503);
        expect(error.cause).toBe(cause);
        expect(error.name).toBe('TranslationUnavailableError');
    });

    it('should only treat transient unavailability as worth retrying', () => {
        expect(isTransientTranslationError(new TranslationUnavailableError())).toBe(true);
        expect(isTransientTranslationError(new TranslationUnavailableError('quota', 456, undefined, false))).toBe(false);
        expect(isTransientTranslationError(new UnsupportedLanguageError('xx'))).toBe(false);
        expect(isTransientTranslationError(new PersistenceUnavailableError())).toBe(false);
        expect(isTransientTranslationError(new Error('plain'))).toBe(false);
    });
});
