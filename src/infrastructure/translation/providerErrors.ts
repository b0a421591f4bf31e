import axios from 'axios';
import {
    TranslationError,
    TranslationUnavailableError,
    UnsupportedLanguageError,
} from '../../domain/errors/TranslationErrors';
import { getHttpStatus } from '../resilience/RetryUtils';

/**
 * Maps a failed provider call onto the pipeline's error taxonomy.
 * Bad-request style statuses mean the language was rejected. Network
 * failures, timeouts, 429 and 5xx are transient; any other status (auth,
 * quota) is unavailable without retry.
 */
export function toProviderError(
    provider: string,
    error: unknown,
    targetLang: string,
    unsupportedStatuses: number[] = [400]
): TranslationError {
    if (error instanceof TranslationError) {
        return error;
    }

    if (axios.isCancel(error)) {
        return new TranslationUnavailableError(`${provider} request was aborted`, undefined, error);
    }

    const status = getHttpStatus(error);
    if (status !== undefined && unsupportedStatuses.includes(status)) {
        return new UnsupportedLanguageError(targetLang, `${provider} does not support language: ${targetLang}`);
    }

    const message = error instanceof Error ? error.message : String(error);
    return new TranslationUnavailableError(
        `${provider} translation failed: ${message}`,
        status,
        error,
        isTransientStatus(status)
    );
}

/**
 * No status means the request never got an answer (network error, timeout).
 */
export function isTransientStatus(status: number | undefined): boolean {
    return status === undefined || status === 429 || status >= 500;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
