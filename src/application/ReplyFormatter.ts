import { TranslationError } from '../domain/errors/TranslationErrors';
import { ChatStats } from '../domain/entities/UsageStats';

/** Telegram's limit for a single text message */
export const MAX_MESSAGE_LENGTH = 4096;

/**
 * Moves a cut position back by one when it would separate a surrogate
 * pair, so emoji and other astral characters stay whole.
 */
export function codePointBoundary(text: string, index: number): number {
    if (index <= 0 || index >= text.length) {
        return Math.max(0, Math.min(index, text.length));
    }
    const before = text.charCodeAt(index - 1);
    const after = text.charCodeAt(index);
    const splitsPair = before >= 0xd800 && before <= 0xdbff && after >= 0xdc00 && after <= 0xdfff;
    return splitsPair ? index - 1 : index;
}

/**
 * Splits text into chunks no longer than maxLength, breaking on line
 * boundaries where possible and hard-splitting lines that are too long.
 */
export function splitMessage(text: string, maxLength: number = MAX_MESSAGE_LENGTH): string[] {
    if (maxLength < 1) {
        throw new Error(`maxLength must be positive, got: ${maxLength}`);
    }
    if (text.length <= maxLength) {
        return [text];
    }

    const chunks: string[] = [];
    let current = '';

    for (const line of text.split('\n')) {
        const pieces: string[] = [];
        for (let i = 0; i < line.length;) {
            const boundary = codePointBoundary(line, i + maxLength);
            // A single pair longer than maxLength is the only case that cannot be kept whole.
            const end = boundary > i ? boundary : i + maxLength;
            pieces.push(line.slice(i, end));
            i = end;
        }
        if (pieces.length === 0) {
            pieces.push('');
        }

        for (const piece of pieces) {
            const candidate = current ? `${current}\n${piece}` : piece;
            if (candidate.length <= maxLength) {
                current = candidate;
            } else {
                if (current) {
                    chunks.push(current);
                }
                current = piece;
            }
        }
    }

    if (current) {
        chunks.push(current);
    }
    return chunks;
}

/**
 * Prefixes the translation with the language flag and splits it so that
 * every chunk, prefix included, fits in one message.
 */
export function formatTranslationReply(flag: string, translatedText: string, maxLength: number = MAX_MESSAGE_LENGTH): string[] {
    const prefix = `${flag}: `;
    const chunks = splitMessage(translatedText, maxLength - prefix.length);
    return chunks.map((chunk, index) => (index === 0 ? `${prefix}${chunk}` : chunk));
}

/**
 * Converts pipeline errors to messages suitable for chat users.
 */
export function getFriendlyErrorMessage(error: TranslationError): string {
    switch (error.code) {
        case 'UNSUPPORTED_LANGUAGE':
            return 'This language is not supported.';
        case 'TRANSLATION_UNAVAILABLE':
            return 'Translation services are unavailable right now. Please try again later.';
        default:
            return 'Something went wrong. Please try again.';
    }
}

export function formatChatStats(stats: ChatStats, days: number): string {
    const lines = [
        `Translation stats (last ${days} days)`,
        `Total: ${stats.total}`,
        `Successful: ${stats.success} (${stats.successRate.toFixed(1)}%)`,
    ];

    if (stats.topLanguages.length > 0) {
        lines.push(`Top languages: ${stats.topLanguages.map((l) => `${l.lang} (${l.count})`).join(', ')}`);
    }

    const providers = Object.entries(stats.providerDistribution);
    if (providers.length > 0) {
        lines.push(`Sources: ${providers.map(([name, count]) => `${name} (${count})`).join(', ')}`);
    }

    return lines.join('\n');
}
