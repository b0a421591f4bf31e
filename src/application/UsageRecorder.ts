import { IUsageRepository } from '../domain/ports/IUsageRepository';
import { PipelineOutcome } from './TranslationPipeline';

/** Chat id under which HTTP API translations are logged */
export const API_CHAT_ID = 'api';

/**
 * Provider column for the translation log: the error code for failures,
 * the inner provider for fresh translations, otherwise the cache or store.
 */
export function usageProvider(outcome: PipelineOutcome): string {
    if (outcome.status === 'error_reply') {
        return outcome.error.code;
    }
    return outcome.source === 'translator' ? outcome.result.provider ?? 'unknown' : outcome.source;
}

/**
 * Logs a pipeline outcome and, for provider calls, the characters sent.
 * Recording failures are logged and never reach the caller.
 */
export async function recordUsage(
    usageRepository: IUsageRepository,
    outcome: PipelineOutcome,
    chatId: string,
    messageId?: string
): Promise<void> {
    const provider = usageProvider(outcome);

    try {
        await usageRepository.logTranslation({
            chatId,
            messageId,
            sourceLang: outcome.status === 'reply' ? outcome.result.detectedSourceLang : undefined,
            targetLang: outcome.key.targetLang,
            provider,
            success: outcome.status === 'reply',
        });

        // Coalesced waiters share the leader's provider call.
        if (outcome.status === 'reply' && outcome.source === 'translator' && !outcome.coalesced) {
            await usageRepository.logApiUsage(provider, outcome.request.sourceText.length);
        }
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        console.warn(`[Usage] Could not record usage: ${reason}`);
    }
}
