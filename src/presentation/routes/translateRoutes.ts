import { Router, Request, Response } from 'express';
import { TranslationPipeline } from '../../application/TranslationPipeline';
import { createTranslationRequest } from '../../domain/entities/Translation';
import { IUsageRepository } from '../../domain/ports/IUsageRepository';
import { API_CHAT_ID, recordUsage } from '../../application/UsageRecorder';
import { asyncHandler, BadRequestError } from '../middleware/errorHandler';

/**
 * Validated body of POST /api/translate.
 */
interface TranslateBody {
    text: string;
    targetLang: string;
    sourceLang?: string;
}

const MAX_TEXT_LENGTH = 5000;

function parseTranslateBody(body: unknown): TranslateBody {
    if (typeof body !== 'object' || body === null) {
        throw new BadRequestError('Request body must be a JSON object');
    }

    const text = 'text' in body ? body.text : undefined;
    const targetLang = 'targetLang' in body ? body.targetLang : undefined;
    const sourceLang = 'sourceLang' in body ? body.sourceLang : undefined;

    if (typeof text !== 'string' || text.trim().length === 0) {
        throw new BadRequestError('text is required');
    }
    if (text.length > MAX_TEXT_LENGTH) {
        throw new BadRequestError(`text must be at most ${MAX_TEXT_LENGTH} characters`);
    }
    if (typeof targetLang !== 'string' || targetLang.trim().length === 0) {
        throw new BadRequestError('targetLang is required');
    }
    if (sourceLang !== undefined && typeof sourceLang !== 'string') {
        throw new BadRequestError('sourceLang must be a string');
    }

    return { text, targetLang, sourceLang };
}

/**
 * Creates the translation HTTP API routes.
 */
export function createTranslateRoutes(pipeline: TranslationPipeline, usageRepository: IUsageRepository): Router {
    const router = Router();

    /**
     * POST /translate
     *
     * Translates text through the cache, persistence and provider chain.
 * Usage is logged under the 'api' chat id.
     */
    router.post(
        '/translate',
        asyncHandler(async (req: Request, res: Response) => {
            const body = parseTranslateBody(req.body);
            const outcome = await pipeline.process(
                createTranslationRequest(body.text, body.targetLang, body.sourceLang)
            );
            await recordUsage(usageRepository, outcome, API_CHAT_ID);

            if (outcome.status === 'error_reply') {
                throw outcome.error;
            }

            res.json({
                requestId: outcome.requestId,
                translatedText: outcome.result.translatedText,
                detectedSourceLang: outcome.result.detectedSourceLang,
                targetLang: outcome.key.targetLang,
                source: outcome.source,
                provider: outcome.result.provider ?? null,
                degraded: outcome.degraded,
            });
        })
    );

    /**
     * GET /usage
     *
     * Today's characters sent to each translation provider.
     */
    router.get(
        '/usage',
        asyncHandler(async (_req: Request, res: Response) => {
            const usage = await usageRepository.getApiUsageToday();
            res.json({ usage });
        })
    );

    /**
     * GET /chats/:chatId/stats
     */
    router.get(
        '/chats/:chatId/stats',
        asyncHandler(async (req: Request, res: Response) => {
            const days = req.query.days === undefined ? 30 : Number(req.query.days);
            if (!Number.isInteger(days) || days < 1) {
                throw new BadRequestError('days must be a positive integer');
            }

            const stats = await usageRepository.getChatStats(req.params.chatId, days);
            res.json({ chatId: req.params.chatId, days, ...stats });
        })
    );

    return router;
}
