import { Router, Request, Response, NextFunction } from 'express';
import { InboundMessage, MessageIntakeService } from '../../application/MessageIntakeService';
import { asyncHandler, UnauthorizedError } from '../middleware/errorHandler';

/**
 * Subset of the Telegram Update object the bot reads.
 */
interface TelegramMessage {
    message_id: number;
    chat: { id: number };
    from?: { id: number };
    text?: string;
    caption?: string;
    reply_to_message?: TelegramMessage;
}

/**
 * Middleware to validate Telegram webhook secret token.
 */
export function validateTelegramSecret(secretToken: string) {
    return (req: Request, res: Response, next: NextFunction) => {
        if (!secretToken) {
            // If no secret is configured, skip validation (dev mode)
            return next();
        }

        const receivedToken = req.headers['x-telegram-bot-api-secret-token'];

        if (receivedToken !== secretToken) {
            console.warn('[Telegram] Invalid webhook secret token received');
            throw new UnauthorizedError('Invalid webhook secret');
        }

        next();
    };
}

/**
 * Creates the Telegram webhook route that feeds chat messages to the intake service.
 */
export function createTelegramWebhookRoutes(intake: MessageIntakeService, secretToken: string): Router {
    const router = Router();

    /**
     * POST /telegram-webhook
     *
     * Receives Telegram updates. Protected by secret token validation.
     */
    router.post(
        '/telegram-webhook',
        validateTelegramSecret(secretToken),
        asyncHandler(async (req: Request, res: Response) => {
            const message = toInboundMessage(req.body);

            // Acknowledge receipt immediately so Telegram does not redeliver
            res.status(200).json({ ok: true });

            if (message) {
                await intake.handleMessage(message);
            }
        })
    );

    return router;
}

/**
 * Extracts a text message from a Telegram update, or null for updates the
 * bot ignores (edits, joins, stickers).
 */
export function toInboundMessage(update: unknown): InboundMessage | null {
    if (!isObject(update)) {
        return null;
    }
    const message = update.message;
    if (!isTelegramMessage(message)) {
        return null;
    }

    const text = message.text ?? message.caption;
    if (!text) {
        return null;
    }

    const inbound: InboundMessage = {
        chatId: String(message.chat.id),
        messageId: String(message.message_id),
        userId: message.from ? String(message.from.id) : undefined,
        text,
    };

    const original = message.reply_to_message;
    const originalText = original?.text ?? original?.caption;
    if (original && originalText) {
        inbound.replyTo = { messageId: String(original.message_id), text: originalText };
    }

    return inbound;
}

function isObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null;
}

function isTelegramMessage(value: unknown): value is TelegramMessage {
    if (!isObject(value) || typeof value.message_id !== 'number') {
        return false;
    }
    const chat = value.chat;
    if (!isObject(chat) || typeof chat.id !== 'number') {
        return false;
    }
    if (value.from !== undefined && !(isObject(value.from) && typeof value.from.id === 'number')) {
        return false;
    }
    if (value.text !== undefined && typeof value.text !== 'string') {
        return false;
    }
    if (value.caption !== undefined && typeof value.caption !== 'string') {
        return false;
    }
    return value.reply_to_message === undefined || isTelegramMessage(value.reply_to_message);
}
