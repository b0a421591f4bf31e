import axios from 'axios';
import { IChatClient } from '../../domain/ports/IChatClient';
import { codePointBoundary, MAX_MESSAGE_LENGTH } from '../../application/ReplyFormatter';

/**
 * Telegram Bot API client for outbound replies.
 */
export class ChatService implements IChatClient {
    private readonly baseUrl: string;

    constructor(private readonly botToken: string) {
        this.baseUrl = `https://api.telegram.org/bot${botToken}`;
    }

    /**
     * Sends a plain-text message to a Telegram chat. Failures are logged,
     * not thrown: a lost reply must not fail the translation.
     */
    async sendMessage(chatId: string, text: string, replyToMessageId?: string): Promise<void> {
        if (!this.botToken) {
            console.warn('[Telegram] Bot token not configured, skipping message send');
            return;
        }

        const content = text.length > MAX_MESSAGE_LENGTH
            ? text.slice(0, codePointBoundary(text, MAX_MESSAGE_LENGTH))
            : text;
        const payload: Record<string, unknown> = {
            chat_id: chatId,
            text: content,
        };
        if (replyToMessageId) {
            payload.reply_parameters = {
                message_id: Number(replyToMessageId),
                allow_sending_without_reply: true,
            };
        }

        try {
            await axios.post(`${this.baseUrl}/sendMessage`, payload);
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            console.error(`[Telegram] Failed to send message to chat ${chatId}: ${reason}`);
        }
    }
}
