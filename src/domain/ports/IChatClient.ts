/**
 * Outbound side of the chat platform.
 * Implementations: ChatService (Telegram)
 */
export interface IChatClient {
    /**
     * Sends a plain-text reply to a chat.
     * @param chatId Chat identifier (e.g., Telegram chat ID)
     * @param replyToMessageId Optional message the reply is threaded under
     */
    sendMessage(chatId: string, text: string, replyToMessageId?: string): Promise<void>;
}
