import { ChatDefaults, ChatSettings } from '../entities/ChatSettings';

/**
 * Storage for per-chat language preferences.
 */
export interface IChatSettingsRepository {
    /**
     * Returns the chat's settings, creating them from defaults on first use.
     */
    getChatSettings(chatId: string, defaults: ChatDefaults): Promise<ChatSettings>;

    updateLanguages(chatId: string, languages: string[]): Promise<void>;

    updateFlags(chatId: string, flags: Record<string, string>): Promise<void>;

    listChats(): Promise<ChatSettings[]>;
}
