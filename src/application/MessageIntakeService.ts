import {
    ChatSettings,
    createChatSettings,
    disableLanguage,
    enableLanguage,
    MAX_FLAG_LENGTH,
} from '../domain/entities/ChatSettings';
import { findLanguageByFlag, getFlagEmoji, isValidLanguageCode, sortByPriority } from '../domain/entities/Language';
import { createTranslationRequest, normalizeLanguageCode } from '../domain/entities/Translation';
import { PersistenceUnavailableError } from '../domain/errors/TranslationErrors';
import { IChatClient } from '../domain/ports/IChatClient';
import { IChatSettingsRepository } from '../domain/ports/IChatSettingsRepository';
import { IUsageRepository } from '../domain/ports/IUsageRepository';
import { ParsedCommand, parseCommand, textAfterArgs } from './CommandParser';
import { formatChatStats, formatTranslationReply, getFriendlyErrorMessage } from './ReplyFormatter';
import { PipelineOutcome, TranslationPipeline } from './TranslationPipeline';
import { recordUsage } from './UsageRecorder';

/**
 * A text message delivered by the chat platform.
 */
export interface InboundMessage {
    chatId: string;
    messageId?: string;
    userId?: string;
    text: string;
    /** The message this one replies to, if any */
    replyTo?: {
        messageId: string;
        text: string;
    };
}

export interface LanguageSettings {
    defaultLanguages: string[];
    priority: string[];
}

export interface MessageIntakeDependencies {
    pipeline: TranslationPipeline;
    chatClient: IChatClient;
    settingsRepository: IChatSettingsRepository;
    usageRepository: IUsageRepository;
    languages: LanguageSettings;
    /** Users allowed to change chat languages; empty means everyone */
    adminUserIds: string[];
    statsWindowDays?: number;
}

export const HELP_TEXT = [
    'Flag Relay translates messages for this chat.',
    '',
    'Commands:',
    '/tr <lang> <text> - translate text (or reply to a message with /tr <lang>)',
    '/<lang> - reply to a message to translate it, e.g. /fr',
    'A flag emoji sent as a reply also works, e.g. 🇫🇷',
    '/languages - list enabled languages',
    '/addlang <code> [flag] - enable a language (admins)',
    '/removelang <code> - disable a language (admins)',
    '/stats - translation statistics for this chat',
].join('\n');

/**
 * Turns inbound chat messages into pipeline requests and replies.
 * Handling one message never throws, so one bad update cannot affect others.
 */
export class MessageIntakeService {
    private readonly statsWindowDays: number;

    constructor(private readonly deps: MessageIntakeDependencies) {
        this.statsWindowDays = deps.statsWindowDays ?? 30;
    }

    async handleMessage(message: InboundMessage): Promise<void> {
        try {
            await this.dispatch(message);
        } catch (error) {
            console.error(`[Intake] Failed to handle message in chat ${message.chatId}:`, error);
        }
    }

    /**
     * Translates text for a chat and sends the reply. Exposed for callers
     * that already know the target language.
     */
    async translateAndReply(
        message: InboundMessage,
        text: string,
        targetLang: string,
        settings: ChatSettings
    ): Promise<PipelineOutcome> {
        const lang = normalizeLanguageCode(targetLang);
        const flag = getFlagEmoji(lang, settings.customFlags);
        const replyToId = message.replyTo?.messageId ?? message.messageId;

        console.log(`[Intake] Translating '${text.substring(0, 50)}' to ${lang} for chat ${message.chatId}`);
        const outcome = await this.deps.pipeline.process(createTranslationRequest(text, lang));

        if (outcome.status === 'reply') {
            const chunks = formatTranslationReply(flag, outcome.result.translatedText);
            for (const [index, chunk] of chunks.entries()) {
                await this.deps.chatClient.sendMessage(message.chatId, chunk, index === 0 ? replyToId : undefined);
            }
            console.log(`[Intake] Sent ${chunks.length} chunk(s) from ${outcome.source}`);
        } else {
            await this.deps.chatClient.sendMessage(
                message.chatId,
                `${flag}: ${getFriendlyErrorMessage(outcome.error)}`,
                replyToId
            );
        }

        await recordUsage(this.deps.usageRepository, outcome, message.chatId, message.replyTo?.messageId ?? message.messageId);
        return outcome;
    }

    private async dispatch(message: InboundMessage): Promise<void> {
        const text = message.text.trim();
        if (text.length === 0) {
            return;
        }

        const command = parseCommand(text);
        if (!command) {
            await this.handleFlagReply(message, text);
            return;
        }

        switch (command.name) {
            case 'start':
            case 'help':
                await this.reply(message, HELP_TEXT);
                return;
            case 'tr':
            case 'translate':
                await this.handleTranslateCommand(message, command);
                return;
            case 'languages':
                await this.handleListLanguages(message);
                return;
            case 'addlang':
                await this.handleAddLanguage(message, command);
                return;
            case 'removelang':
                await this.handleRemoveLanguage(message, command);
                return;
            case 'stats':
                await this.handleStats(message);
                return;
            default:
                await this.handleLanguageShortcut(message, command);
        }
    }

    private async handleTranslateCommand(message: InboundMessage, command: ParsedCommand): Promise<void> {
        const [lang] = command.args;
        if (!lang) {
            await this.reply(message, 'Usage: /tr <lang> <text>, or reply to a message with /tr <lang>');
            return;
        }

        const text = textAfterArgs(command, 1) || message.replyTo?.text || '';
        if (text.length === 0) {
            await this.reply(message, 'Nothing to translate. Add text or reply to a message.');
            return;
        }

        const settings = await this.loadSettings(message.chatId);
        await this.translateAndReply(message, text, lang, settings);
    }

    private async handleLanguageShortcut(message: InboundMessage, command: ParsedCommand): Promise<void> {
        const settings = await this.loadSettings(message.chatId);
        if (!settings.enabledLanguages.includes(normalizeLanguageCode(command.name))) {
            return;
        }

        const text = command.rest || message.replyTo?.text || '';
        if (text.length === 0) {
            return;
        }
        await this.translateAndReply(message, text, command.name, settings);
    }

    private async handleFlagReply(message: InboundMessage, text: string): Promise<void> {
        if (!message.replyTo || message.replyTo.text.trim().length === 0) {
            return;
        }

        const settings = await this.loadSettings(message.chatId);
        const lang = findLanguageByFlag(text, settings.enabledLanguages, settings.customFlags);
        if (!lang) {
            return;
        }
        await this.translateAndReply(message, message.replyTo.text, lang, settings);
    }

    private async handleListLanguages(message: InboundMessage): Promise<void> {
        const settings = await this.loadSettings(message.chatId);
        const sorted = sortByPriority(settings.enabledLanguages, this.deps.languages.priority);
        const list = sorted.map((lang) => `${getFlagEmoji(lang, settings.customFlags)} ${lang.toUpperCase()}`).join(', ');
        await this.reply(message, `Enabled languages (${sorted.length}):\n${list}`);
    }

    private async handleAddLanguage(message: InboundMessage, command: ParsedCommand): Promise<void> {
        if (!this.isAdmin(message)) {
            await this.reply(message, 'Only admins can change languages.');
            return;
        }

        const [lang, flag] = command.args;
        if (!lang || !isValidLanguageCode(lang)) {
            await this.reply(message, 'Usage: /addlang <code> [flag], e.g. /addlang ko 🇰🇷');
            return;
        }
        if (flag && flag.length > MAX_FLAG_LENGTH) {
            await this.reply(message, `Flag must be at most ${MAX_FLAG_LENGTH} characters.`);
            return;
        }

        const code = normalizeLanguageCode(lang);
        const settings = await this.loadSettings(message.chatId);
        const updated = enableLanguage(settings, code, flag);
        if (!updated) {
            await this.reply(message, `Language ${code} is already enabled.`);
            return;
        }

        await this.deps.settingsRepository.updateLanguages(message.chatId, updated.enabledLanguages);
        await this.deps.settingsRepository.updateFlags(message.chatId, updated.customFlags);
        console.log(`[Intake] Language ${code} added in chat ${message.chatId}`);
        await this.reply(message, `Language ${code.toUpperCase()} added with flag ${getFlagEmoji(code, updated.customFlags)}`);
    }

    private async handleRemoveLanguage(message: InboundMessage, command: ParsedCommand): Promise<void> {
        if (!this.isAdmin(message)) {
            await this.reply(message, 'Only admins can change languages.');
            return;
        }

        const [lang] = command.args;
        if (!lang) {
            await this.reply(message, 'Usage: /removelang <code>');
            return;
        }

        const code = normalizeLanguageCode(lang);
        const settings = await this.loadSettings(message.chatId);
        const updated = disableLanguage(settings, code);
        if (!updated) {
            await this.reply(message, `Language ${code} is not enabled.`);
            return;
        }

        await this.deps.settingsRepository.updateLanguages(message.chatId, updated.enabledLanguages);
        await this.deps.settingsRepository.updateFlags(message.chatId, updated.customFlags);
        console.log(`[Intake] Language ${code} removed in chat ${message.chatId}`);
        await this.reply(message, `Language ${code.toUpperCase()} removed.`);
    }

    private async handleStats(message: InboundMessage): Promise<void> {
        const stats = await this.deps.usageRepository.getChatStats(message.chatId, this.statsWindowDays);
        await this.reply(message, formatChatStats(stats, this.statsWindowDays));
    }

    private isAdmin(message: InboundMessage): boolean {
        const admins = this.deps.adminUserIds;
        return admins.length === 0 || (message.userId !== undefined && admins.includes(message.userId));
    }

    /**
     * Falls back to in-memory defaults while the database is unavailable.
     */
    private async loadSettings(chatId: string): Promise<ChatSettings> {
        const defaults = { defaultLanguages: this.deps.languages.defaultLanguages };
        try {
            return await this.deps.settingsRepository.getChatSettings(chatId, defaults);
        } catch (error) {
            if (error instanceof PersistenceUnavailableError) {
                console.warn(`[Intake] Using default settings for chat ${chatId}: ${error.message}`);
                return createChatSettings(chatId, defaults);
            }
            throw error;
        }
    }

    private async reply(message: InboundMessage, text: string): Promise<void> {
        await this.deps.chatClient.sendMessage(message.chatId, text, message.messageId);
    }
}
