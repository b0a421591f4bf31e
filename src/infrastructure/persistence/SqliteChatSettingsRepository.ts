import { IChatSettingsRepository } from '../../domain/ports/IChatSettingsRepository';
import { ChatDefaults, ChatSettings, createChatSettings } from '../../domain/entities/ChatSettings';
import { SqliteDatabase } from './SqliteDatabase';

interface ChatRow {
    chat_id: string;
    enabled_languages: string;
    custom_flags: string;
    created_at: string;
    updated_at: string;
}

/**
 * Per-chat language settings stored as JSON columns.
 */
export class SqliteChatSettingsRepository implements IChatSettingsRepository {
    constructor(
        private readonly database: SqliteDatabase,
        private readonly now: () => Date = () => new Date()
    ) { }

    async getChatSettings(chatId: string, defaults: ChatDefaults): Promise<ChatSettings> {
        return this.database.run('read chat settings', (db) => {
            const row = db.prepare<[string], ChatRow>(`SELECT * FROM chats WHERE chat_id = ?`).get(chatId);
            if (row) {
                return toSettings(row);
            }

            const settings = createChatSettings(chatId, defaults, this.now());
            db.prepare(
                `INSERT INTO chats (chat_id, enabled_languages, custom_flags, created_at, updated_at)
                 VALUES (?, ?, ?, ?, ?)`
            ).run(
                chatId,
                JSON.stringify(settings.enabledLanguages),
                JSON.stringify(settings.customFlags),
                settings.createdAt.toISOString(),
                settings.updatedAt.toISOString()
            );
            console.log(`[Database] Created default settings for chat ${chatId}`);
            return settings;
        });
    }

    async updateLanguages(chatId: string, languages: string[]): Promise<void> {
        this.database.run('update chat languages', (db) => {
            db.prepare(`UPDATE chats SET enabled_languages = ?, updated_at = ? WHERE chat_id = ?`)
                .run(JSON.stringify(languages), this.now().toISOString(), chatId);
        });
    }

    async updateFlags(chatId: string, flags: Record<string, string>): Promise<void> {
        this.database.run('update chat flags', (db) => {
            db.prepare(`UPDATE chats SET custom_flags = ?, updated_at = ? WHERE chat_id = ?`)
                .run(JSON.stringify(flags), this.now().toISOString(), chatId);
        });
    }

    async listChats(): Promise<ChatSettings[]> {
        return this.database.run('list chats', (db) =>
            db.prepare<[], ChatRow>(`SELECT * FROM chats ORDER BY created_at DESC`).all().map(toSettings)
        );
    }
}

function toSettings(row: ChatRow): ChatSettings {
    return {
        chatId: row.chat_id,
        enabledLanguages: parseStringArray(row.enabled_languages),
        customFlags: parseStringRecord(row.custom_flags),
        createdAt: new Date(row.created_at),
        updatedAt: new Date(row.updated_at),
    };
}

function parseStringArray(json: string): string[] {
    const value: unknown = JSON.parse(json);
    return Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string') : [];
}

function parseStringRecord(json: string): Record<string, string> {
    const value: unknown = JSON.parse(json);
    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
        return {};
    }
    return Object.fromEntries(
        Object.entries(value).filter((entry): entry is [string, string] => typeof entry[1] === 'string')
    );
}
