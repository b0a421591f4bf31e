import dotenv from 'dotenv';

// Load environment variables
dotenv.config();

export type TranslationProviderMode = 'cascade' | 'mock';

/**
 * Application configuration loaded from environment variables.
 */
export interface Config {
    // Server
    port: number;
    environment: string;

    // Telegram
    telegramBotToken: string;
    telegramWebhookSecret: string;
    adminUserIds: string[];

    // Translation providers
    translationProvider: TranslationProviderMode;
    deeplApiKey: string;
    libreTranslateUrl: string;
    libreTranslateApiKey: string;
    myMemoryUrl: string;
    myMemoryEmail: string;

    // Translation client
    translationTimeoutMs: number;
    retryMaxAttempts: number;
    retryInitialBackoffMs: number;
    retryMaxBackoffMs: number;

    // Cache
    cacheCapacity: number;
    cacheWarmLimit: number;

    // Persistence
    databasePath: string;
    logRetentionDays: number;

    // Languages
    defaultLanguages: string[];
    languagePriority: string[];
}

function getEnvVar(key: string, defaultValue?: string): string {
    let value = process.env[key];
    if (value === undefined) {
        if (defaultValue !== undefined) {
            return defaultValue;
        }
        throw new Error(`Missing required environment variable: ${key}`);
    }

    // Trim whitespace and remove wrapping quotes
    value = value.trim();
    if (value.startsWith('"') && value.endsWith('"')) {
        value = value.substring(1, value.length - 1);
    } else if (value.startsWith("'") && value.endsWith("'")) {
        value = value.substring(1, value.length - 1);
    }

    return value;
}

function getEnvVarNumber(key: string, defaultValue?: number): number {
    const value = getEnvVar(key, defaultValue?.toString());
    const parsed = parseFloat(value);
    if (isNaN(parsed)) {
        throw new Error(`Environment variable ${key} must be a number, got: ${value}`);
    }
    return parsed;
}

function getEnvVarList(key: string, defaultValue: string[] = []): string[] {
    const value = getEnvVar(key, defaultValue.join(','));
    return value
        .split(',')
        .map((item) => item.trim().toLowerCase())
        .filter((item) => item.length > 0);
}

function getProviderMode(key: string): TranslationProviderMode {
    const value = getEnvVar(key, 'cascade').toLowerCase();
    if (value !== 'cascade' && value !== 'mock') {
        throw new Error(`Environment variable ${key} must be "cascade" or "mock", got: ${value}`);
    }
    return value;
}

export const DEFAULT_LANGUAGES = ['en', 'es', 'fr', 'de', 'ru', 'pt'];

export const DEFAULT_LANGUAGE_PRIORITY = [
    'en', 'es', 'fr', 'de', 'ru', 'pt', 'it', 'pl', 'ja', 'ko',
    'zh', 'ar', 'hi', 'nl', 'sv', 'no', 'da', 'fi', 'tr', 'cs',
];

/**
 * Loads configuration from environment variables.
 */
export function loadConfig(): Config {
    return {
        // Server
        port: getEnvVarNumber('PORT', 3000),
        environment: getEnvVar('NODE_ENV', 'development'),

        // Telegram
        telegramBotToken: getEnvVar('TELEGRAM_BOT_TOKEN', ''),
        telegramWebhookSecret: getEnvVar('TELEGRAM_WEBHOOK_SECRET', ''),
        adminUserIds: getEnvVarList('ADMIN_USER_IDS'),

        // Translation providers
        translationProvider: getProviderMode('TRANSLATION_PROVIDER'),
        deeplApiKey: getEnvVar('DEEPL_API_KEY', ''),
        libreTranslateUrl: getEnvVar('LIBRETRANSLATE_URL', 'https://libretranslate.com'),
        libreTranslateApiKey: getEnvVar('LIBRETRANSLATE_API_KEY', ''),
        myMemoryUrl: getEnvVar('MYMEMORY_URL', 'https://api.mymemory.translated.net'),
        myMemoryEmail: getEnvVar('MYMEMORY_EMAIL', ''),

        // Translation client
        translationTimeoutMs: getEnvVarNumber('TRANSLATION_TIMEOUT_MS', 10000),
        retryMaxAttempts: getEnvVarNumber('RETRY_MAX_ATTEMPTS', 3),
        retryInitialBackoffMs: getEnvVarNumber('RETRY_INITIAL_BACKOFF_MS', 500),
        retryMaxBackoffMs: getEnvVarNumber('RETRY_MAX_BACKOFF_MS', 8000),

        // Cache
        cacheCapacity: getEnvVarNumber('CACHE_CAPACITY', 1000),
        cacheWarmLimit: getEnvVarNumber('CACHE_WARM_LIMIT', 500),

        // Persistence
        databasePath: getEnvVar('DATABASE_PATH', './data/flag-relay.db'),
        logRetentionDays: getEnvVarNumber('LOG_RETENTION_DAYS', 90),

        // Languages
        defaultLanguages: getEnvVarList('DEFAULT_LANGUAGES', DEFAULT_LANGUAGES),
        languagePriority: getEnvVarList('LANGUAGE_PRIORITY', DEFAULT_LANGUAGE_PRIORITY),
    };
}

/**
 * Validates settings that cannot be checked while parsing.
 */
export function validateConfig(config: Config): string[] {
    const errors: string[] = [];

    if (!config.telegramBotToken) {
        errors.push('TELEGRAM_BOT_TOKEN is required to reply in chats');
    }
    if (!Number.isInteger(config.cacheCapacity) || config.cacheCapacity < 1) {
        errors.push('CACHE_CAPACITY must be a positive integer');
    }
    if (!Number.isInteger(config.retryMaxAttempts) || config.retryMaxAttempts < 1) {
        errors.push('RETRY_MAX_ATTEMPTS must be a positive integer');
    }
    if (config.translationTimeoutMs <= 0) {
        errors.push('TRANSLATION_TIMEOUT_MS must be positive');
    }
    if (config.defaultLanguages.length === 0) {
        errors.push('DEFAULT_LANGUAGES must list at least one language');
    }

    return errors;
}
