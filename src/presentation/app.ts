import express, { Application, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import { Config } from '../config';
import { TranslationPipeline } from '../application/TranslationPipeline';
import { MessageIntakeService } from '../application/MessageIntakeService';
import { IChatClient } from '../domain/ports/IChatClient';
import { ITranslationPort } from '../domain/ports/ITranslationPort';
import { IUsageRepository } from '../domain/ports/IUsageRepository';

// Infrastructure imports
import { LruTranslationCache } from '../infrastructure/cache/LruTranslationCache';
import { SqliteDatabase } from '../infrastructure/persistence/SqliteDatabase';
import { SqliteTranslationStore } from '../infrastructure/persistence/SqliteTranslationStore';
import { SqliteUsageRepository } from '../infrastructure/persistence/SqliteUsageRepository';
import { SqliteChatSettingsRepository } from '../infrastructure/persistence/SqliteChatSettingsRepository';
import { CascadeTranslationAdapter } from '../infrastructure/translation/CascadeTranslationAdapter';
import { DeepLTranslationAdapter } from '../infrastructure/translation/DeepLTranslationAdapter';
import { LibreTranslateAdapter } from '../infrastructure/translation/LibreTranslateAdapter';
import { MyMemoryTranslationAdapter } from '../infrastructure/translation/MyMemoryTranslationAdapter';
import { MockTranslationAdapter } from '../infrastructure/translation/MockTranslationAdapter';
import { ResilientTranslationClient } from '../infrastructure/translation/ResilientTranslationClient';
import { ChatService } from './services/ChatService';

// Route imports
import { createTranslateRoutes } from './routes/translateRoutes';
import { createTelegramWebhookRoutes } from './routes/telegramWebhook';
import { errorHandler, NotFoundError } from './middleware/errorHandler';

/**
 * Everything the HTTP app needs; built by createDependencies or by tests.
 */
export interface AppDependencies {
    pipeline: TranslationPipeline;
    intake: MessageIntakeService;
    usageRepository: IUsageRepository;
    /** Present when the app owns a database connection */
    database?: SqliteDatabase;
}

/**
 * Builds the provider chain: DeepL (when a key is set), LibreTranslate,
 * then MyMemory, each call under TRANSLATION_TIMEOUT_MS. 'mock' mode
 * answers locally.
 */
export function createTranslationProvider(config: Config): ITranslationPort {
    if (config.translationProvider === 'mock') {
        console.log('[App] Using mock translation provider');
        return new MockTranslationAdapter();
    }

    const providers: ITranslationPort[] = [];
    if (config.deeplApiKey) {
        providers.push(new DeepLTranslationAdapter(config.deeplApiKey, config.translationTimeoutMs));
    }
    providers.push(
        new LibreTranslateAdapter(
            config.libreTranslateUrl,
            config.libreTranslateApiKey || undefined,
            config.translationTimeoutMs
        ),
        new MyMemoryTranslationAdapter(config.myMemoryUrl, config.myMemoryEmail || undefined, config.translationTimeoutMs)
    );

    console.log(`[App] Translation providers: ${providers.map((p) => p.name).join(' -> ')}`);
    return new CascadeTranslationAdapter(providers, { providerTimeoutMs: config.translationTimeoutMs });
}

/**
 * Wires the production object graph from configuration.
 */
export function createDependencies(config: Config, chatClient?: IChatClient): AppDependencies {
    const database = new SqliteDatabase(config.databasePath);
    const store = new SqliteTranslationStore(database);
    const usageRepository = new SqliteUsageRepository(database);
    const settingsRepository = new SqliteChatSettingsRepository(database);

    const provider = createTranslationProvider(config);
    // Each cascade provider has its own timeout; an attempt may use all of them.
    const attemptTimeoutMs = provider instanceof CascadeTranslationAdapter
        ? provider.totalTimeoutMs ?? config.translationTimeoutMs
        : config.translationTimeoutMs;

    const translator = new ResilientTranslationClient(provider, {
        timeoutMs: attemptTimeoutMs,
        retryPolicy: {
            maxAttempts: config.retryMaxAttempts,
            initialBackoffMs: config.retryInitialBackoffMs,
            maxBackoffMs: config.retryMaxBackoffMs,
        },
    });

    const pipeline = new TranslationPipeline({
        cache: new LruTranslationCache(config.cacheCapacity),
        store,
        translator,
    });

    const intake = new MessageIntakeService({
        pipeline,
        chatClient: chatClient ?? new ChatService(config.telegramBotToken),
        settingsRepository,
        usageRepository,
        languages: {
            defaultLanguages: config.defaultLanguages,
            priority: config.languagePriority,
        },
        adminUserIds: config.adminUserIds,
    });

    return { pipeline, intake, usageRepository, database };
}

/**
 * Creates and configures the Express application.
 */
export function createApp(config: Config, deps: AppDependencies = createDependencies(config)): Application {
    const app = express();

    // Middleware
    app.use(cors());
    app.use(express.json());

    // Health check
    app.get('/health', (req: Request, res: Response) => {
        res.json({
            status: 'ok',
            timestamp: new Date().toISOString(),
            version: '1.0.0',
            database: deps.database ? (deps.database.isOpen ? 'open' : 'unavailable') : 'none',
        });
    });

    // API routes
    app.use('/api', createTranslateRoutes(deps.pipeline, deps.usageRepository));
    app.use(createTelegramWebhookRoutes(deps.intake, config.telegramWebhookSecret));

    app.use((req: Request, _res: Response, next: NextFunction) => {
        next(new NotFoundError(`Route not found: ${req.method} ${req.path}`));
    });

    // Error handler (must be last)
    app.use(errorHandler);

    return app;
}
