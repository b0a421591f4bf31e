/**
 * Integration Tests: HTTP API and Telegram webhook
 * Runs the Express app against the mock provider and in-memory fakes.
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import request from 'supertest';
import { Application } from 'express';
import { AppDependencies, createApp, createDependencies, createTranslationProvider } from '../../src/presentation/app';
import { MessageIntakeService } from '../../src/application/MessageIntakeService';
import { TranslationPipeline } from '../../src/application/TranslationPipeline';
import { LruTranslationCache } from '../../src/infrastructure/cache/LruTranslationCache';
import { MockTranslationAdapter } from '../../src/infrastructure/translation/MockTranslationAdapter';
import { ResilientTranslationClient } from '../../src/infrastructure/translation/ResilientTranslationClient';
import { ITranslationPort } from '../../src/domain/ports/ITranslationPort';
import { TranslationUnavailableError } from '../../src/domain/errors/TranslationErrors';
import { createTestConfig } from '../helpers/config';
import {
    InMemoryChatSettingsRepository,
    InMemoryTranslationStore,
    RecordingChatClient,
    RecordingUsageRepository,
} from '../helpers/fakes';

const config = createTestConfig();

function createTestDependencies(provider: ITranslationPort = new MockTranslationAdapter()) {
    const chatClient = new RecordingChatClient();
    const usageRepository = new RecordingUsageRepository();
    const pipeline = new TranslationPipeline({
        cache: new LruTranslationCache(config.cacheCapacity),
        store: new InMemoryTranslationStore(),
        translator: new ResilientTranslationClient(provider, { retryPolicy: { maxAttempts: 1 } }),
    });
    const intake = new MessageIntakeService({
        pipeline,
        chatClient,
        settingsRepository: new InMemoryChatSettingsRepository(),
        usageRepository,
        languages: { defaultLanguages: config.defaultLanguages, priority: config.languagePriority },
        adminUserIds: config.adminUserIds,
    });
    const deps: AppDependencies = { pipeline, intake, usageRepository };
    return { deps, chatClient, usageRepository };
}

describe('Integration: Translation API', () => {
    let app: Application;
    let chatClient: RecordingChatClient;
    let usageRepository: RecordingUsageRepository;
    let deps: AppDependencies;

    beforeEach(() => {
        jest.spyOn(console, 'log').mockImplementation(() => undefined);
        jest.spyOn(console, 'warn').mockImplementation(() => undefined);
        jest.spyOn(console, 'error').mockImplementation(() => undefined);
        ({ deps, chatClient, usageRepository } = createTestDependencies());
        app = createApp(config, deps);
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    describe('GET /health', () => {
        it('should report ok', async () => {
            const res = await request(app).get('/health');

            expect(res.status).toBe(200);
            expect(res.body).toMatchObject({ status: 'ok', version: '1.0.0', database: 'none' });
        });
    });

    describe('unknown routes', () => {
        it('should answer 404 with the error envelope', async () => {
            const res = await request(app).get('/api/nothing-here');

            expect(res.status).toBe(404);
            expect(res.body).toEqual({
                error: { message: 'Route not found: GET /api/nothing-here', code: 'NotFoundError' },
            });
            expect(console.warn).toHaveBeenCalledWith(
                '[WARN] NotFoundError: Route not found: GET /api/nothing-here (GET /api/nothing-here)'
            );
        });
    });

    describe('POST /api/translate', () => {
        it('should translate and then serve the same request from cache', async () => {
            const first = await request(app).post('/api/translate').send({ text: 'Hello', targetLang: 'fr' });

            expect(first.status).toBe(200);
            expect(first.body).toMatchObject({
                translatedText: '[FR] Hello',
                detectedSourceLang: 'en',
                targetLang: 'fr',
                source: 'translator',
                provider: 'Mock',
                degraded: false,
            });
            expect(first.body.requestId).toMatch(/^req_/);

            const second = await request(app).post('/api/translate').send({ text: ' hello ', targetLang: 'FR' });

            expect(second.status).toBe(200);
            expect(second.body.source).toBe('cache');
            expect(second.body.translatedText).toBe('[FR] Hello');
        });

        it('should pass a source language hint through', async () => {
            const res = await request(app)
                .post('/api/translate')
                .send({ text: 'Hallo', targetLang: 'en', sourceLang: 'de' });

            expect(res.status).toBe(200);
            expect(res.body.detectedSourceLang).toBe('de');
        });

        it.each([
            [{}, 'text is required'],
            [{ text: '   ', targetLang: 'fr' }, 'text is required'],
            [{ text: 'Hello' }, 'targetLang is required'],
            [{ text: 'Hello', targetLang: 'fr', sourceLang: 7 }, 'sourceLang must be a string'],
            [{ text: 'a'.repeat(5001), targetLang: 'fr' }, 'text must be at most 5000 characters'],
        ])('should reject invalid body %#', async (body, message) => {
            const res = await request(app).post('/api/translate').send(body);

            expect(res.status).toBe(400);
            expect(res.body).toEqual({ error: { message, code: 'BadRequestError' } });
        });

        it('should answer 422 for unsupported languages', async () => {
            const res = await request(app).post('/api/translate').send({ text: 'Hello', targetLang: 'klingon' });

            expect(res.status).toBe(422);
            expect(res.body).toEqual({
                error: { message: 'Language not supported: klingon', code: 'UNSUPPORTED_LANGUAGE' },
            });
        });

        it('should answer 503 when providers are down', async () => {
            const down: ITranslationPort = {
                name: 'Down',
                translate: async () => {
                    throw new TranslationUnavailableError('Translation failed, all services exhausted.');
                },
            };
            app = createApp(config, createTestDependencies(down).deps);

            const res = await request(app).post('/api/translate').send({ text: 'Hello', targetLang: 'fr' });

            expect(res.status).toBe(503);
            expect(res.body).toEqual({
                error: { message: 'Translation failed, all services exhausted.', code: 'TRANSLATION_UNAVAILABLE' },
            });
        });
    });

    describe('usage and stats', () => {
        it('should return today\'s provider usage', async () => {
            await usageRepository.logApiUsage('DeepL', 120);
            await usageRepository.logApiUsage('DeepL', 30);

            const res = await request(app).get('/api/usage');

            expect(res.status).toBe(200);
            expect(res.body).toEqual({ usage: { DeepL: 150 } });
        });

        it('should count provider characters spent through the API', async () => {
            await request(app).post('/api/translate').send({ text: 'Hello', targetLang: 'fr' });
            await request(app).post('/api/translate').send({ text: 'Hello', targetLang: 'fr' });
            await request(app).post('/api/translate').send({ text: 'Hello', targetLang: 'klingon' });

            const res = await request(app).get('/api/usage');

            expect(res.body).toEqual({ usage: { Mock: 5 } });
            expect(usageRepository.translations.map((entry) => [entry.chatId, entry.provider, entry.success])).toEqual([
                ['api', 'Mock', true],
                ['api', 'cache', true],
                ['api', 'UNSUPPORTED_LANGUAGE', false],
            ]);
        });

        it('should return chat statistics', async () => {
            const res = await request(app).get('/api/chats/42/stats?days=7');

            expect(res.status).toBe(200);
            expect(res.body).toEqual({
                chatId: '42',
                days: 7,
                total: 0,
                success: 0,
                successRate: 0,
                topLanguages: [],
                providerDistribution: {},
            });
        });

        it('should reject an invalid window', async () => {
            const res = await request(app).get('/api/chats/42/stats?days=0');

            expect(res.status).toBe(400);
            expect(res.body.error.message).toBe('days must be a positive integer');
        });
    });

    describe('POST /telegram-webhook', () => {
        it('should reply in the chat after acknowledging the update', async () => {
            const handled = jest.spyOn(deps.intake, 'handleMessage');

            const res = await request(app)
                .post('/telegram-webhook')
                .set('x-telegram-bot-api-secret-token', 'test-secret')
                .send({
                    update_id: 1,
                    message: { message_id: 10, chat: { id: 42 }, from: { id: 1 }, text: '/tr de Good morning' },
                });

            expect(res.status).toBe(200);
            await handled.mock.results[0].value;

            expect(chatClient.sent).toEqual([
                { chatId: '42', text: '🇩🇪: [DE] Good morning', replyToMessageId: '10' },
            ]);
            expect(usageRepository.apiUsage).toEqual([{ provider: 'Mock', charsUsed: 12 }]);
        });

        it('should require the webhook secret', async () => {
            const res = await request(app).post('/telegram-webhook').send({ update_id: 1 });

            expect(res.status).toBe(401);
        });
    });
});

describe('Integration: application wiring', () => {
    beforeEach(() => {
        jest.spyOn(console, 'log').mockImplementation(() => undefined);
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    it('should build the cascade when providers are configured', () => {
        expect(createTranslationProvider(createTestConfig({ translationProvider: 'cascade' })).name).toBe('Cascade');
        expect(createTranslationProvider(createTestConfig({ translationProvider: 'mock' })).name).toBe('Mock');
    });

    it('should wire SQLite persistence and serve translations end to end', async () => {
        const deps = createDependencies(createTestConfig(), new RecordingChatClient());
        const app = createApp(createTestConfig(), deps);

        try {
            const health = await request(app).get('/health');
            expect(health.body.database).toBe('open');

            const res = await request(app).post('/api/translate').send({ text: 'Hello', targetLang: 'fr' });
            expect(res.status).toBe(200);

            await expect(deps.pipeline.warmCache()).resolves.toBe(1);
        } finally {
            deps.database?.close();
        }
    });

    it('should run cache-only when the database cannot be opened', async () => {
        jest.spyOn(console, 'warn').mockImplementation(() => undefined);
        jest.spyOn(console, 'error').mockImplementation(() => undefined);
        const workDir = fs.mkdtempSync(path.join(os.tmpdir(), 'flag-relay-app-'));
        const blocker = path.join(workDir, 'blocker');
        fs.writeFileSync(blocker, 'not a directory');
        const brokenConfig = createTestConfig({ databasePath: path.join(blocker, 'data', 'flag-relay.db') });

        try {
            const deps = createDependencies(brokenConfig, new RecordingChatClient());
            const app = createApp(brokenConfig, deps);

            await expect(deps.pipeline.warmCache()).resolves.toBe(0);

            const health = await request(app).get('/health');
            expect(health.body.database).toBe('unavailable');

            const res = await request(app).post('/api/translate').send({ text: 'Hello', targetLang: 'fr' });
            expect(res.status).toBe(200);
            expect(res.body).toMatchObject({ translatedText: '[FR] Hello', source: 'translator', degraded: true });

            const again = await request(app).post('/api/translate').send({ text: 'Hello', targetLang: 'fr' });
            expect(again.body.source).toBe('cache');
        } finally {
            fs.rmSync(workDir, { recursive: true, force: true });
        }
    });
});
