import express from 'express';
import request from 'supertest';
import { createTelegramWebhookRoutes, toInboundMessage } from '../../../src/presentation/routes/telegramWebhook';
import { errorHandler } from '../../../src/presentation/middleware/errorHandler';
import { MessageIntakeService } from '../../../src/application/MessageIntakeService';
import { TranslationPipeline } from '../../../src/application/TranslationPipeline';
import { LruTranslationCache } from '../../../src/infrastructure/cache/LruTranslationCache';
import { MockTranslationAdapter } from '../../../src/infrastructure/translation/MockTranslationAdapter';
import { ResilientTranslationClient } from '../../../src/infrastructure/translation/ResilientTranslationClient';
import {
    InMemoryChatSettingsRepository,
    InMemoryTranslationStore,
    RecordingChatClient,
    RecordingUsageRepository,
} from '../../helpers/fakes';

function createIntake(): MessageIntakeService {
    return new MessageIntakeService({
        pipeline: new TranslationPipeline({
            cache: new LruTranslationCache(10),
            store: new InMemoryTranslationStore(),
            translator: new ResilientTranslationClient(new MockTranslationAdapter()),
        }),
        chatClient: new RecordingChatClient(),
        settingsRepository: new InMemoryChatSettingsRepository(),
        usageRepository: new RecordingUsageRepository(),
        languages: { defaultLanguages: ['en', 'fr'], priority: ['en', 'fr'] },
        adminUserIds: [],
    });
}

function createWebhookApp(intake: MessageIntakeService, secret: string) {
    const app = express();
    app.use(express.json());
    app.use(createTelegramWebhookRoutes(intake, secret));
    app.use(errorHandler);
    return app;
}

const update = {
    update_id: 1001,
    message: {
        message_id: 10,
        chat: { id: -100123, type: 'supergroup' },
        from: { id: 7, is_bot: false, first_name: 'Test' },
        text: '/tr fr Hello',
    },
};

describe('Telegram webhook', () => {
    beforeEach(() => {
        jest.spyOn(console, 'log').mockImplementation(() => undefined);
        jest.spyOn(console, 'warn').mockImplementation(() => undefined);
        jest.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    describe('toInboundMessage', () => {
        it('should convert a text message with string ids', () => {
            expect(toInboundMessage(update)).toEqual({
                chatId: '-100123',
                messageId: '10',
                userId: '7',
                text: '/tr fr Hello',
            });
        });

        it('should include the replied-to message, using its caption when it has no text', () => {
            const inbound = toInboundMessage({
                message: {
                    message_id: 11,
                    chat: { id: 5 },
                    text: '🇫🇷',
                    reply_to_message: { message_id: 9, chat: { id: 5 }, caption: 'Photo caption' },
                },
            });

            expect(inbound?.replyTo).toEqual({ messageId: '9', text: 'Photo caption' });
        });

        it.each([
            ['no message', { update_id: 1, edited_message: { message_id: 1, chat: { id: 1 }, text: 'x' } }],
            ['no text', { message: { message_id: 1, chat: { id: 1 }, sticker: {} } }],
            ['malformed chat', { message: { message_id: 1, chat: 'x', text: 'hi' } }],
            ['not an object', 'hello'],
        ])('should ignore updates with %s', (_label, body) => {
            expect(toInboundMessage(body)).toBeNull();
        });
    });

    describe('POST /telegram-webhook', () => {
        it('should reject requests with a wrong secret', async () => {
            const intake = createIntake();
            const handle = jest.spyOn(intake, 'handleMessage');

            const res = await request(createWebhookApp(intake, 'test-secret'))
                .post('/telegram-webhook')
                .set('x-telegram-bot-api-secret-token', 'wrong')
                .send(update);

            expect(res.status).toBe(401);
            expect(res.body).toEqual({ error: { message: 'Invalid webhook secret', code: 'UnauthorizedError' } });
            expect(handle).not.toHaveBeenCalled();
        });

        it('should acknowledge and hand the message to the intake service', async () => {
            const intake = createIntake();
            const handle = jest.spyOn(intake, 'handleMessage').mockResolvedValue(undefined);

            const res = await request(createWebhookApp(intake, 'test-secret'))
                .post('/telegram-webhook')
                .set('x-telegram-bot-api-secret-token', 'test-secret')
                .send(update);

            expect(res.status).toBe(200);
            expect(res.body).toEqual({ ok: true });
            expect(handle).toHaveBeenCalledWith({
                chatId: '-100123',
                messageId: '10',
                userId: '7',
                text: '/tr fr Hello',
            });
        });

        it('should skip validation when no secret is configured', async () => {
            const intake = createIntake();
            jest.spyOn(intake, 'handleMessage').mockResolvedValue(undefined);

            const res = await request(createWebhookApp(intake, '')).post('/telegram-webhook').send(update);

            expect(res.status).toBe(200);
        });

        it('should acknowledge updates it ignores', async () => {
            const intake = createIntake();
            const handle = jest.spyOn(intake, 'handleMessage');

            const res = await request(createWebhookApp(intake, '')).post('/telegram-webhook').send({ update_id: 5 });

            expect(res.status).toBe(200);
            expect(handle).not.toHaveBeenCalled();
        });
    });
});
